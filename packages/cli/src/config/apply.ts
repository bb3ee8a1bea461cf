// pattern: Functional Core
// Drives FirejailCommand builder methods from a validated profile file.
// Keys are applied in a fixed order; the emitted vector order comes from the
// flag emitter, not from the file.

import {
  CapsDrop,
  IpConfig,
  Join,
  NetFilter,
  NetMode,
  Overlay,
  PrivateList,
  PrivateMode,
  Seccomp,
  Shell,
  X11,
} from "../firejail/index.js";
import {
  PATH_LIST_FLAGS,
  PRIVATE_LIST_FLAGS,
  SCALAR_FLAGS,
} from "../firejail/profile.js";

import type {
  JailProfileV1,
  JoinV1,
  NetInterfaceV1,
  PathListsV1,
  PrivateListsV1,
  ScalarOptionsV1,
  SeccompV1,
} from "./types/v1/index.js";
import type { FirejailCommand } from "../firejail/index.js";

function toIpConfig(value: string | undefined): IpConfig | undefined {
  switch (value) {
    case undefined:
      return undefined;
    case "none":
      return IpConfig.none();
    case "dhcp":
      return IpConfig.dhcp();
    default:
      return IpConfig.address(value);
  }
}

function toNetMode(net: "none" | NetInterfaceV1): NetMode {
  if (net === "none") {
    return NetMode.none();
  }
  const ip = toIpConfig(net.ip);
  const ip6 = toIpConfig(net.ip6);
  return NetMode.interface(net.device, {
    ...(ip && { ip }),
    ...(ip6 && { ip6 }),
    ...(net.mac !== undefined && { mac: net.mac }),
    ...(net.mtu !== undefined && { mtu: net.mtu }),
    ...(net.defaultGateway !== undefined && {
      defaultGateway: net.defaultGateway,
    }),
    ...(net.netmask !== undefined && { netmask: net.netmask }),
    ...(net.vethName !== undefined && { vethName: net.vethName }),
  });
}

function toJoin(join: JoinV1): Join {
  switch (join.mode) {
    case "join":
      return Join.join(join.target);
    case "network":
      return Join.network(join.target);
    case "filesystem":
      return Join.filesystem(join.target);
    case "orStart":
      return Join.orStart(String(join.target));
  }
}

function toSeccomp(seccomp: SeccompV1): Seccomp {
  if (seccomp === true) {
    return Seccomp.default();
  }
  if ("syscalls" in seccomp) {
    return Seccomp.syscalls(seccomp.syscalls);
  }
  if ("drop" in seccomp) {
    return Seccomp.drop(seccomp.drop);
  }
  return Seccomp.keep(seccomp.keep);
}

/**
 * Apply every setting of a profile file to a command
 */
export function applyJailProfile(
  command: FirejailCommand,
  profile: JailProfileV1
): FirejailCommand {
  if (profile.verbose) {
    command.verbose();
  }

  for (const name of profile.enable ?? []) {
    command.enable(name);
  }

  const options: ScalarOptionsV1 = profile.options ?? {};
  for (const [name] of SCALAR_FLAGS) {
    const value = options[name];
    if (value === undefined) {
      continue;
    }
    if (name === "timeout") {
      command.timeout(value);
    } else {
      command.option(name, value);
    }
  }

  if (profile.capsDrop === "all") {
    command.capsDrop(CapsDrop.dropAll());
  } else if (profile.capsDrop) {
    command.capsDrop(
      CapsDrop.builder()
        .keeps(profile.capsDrop.keep ?? [])
        .drops(profile.capsDrop.drop ?? [])
        .build()
    );
  }

  if (profile.private === true) {
    command.privateMode(PrivateMode.temporary());
  } else if (profile.private !== undefined) {
    command.privateMode(PrivateMode.directory(profile.private));
  }

  const privateLists: PrivateListsV1 = profile.privateLists ?? {};
  for (const [name] of PRIVATE_LIST_FLAGS) {
    const value = privateLists[name];
    if (value === true) {
      command.privateList(name, PrivateList.default());
    } else if (value !== undefined) {
      command.privateList(name, PrivateList.entries(value));
    }
  }

  if (profile.net !== undefined) {
    command.net(toNetMode(profile.net));
  }

  if (profile.netfilter === true) {
    command.netfilter(NetFilter.default());
  } else if (profile.netfilter !== undefined) {
    command.netfilter(NetFilter.file(profile.netfilter));
  }

  if (profile.overlay === "persistent") {
    command.overlay(Overlay.persistent());
  } else if (profile.overlay === "tmpfs") {
    command.overlay(Overlay.tmpfs());
  } else if (profile.overlay !== undefined) {
    command.overlay(Overlay.named(profile.overlay.named));
  }

  if (profile.join !== undefined) {
    command.join(toJoin(profile.join));
  }
  if (profile.seccomp !== undefined) {
    command.seccomp(toSeccomp(profile.seccomp));
  }
  if (profile.shell !== undefined) {
    command.shell(
      profile.shell === "none" ? Shell.none() : Shell.program(profile.shell)
    );
  }
  if (profile.x11 !== undefined) {
    command.x11(profile.x11 === "auto" ? X11.auto() : X11.server(profile.x11));
  }

  command.cpus(profile.cpus ?? []);
  command.protocols(profile.protocols ?? []);
  for (const { source, target } of profile.binds ?? []) {
    command.bind(source, target);
  }
  command.dnsServers(profile.dns ?? []);
  command.blacklists(profile.blacklist ?? []);
  command.ignores(profile.ignore ?? []);

  const paths: PathListsV1 = profile.paths ?? {};
  for (const [name] of PATH_LIST_FLAGS) {
    const entries = paths[name];
    if (entries !== undefined) {
      command.pathList(name, entries);
    }
  }

  command.sandboxEnvs(profile.env ?? {});

  return command;
}
