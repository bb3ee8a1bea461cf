// pattern: Functional Core
// Turns a finished Profile into the ordered firejail argument vector.
// Values are interpolated verbatim: every flag is one argv element and is
// never seen by a shell.

import {
  PATH_LIST_FLAGS,
  PRIVATE_LIST_FLAGS,
  SCALAR_FLAGS,
  SWITCH_FLAGS,
} from "./profile.js";

import type { CapsDrop } from "./caps-drop.js";
import type { Profile } from "./profile.js";
import type {
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
} from "./settings.js";

/** Marks the end of launcher flags */
export const SEPARATOR = "--";

export const QUIET_FLAG = "--quiet";

function unreachable(value: never): never {
  throw new Error(`Unhandled setting: ${JSON.stringify(value)}`);
}

function capsDropFlags(capsDrop: CapsDrop): string[] {
  switch (capsDrop.kind) {
    case "notSpecified":
      return [];
    case "dropAll":
      return ["--caps.drop=all"];
    case "settings": {
      const flags: string[] = [];
      if (capsDrop.keep.length > 0) {
        flags.push(`--caps.keep=${capsDrop.keep.join(",")}`);
      }
      if (capsDrop.drop.length > 0) {
        flags.push(`--caps.drop=${capsDrop.drop.join(",")}`);
      }
      return flags;
    }
    default:
      return unreachable(capsDrop);
  }
}

function privateFlags(mode: PrivateMode): string[] {
  switch (mode.kind) {
    case "notSpecified":
      return [];
    case "temporary":
      return ["--private"];
    case "directory":
      return [`--private=${mode.path}`];
    default:
      return unreachable(mode);
  }
}

function privateListFlags(flag: string, list: PrivateList): string[] {
  switch (list.kind) {
    case "notSpecified":
      return [];
    case "default":
      return [flag];
    case "entries":
      return [`${flag}=${list.entries.join(",")}`];
    default:
      return unreachable(list);
  }
}

function ipFlags(flag: string, config: IpConfig | undefined): string[] {
  if (!config) {
    return [];
  }
  switch (config.kind) {
    case "notSpecified":
      return [];
    case "none":
      return [`${flag}=none`];
    case "dhcp":
      return [`${flag}=dhcp`];
    case "address":
      return [`${flag}=${config.address}`];
    default:
      return unreachable(config);
  }
}

function netFlags(net: NetMode): string[] {
  switch (net.kind) {
    case "notSpecified":
      return [];
    case "none":
      return ["--net=none"];
    case "interface": {
      const flags = [`--net=${net.device}`];
      flags.push(...ipFlags("--ip", net.ip));
      flags.push(...ipFlags("--ip6", net.ip6));
      if (net.mac !== undefined) flags.push(`--mac=${net.mac}`);
      if (net.mtu !== undefined) flags.push(`--mtu=${net.mtu}`);
      if (net.defaultGateway !== undefined) {
        flags.push(`--defaultgw=${net.defaultGateway}`);
      }
      if (net.netmask !== undefined) flags.push(`--netmask=${net.netmask}`);
      if (net.vethName !== undefined) {
        flags.push(`--veth-name=${net.vethName}`);
      }
      return flags;
    }
    default:
      return unreachable(net);
  }
}

function netfilterFlags(netfilter: NetFilter): string[] {
  switch (netfilter.kind) {
    case "notSpecified":
      return [];
    case "default":
      return ["--netfilter"];
    case "file":
      return [`--netfilter=${netfilter.path}`];
    default:
      return unreachable(netfilter);
  }
}

function overlayFlags(overlay: Overlay): string[] {
  switch (overlay.kind) {
    case "notSpecified":
      return [];
    case "persistent":
      return ["--overlay"];
    case "tmpfs":
      return ["--overlay-tmpfs"];
    case "named":
      return [`--overlay-named=${overlay.name}`];
    default:
      return unreachable(overlay);
  }
}

function joinFlags(join: Join): string[] {
  switch (join.kind) {
    case "notSpecified":
      return [];
    case "join":
      return [`--join=${join.target}`];
    case "network":
      return [`--join-network=${join.target}`];
    case "filesystem":
      return [`--join-filesystem=${join.target}`];
    case "orStart":
      return [`--join-or-start=${join.name}`];
    default:
      return unreachable(join);
  }
}

function seccompFlags(seccomp: Seccomp): string[] {
  switch (seccomp.kind) {
    case "notSpecified":
      return [];
    case "default":
      return ["--seccomp"];
    case "syscalls":
      return [`--seccomp=${seccomp.syscalls.join(",")}`];
    case "drop":
      return [`--seccomp.drop=${seccomp.syscalls.join(",")}`];
    case "keep":
      return [`--seccomp.keep=${seccomp.syscalls.join(",")}`];
    default:
      return unreachable(seccomp);
  }
}

function shellFlags(shell: Shell): string[] {
  switch (shell.kind) {
    case "notSpecified":
      return [];
    case "none":
      return ["--shell=none"];
    case "program":
      return [`--shell=${shell.path}`];
    default:
      return unreachable(shell);
  }
}

function x11Flags(x11: X11): string[] {
  switch (x11.kind) {
    case "notSpecified":
      return [];
    case "auto":
      return ["--x11"];
    case "none":
    case "xephyr":
    case "xorg":
    case "xpra":
    case "xvfb":
      return [`--x11=${x11.kind}`];
    default:
      return unreachable(x11);
  }
}

/**
 * Produce the launcher flags for a profile, without the separator or the
 * target invocation. Identical profiles always produce identical vectors.
 */
export function emitFlags(profile: Readonly<Profile>): string[] {
  const args: string[] = [];

  if (!profile.verbose) {
    args.push(QUIET_FLAG);
  }

  for (const [name, flag] of SWITCH_FLAGS) {
    if (profile.switches.has(name)) {
      args.push(flag);
    }
  }

  // Capability settings mean nothing to firejail without --caps
  if (profile.switches.has("caps")) {
    args.push(...capsDropFlags(profile.capsDrop));
  }

  for (const [name, flag] of SCALAR_FLAGS) {
    const value = profile.scalars[name];
    if (value !== undefined) {
      args.push(`${flag}=${value}`);
    }
  }

  args.push(...privateFlags(profile.private));
  for (const [name, flag] of PRIVATE_LIST_FLAGS) {
    const list = profile.privateLists[name];
    if (list) {
      args.push(...privateListFlags(flag, list));
    }
  }
  args.push(...netFlags(profile.net));
  args.push(...netfilterFlags(profile.netfilter));
  args.push(...overlayFlags(profile.overlay));
  args.push(...joinFlags(profile.join));
  args.push(...seccompFlags(profile.seccomp));
  args.push(...shellFlags(profile.shell));
  args.push(...x11Flags(profile.x11));

  if (profile.cpus.length > 0) {
    args.push(`--cpu=${profile.cpus.map(cpu => cpu.toString(10)).join(",")}`);
  }
  if (profile.protocols.length > 0) {
    args.push(`--protocol=${profile.protocols.join(",")}`);
  }

  for (const { source, target } of profile.binds) {
    args.push(`--bind=${source},${target}`);
  }
  for (const server of profile.dns) {
    args.push(`--dns=${server}`);
  }
  for (const path of profile.blacklists) {
    args.push(`--blacklist=${path}`);
  }
  for (const command of profile.ignores) {
    args.push(`--ignore=${command}`);
  }

  for (const [name, flag] of PATH_LIST_FLAGS) {
    for (const entry of profile.pathLists[name] ?? []) {
      args.push(`${flag}=${entry}`);
    }
  }
  for (const { name, value } of profile.sandboxEnv) {
    args.push(`--env=${name}=${value}`);
  }

  return args;
}

/**
 * Full argument vector for the launcher: flags, separator, then the target
 * program and its own arguments in caller order.
 */
export function buildLauncherArgs(
  profile: Readonly<Profile>,
  program: string,
  args: readonly string[]
): string[] {
  return [...emitFlags(profile), SEPARATOR, program, ...args];
}
