import { type Static, Type } from "@sinclair/typebox";

import {
  PATH_LIST_FLAGS,
  PRIVATE_LIST_FLAGS,
  SWITCH_FLAGS,
} from "../../../firejail/profile.js";

const StringList = Type.Array(Type.String());

export const SwitchNameV1 = Type.Union(
  SWITCH_FLAGS.map(([name]) => Type.Literal(name)),
  {
    description: "A firejail switch, named as the builder method",
    errorMessage: "must be a known switch name",
  }
);
export type SwitchNameV1 = Static<typeof SwitchNameV1>;

export const ScalarOptionsV1 = Type.Object(
  {
    cgroup: Type.Optional(Type.String()),
    hostname: Type.Optional(Type.String()),
    hostsFile: Type.Optional(Type.String()),
    timeout: Type.Optional(
      Type.Union([Type.String(), Type.Integer({ minimum: 0 })], {
        description: "hh:mm:ss, or a number of seconds",
      })
    ),
    name: Type.Optional(Type.String()),
    nice: Type.Optional(Type.Integer()),
    chroot: Type.Optional(Type.String()),
    profile: Type.Optional(
      Type.String({ description: "A firejail .profile file to load" })
    ),
    rlimitAs: Type.Optional(Type.Union([Type.String(), Type.Integer()])),
    rlimitCpu: Type.Optional(Type.Integer()),
    rlimitFsize: Type.Optional(Type.Union([Type.String(), Type.Integer()])),
    rlimitNofile: Type.Optional(Type.Integer()),
    rlimitNproc: Type.Optional(Type.Integer()),
    rlimitSigpending: Type.Optional(Type.Integer()),
    output: Type.Optional(Type.String()),
    outputStderr: Type.Optional(Type.String()),
  },
  { additionalProperties: false }
);
export type ScalarOptionsV1 = Static<typeof ScalarOptionsV1>;

export const CapsDropV1 = Type.Union(
  [
    Type.Literal("all"),
    Type.Object(
      {
        keep: Type.Optional(StringList),
        drop: Type.Optional(StringList),
      },
      { additionalProperties: false }
    ),
  ],
  { description: 'Only used together with the "caps" switch' }
);
export type CapsDropV1 = Static<typeof CapsDropV1>;

const PrivateListValueV1 = Type.Union([Type.Literal(true), StringList], {
  description: "true for firejail's default set, or explicit entries",
});

export const PrivateListsV1 = Type.Partial(
  Type.Object(
    Object.fromEntries(
      PRIVATE_LIST_FLAGS.map(([name]) => [name, PrivateListValueV1])
    )
  ),
  { additionalProperties: false }
);
export type PrivateListsV1 = Static<typeof PrivateListsV1>;

export const NetInterfaceV1 = Type.Object(
  {
    device: Type.String({ description: "Bridge or ethernet device" }),
    ip: Type.Optional(
      Type.String({ description: '"none", "dhcp", or an IPv4 address' })
    ),
    ip6: Type.Optional(
      Type.String({ description: '"none", "dhcp", or an IPv6 address' })
    ),
    mac: Type.Optional(Type.String()),
    mtu: Type.Optional(Type.Integer({ minimum: 1 })),
    defaultGateway: Type.Optional(Type.String()),
    netmask: Type.Optional(Type.String()),
    vethName: Type.Optional(Type.String()),
  },
  { additionalProperties: false }
);
export type NetInterfaceV1 = Static<typeof NetInterfaceV1>;

export const JoinV1 = Type.Object(
  {
    mode: Type.Union([
      Type.Literal("join"),
      Type.Literal("network"),
      Type.Literal("filesystem"),
      Type.Literal("orStart"),
    ]),
    target: Type.Union([Type.String(), Type.Integer({ minimum: 1 })], {
      description: "Sandbox name or pid; orStart takes a name",
    }),
  },
  { additionalProperties: false }
);
export type JoinV1 = Static<typeof JoinV1>;

export const SeccompV1 = Type.Union([
  Type.Literal(true),
  Type.Object({ syscalls: StringList }, { additionalProperties: false }),
  Type.Object({ drop: StringList }, { additionalProperties: false }),
  Type.Object({ keep: StringList }, { additionalProperties: false }),
]);
export type SeccompV1 = Static<typeof SeccompV1>;

export const X11V1 = Type.Union([
  Type.Literal("auto"),
  Type.Literal("none"),
  Type.Literal("xephyr"),
  Type.Literal("xorg"),
  Type.Literal("xpra"),
  Type.Literal("xvfb"),
]);
export type X11V1 = Static<typeof X11V1>;

export const PathListsV1 = Type.Partial(
  Type.Object(
    Object.fromEntries(PATH_LIST_FLAGS.map(([name]) => [name, StringList]))
  ),
  { additionalProperties: false }
);
export type PathListsV1 = Static<typeof PathListsV1>;

export const JailProfileV1 = Type.Object(
  {
    version: Type.Literal(1),
    verbose: Type.Optional(Type.Boolean()),
    enable: Type.Optional(Type.Array(SwitchNameV1)),
    options: Type.Optional(ScalarOptionsV1),
    capsDrop: Type.Optional(CapsDropV1),
    private: Type.Optional(
      Type.Union([Type.Literal(true), Type.String()], {
        description: "true for a temporary home, or a directory to use",
      })
    ),
    privateLists: Type.Optional(PrivateListsV1),
    net: Type.Optional(Type.Union([Type.Literal("none"), NetInterfaceV1])),
    netfilter: Type.Optional(
      Type.Union([Type.Literal(true), Type.String()], {
        description: "true for the default filter, or a filter file",
      })
    ),
    overlay: Type.Optional(
      Type.Union([
        Type.Literal("persistent"),
        Type.Literal("tmpfs"),
        Type.Object({ named: Type.String() }, { additionalProperties: false }),
      ])
    ),
    join: Type.Optional(JoinV1),
    seccomp: Type.Optional(SeccompV1),
    shell: Type.Optional(
      Type.String({ description: '"none", or the shell to use' })
    ),
    x11: Type.Optional(X11V1),
    cpus: Type.Optional(Type.Array(Type.Integer({ minimum: 0 }))),
    protocols: Type.Optional(StringList),
    binds: Type.Optional(
      Type.Array(
        Type.Object(
          { source: Type.String(), target: Type.String() },
          { additionalProperties: false }
        )
      )
    ),
    dns: Type.Optional(StringList),
    blacklist: Type.Optional(StringList),
    ignore: Type.Optional(StringList),
    paths: Type.Optional(PathListsV1),
    env: Type.Optional(
      Type.Record(Type.String(), Type.String(), {
        description: "Variables set inside the sandbox with --env",
      })
    ),
  },
  { additionalProperties: false }
);
export type JailProfileV1 = Static<typeof JailProfileV1>;
