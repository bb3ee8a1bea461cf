// pattern: Functional Core
// Closed sets of mutually exclusive firejail settings.
// Each union has a constructor namespace of the same name; the `notSpecified`
// variant always means "emit nothing".

/**
 * Home directory isolation (`--private`, `--private=dir`)
 */
export type PrivateMode =
  | { readonly kind: "notSpecified" }
  | { readonly kind: "temporary" }
  | { readonly kind: "directory"; readonly path: string };

export const PrivateMode = {
  notSpecified: (): PrivateMode => ({ kind: "notSpecified" }),
  /** Temporary home directory, discarded when the sandbox exits */
  temporary: (): PrivateMode => ({ kind: "temporary" }),
  /** Use `path` as the sandbox home directory */
  directory: (path: string): PrivateMode => ({ kind: "directory", path }),
};

/**
 * Value of one of the `--private-bin`, `--private-etc`, ... options
 */
export type PrivateList =
  | { readonly kind: "notSpecified" }
  | { readonly kind: "default" }
  | { readonly kind: "entries"; readonly entries: readonly string[] };

export const PrivateList = {
  notSpecified: (): PrivateList => ({ kind: "notSpecified" }),
  default: (): PrivateList => ({ kind: "default" }),
  entries: (entries: Iterable<string>): PrivateList => ({
    kind: "entries",
    entries: [...entries],
  }),
};

/**
 * Address assignment for a sandbox network interface (`--ip`, `--ip6`)
 */
export type IpConfig =
  | { readonly kind: "notSpecified" }
  | { readonly kind: "none" }
  | { readonly kind: "dhcp" }
  | { readonly kind: "address"; readonly address: string };

export const IpConfig = {
  notSpecified: (): IpConfig => ({ kind: "notSpecified" }),
  none: (): IpConfig => ({ kind: "none" }),
  dhcp: (): IpConfig => ({ kind: "dhcp" }),
  address: (address: string): IpConfig => ({ kind: "address", address }),
};

/**
 * Parameters that firejail applies to the interface named by `--net`
 */
export interface NetInterfaceParams {
  ip?: IpConfig;
  ip6?: IpConfig;
  mac?: string;
  mtu?: number;
  defaultGateway?: string;
  netmask?: string;
  vethName?: string;
}

export type NetMode =
  | { readonly kind: "notSpecified" }
  | { readonly kind: "none" }
  | ({ readonly kind: "interface"; readonly device: string } & Readonly<
      NetInterfaceParams
    >);

export const NetMode = {
  notSpecified: (): NetMode => ({ kind: "notSpecified" }),
  /** New network namespace with only a loopback interface */
  none: (): NetMode => ({ kind: "none" }),
  /** Attach the sandbox to a bridge or ethernet device */
  interface: (device: string, params: NetInterfaceParams = {}): NetMode => ({
    kind: "interface",
    device,
    ...params,
  }),
};

export type NetFilter =
  | { readonly kind: "notSpecified" }
  | { readonly kind: "default" }
  | { readonly kind: "file"; readonly path: string };

export const NetFilter = {
  notSpecified: (): NetFilter => ({ kind: "notSpecified" }),
  default: (): NetFilter => ({ kind: "default" }),
  file: (path: string): NetFilter => ({ kind: "file", path }),
};

export type Overlay =
  | { readonly kind: "notSpecified" }
  | { readonly kind: "persistent" }
  | { readonly kind: "tmpfs" }
  | { readonly kind: "named"; readonly name: string };

export const Overlay = {
  notSpecified: (): Overlay => ({ kind: "notSpecified" }),
  persistent: (): Overlay => ({ kind: "persistent" }),
  tmpfs: (): Overlay => ({ kind: "tmpfs" }),
  named: (name: string): Overlay => ({ kind: "named", name }),
};

/** A running sandbox, by name or by pid */
export type JoinTarget = string | number;

export type Join =
  | { readonly kind: "notSpecified" }
  | { readonly kind: "join"; readonly target: JoinTarget }
  | { readonly kind: "network"; readonly target: JoinTarget }
  | { readonly kind: "filesystem"; readonly target: JoinTarget }
  | { readonly kind: "orStart"; readonly name: string };

export const Join = {
  notSpecified: (): Join => ({ kind: "notSpecified" }),
  join: (target: JoinTarget): Join => ({ kind: "join", target }),
  network: (target: JoinTarget): Join => ({ kind: "network", target }),
  filesystem: (target: JoinTarget): Join => ({ kind: "filesystem", target }),
  orStart: (name: string): Join => ({ kind: "orStart", name }),
};

export type Seccomp =
  | { readonly kind: "notSpecified" }
  | { readonly kind: "default" }
  | { readonly kind: "syscalls"; readonly syscalls: readonly string[] }
  | { readonly kind: "drop"; readonly syscalls: readonly string[] }
  | { readonly kind: "keep"; readonly syscalls: readonly string[] };

export const Seccomp = {
  notSpecified: (): Seccomp => ({ kind: "notSpecified" }),
  /** firejail's default syscall blacklist */
  default: (): Seccomp => ({ kind: "default" }),
  /** Default blacklist plus the given syscalls */
  syscalls: (syscalls: Iterable<string>): Seccomp => ({
    kind: "syscalls",
    syscalls: [...syscalls],
  }),
  drop: (syscalls: Iterable<string>): Seccomp => ({
    kind: "drop",
    syscalls: [...syscalls],
  }),
  keep: (syscalls: Iterable<string>): Seccomp => ({
    kind: "keep",
    syscalls: [...syscalls],
  }),
};

export type Shell =
  | { readonly kind: "notSpecified" }
  | { readonly kind: "none" }
  | { readonly kind: "program"; readonly path: string };

export const Shell = {
  notSpecified: (): Shell => ({ kind: "notSpecified" }),
  none: (): Shell => ({ kind: "none" }),
  program: (path: string): Shell => ({ kind: "program", path }),
};

export type X11 =
  | { readonly kind: "notSpecified" }
  | { readonly kind: "auto" }
  | { readonly kind: "none" }
  | { readonly kind: "xephyr" }
  | { readonly kind: "xorg" }
  | { readonly kind: "xpra" }
  | { readonly kind: "xvfb" };

/** X11 variants that take an explicit `--x11=<mode>` value */
export type X11Server = Exclude<X11["kind"], "notSpecified" | "auto">;

export const X11 = {
  notSpecified: (): X11 => ({ kind: "notSpecified" }),
  /** Let firejail pick the first available X server */
  auto: (): X11 => ({ kind: "auto" }),
  server: (kind: X11Server): X11 => ({ kind }),
};
