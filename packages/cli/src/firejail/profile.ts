// pattern: Functional Core
// The aggregate firejail configuration and the tables that map its fields to
// launcher flags. Adding a switch, scalar or repeated list is one table line.

import { CapsDrop } from "./caps-drop.js";
import {
  Join,
  NetFilter,
  NetMode,
  Overlay,
  type PrivateList,
  PrivateMode,
  Seccomp,
  Shell,
  X11,
} from "./settings.js";

/**
 * No-argument switches, in emission order
 */
export const SWITCH_FLAGS = [
  ["caps", "--caps"],
  ["allowDebuggers", "--allow-debuggers"],
  ["allusers", "--allusers"],
  ["apparmor", "--apparmor"],
  ["appimage", "--appimage"],
  ["deterministicExitCode", "--deterministic-exit-code"],
  ["deterministicShutdown", "--deterministic-shutdown"],
  ["disableMnt", "--disable-mnt"],
  ["ipcNamespace", "--ipc-namespace"],
  ["keepDevShm", "--keep-dev-shm"],
  ["keepVarTmp", "--keep-var-tmp"],
  ["machineId", "--machine-id"],
  ["memoryDenyWriteExecute", "--memory-deny-write-execute"],
  ["no3d", "--no3d"],
  ["noAutoPulse", "--noautopulse"],
  ["noDvd", "--nodvd"],
  ["noGroups", "--nogroups"],
  ["noInput", "--noinput"],
  ["noNewPrivs", "--nonewprivs"],
  ["noPrinters", "--noprinters"],
  ["noProfile", "--noprofile"],
  ["noRoot", "--noroot"],
  ["noSound", "--nosound"],
  ["noTv", "--notv"],
  ["noU2f", "--nou2f"],
  ["noVideo", "--novideo"],
  ["privateCache", "--private-cache"],
  ["privateDev", "--private-dev"],
  ["privateTmp", "--private-tmp"],
  ["restrictNamespaces", "--restrict-namespaces"],
  ["seccompBlockSecondary", "--seccomp.block-secondary"],
  ["writableEtc", "--writable-etc"],
  ["writableRunUser", "--writable-run-user"],
  ["writableVar", "--writable-var"],
  ["writableVarLog", "--writable-var-log"],
] as const;
export type SwitchName = (typeof SWITCH_FLAGS)[number][0];

/**
 * Single-valued options emitted as `flag=value`, in emission order
 */
export const SCALAR_FLAGS = [
  ["cgroup", "--cgroup"],
  ["hostname", "--hostname"],
  ["hostsFile", "--hosts-file"],
  ["timeout", "--timeout"],
  ["name", "--name"],
  ["nice", "--nice"],
  ["chroot", "--chroot"],
  ["profile", "--profile"],
  ["rlimitAs", "--rlimit-as"],
  ["rlimitCpu", "--rlimit-cpu"],
  ["rlimitFsize", "--rlimit-fsize"],
  ["rlimitNofile", "--rlimit-nofile"],
  ["rlimitNproc", "--rlimit-nproc"],
  ["rlimitSigpending", "--rlimit-sigpending"],
  ["output", "--output"],
  ["outputStderr", "--output-stderr"],
] as const;
export type ScalarName = (typeof SCALAR_FLAGS)[number][0];
export type ScalarValue = string | number;

/**
 * `--private-*` list options, in emission order
 */
export const PRIVATE_LIST_FLAGS = [
  ["privateBin", "--private-bin"],
  ["privateEtc", "--private-etc"],
  ["privateLib", "--private-lib"],
  ["privateOpt", "--private-opt"],
  ["privateSrv", "--private-srv"],
  ["privateHome", "--private-home"],
] as const;
export type PrivateListName = (typeof PRIVATE_LIST_FLAGS)[number][0];

/**
 * Repeatable options, one flag per entry, emitted after `--ignore`
 */
export const PATH_LIST_FLAGS = [
  ["whitelist", "--whitelist"],
  ["noblacklist", "--noblacklist"],
  ["nowhitelist", "--nowhitelist"],
  ["readOnly", "--read-only"],
  ["readWrite", "--read-write"],
  ["noexec", "--noexec"],
  ["tmpfs", "--tmpfs"],
  ["mkdir", "--mkdir"],
  ["mkfile", "--mkfile"],
  ["rmenv", "--rmenv"],
] as const;
export type PathListName = (typeof PATH_LIST_FLAGS)[number][0];

export interface BindPair {
  source: string;
  target: string;
}

export interface EnvPair {
  name: string;
  value: string;
}

/**
 * Everything a firejail invocation can be asked to do.
 * Every field has a default meaning "not requested".
 */
export interface Profile {
  /** When false, `--quiet` is emitted */
  verbose: boolean;
  /** Enabled switches; emission follows `SWITCH_FLAGS` order, not insertion */
  switches: Set<SwitchName>;
  scalars: Partial<Record<ScalarName, ScalarValue>>;
  capsDrop: CapsDrop;
  private: PrivateMode;
  /** Absent entries are `notSpecified` */
  privateLists: Partial<Record<PrivateListName, PrivateList>>;
  net: NetMode;
  netfilter: NetFilter;
  overlay: Overlay;
  join: Join;
  seccomp: Seccomp;
  shell: Shell;
  x11: X11;
  cpus: number[];
  protocols: string[];
  binds: BindPair[];
  dns: string[];
  blacklists: string[];
  ignores: string[];
  pathLists: Partial<Record<PathListName, string[]>>;
  /** Variables set inside the sandbox (`--env=name=value`) */
  sandboxEnv: EnvPair[];
}

/**
 * Create a profile with nothing requested
 */
export function createProfile(): Profile {
  return {
    verbose: false,
    switches: new Set(),
    scalars: {},
    capsDrop: CapsDrop.notSpecified(),
    private: PrivateMode.notSpecified(),
    privateLists: {},
    net: NetMode.notSpecified(),
    netfilter: NetFilter.notSpecified(),
    overlay: Overlay.notSpecified(),
    join: Join.notSpecified(),
    seccomp: Seccomp.notSpecified(),
    shell: Shell.notSpecified(),
    x11: X11.notSpecified(),
    cpus: [],
    protocols: [],
    binds: [],
    dns: [],
    blacklists: [],
    ignores: [],
    pathLists: {},
    sandboxEnv: [],
  };
}

/**
 * Render a number of seconds as firejail's `hh:mm:ss` timeout format
 */
export function formatTimeout(totalSeconds: number): string {
  const seconds = Number.isFinite(totalSeconds)
    ? Math.max(0, Math.floor(totalSeconds))
    : 0;
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const rest = seconds % 60;
  return [hours, minutes, rest]
    .map(part => String(part).padStart(2, "0"))
    .join(":");
}
