// pattern: Mixed (unavoidable)
// Fluent firejail configuration plus the single side-effecting spawn.
// Builder methods only touch in-memory state; spawn() hands the emitted
// vector to execa.

import { once } from "node:events";
import { access, constants } from "node:fs/promises";
import { dirname } from "node:path";

import { execa, type Options, type ResultPromise } from "execa";
import { type Logger, pino } from "pino";

import { LaunchError } from "../utils/errors.js";

import {
  clearEnvironment,
  createEnvironmentEdits,
  removeVariable,
  resolveEnvironment,
  setVariable,
} from "./environment.js";
import { buildLauncherArgs } from "./flags.js";
import { createProfile, formatTimeout } from "./profile.js";
import { PrivateList } from "./settings.js";

import type { CapsDrop } from "./caps-drop.js";
import type {
  PathListName,
  PrivateListName,
  Profile,
  ScalarName,
  ScalarValue,
  SwitchName,
} from "./profile.js";
import type {
  Join,
  NetFilter,
  NetMode,
  Overlay,
  PrivateMode,
  Seccomp,
  Shell,
  X11,
} from "./settings.js";

export const DEFAULT_LAUNCHER = "firejail";

/**
 * Where a standard stream of the launched process goes.
 * `ignore` discards it; `{ file }` redirects it to a path.
 */
export type StdioSetting = "inherit" | "pipe" | "ignore" | { file: string };

interface StdioSettings {
  stdin?: StdioSetting;
  stdout?: StdioSetting;
  stderr?: StdioSetting;
}

/**
 * A launcher process that the operating system has started.
 * Awaiting `child` resolves once it exits; a non-zero exit code is reported
 * on the result rather than thrown.
 */
export interface SpawnedJail {
  child: ResultPromise;
  pid: number;
  launcher: string;
  args: string[];
}

const SILENT_LOGGER = pino({ level: "silent" });

/**
 * Builds a firejail invocation in the style of a process builder.
 * Every configuration method returns `this`; lists append, scalars replace.
 */
export class FirejailCommand {
  private readonly program: string;
  private readonly targetArgs: string[] = [];
  private readonly profile: Profile = createProfile();
  private readonly envEdits = createEnvironmentEdits();
  private readonly stdio: StdioSettings = {};
  private readonly childLogger: Logger;
  private launcher = DEFAULT_LAUNCHER;
  private cwd?: string;
  private spawned = false;

  constructor(program: string, logger: Logger = SILENT_LOGGER) {
    this.program = program;

    const processName = program.split(/[/\\]/).pop() ?? program;
    this.childLogger = logger.child({ process: processName });
  }

  // Target invocation

  arg(arg: string): this {
    this.targetArgs.push(arg);
    return this;
  }

  args(args: Iterable<string>): this {
    this.targetArgs.push(...args);
    return this;
  }

  // Switches

  /**
   * Turn on any switch by name
   */
  enable(name: SwitchName): this {
    this.profile.switches.add(name);
    return this;
  }

  /**
   * Turn a switch back off. Settings that depend on it stay stored.
   */
  disable(name: SwitchName): this {
    this.profile.switches.delete(name);
    return this;
  }

  /**
   * Let firejail print its own progress. Without this `--quiet` is passed.
   */
  verbose(): this {
    this.profile.verbose = true;
    return this;
  }

  caps(): this {
    return this.enable("caps");
  }

  allowDebuggers(): this {
    return this.enable("allowDebuggers");
  }

  allusers(): this {
    return this.enable("allusers");
  }

  apparmor(): this {
    return this.enable("apparmor");
  }

  appimage(): this {
    return this.enable("appimage");
  }

  deterministicExitCode(): this {
    return this.enable("deterministicExitCode");
  }

  deterministicShutdown(): this {
    return this.enable("deterministicShutdown");
  }

  disableMnt(): this {
    return this.enable("disableMnt");
  }

  ipcNamespace(): this {
    return this.enable("ipcNamespace");
  }

  keepDevShm(): this {
    return this.enable("keepDevShm");
  }

  keepVarTmp(): this {
    return this.enable("keepVarTmp");
  }

  machineId(): this {
    return this.enable("machineId");
  }

  memoryDenyWriteExecute(): this {
    return this.enable("memoryDenyWriteExecute");
  }

  no3d(): this {
    return this.enable("no3d");
  }

  noAutoPulse(): this {
    return this.enable("noAutoPulse");
  }

  noDvd(): this {
    return this.enable("noDvd");
  }

  noGroups(): this {
    return this.enable("noGroups");
  }

  noInput(): this {
    return this.enable("noInput");
  }

  noNewPrivs(): this {
    return this.enable("noNewPrivs");
  }

  noPrinters(): this {
    return this.enable("noPrinters");
  }

  noProfile(): this {
    return this.enable("noProfile");
  }

  noRoot(): this {
    return this.enable("noRoot");
  }

  noSound(): this {
    return this.enable("noSound");
  }

  noTv(): this {
    return this.enable("noTv");
  }

  noU2f(): this {
    return this.enable("noU2f");
  }

  noVideo(): this {
    return this.enable("noVideo");
  }

  privateCache(): this {
    return this.enable("privateCache");
  }

  privateDev(): this {
    return this.enable("privateDev");
  }

  privateTmp(): this {
    return this.enable("privateTmp");
  }

  restrictNamespaces(): this {
    return this.enable("restrictNamespaces");
  }

  seccompBlockSecondary(): this {
    return this.enable("seccompBlockSecondary");
  }

  writableEtc(): this {
    return this.enable("writableEtc");
  }

  writableRunUser(): this {
    return this.enable("writableRunUser");
  }

  writableVar(): this {
    return this.enable("writableVar");
  }

  writableVarLog(): this {
    return this.enable("writableVarLog");
  }

  // Scalar options (last call wins)

  option(name: ScalarName, value: ScalarValue): this {
    this.profile.scalars[name] = value;
    return this;
  }

  cgroup(path: string): this {
    return this.option("cgroup", path);
  }

  hostname(name: string): this {
    return this.option("hostname", name);
  }

  hostsFile(path: string): this {
    return this.option("hostsFile", path);
  }

  /**
   * Kill the sandbox after the given time. Numbers are seconds; strings are
   * passed through and should already be `hh:mm:ss`.
   */
  timeout(value: string | number): this {
    return this.option(
      "timeout",
      typeof value === "number" ? formatTimeout(value) : value
    );
  }

  name(name: string): this {
    return this.option("name", name);
  }

  nice(value: number): this {
    return this.option("nice", value);
  }

  chroot(dir: string): this {
    return this.option("chroot", dir);
  }

  /**
   * Load a firejail `.profile` file (`--profile`)
   */
  profileFile(path: string): this {
    return this.option("profile", path);
  }

  rlimitAs(value: ScalarValue): this {
    return this.option("rlimitAs", value);
  }

  rlimitCpu(value: ScalarValue): this {
    return this.option("rlimitCpu", value);
  }

  rlimitFsize(value: ScalarValue): this {
    return this.option("rlimitFsize", value);
  }

  rlimitNofile(value: ScalarValue): this {
    return this.option("rlimitNofile", value);
  }

  rlimitNproc(value: ScalarValue): this {
    return this.option("rlimitNproc", value);
  }

  rlimitSigpending(value: ScalarValue): this {
    return this.option("rlimitSigpending", value);
  }

  output(path: string): this {
    return this.option("output", path);
  }

  outputStderr(path: string): this {
    return this.option("outputStderr", path);
  }

  // Mode settings (last call wins)

  /**
   * Only emitted while `caps()` is enabled
   */
  capsDrop(config: CapsDrop): this {
    this.profile.capsDrop = config;
    return this;
  }

  privateMode(mode: PrivateMode): this {
    this.profile.private = mode;
    return this;
  }

  privateList(name: PrivateListName, list: PrivateList): this {
    this.profile.privateLists[name] = list;
    return this;
  }

  privateBin(entries?: Iterable<string>): this {
    return this.privateList("privateBin", toPrivateList(entries));
  }

  privateEtc(entries?: Iterable<string>): this {
    return this.privateList("privateEtc", toPrivateList(entries));
  }

  privateLib(entries?: Iterable<string>): this {
    return this.privateList("privateLib", toPrivateList(entries));
  }

  privateOpt(entries?: Iterable<string>): this {
    return this.privateList("privateOpt", toPrivateList(entries));
  }

  privateSrv(entries?: Iterable<string>): this {
    return this.privateList("privateSrv", toPrivateList(entries));
  }

  privateHome(entries?: Iterable<string>): this {
    return this.privateList("privateHome", toPrivateList(entries));
  }

  net(mode: NetMode): this {
    this.profile.net = mode;
    return this;
  }

  netfilter(mode: NetFilter): this {
    this.profile.netfilter = mode;
    return this;
  }

  overlay(mode: Overlay): this {
    this.profile.overlay = mode;
    return this;
  }

  join(mode: Join): this {
    this.profile.join = mode;
    return this;
  }

  seccomp(mode: Seccomp): this {
    this.profile.seccomp = mode;
    return this;
  }

  shell(mode: Shell): this {
    this.profile.shell = mode;
    return this;
  }

  x11(mode: X11): this {
    this.profile.x11 = mode;
    return this;
  }

  // Lists (append only, duplicates kept)

  cpu(index: number): this {
    this.profile.cpus.push(index);
    return this;
  }

  cpus(indices: Iterable<number>): this {
    this.profile.cpus.push(...indices);
    return this;
  }

  protocol(protocol: string): this {
    this.profile.protocols.push(protocol);
    return this;
  }

  protocols(protocols: Iterable<string>): this {
    this.profile.protocols.push(...protocols);
    return this;
  }

  bind(source: string, target: string): this {
    this.profile.binds.push({ source, target });
    return this;
  }

  binds(pairs: Iterable<readonly [string, string]>): this {
    for (const [source, target] of pairs) {
      this.profile.binds.push({ source, target });
    }
    return this;
  }

  dns(server: string): this {
    this.profile.dns.push(server);
    return this;
  }

  dnsServers(servers: Iterable<string>): this {
    this.profile.dns.push(...servers);
    return this;
  }

  blacklist(path: string): this {
    this.profile.blacklists.push(path);
    return this;
  }

  blacklists(paths: Iterable<string>): this {
    this.profile.blacklists.push(...paths);
    return this;
  }

  ignore(command: string): this {
    this.profile.ignores.push(command);
    return this;
  }

  ignores(commands: Iterable<string>): this {
    this.profile.ignores.push(...commands);
    return this;
  }

  /**
   * Append to any of the repeatable path options by name
   */
  pathList(name: PathListName, entries: Iterable<string>): this {
    const list = (this.profile.pathLists[name] ??= []);
    list.push(...entries);
    return this;
  }

  whitelist(path: string): this {
    return this.pathList("whitelist", [path]);
  }

  whitelists(paths: Iterable<string>): this {
    return this.pathList("whitelist", paths);
  }

  noblacklist(path: string): this {
    return this.pathList("noblacklist", [path]);
  }

  noblacklists(paths: Iterable<string>): this {
    return this.pathList("noblacklist", paths);
  }

  nowhitelist(path: string): this {
    return this.pathList("nowhitelist", [path]);
  }

  nowhitelists(paths: Iterable<string>): this {
    return this.pathList("nowhitelist", paths);
  }

  readOnly(path: string): this {
    return this.pathList("readOnly", [path]);
  }

  readOnlyPaths(paths: Iterable<string>): this {
    return this.pathList("readOnly", paths);
  }

  readWrite(path: string): this {
    return this.pathList("readWrite", [path]);
  }

  readWritePaths(paths: Iterable<string>): this {
    return this.pathList("readWrite", paths);
  }

  noexec(path: string): this {
    return this.pathList("noexec", [path]);
  }

  noexecPaths(paths: Iterable<string>): this {
    return this.pathList("noexec", paths);
  }

  tmpfs(path: string): this {
    return this.pathList("tmpfs", [path]);
  }

  tmpfsPaths(paths: Iterable<string>): this {
    return this.pathList("tmpfs", paths);
  }

  mkdir(path: string): this {
    return this.pathList("mkdir", [path]);
  }

  mkdirs(paths: Iterable<string>): this {
    return this.pathList("mkdir", paths);
  }

  mkfile(path: string): this {
    return this.pathList("mkfile", [path]);
  }

  mkfiles(paths: Iterable<string>): this {
    return this.pathList("mkfile", paths);
  }

  /**
   * Remove a variable inside the sandbox (`--rmenv`)
   */
  rmenv(name: string): this {
    return this.pathList("rmenv", [name]);
  }

  rmenvs(names: Iterable<string>): this {
    return this.pathList("rmenv", names);
  }

  /**
   * Set a variable inside the sandbox (`--env=name=value`).
   * Unlike env(), this is applied by firejail, not by the spawn call.
   */
  sandboxEnv(name: string, value: string): this {
    this.profile.sandboxEnv.push({ name, value });
    return this;
  }

  sandboxEnvs(vars: Record<string, string>): this {
    for (const [name, value] of Object.entries(vars)) {
      this.profile.sandboxEnv.push({ name, value });
    }
    return this;
  }

  // Process boundary

  /**
   * Use a different launcher binary (default `firejail` from PATH)
   */
  launcherPath(path: string): this {
    this.launcher = path;
    return this;
  }

  currentDir(path: string): this {
    this.cwd = path;
    return this;
  }

  /**
   * Start the launcher with an empty environment
   */
  envClear(): this {
    clearEnvironment(this.envEdits);
    return this;
  }

  envRemove(key: string): this {
    removeVariable(this.envEdits, key);
    return this;
  }

  env(key: string, value: string): this {
    setVariable(this.envEdits, key, value);
    return this;
  }

  envs(vars: Record<string, string>): this {
    for (const [key, value] of Object.entries(vars)) {
      setVariable(this.envEdits, key, value);
    }
    return this;
  }

  stdin(setting: StdioSetting): this {
    this.stdio.stdin = setting;
    return this;
  }

  stdout(setting: StdioSetting): this {
    this.stdio.stdout = setting;
    return this;
  }

  stderr(setting: StdioSetting): this {
    this.stdio.stderr = setting;
    return this;
  }

  /**
   * The launcher binary spawn() will run
   */
  getLauncher(): string {
    return this.launcher;
  }

  /**
   * The exact argument vector spawn() would pass to the launcher
   */
  launcherArgs(): string[] {
    return buildLauncherArgs(this.profile, this.program, this.targetArgs);
  }

  /**
   * Start the launcher. Resolves as soon as the operating system has created
   * the process; it does not wait for it to exit.
   *
   * @throws LaunchError when the launcher cannot be started, when a file
   * redirection cannot be opened, or when this command was already spawned
   */
  async spawn(): Promise<SpawnedJail> {
    if (this.spawned) {
      throw new LaunchError(
        `Command for ${this.program} has already been spawned`,
        this.launcher
      );
    }
    this.spawned = true;

    if (
      !this.profile.switches.has("caps") &&
      this.profile.capsDrop.kind !== "notSpecified"
    ) {
      this.childLogger.debug(
        { capsDrop: this.profile.capsDrop.kind },
        "Capability drop configured without caps(), not passing it to firejail"
      );
    }

    const args = this.launcherArgs();
    const options: Options = {
      env: resolveEnvironment(process.env, this.envEdits),
      extendEnv: false,
      reject: false,
      buffer: false,
      stdin: this.stdio.stdin ?? "inherit",
      stdout: this.stdio.stdout ?? "inherit",
      stderr: this.stdio.stderr ?? "inherit",
      ...(this.cwd !== undefined && { cwd: this.cwd }),
    };

    this.childLogger.debug(
      {
        launcher: this.launcher,
        args,
        cwd: this.cwd,
        clearEnv: this.envEdits.clear,
      },
      "Launching sandboxed command"
    );

    try {
      await checkRedirections(this.stdio, this.launcher);
      const child = execa(this.launcher, args, options);
      const pid = await waitForSpawn(child);

      this.childLogger.debug({ pid }, "Launcher started");
      return { child, pid, launcher: this.launcher, args };
    } catch (error) {
      this.childLogger.debug(
        { err: error, launcher: this.launcher },
        "Launcher failed to start"
      );
      if (error instanceof LaunchError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new LaunchError(
        `Failed to start ${this.launcher}: ${reason}`,
        this.launcher,
        error
      );
    }
  }
}

// execa opens file redirections itself and only reports a failure through
// the settled result, after the process has already started
async function checkRedirections(
  stdio: StdioSettings,
  launcher: string
): Promise<void> {
  const checks = [
    ["stdin", stdio.stdin],
    ["stdout", stdio.stdout],
    ["stderr", stdio.stderr],
  ] as const;

  for (const [stream, setting] of checks) {
    if (typeof setting !== "object") {
      continue;
    }
    try {
      if (stream === "stdin") {
        await access(setting.file, constants.R_OK);
      } else {
        await access(dirname(setting.file), constants.W_OK);
      }
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new LaunchError(
        `Cannot open ${setting.file} for ${stream}: ${reason}`,
        launcher,
        error,
        stream
      );
    }
  }
}

// execa reports some start failures by settling the result instead of
// emitting "error", so wait for whichever comes first
async function waitForSpawn(child: ResultPromise): Promise<number> {
  const outcome = await Promise.race([
    once(child, "spawn").then(() => null),
    child,
  ]);
  if (outcome instanceof Error) {
    throw outcome;
  }
  if (outcome !== null || child.pid === undefined) {
    throw new Error("no process was created", { cause: outcome });
  }
  return child.pid;
}

function toPrivateList(entries: Iterable<string> | undefined): PrivateList {
  return entries === undefined
    ? PrivateList.default()
    : PrivateList.entries(entries);
}

/**
 * Create a new firejail command for the given program
 */
export function createFirejailCommand(
  program: string,
  logger?: Logger
): FirejailCommand {
  return new FirejailCommand(program, logger);
}

