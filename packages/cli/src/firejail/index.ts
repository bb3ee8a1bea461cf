// pattern: Imperative Shell
// Main entry point for the firejail module.

export { CapsDrop, CapsDropBuilder } from "./caps-drop.js";
export type { SpawnedJail, StdioSetting } from "./command.js";
export {
  createFirejailCommand,
  DEFAULT_LAUNCHER,
  FirejailCommand,
} from "./command.js";
export { buildLauncherArgs, emitFlags, QUIET_FLAG, SEPARATOR } from "./flags.js";
export type {
  BindPair,
  EnvPair,
  PathListName,
  PrivateListName,
  Profile,
  ScalarName,
  ScalarValue,
  SwitchName,
} from "./profile.js";
export {
  createProfile,
  formatTimeout,
  PATH_LIST_FLAGS,
  PRIVATE_LIST_FLAGS,
  SCALAR_FLAGS,
  SWITCH_FLAGS,
} from "./profile.js";
export type { JoinTarget, NetInterfaceParams, X11Server } from "./settings.js";
export {
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
