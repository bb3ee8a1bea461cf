// pattern: Functional Core
// Library entry point: the firejail builder plus profile-file support.

export * from "./firejail/index.js";

export { applyJailProfile } from "./config/apply.js";
export {
  loadJailProfileFile,
  parseJailProfileContent,
  SUPPORTED_PROFILE_EXTENSIONS,
  validateJailProfileObject,
} from "./config/loaders/jail-profile-loader.js";
export type { JailProfileV1 } from "./config/types/v1/index.js";

export {
  ConfigurationError,
  FileSystemError,
  JailrunError,
  LaunchError,
  ValidationError,
} from "./utils/errors.js";
