/**
 * Utility exports
 */

// Encoding utilities
export {
  detectEncoding,
  decodeStrict,
  DEFAULT_ENCODINGS,
} from "./detect-encoding";

// Text utilities
export { replaceLiteral } from "./replace-literal";
export { collapseQuotes } from "./collapse-quotes";
export { skipInitialSpace } from "./skip-initial-space";

// Path/filename utilities
export { hasTargetExtension } from "./has-target-extension";
export { formatTimestamp, formatFileTimestamp } from "./format-timestamp";

// Filesystem utilities
export { directoryExists } from "./directory-exists";

// Config utilities
export {
  loadConfig,
  mergeConfig,
  getUserConfigPath,
  loadDefaultConfig,
} from "./load-config";

// Errors
export { EncodingUndetectedError, TargetNotFoundError } from "./errors";

// Classes
export { Logger, createLogger } from "./logger";
export type { LoggerOptions } from "./logger";
export { Tracker } from "./tracker";
