/**
 * Central type exports
 */

// Configuration
export type {
  ReplaceConfig,
  PartialReplaceConfig,
  TableConfig,
  FilesConfig,
  LoggingConfig,
  LogLevel,
  ConfigError,
} from "./config";
export {
  ReplaceConfigSchema,
  PartialReplaceConfigSchema,
  LogLevelSchema,
} from "./config";

// Pipeline
export type {
  DetectionResult,
  ReplacePair,
  TableOptions,
  FailureKind,
  RewriteResult,
  RewriteOptions,
} from "./pipeline";

// Context
export type {
  ReplaceContext,
  Issue,
  IssueType,
  FileIssue,
  ResourceIssue,
  ResourceIssueReason,
  RunSummary,
} from "./context";
