/**
 * Replace context - flows through the entire pipeline
 * Created once by the CLI, torn down (logger closed) when the run ends
 */

import type { ReplaceConfig } from "./config";
import type { ReplacePair } from "./pipeline";
import type { Logger } from "../utils/logger";
import type { Tracker } from "../utils/tracker";

// Re-export types from tracker
export type {
  Issue,
  IssueType,
  FileIssue,
  ResourceIssue,
  ResourceIssueReason,
  RunSummary,
} from "../utils/tracker";

export interface ReplaceContext {
  // Input - provided at initialization
  config: ReplaceConfig;
  logger: Logger;

  // Unified tracking for stats and errors
  tracker: Tracker;

  verbose?: boolean;

  pairs?: ReplacePair[]; // Filled by the traversal driver after loading
}
