/**
 * Run Tracker
 * Unified tracking for stats and issues
 */

import { ZodError } from "zod";
import type { FailureKind, RewriteResult } from "../types/pipeline";

// ============================================================================
// Types
// ============================================================================

export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";

// Discriminated union - each type has its own subset of reasons
export interface FileIssue {
  type: "file";
  path: string;
  find: string;
  reason: FailureKind;
  details: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details: string;
}

export type Issue = FileIssue | ResourceIssue;
export type IssueType = Issue["type"];

export interface RunSummary {
  pairs: number;
  matchedFiles: number;
  changedFiles: number;
  attempts: number;
  replaced: number;
  unchanged: number;
  failed: number;
  occurrences: number;
  issues: Issue[];
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

function mapResourceError(error: unknown): {
  reason: ResourceIssueReason;
  details: string;
} {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues.map((e) => `${e.path.join(".")}: ${e.message}`).join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return { reason: "invalid-json", details: error.message };
  }
  return {
    reason: "read-error",
    details: error instanceof Error ? error.message : String(error),
  };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private pairs = 0;
  private matchedFiles = 0;
  private replaced = 0;
  private unchanged = 0;
  private failed = 0;
  private occurrences = 0;
  private changedFiles = new Set<string>();
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setPairs(count: number): void {
    this.pairs = count;
  }

  setMatchedFiles(count: number): void {
    this.matchedFiles = count;
  }

  /**
   * Record the outcome of applying one pair to one file
   */
  trackResult(path: string, find: string, result: RewriteResult): void {
    switch (result.status) {
      case "replaced":
        this.replaced++;
        this.occurrences += result.occurrences;
        this.changedFiles.add(path);
        break;
      case "unchanged":
        this.unchanged++;
        break;
      case "failed":
        this.failed++;
        this.issues.push({
          type: "file",
          path,
          find,
          reason: result.kind,
          details: result.details,
        });
        break;
    }
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  trackResourceError(path: string, error: unknown): void {
    const { reason, details } = mapResourceError(error);
    this.issues.push({ type: "resource", path, reason, details });
  }

  getIssues(): Issue[];
  getIssues(type: "file"): FileIssue[];
  getIssues(type: "resource"): ResourceIssue[];
  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): RunSummary {
    const duration = new Date().getTime() - this.startTime.getTime();

    return {
      pairs: this.pairs,
      matchedFiles: this.matchedFiles,
      changedFiles: this.changedFiles.size,
      attempts: this.replaced + this.unchanged + this.failed,
      replaced: this.replaced,
      unchanged: this.unchanged,
      failed: this.failed,
      occurrences: this.occurrences,
      issues: [...this.issues],
      duration,
    };
  }
}
