/**
 * Pipeline module data types
 */

// ============================================================================
// Encoding Prober
// ============================================================================

export type DetectionResult =
  | { detected: true; encoding: string; text: string }
  | { detected: false };

// ============================================================================
// Pair Loader
// ============================================================================

export interface ReplacePair {
  find: string;
  replace: string;
  note?: string; // Third table column, only surfaced in the log
}

export interface TableOptions {
  encodings: readonly string[];
  delimiter: string;
  quote: string;
}

// ============================================================================
// File Rewriter
// ============================================================================

export type FailureKind = "permission-denied" | "io-error";

export type RewriteResult =
  | { status: "replaced"; occurrences: number }
  | { status: "unchanged" }
  | { status: "failed"; kind: FailureKind; details: string };

export interface RewriteOptions {
  encoding: string; // Lossy decode on read, encode on write
  bom: boolean; // Prefix written files with a byte order mark
}
