/**
 * Stats Module
 * Displays the run summary and issues
 */

import chalk from "chalk";
import type { FileIssue, ResourceIssue, RunSummary } from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

function progressBar(current: number, total: number, width: number = 24): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const empty = width - filled;
  const percentText = `${Math.round(percentage * 100)}%`;

  return `${chalk.green("━".repeat(filled))}${chalk.dim("━".repeat(empty))} ${chalk.dim(percentText)}`;
}

function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Display the run summary on the console
 */
export function stats(summary: RunSummary, verbose?: boolean): void {
  const fileIssues = summary.issues.filter(
    (issue): issue is FileIssue => issue.type === "file",
  );
  const resourceIssues = summary.issues.filter(
    (issue): issue is ResourceIssue => issue.type === "resource",
  );

  console.log("");

  const statusIcon =
    fileIssues.length > 0
      ? chalk.red("✖")
      : resourceIssues.length > 0
        ? chalk.yellow("◆")
        : chalk.green("✔");

  console.log(
    `  ${statusIcon} ${chalk.bold("Replacement Complete")} ${chalk.dim("·")} ${chalk.dim(formatDuration(summary.duration))}`,
  );

  console.log(sectionHeader("Files"));
  console.log(`   ${progressBar(summary.changedFiles, summary.matchedFiles)}`);
  console.log(statRow(chalk.cyan("◉"), "Matched", summary.matchedFiles, chalk.cyan));
  console.log(statRow(chalk.green("◉"), "Changed", summary.changedFiles, chalk.green));

  console.log(sectionHeader("Replacements"));
  console.log(statRow(chalk.cyan("◉"), "Pairs", summary.pairs, chalk.cyan));
  console.log(statRow(chalk.green("◉"), "Replaced", summary.replaced, chalk.green));
  console.log(statRow(chalk.dim("◉"), "Unchanged", summary.unchanged));
  console.log(statRow(chalk.green("◉"), "Occurrences", summary.occurrences, chalk.green));

  if (summary.failed > 0) {
    console.log(statRow(chalk.red("◉"), "Failed", summary.failed, chalk.red));
  }

  displayIssuesSection(fileIssues, resourceIssues, verbose);

  console.log("");
}

function displayIssuesSection(
  fileIssues: FileIssue[],
  resourceIssues: ResourceIssue[],
  verbose?: boolean,
): void {
  if (fileIssues.length === 0 && resourceIssues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  if (fileIssues.length > 0) {
    const permission = fileIssues.filter((i) => i.reason === "permission-denied");
    if (permission.length > 0) {
      console.log(
        statRow(chalk.red("✖"), "Permission denied", permission.length, chalk.red),
      );
    }
    const other = fileIssues.length - permission.length;
    if (other > 0) {
      console.log(statRow(chalk.red("✖"), "I/O errors", other, chalk.red));
    }
    if (verbose) {
      for (const issue of fileIssues) {
        console.log(`      ${chalk.dim("·")} ${issue.path}`);
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
  }

  if (resourceIssues.length > 0) {
    console.log(
      statRow(chalk.yellow("✖"), "Config failed", resourceIssues.length, chalk.yellow),
    );
    for (const issue of resourceIssues) {
      console.log(`      ${chalk.dim("·")} ${issue.path}`);
      if (verbose) {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
  }
}
