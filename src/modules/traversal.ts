/**
 * Traversal Driver
 * Loads the replace pairs once, then applies all of them to every
 * matching file under the target directory
 */

import glob from "fast-glob";
import { realpath } from "fs/promises";
import path from "node:path";
import { loadPairs } from "./loader";
import { applyPair } from "./rewriter";
import { directoryExists, hasTargetExtension, TargetNotFoundError } from "../utils";
import type { ReplaceContext, RunSummary } from "../types";

/**
 * Discover target files, sorted for a stable processing order
 *
 * Directories that cannot be read are skipped. A file reached through
 * several symlinked paths is listed once, under its first path.
 */
export async function findTargetFiles(
  targetDir: string,
  options: { extensions: readonly string[]; ignore: string[]; followSymbolicLinks: boolean },
): Promise<string[]> {
  const entries = await glob("**/*", {
    cwd: targetDir,
    absolute: true,
    onlyFiles: true,
    dot: true,
    ignore: options.ignore,
    followSymbolicLinks: options.followSymbolicLinks,
    suppressErrors: true,
  });

  const files: string[] = [];
  const seen = new Set<string>();

  for (const entry of entries.sort()) {
    if (!hasTargetExtension(entry, options.extensions)) continue;

    const real = await realpath(entry).catch(() => entry);
    if (seen.has(real)) continue;

    seen.add(real);
    files.push(entry);
  }

  return files;
}

/**
 * Run the replacement pipeline
 *
 * Reads from context:
 * - config.source, config.target, config.table, config.files
 *
 * Writes to context:
 * - pairs: Loaded replace pairs, in table order
 *
 * Fails before touching any file when the target is missing or the table
 * cannot be loaded. Per-file failures are tracked and never abort the run.
 */
export async function run(ctx: ReplaceContext): Promise<RunSummary> {
  const { config, logger, tracker } = ctx;
  const tablePath = path.resolve(config.source);
  const targetDir = path.resolve(config.target);

  if (!(await directoryExists(targetDir))) {
    throw new TargetNotFoundError(targetDir);
  }

  const pairs = await loadPairs(tablePath, config.table, logger);
  ctx.pairs = pairs;
  tracker.setPairs(pairs.length);

  const files = await findTargetFiles(targetDir, config.files);
  tracker.setMatchedFiles(files.length);

  // Each attempt re-reads the file, so pairs compose in table order
  for (const file of files) {
    for (const pair of pairs) {
      const result = await applyPair(file, pair, config.files, logger);
      tracker.trackResult(file, pair.find, result);
    }
  }

  logger.info("Replacement operation completed.");

  return tracker.getStats();
}
