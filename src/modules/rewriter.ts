/**
 * File Rewriter
 * Applies one replace pair to one file, writing back only when it changed
 */

import { readFile, writeFile } from "fs/promises";
import iconv from "iconv-lite";
import { replaceLiteral } from "../utils";
import type { Logger } from "../utils";
import type {
  FailureKind,
  ReplacePair,
  RewriteOptions,
  RewriteResult,
} from "../types";

const BOM = "\uFEFF";

function classifyError(error: unknown): { kind: FailureKind; details: string } {
  const details = error instanceof Error ? error.message : String(error);

  if (
    error instanceof Error &&
    "code" in error &&
    (error.code === "EACCES" || error.code === "EPERM")
  ) {
    return { kind: "permission-denied", details };
  }

  return { kind: "io-error", details };
}

/**
 * Replace every literal occurrence of `pair.find` in a file
 *
 * The file is decoded lossily: undecodable bytes become U+FFFD instead of
 * failing. Never throws; read and write failures come back as a `failed`
 * result and are logged.
 */
export async function applyPair(
  filePath: string,
  pair: ReplacePair,
  options: RewriteOptions,
  logger: Logger,
): Promise<RewriteResult> {
  try {
    const buffer = await readFile(filePath);
    const content = iconv.decode(buffer, options.encoding, { stripBOM: false });

    const { text, occurrences } = replaceLiteral(content, pair.find, pair.replace);

    if (occurrences === 0 || text === content) {
      logger.debug(
        `No replacement for '${pair.find}' in ${filePath}, content unchanged.`,
      );
      return { status: "unchanged" };
    }

    const addBOM = options.bom && !text.startsWith(BOM);
    await writeFile(filePath, iconv.encode(text, options.encoding, { addBOM }));

    logger.info(`Replaced '${pair.find}' with '${pair.replace}' in ${filePath}`);
    return { status: "replaced", occurrences };
  } catch (error) {
    const { kind, details } = classifyError(error);

    if (kind === "permission-denied") {
      logger.error(`Permission error: ${details}. Skipping ${filePath}.`);
    } else {
      logger.error(`An error occurred with ${filePath}: ${details}`);
    }

    return { status: "failed", kind, details };
  }
}
