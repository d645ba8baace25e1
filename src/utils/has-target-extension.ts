import { extname } from "node:path";

/**
 * Check whether a file's extension is one of `extensions`, ignoring case
 */
export function hasTargetExtension(
  filePath: string,
  extensions: readonly string[],
): boolean {
  const ext = extname(filePath).toLowerCase();
  if (!ext) return false;
  return extensions.some((candidate) => candidate.toLowerCase() === ext);
}
