/**
 * Encoding Prober
 * Finds the first candidate encoding under which a whole file decodes cleanly
 */

import { readFile } from "fs/promises";
import iconv from "iconv-lite";
import type { DetectionResult } from "../types";

export const DEFAULT_ENCODINGS: readonly string[] = Object.freeze([
  "utf-8",
  "shift_jis",
]);

/**
 * Decode a buffer strictly
 * iconv-lite substitutes invalid sequences instead of failing, so a decode
 * only counts when encoding the text again reproduces the exact bytes
 */
export function decodeStrict(buffer: Buffer, encoding: string): string | null {
  const text = iconv.decode(buffer, encoding, { stripBOM: false });
  const encoded = iconv.encode(text, encoding, { addBOM: false });
  return encoded.equals(buffer) ? text : null;
}

/**
 * Detect the encoding of a file by decoding all of its bytes under each
 * candidate in order
 */
export async function detectEncoding(
  path: string,
  candidates: readonly string[] = DEFAULT_ENCODINGS,
): Promise<DetectionResult> {
  const buffer = await readFile(path);

  for (const encoding of candidates) {
    const text = decodeStrict(buffer, encoding);
    if (text !== null) {
      return { detected: true, encoding, text };
    }
  }

  return { detected: false };
}
