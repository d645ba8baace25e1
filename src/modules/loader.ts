/**
 * Pair Loader
 * Reads the (find, replace[, note]) table into ordered replace pairs
 */

import { parse } from "csv-parse/sync";
import { z } from "zod";
import {
  detectEncoding,
  collapseQuotes,
  skipInitialSpace,
  EncodingUndetectedError,
} from "../utils";
import type { Logger } from "../utils";
import type { ReplacePair, TableOptions } from "../types";

const RecordsSchema = z.array(z.array(z.string()));

function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Load replace pairs from a delimited table
 *
 * The whole file must decode under one of `options.encodings` before any
 * row is read. Rows with fewer than two fields are skipped, a third field
 * is logged as a note.
 *
 * @throws EncodingUndetectedError when no candidate encoding fits
 */
export async function loadPairs(
  tablePath: string,
  options: TableOptions,
  logger: Logger,
): Promise<ReplacePair[]> {
  const detection = await detectEncoding(tablePath, options.encodings);
  if (!detection.detected) {
    throw new EncodingUndetectedError(tablePath, options.encodings);
  }

  const records = RecordsSchema.parse(
    parse(skipInitialSpace(stripBom(detection.text), options.delimiter, options.quote), {
      delimiter: options.delimiter,
      quote: options.quote,
      escape: options.quote,
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: true,
    }),
  );

  const pairs: ReplacePair[] = [];

  for (const row of records) {
    if (row.length < 2) {
      continue;
    }

    const pair: ReplacePair = {
      find: collapseQuotes(row[0], options.quote),
      replace: collapseQuotes(row[1], options.quote),
    };

    if (row.length >= 3) {
      pair.note = row[2];
      logger.info(
        `Loaded pair '${pair.find}' -> '${pair.replace}' (note: ${pair.note})`,
      );
    }

    pairs.push(pair);
  }

  logger.info(
    `Loaded ${pairs.length} replace pairs from ${tablePath} (${detection.encoding})`,
  );

  return pairs;
}
