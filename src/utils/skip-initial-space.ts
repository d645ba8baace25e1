/**
 * Drop the spaces (U+0020 only) that open each field of a delimited table
 *
 * Runs before csv-parse so that `a, "b,c"` reads as two fields. Quoted
 * fields are copied untouched, tabs and other whitespace are kept.
 */
export function skipInitialSpace(
  text: string,
  delimiter: string = ",",
  quote: string = '"',
): string {
  let out = "";
  let fieldStart = true;
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (quoted) {
      out += char;
      if (char === quote) {
        if (text[i + 1] === quote) {
          out += quote;
          i++;
        } else {
          quoted = false;
        }
      }
      continue;
    }

    if (fieldStart && char === " ") {
      continue;
    }

    quoted = fieldStart && char === quote;
    fieldStart = char === delimiter || char === "\n" || char === "\r";
    out += char;
  }

  return out;
}
