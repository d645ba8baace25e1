/**
 * Collapse doubled quote characters into one, e.g. `say ""hi""` → `say "hi"`
 */
export function collapseQuotes(field: string, quote: string = '"'): string {
  return field.replaceAll(quote + quote, quote);
}
