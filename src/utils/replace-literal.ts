/**
 * Replace every non-overlapping occurrence of `find`, scanning left to right
 * Returns the new text and how many occurrences were replaced.
 * An empty `find` matches before every code point and at the end.
 */
export function replaceLiteral(
  text: string,
  find: string,
  replace: string,
): { text: string; occurrences: number } {
  if (find.length === 0) {
    const chars = Array.from(text);
    return {
      text: replace + chars.join(replace) + (chars.length > 0 ? replace : ""),
      occurrences: chars.length + 1,
    };
  }

  const parts = text.split(find);
  return { text: parts.join(replace), occurrences: parts.length - 1 };
}
