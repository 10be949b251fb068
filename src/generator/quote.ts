/**
 * POSIX shell quoting helpers.
 */

const SAFE_WORD_RE = /^[A-Za-z0-9_\/.,:=+@%-]+$/;

/** Wrap in single quotes; embedded quotes become '\''. */
export function singleQuote(value: string): string {
  return `'${value.replace(/'/g, "'\\''")}'`;
}

/** Quote only when the word would otherwise be split or expanded. */
export function shellWord(value: string): string {
  return SAFE_WORD_RE.test(value) ? value : singleQuote(value);
}
