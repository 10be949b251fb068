/**
 * Alias names become shell function names, so they are restricted to
 * characters both bash and zsh accept in a function definition.
 */

const ALIAS_NAME_RE = /^[A-Za-z0-9_][A-Za-z0-9_.:+-]*$/;

// Reserved words of bash and zsh. `name() {` fails to parse for these,
// which would break every function defined after it in the same dump.
const RESERVED_WORDS = new Set([
  "case",
  "coproc",
  "declare",
  "do",
  "done",
  "elif",
  "else",
  "end",
  "esac",
  "export",
  "fi",
  "float",
  "for",
  "foreach",
  "function",
  "if",
  "in",
  "integer",
  "local",
  "nocorrect",
  "readonly",
  "repeat",
  "select",
  "then",
  "time",
  "typeset",
  "until",
  "while",
]);

export function isReservedWord(name: string): boolean {
  return RESERVED_WORDS.has(name);
}

export function isValidAliasName(name: string): boolean {
  return ALIAS_NAME_RE.test(name) && !isReservedWord(name);
}
