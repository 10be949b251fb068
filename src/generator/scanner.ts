/**
 * Command text analysis for the dump generator: placeholder rewriting and
 * detection of shell positional/special parameter references.
 */

/** Replace `@N` with `$N`. Purely textual; quoting is not considered. */
export function rewritePlaceholders(command: string): string {
  return command.replace(/@(?=[0-9])/g, "$$");
}

type ScanState = "normal" | "singleQuoted" | "doubleQuoted" | "escaped";

const SPECIAL_PARAMETERS = new Set(["@", "*", "#"]);

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= "0" && ch <= "9";
}

function isPositionalChar(ch: string | undefined): boolean {
  return isDigit(ch) || (ch !== undefined && SPECIAL_PARAMETERS.has(ch));
}

/**
 * Whether `command` already references `$1`…, `$@`, `$*`, `$#` or their
 * braced forms in a position the shell would expand. Text inside single
 * quotes is never expanded and never counts.
 */
export function usesPositionalArgs(command: string): boolean {
  const chars = Array.from(command);
  let state: ScanState = "normal";
  // State to return to after an escaped character.
  let resume: ScanState = "normal";

  for (let i = 0; i < chars.length; i++) {
    const ch = chars[i];

    switch (state) {
      case "escaped":
        state = resume;
        continue;

      case "singleQuoted":
        if (ch === "'") state = "normal";
        continue;

      case "normal":
        if (ch === "\\") {
          resume = "normal";
          state = "escaped";
          continue;
        }
        if (ch === "'") {
          state = "singleQuoted";
          continue;
        }
        if (ch === "\"") {
          state = "doubleQuoted";
          continue;
        }
        break;

      case "doubleQuoted":
        if (ch === "\\") {
          resume = "doubleQuoted";
          state = "escaped";
          continue;
        }
        if (ch === "\"") {
          state = "normal";
          continue;
        }
        break;
    }

    if (ch === "$" && referencesParameter(chars, i + 1)) {
      return true;
    }
  }

  return false;
}

/** Inspect the text after a `$` at `start` without advancing the scan. */
function referencesParameter(chars: string[], start: number): boolean {
  const next = chars[start];
  if (isPositionalChar(next)) return true;
  if (next !== "{") return false;

  let sawPositional = false;
  for (let j = start + 1; j < chars.length; j++) {
    const inner = chars[j];
    if (inner === "}") return sawPositional;
    if (!isPositionalChar(inner)) return false;
    sawPositional = true;
  }
  // Unterminated brace.
  return false;
}
