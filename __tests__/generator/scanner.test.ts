import { describe, expect, it } from "vitest";
import { rewritePlaceholders, usesPositionalArgs } from "../../src/generator/scanner.js";

describe("rewritePlaceholders", () => {
  it("turns @N into $N", () => {
    expect(rewritePlaceholders("cd @1 && ls @2")).toBe("cd $1 && ls $2");
  });

  it("leaves @ not followed by a digit alone", () => {
    expect(rewritePlaceholders("mail user@example.com")).toBe("mail user@example.com");
  });

  it("ignores quoting", () => {
    expect(rewritePlaceholders("echo '@1'")).toBe("echo '$1'");
  });

  it("only rewrites the @ directly before the digit", () => {
    expect(rewritePlaceholders("@@1")).toBe("@$1");
  });
});

describe("usesPositionalArgs", () => {
  it.each([
    ["echo $1", true],
    ["echo $@", true],
    ["echo $*", true],
    ["echo $#", true],
    ["echo ${1}", true],
    ["echo ${2}", true],
    ["echo ${10}", true],
    ["echo ${@}", true],
    ["echo \"$1\"", true],
    ["echo hi", false],
    ["echo $HOME", false],
    ["echo ${name}", false],
    ["echo ${1foo}", false],
    ["echo '$1'", false],
    ["awk '{print $1}'", false],
    ["echo \\$1", false],
    ["echo \"\\$1\"", false],
    ["echo ${", false],
    ["echo ${}", false],
    ["echo ${1", false],
  ])("%s -> %s", (command, expected) => {
    expect(usesPositionalArgs(command)).toBe(expected);
  });

  it("resumes scanning after a closed single-quoted span", () => {
    expect(usesPositionalArgs("echo 'it' $2")).toBe(true);
  });

  it("treats a backslash inside single quotes as literal", () => {
    expect(usesPositionalArgs("echo '\\'$1")).toBe(true);
  });

  it("an escaped backslash does not escape the following $", () => {
    expect(usesPositionalArgs("echo \\\\$1")).toBe(true);
  });

  it("a single quote inside double quotes does not start a quoted span", () => {
    expect(usesPositionalArgs("echo \"it's $1\"")).toBe(true);
  });
});
