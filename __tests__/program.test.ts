import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtemp, realpath, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { buildProgram } from "../src/program.js";
import { renderBootstrap } from "../src/generator/script.js";
import { AliasNotFoundError } from "../src/util/errors.js";

const mockChildProcess = vi.hoisted(() => ({
  spawnSync: vi.fn(),
}));

vi.mock("node:child_process", () => ({
  ...mockChildProcess,
  default: mockChildProcess,
}));

const mockPrompt = vi.hoisted(() => ({
  confirm: vi.fn(),
  promptNonEmpty: vi.fn(),
}));

vi.mock("../src/util/prompt.js", () => mockPrompt);

describe("dalias program", () => {
  let tempDir: string;
  let stderrSpy: ReturnType<typeof vi.spyOn>;
  let stdoutSpy: ReturnType<typeof vi.spyOn>;

  async function run(...args: string[]): Promise<void> {
    const program = buildProgram();
    program.exitOverride();
    await program.parseAsync(["node", "dalias", ...args]);
  }

  function stderr(): string {
    return stderrSpy.mock.calls.map(c => c.join(" ")).join("\n");
  }

  function stdout(): string {
    return stdoutSpy.mock.calls.map(c => c.join(" ")).join("\n");
  }

  beforeEach(async () => {
    tempDir = await realpath(await mkdtemp(join(tmpdir(), "dalias-program-test-")));
    vi.stubEnv("DALIAS_DATA_DIR", tempDir);
    vi.stubEnv("DALIAS_FUNCTIONS", "");
    vi.stubEnv("DALIAS_VERBOSE", "");
    vi.stubEnv("DALIAS_FZF_BIN", "fzf");
    stderrSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    stdoutSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    mockChildProcess.spawnSync.mockReset();
    mockPrompt.confirm.mockReset();
    mockPrompt.promptNonEmpty.mockReset();
    await rm(tempDir, { recursive: true, force: true });
  });

  it("adds with the explicit subcommand", async () => {
    await run("add", "gs", "git status");
    expect(stderr()).toBe("Added alias 'gs' for 'git status' (Global)");
  });

  it("adds with a directory scope", async () => {
    await run("add", "mk", "make", "--scope", tempDir);
    expect(stderr()).toBe(`Added alias 'mk' for 'make' (Exact: ${tempDir})`);
  });

  it("supports the implicit add, list and remove forms", async () => {
    await run("ll", "ls -la");
    expect(stderr()).toBe("Added alias 'll' for 'ls -la' (Global)");

    await run();
    expect(stdout()).toBe("ll = 'ls -la' (Global)");

    await run("ll");
    expect(stderrSpy).toHaveBeenLastCalledWith("Removed alias 'll' (1 definitions)");
  });

  it("fails to remove an unknown alias", async () => {
    await expect(run("remove", "ghost")).rejects.toThrow(AliasNotFoundError);
  });

  it("requires a name unless --all is given", async () => {
    await expect(run("remove")).rejects.toThrow(
      "Missing alias name. Use --all to remove every alias",
    );
  });

  it("removes everything with --all --force", async () => {
    await run("add", "a", "echo a");
    await run("add", "b", "echo b");
    await run("rm", "--all", "--force");
    expect(stderrSpy).toHaveBeenLastCalledWith("Removed 2 alias(es)");
    expect(mockPrompt.confirm).not.toHaveBeenCalled();
  });

  it("asks before --all and keeps aliases on decline", async () => {
    mockPrompt.confirm.mockResolvedValue(false);
    await run("add", "a", "echo a");
    await expect(run("remove", "--all")).rejects.toThrow("Operation cancelled");
    expect(mockPrompt.confirm).toHaveBeenCalledWith("Remove all 1 alias(es)?");

    await run("list", "--all");
    expect(stdout()).toBe("a = 'echo a' (Global)");
  });

  it("prints the bootstrap for init", async () => {
    await run("init");
    expect(stdoutSpy).toHaveBeenCalledWith(renderBootstrap());
  });

  it("prints alias functions for init --dump", async () => {
    await run("add", "gs", "git status");
    await run("init", "--dump");
    const lines = stdout().split("\n");
    expect(lines).toContain("gs() {");
    expect(lines).toContain("    git status \"$@\"");
    expect(lines).toContain("export DALIAS_FUNCTIONS='gs'");
  });

  it("adds a command picked from history", async () => {
    const historyFile = join(tempDir, "history");
    await writeFile(historyFile, "git status\nmake test\n");
    vi.stubEnv("DALIAS_HISTORY_FILE", historyFile);
    mockChildProcess.spawnSync.mockReturnValue({ status: 0, stdout: "git status\n" });
    mockPrompt.promptNonEmpty.mockResolvedValue("gst");

    await run("add");

    expect(mockChildProcess.spawnSync).toHaveBeenCalledWith(
      "fzf",
      expect.any(Array),
      expect.objectContaining({ input: "make test\ngit status" }),
    );
    expect(mockPrompt.promptNonEmpty).toHaveBeenCalledWith("Alias name (command: git status): ");
    expect(stderr()).toBe("Added alias 'gst' for 'git status' (Global)");
  });
});
