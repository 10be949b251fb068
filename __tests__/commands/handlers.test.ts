import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AliasStore } from "../../src/alias/store.js";
import { exactScope, GLOBAL_SCOPE, recursiveScope } from "../../src/alias/scope.js";
import { SqliteEngine } from "../../src/storage/sqlite.js";
import { handleAdd } from "../../src/commands/add.js";
import { handleRemove, handleRemoveAll, handleRemoveScope } from "../../src/commands/remove.js";
import { handleList } from "../../src/commands/list.js";
import { handleDump } from "../../src/commands/init.js";
import {
  AliasNotFoundError,
  CancelledError,
  InvalidAliasNameError,
  ScopeNotFoundError,
} from "../../src/util/errors.js";

describe("command handlers", () => {
  let store: AliasStore;

  beforeEach(() => {
    store = new AliasStore(SqliteEngine.open(":memory:"));
  });

  afterEach(() => {
    store.close();
  });

  describe("handleAdd", () => {
    it("reports the added alias with its scope", () => {
      expect(handleAdd(store, "gs", "git status", GLOBAL_SCOPE)).toBe(
        "Added alias 'gs' for 'git status' (Global)",
      );
      expect(handleAdd(store, "gs", "git st", exactScope("/repo"))).toBe(
        "Added alias 'gs' for 'git st' (Exact: /repo)",
      );
      expect(store.list().get("gs")).toHaveLength(2);
    });

    it.each(["done", "if", "function", "local"])("rejects the reserved word %s", word => {
      expect(() => handleAdd(store, word, "echo x", GLOBAL_SCOPE)).toThrow(
        `Invalid alias name: "${word}". It is a shell reserved word`,
      );
      expect(store.list().size).toBe(0);
    });

    it("rejects invalid names without touching the store", () => {
      expect(() => handleAdd(store, "bad name", "true", GLOBAL_SCOPE)).toThrow(
        InvalidAliasNameError,
      );
      expect(store.list().size).toBe(0);
    });
  });

  describe("handleRemove", () => {
    it("reports how many definitions were removed", () => {
      store.add("gs", "git status", GLOBAL_SCOPE);
      store.add("gs", "git st", exactScope("/repo"));
      expect(handleRemove(store, "gs")).toBe("Removed alias 'gs' (2 definitions)");
    });

    it("throws AliasNotFoundError for an unknown alias", () => {
      expect(() => handleRemove(store, "ghost")).toThrow(AliasNotFoundError);
      expect(() => handleRemove(store, "ghost")).toThrow("Alias not found: ghost");
    });
  });

  describe("handleRemoveScope", () => {
    it("removes one definition", () => {
      store.add("gs", "git status", GLOBAL_SCOPE);
      store.add("gs", "git st", exactScope("/repo"));
      expect(handleRemoveScope(store, "gs", exactScope("/repo"))).toBe(
        "Removed alias 'gs' from scope 'Exact: /repo' ('git st')",
      );
      expect(store.list().get("gs")).toEqual([{ command: "git status", scope: GLOBAL_SCOPE }]);
    });

    it("throws ScopeNotFoundError when the scope has no definition", () => {
      store.add("gs", "git status", GLOBAL_SCOPE);
      expect(() => handleRemoveScope(store, "gs", exactScope("/repo"))).toThrow(ScopeNotFoundError);
      expect(() => handleRemoveScope(store, "gs", exactScope("/repo"))).toThrow(
        "No definition found for alias 'gs' in scope 'Exact: /repo'",
      );
    });
  });

  describe("handleRemoveAll", () => {
    beforeEach(() => {
      store.add("gs", "git status", GLOBAL_SCOPE);
      store.add("mk", "make", recursiveScope("/work"));
    });

    it("removes everything with force and does not ask", async () => {
      const ask = vi.fn();
      await expect(handleRemoveAll(store, null, true, ask)).resolves.toBe("Removed 2 alias(es)");
      expect(ask).not.toHaveBeenCalled();
      expect(store.list().size).toBe(0);
    });

    it("asks with the alias count and cancels on decline", async () => {
      const ask = vi.fn().mockResolvedValue(false);
      await expect(handleRemoveAll(store, null, false, ask)).rejects.toThrow(CancelledError);
      expect(ask).toHaveBeenCalledWith("Remove all 2 alias(es)?");
      expect(store.list().size).toBe(2);
    });

    it("limits removal to one scope after confirmation", async () => {
      const ask = vi.fn().mockResolvedValue(true);
      await expect(handleRemoveAll(store, GLOBAL_SCOPE, false, ask)).resolves.toBe(
        "Removed 1 alias(es) from scope 'Global'",
      );
      expect(ask).toHaveBeenCalledWith("Remove all definitions in scope 'Global'?");
      expect([...store.list().keys()]).toEqual(["mk"]);
    });
  });

  describe("handleList", () => {
    beforeEach(() => {
      store.add("gs", "git status", GLOBAL_SCOPE);
      store.add("gs", "git st", exactScope("/repo"));
      store.add("mk", "make", recursiveScope("/work"));
    });

    it("shows only definitions active in cwd, in precedence order", () => {
      expect(handleList(store, { cwd: "/repo" })).toBe(
        "gs = 'git st' (Exact: /repo)\ngs = 'git status' (Global)",
      );
    });

    it("matches recursive scopes in subdirectories", () => {
      expect(handleList(store, { cwd: "/work/api" })).toBe(
        "gs = 'git status' (Global)\nmk = 'make' (Recursive: /work)",
      );
    });

    it("shows everything with all", () => {
      expect(handleList(store, { all: true, cwd: "/" }).split("\n")).toEqual([
        "gs = 'git st' (Exact: /repo)",
        "gs = 'git status' (Global)",
        "mk = 'make' (Recursive: /work)",
      ]);
    });

    it("reports an empty store", () => {
      store.removeAll();
      expect(handleList(store, { cwd: "/" })).toBe("No aliases found");
    });
  });

  describe("handleDump", () => {
    it("renders functions and clears stale ones", () => {
      store.add("gs", "git status", GLOBAL_SCOPE);
      const lines = handleDump(store, "gs old").split("\n");
      expect(lines).toContain("gs() {");
      expect(lines).toContain("unset -f old 2>/dev/null");
      expect(lines.filter(l => l === "unset -f gs 2>/dev/null")).toHaveLength(1);
      expect(lines).toContain("export DALIAS_FUNCTIONS='gs'");
    });
  });
});
