/**
 * SQLite-backed key-value engine (better-sqlite3).
 *
 * One table, `aliases(name PRIMARY KEY, value)`. Writes take the database
 * lock up front with BEGIN IMMEDIATE so concurrent processes serialize
 * instead of failing mid-transaction on upgrade.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { KeyValueEngine, ReadTransaction, WriteTransaction } from "./types";
import { StorageFailureError } from "../util/errors";
import { log } from "../util/logger";

const BUSY_TIMEOUT_MS = 5000;

interface Row {
  name: string;
  value: string;
}

export class SqliteEngine implements KeyValueEngine {
  private readonly db: Database.Database;
  private readonly selectOne: Database.Statement<[string], Row>;
  private readonly selectAll: Database.Statement<[], Row>;
  private readonly upsert: Database.Statement<[string, string]>;
  private readonly deleteOne: Database.Statement<[string]>;

  private constructor(db: Database.Database) {
    this.db = db;
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS aliases (
        name TEXT PRIMARY KEY,
        value TEXT NOT NULL
      ) WITHOUT ROWID;
    `);
    this.selectOne = db.prepare<[string], Row>("SELECT name, value FROM aliases WHERE name = ?");
    this.selectAll = db.prepare<[], Row>("SELECT name, value FROM aliases ORDER BY name");
    this.upsert = db.prepare<[string, string]>(
      "INSERT INTO aliases (name, value) VALUES (?, ?) ON CONFLICT(name) DO UPDATE SET value = excluded.value",
    );
    this.deleteOne = db.prepare<[string]>("DELETE FROM aliases WHERE name = ?");
  }

  /** Open (creating if needed) the database file at `path`; ":memory:" is accepted. */
  static open(path: string): SqliteEngine {
    try {
      if (path !== ":memory:") {
        mkdirSync(dirname(path), { recursive: true });
      }
      const db = new Database(path);
      if (path !== ":memory:") {
        db.pragma("journal_mode = WAL");
      }
      db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
      log(`Opened alias database at ${path}`);
      return new SqliteEngine(db);
    } catch (err) {
      throw new StorageFailureError("open", err);
    }
  }

  beginRead(): ReadTransaction {
    this.begin("BEGIN DEFERRED", "begin read");
    let open = true;
    return {
      get: key => this.read(() => this.selectOne.get(key)?.value),
      entries: () => this.read(() => this.allEntries()),
      close: () => {
        if (!open) return;
        open = false;
        this.end("COMMIT", "end read");
      },
    };
  }

  beginWrite(): WriteTransaction {
    this.begin("BEGIN IMMEDIATE", "begin write");
    let open = true;
    const ensureOpen = (): void => {
      if (!open) throw new StorageFailureError("write", new Error("transaction already finished"));
    };
    return {
      get: key => this.read(() => this.selectOne.get(key)?.value),
      entries: () => this.read(() => this.allEntries()),
      insert: (key, value) => {
        ensureOpen();
        this.read(() => this.upsert.run(key, value));
      },
      remove: key => {
        ensureOpen();
        return this.read(() => {
          const previous = this.selectOne.get(key)?.value;
          if (previous !== undefined) this.deleteOne.run(key);
          return previous;
        });
      },
      commit: () => {
        ensureOpen();
        open = false;
        this.end("COMMIT", "commit");
      },
      abort: () => {
        if (!open) return;
        open = false;
        if (this.db.inTransaction) this.end("ROLLBACK", "rollback");
      },
    };
  }

  close(): void {
    this.db.close();
  }

  private allEntries(): Array<[string, string]> {
    return this.selectAll.all().map(row => [row.name, row.value]);
  }

  private begin(sql: string, operation: string): void {
    try {
      this.db.exec(sql);
    } catch (err) {
      throw new StorageFailureError(operation, err);
    }
  }

  private end(sql: string, operation: string): void {
    try {
      this.db.exec(sql);
    } catch (err) {
      if (this.db.inTransaction) {
        try {
          this.db.exec("ROLLBACK");
        } catch (rollbackErr) {
          log(`Rollback after failed ${operation} also failed: ${String(rollbackErr)}`);
        }
      }
      throw new StorageFailureError(operation, err);
    }
  }

  private read<T>(fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw new StorageFailureError("query", err);
    }
  }
}
