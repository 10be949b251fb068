/**
 * Alias store: scoped alias definitions persisted through a
 * transactional key-value engine (SQLite at ~/.dalias/aliases.db by default).
 *
 * Every operation runs in exactly one engine transaction. A write that throws
 * before its commit succeeds is rolled back, so `list()` never observes a
 * partial mutation.
 */

import type { AliasDefinition, AliasListing, Scope } from "./types";
import type { KeyValueEngine, WriteTransaction } from "../storage/types";
import { decodeDefinitions, encodeDefinitions } from "./codec";
import { AliasRecord } from "./record";
import { describeScope, scopesEqual } from "./scope";
import { DaliasError, StorageFailureError } from "../util/errors";
import { log } from "../util/logger";

export class AliasStore {
  constructor(private readonly engine: KeyValueEngine) {}

  add(name: string, command: string, scope: Scope): void {
    this.write("add", txn => {
      const record = new AliasRecord(readDefinitions(txn, name) ?? []);
      record.upsert({ command, scope });
      txn.insert(name, encodeDefinitions(record.toList()));
    });
    log(`Added '${name}' (${describeScope(scope)})`);
  }

  /** Delete the whole record; null when the alias does not exist. */
  remove(name: string): AliasDefinition[] | null {
    const removed = this.write("remove", txn => {
      const raw = txn.remove(name);
      return raw === undefined ? null : decodeDefinitions(raw);
    });
    if (removed) log(`Removed '${name}' (${removed.length} definitions)`);
    return removed;
  }

  /**
   * Remove the one definition registered for `scope`. The record is deleted
   * when nothing remains. Null when the alias or the scope is absent.
   */
  removeScope(name: string, scope: Scope): AliasDefinition | null {
    const removed = this.write("remove scope", txn => {
      const definitions = readDefinitions(txn, name);
      if (!definitions) return null;

      const record = new AliasRecord(definitions);
      const definition = record.removeScope(scope);
      if (!definition) return null;

      if (record.isEmpty) {
        txn.remove(name);
      } else {
        txn.insert(name, encodeDefinitions(record.toList()));
      }
      return definition;
    });
    if (removed) log(`Removed '${name}' from ${describeScope(scope)}`);
    return removed;
  }

  /** Delete every record; returns how many existed. */
  removeAll(): number {
    const count = this.write("remove all", txn => {
      const names = txn.entries().map(([name]) => name);
      for (const name of names) {
        txn.remove(name);
      }
      return names.length;
    });
    log(`Removed all ${count} aliases`);
    return count;
  }

  /**
   * Remove every definition whose scope equals `scope` (value equality,
   * not subtree containment) and drop records left empty.
   */
  removeAllInScope(scope: Scope): AliasListing {
    const removed = this.write("remove all in scope", txn => {
      const result: AliasListing = new Map();
      for (const [name, raw] of txn.entries()) {
        const definitions = decodeDefinitions(raw);
        const kept = definitions.filter(d => !scopesEqual(d.scope, scope));
        if (kept.length === definitions.length) continue;

        result.set(name, definitions.filter(d => scopesEqual(d.scope, scope)));
        if (kept.length === 0) {
          txn.remove(name);
        } else {
          txn.insert(name, encodeDefinitions(kept));
        }
      }
      return result;
    });
    log(`Removed ${removed.size} aliases from ${describeScope(scope)}`);
    return removed;
  }

  list(): AliasListing {
    const txn = guard("begin read", () => this.engine.beginRead());
    try {
      const listing: AliasListing = new Map();
      for (const [name, raw] of txn.entries()) {
        listing.set(name, decodeDefinitions(raw));
      }
      return listing;
    } catch (err) {
      throw asStorageFailure("list", err);
    } finally {
      txn.close();
    }
  }

  close(): void {
    this.engine.close();
  }

  private write<T>(operation: string, fn: (txn: WriteTransaction) => T): T {
    const txn = guard(`begin ${operation}`, () => this.engine.beginWrite());
    let result: T;
    try {
      result = fn(txn);
      txn.commit();
    } catch (err) {
      try {
        txn.abort();
      } catch (abortErr) {
        log(`Rollback after failed ${operation} also failed: ${String(abortErr)}`);
      }
      throw asStorageFailure(operation, err);
    }
    return result;
  }
}

function guard<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw asStorageFailure(operation, err);
  }
}

function asStorageFailure(operation: string, err: unknown): DaliasError {
  return err instanceof DaliasError ? err : new StorageFailureError(operation, err);
}

function readDefinitions(
  txn: WriteTransaction,
  name: string,
): AliasDefinition[] | null {
  const raw = txn.get(name);
  return raw === undefined ? null : decodeDefinitions(raw);
}
