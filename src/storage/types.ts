/**
 * Transactional key-value engine consumed by the alias store.
 * Keys are alias names; values are encoded definition lists.
 */

export interface ReadTransaction {
  get(key: string): string | undefined;
  /** Every entry, ordered by key. */
  entries(): Array<[string, string]>;
  close(): void;
}

export interface WriteTransaction {
  get(key: string): string | undefined;
  entries(): Array<[string, string]>;
  insert(key: string, value: string): void;
  /** Returns the previous value, if any. */
  remove(key: string): string | undefined;
  commit(): void;
  abort(): void;
}

export interface KeyValueEngine {
  beginRead(): ReadTransaction;
  beginWrite(): WriteTransaction;
  close(): void;
}
