/**
 * In-memory view of one alias record: definitions keyed by scope,
 * in insertion order. Re-adding a scope moves it to the end.
 */

import type { AliasDefinition, Scope } from "./types";
import { scopeKey } from "./scope";

export class AliasRecord {
  private readonly byScope = new Map<string, AliasDefinition>();

  constructor(definitions: AliasDefinition[] = []) {
    for (const definition of definitions) {
      this.upsert(definition);
    }
  }

  get size(): number {
    return this.byScope.size;
  }

  get isEmpty(): boolean {
    return this.byScope.size === 0;
  }

  upsert(definition: AliasDefinition): void {
    const key = scopeKey(definition.scope);
    this.byScope.delete(key);
    this.byScope.set(key, definition);
  }

  removeScope(scope: Scope): AliasDefinition | undefined {
    const key = scopeKey(scope);
    const existing = this.byScope.get(key);
    if (existing) this.byScope.delete(key);
    return existing;
  }

  toList(): AliasDefinition[] {
    return [...this.byScope.values()];
  }
}
