/**
 * Alias data model: scopes, definitions and the listing shape.
 */

export type Scope =
  | { type: "global"; }
  | { type: "exact"; path: string; }
  | { type: "recursive"; path: string; };

export type ScopeType = Scope["type"];

export interface AliasDefinition {
  command: string;
  scope: Scope;
}

/** Alias name -> definitions, in name order. */
export type AliasListing = Map<string, AliasDefinition[]>;
