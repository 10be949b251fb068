/**
 * Programmatic API for dalias.
 */

export { AliasStore } from "./alias/store";
export { AliasRecord } from "./alias/record";
export { decodeDefinitions, encodeDefinitions } from "./alias/codec";
export {
  compareScopes,
  describeScope,
  exactScope,
  GLOBAL_SCOPE,
  recursiveScope,
  resolveScopePath,
  scopeKey,
  scopeMatches,
  scopesEqual,
  sortByPrecedence,
} from "./alias/scope";
export { isValidAliasName } from "./alias/name";
export type { AliasDefinition, AliasListing, Scope, ScopeType } from "./alias/types";
export { SqliteEngine } from "./storage/sqlite";
export type { KeyValueEngine, ReadTransaction, WriteTransaction } from "./storage/types";
export {
  type BootstrapOptions,
  type DumpOptions,
  FUNCTIONS_MARKER,
  parseFunctionsMarker,
  renderBootstrap,
  renderCommand,
  renderDump,
  renderFunction,
} from "./generator/script";
export { rewritePlaceholders, usesPositionalArgs } from "./generator/scanner";
export { resolveSettings, type Settings } from "./config/settings";
export * from "./util/errors";
export { setVerbose } from "./util/logger";
