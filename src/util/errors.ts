/**
 * Error taxonomy shared by the store, the generator and the CLI.
 */

export type DaliasErrorCode =
  | "STORAGE_FAILURE"
  | "ALIAS_NOT_FOUND"
  | "SCOPE_NOT_FOUND"
  | "INVALID_SCOPE"
  | "INVALID_ALIAS_NAME"
  | "CANCELLED"
  | "CONFIG_ERROR";

export class DaliasError extends Error {
  constructor(
    public readonly code: DaliasErrorCode,
    message: string,
    options?: { cause?: unknown; },
  ) {
    super(message, options);
    this.name = "DaliasError";
  }
}

/** The persistence engine could not open, begin, read or commit. */
export class StorageFailureError extends DaliasError {
  constructor(operation: string, cause?: unknown) {
    super(
      "STORAGE_FAILURE",
      `Storage error during ${operation}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
    this.name = "StorageFailureError";
  }
}

export class AliasNotFoundError extends DaliasError {
  constructor(public readonly alias: string) {
    super("ALIAS_NOT_FOUND", `Alias not found: ${alias}`);
    this.name = "AliasNotFoundError";
  }
}

export class ScopeNotFoundError extends DaliasError {
  constructor(public readonly alias: string, public readonly scope: string) {
    super(
      "SCOPE_NOT_FOUND",
      `No definition found for alias '${alias}' in scope '${scope}'`,
    );
    this.name = "ScopeNotFoundError";
  }
}

export class InvalidScopeError extends DaliasError {
  constructor(public readonly path: string, reason?: string) {
    super("INVALID_SCOPE", `Invalid scope path: ${path}${reason ? ` (${reason})` : ""}`);
    this.name = "InvalidScopeError";
  }
}

export class InvalidAliasNameError extends DaliasError {
  constructor(public readonly alias: string, reason?: string) {
    super(
      "INVALID_ALIAS_NAME",
      `Invalid alias name: "${alias}". ${reason ?? "Use letters, digits, and _ . : + -"}`,
    );
    this.name = "InvalidAliasNameError";
  }
}

export class CancelledError extends DaliasError {
  constructor() {
    super("CANCELLED", "Operation cancelled");
    this.name = "CancelledError";
  }
}

export class ConfigError extends DaliasError {
  constructor(message: string) {
    super("CONFIG_ERROR", `Configuration error: ${message}`);
    this.name = "ConfigError";
  }
}
