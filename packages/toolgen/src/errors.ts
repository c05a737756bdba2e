import type { Diagnostic } from "./diagnostics.js";

/**
 * Raised for input the caller can fix (missing file, unreadable snapshot).
 * Malformed schema *content* never raises; it is reported as diagnostics.
 */
export class UserInputError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "UserInputError";
  }
}

/**
 * Raised when resolved configuration is invalid.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/**
 * Raised in strict mode when generation meets an invariant violation, or when
 * a strict pipeline run finishes with error-severity diagnostics.
 */
export class GenerationInvariantError extends Error {
  readonly diagnostics: ReadonlyArray<Diagnostic>;

  constructor(message: string, diagnostics: ReadonlyArray<Diagnostic>) {
    super(message);
    this.name = "GenerationInvariantError";
    this.diagnostics = diagnostics;
  }
}
