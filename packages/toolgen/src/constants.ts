/**
 * Constants for the yang-toolgen pipeline.
 */

/**
 * Generator identification, stamped into emitted headers and manifests
 */
export const GENERATOR_NAME = "yang-toolgen" as const;

/**
 * Implicit scope-identity parameter prepended to every device-scoped tool
 */
export const DEFAULT_IDENTITY_PARAMETER = {
  name: "router_name",
  description: "Name of the device the operation targets",
} as const;

/**
 * Nesting limit shared by the text parser and the reflective analyzer.
 * Anything deeper is reported as a diagnostic instead of being walked.
 */
export const DEFAULT_MAX_DEPTH = 64;

/**
 * Fallback module name for schema text without a `module` statement
 */
export const DEFAULT_MODULE_NAME = "unknown";

/**
 * Module the emitted stubs import their runtime helpers from
 */
export const DEFAULT_RUNTIME_MODULE = "./runtime.js";

/**
 * Children of a live configuration tree that are bookkeeping, not schema
 */
export const DEFAULT_IGNORED_CHILDREN: ReadonlyArray<string> = [
  "commit-queue",
  "log",
  "modified",
  "private",
];
