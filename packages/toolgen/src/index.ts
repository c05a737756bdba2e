/**
 * Schema-driven tool generator.
 *
 * Two routes lead into one Schema IR: `parseSchema` reads YANG-like schema
 * text and `analyzeModel` walks a live configuration tree through the
 * `NavigableNode` interface. `generate` turns the IR into tool descriptors,
 * `emit` renders them as TypeScript and `buildManifest` as JSON.
 *
 * @example
 * ```typescript
 * import { runTextPipeline } from "@yang-toolgen/core";
 *
 * const { source, manifest, diagnostics } = runTextPipeline(schemaText);
 * ```
 */
export * from "./constants.js";
export * from "./diagnostics.js";
export * from "./errors.js";
export * from "./version.js";

export * from "./schema/ir.js";
export * from "./schema/type-map.js";

export { parseSchema, type ParseOptions, type ParseResult } from "./parser/parser.js";

export type { NavigableNode, ScalarValue } from "./reflect/navigable.js";
export * from "./reflect/analyzer.js";
export * from "./reflect/snapshot.js";

export * from "./generator/tool-spec.js";
export { parameterName, toolName } from "./generator/naming.js";
export * from "./generator/generate.js";

export * from "./emitter/emit.js";
export { sanitizeIdentifier } from "./emitter/identifiers.js";

export * from "./manifest/manifest.js";

export * from "./pipeline.js";

export * from "./telem/logging.js";
