/**
 * Diagnostics: non-fatal findings collected by every pipeline stage.
 *
 * Parsing, reflective analysis and generation never throw for malformed input
 * data. Problems are recorded here and returned next to the primary result;
 * the caller decides whether a non-empty list fails the build.
 */

export type DiagnosticCode =
  | "structural-parse-error" // unbalanced or unterminated block
  | "unknown-type" // type token missing from the mapping table
  | "reflection-access-error" // a capability probe threw on the live tree
  | "generation-invariant-violation" // e.g. list key not among its leafs
  | "unexpanded-grouping" // `uses` is recorded but never expanded
  | "depth-limit-exceeded" // nesting beyond the configured limit
  | "invalid-default" // default literal does not fit the leaf's type
  | "duplicate-name" // sibling or tool name collision
  | "missing-module"; // schema text without a `module` statement

export type DiagnosticSeverity = "error" | "warning" | "info";

export interface SourceLocation {
  line: number;
  column: number;
}

export interface Diagnostic {
  code: DiagnosticCode;
  severity: DiagnosticSeverity;
  message: string;
  location?: SourceLocation;
  /**
   * Schema path of the node the diagnostic is about, e.g. `["m", "a", "status"]`
   */
  path?: ReadonlyArray<string>;
}

const DEFAULT_SEVERITY: Record<DiagnosticCode, DiagnosticSeverity> = {
  "structural-parse-error": "error",
  "unknown-type": "warning",
  "reflection-access-error": "error",
  "generation-invariant-violation": "error",
  "unexpanded-grouping": "warning",
  "depth-limit-exceeded": "error",
  "invalid-default": "warning",
  "duplicate-name": "warning",
  "missing-module": "warning",
};

export type DiagnosticInput = Omit<Diagnostic, "severity"> & {
  severity?: DiagnosticSeverity;
};

/**
 * Append-only collector threaded through a single pass.
 */
export class DiagnosticCollector {
  private readonly items: Diagnostic[] = [];

  report(input: DiagnosticInput): Diagnostic {
    const diagnostic: Diagnostic = {
      ...input,
      severity: input.severity ?? DEFAULT_SEVERITY[input.code],
    };
    this.items.push(diagnostic);
    return diagnostic;
  }

  get size(): number {
    return this.items.length;
  }

  toArray(): Diagnostic[] {
    return [...this.items];
  }
}

export function hasErrors(diagnostics: ReadonlyArray<Diagnostic>): boolean {
  return diagnostics.some((d) => d.severity === "error");
}

/**
 * Render a diagnostic as a single line, e.g.
 * `error structural-parse-error 4:3 [m/c] block "container c" is never closed`
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const parts: string[] = [diagnostic.severity, diagnostic.code];
  if (diagnostic.location) {
    parts.push(`${diagnostic.location.line}:${diagnostic.location.column}`);
  }
  if (diagnostic.path && diagnostic.path.length > 0) {
    parts.push(`[${diagnostic.path.join("/")}]`);
  }
  parts.push(diagnostic.message);
  return parts.join(" ");
}
