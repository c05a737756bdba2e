import type { DiagnosticCollector } from "../diagnostics.js";
import type { Token } from "./lexer.js";
import { scanStatements, type Statement } from "./scanner.js";

export interface ParseContext {
  tokens: ReadonlyArray<Token>;
  diagnostics: DiagnosticCollector;
  maxDepth: number;
}

/**
 * Sub-statements of a block statement; empty for simple statements.
 *
 * A body is always bounded by a matched pair of braces, so the scan below
 * never ends on an unterminated block.
 */
export function subStatements(ctx: ParseContext, statement: Statement): Statement[] {
  if (!statement.body) return [];
  return scanStatements(ctx.tokens, statement.body, ctx.diagnostics).statements;
}

/**
 * Collapse the indentation of multi-line description strings.
 */
export function normalizeText(text: string | undefined): string {
  return (text ?? "").replace(/\s+/g, " ").trim();
}
