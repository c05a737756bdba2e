/**
 * Depth-counting block scanner.
 *
 * Splits a token range into sibling statements of the form
 * `keyword [argument] ;` or `keyword [argument] { ... }`. A block body is
 * located by counting depth (+1 on `{`, -1 on `}`) from the opening brace and
 * slicing when the depth returns to zero, so blocks nest to any depth without
 * the scanner needing to know which keywords may contain which.
 */
import type { DiagnosticCollector, SourceLocation } from "../diagnostics.js";
import type { Token } from "./lexer.js";

/**
 * Half-open range of token indices.
 */
export interface TokenRange {
  start: number;
  end: number;
}

export interface Statement {
  keyword: string;
  argument?: string;
  location: SourceLocation;
  /**
   * Tokens between the braces, for block statements.
   */
  body?: TokenRange;
}

export interface ScanResult {
  statements: Statement[];
  /**
   * A block that reached the end of the range before its closing brace. Its
   * body runs to the end of the range. It is *not* part of `statements`.
   */
  unterminated?: Statement;
}

export function describeStatement(statement: Pick<Statement, "keyword" | "argument">): string {
  return statement.argument === undefined
    ? statement.keyword
    : `${statement.keyword} ${statement.argument}`;
}

/**
 * Index of the `}` closing the `{` at `open`, or -1 when the range ends first.
 */
export function findClosingBrace(
  tokens: ReadonlyArray<Token>,
  open: number,
  end: number,
): number {
  let depth = 0;
  for (let i = open; i < end; i++) {
    const kind = tokens[i].kind;
    if (kind === "open") {
      depth++;
    } else if (kind === "close") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

export function scanStatements(
  tokens: ReadonlyArray<Token>,
  range: TokenRange,
  diagnostics: DiagnosticCollector,
): ScanResult {
  const statements: Statement[] = [];
  let i = range.start;

  while (i < range.end) {
    const token = tokens[i];

    if (token.kind === "semicolon") {
      i++;
      continue;
    }

    if (token.kind === "close") {
      diagnostics.report({
        code: "structural-parse-error",
        message: "unexpected '}' without a matching '{'",
        location: { line: token.line, column: token.column },
      });
      i++;
      continue;
    }

    if (token.kind === "open") {
      const close = findClosingBrace(tokens, i, range.end);
      diagnostics.report({
        code: "structural-parse-error",
        message: "block without a keyword is skipped",
        location: { line: token.line, column: token.column },
      });
      if (close === -1) break;
      i = close + 1;
      continue;
    }

    const location: SourceLocation = { line: token.line, column: token.column };
    const keyword = token.value;
    i++;

    const argumentParts: string[] = [];
    while (
      i < range.end &&
      (tokens[i].kind === "word" || tokens[i].kind === "string")
    ) {
      argumentParts.push(tokens[i].value);
      i++;
    }
    const statement: Statement = {
      keyword,
      location,
      ...(argumentParts.length > 0 ? { argument: argumentParts.join(" ") } : {}),
    };

    const next = i < range.end ? tokens[i] : undefined;

    if (next?.kind === "semicolon") {
      statements.push(statement);
      i++;
      continue;
    }

    if (next?.kind === "open") {
      const close = findClosingBrace(tokens, i, range.end);
      if (close === -1) {
        diagnostics.report({
          code: "structural-parse-error",
          message: `block "${describeStatement(statement)}" is never closed`,
          location,
        });
        return {
          statements,
          unterminated: { ...statement, body: { start: i + 1, end: range.end } },
        };
      }
      statements.push({ ...statement, body: { start: i + 1, end: close } });
      i = close + 1;
      continue;
    }

    // Missing terminator: keep the statement, the next token starts afresh.
    diagnostics.report({
      code: "structural-parse-error",
      severity: "warning",
      message: `statement "${describeStatement(statement)}" is missing ';'`,
      location,
    });
    statements.push(statement);
  }

  return { statements };
}
