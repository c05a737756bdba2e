/**
 * Tokenizer for the YANG-like schema language.
 *
 * Produces a flat token stream; block structure is recovered afterwards by the
 * depth-counting scanner. Quoted strings joined with `+` are folded into one
 * string token. Comments are dropped.
 */
import type { DiagnosticCollector, SourceLocation } from "../diagnostics.js";

export type TokenKind = "word" | "string" | "open" | "close" | "semicolon";

export interface Token extends SourceLocation {
  kind: TokenKind;
  value: string;
}

const ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  '"': '"',
  "\\": "\\",
};

function isWhitespace(ch: string): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || ch === "\r";
}

function isDelimiter(ch: string): boolean {
  return isWhitespace(ch) || ch === "{" || ch === "}" || ch === ";" || ch === '"' || ch === "'";
}

export function tokenize(text: string, diagnostics: DiagnosticCollector): Token[] {
  const tokens: Token[] = [];
  let pos = 0;
  let line = 1;
  let column = 1;

  const advance = () => {
    if (text[pos] === "\n") {
      line++;
      column = 1;
    } else {
      column++;
    }
    pos++;
  };

  const unterminated = (what: string, at: SourceLocation) => {
    diagnostics.report({
      code: "structural-parse-error",
      message: `${what} is never closed`,
      location: at,
    });
  };

  while (pos < text.length) {
    const ch = text[pos];

    if (isWhitespace(ch)) {
      advance();
      continue;
    }

    const start: SourceLocation = { line, column };

    if (ch === "/" && text[pos + 1] === "/") {
      while (pos < text.length && text[pos] !== "\n") advance();
      continue;
    }

    if (ch === "/" && text[pos + 1] === "*") {
      const end = text.indexOf("*/", pos + 2);
      if (end === -1) {
        unterminated("comment", start);
        return tokens;
      }
      while (pos < end + 2) advance();
      continue;
    }

    if (ch === "{" || ch === "}" || ch === ";") {
      tokens.push({
        kind: ch === "{" ? "open" : ch === "}" ? "close" : "semicolon",
        value: ch,
        ...start,
      });
      advance();
      continue;
    }

    if (ch === '"' || ch === "'") {
      const quote = ch;
      advance();
      let value = "";
      let closed = false;
      while (pos < text.length) {
        const c = text[pos];
        if (c === quote) {
          closed = true;
          advance();
          break;
        }
        if (quote === '"' && c === "\\" && pos + 1 < text.length) {
          const next = text[pos + 1];
          value += ESCAPES[next] ?? `\\${next}`;
          advance();
          advance();
          continue;
        }
        value += c;
        advance();
      }
      if (!closed) {
        unterminated("quoted string", start);
        return tokens;
      }

      // "a" + "b" folds into the previous string token
      const prev = tokens[tokens.length - 1];
      const beforePrev = tokens[tokens.length - 2];
      if (prev?.kind === "word" && prev.value === "+" && beforePrev?.kind === "string") {
        tokens.pop();
        beforePrev.value += value;
      } else {
        tokens.push({ kind: "string", value, ...start });
      }
      continue;
    }

    let word = "";
    while (pos < text.length && !isDelimiter(text[pos])) {
      word += text[pos];
      advance();
    }
    tokens.push({ kind: "word", value: word, ...start });
  }

  return tokens;
}
