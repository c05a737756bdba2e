const RESERVED_WORDS = new Set([
  "arguments",
  "await",
  "break",
  "case",
  "catch",
  "class",
  "const",
  "continue",
  "debugger",
  "default",
  "delete",
  "do",
  "else",
  "enum",
  "eval",
  "export",
  "extends",
  "false",
  "finally",
  "for",
  "function",
  "if",
  "implements",
  "import",
  "in",
  "instanceof",
  "interface",
  "let",
  "new",
  "null",
  "package",
  "private",
  "protected",
  "public",
  "return",
  "static",
  "super",
  "switch",
  "this",
  "throw",
  "true",
  "try",
  "typeof",
  "var",
  "void",
  "while",
  "with",
  "yield",
]);

/**
 * A valid identifier for `name`: other characters become `_`, a leading
 * digit gets a `_` prefix and reserved words a `_` suffix.
 */
export function sanitizeIdentifier(name: string): string {
  let identifier = name.replace(/[^A-Za-z0-9_$]/g, "_");
  if (identifier === "") identifier = "_";
  if (/^[0-9]/.test(identifier)) identifier = `_${identifier}`;
  if (RESERVED_WORDS.has(identifier)) identifier = `${identifier}_`;
  return identifier;
}

/**
 * Identifier scope for one emitted block. Names listed in `blocked` (the
 * runtime imports) are never handed out.
 */
export class IdentifierScope {
  private readonly used: Set<string>;

  constructor(blocked: Iterable<string> = []) {
    this.used = new Set(blocked);
  }

  declare(name: string): string {
    const base = sanitizeIdentifier(name);
    let identifier = base;
    for (let n = 2; this.used.has(identifier); n++) {
      identifier = `${base}_${n}`;
    }
    this.used.add(identifier);
    return identifier;
  }
}
