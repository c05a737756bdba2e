/**
 * Leaf and leaf-list metadata extraction.
 *
 * Leaf bodies are flat clauses; the only nesting looked into is the `type`
 * statement, whose body carries `enum` and `range` (and nested `type`s for
 * unions).
 */
import type { CanonicalType, DefaultValue, Parameter } from "../schema/ir.js";
import { coerceDefault, mapSchemaType } from "../schema/type-map.js";
import { normalizeText, subStatements, type ParseContext } from "./context.js";
import type { Statement } from "./scanner.js";

interface LeafClauses {
  typeToken?: string;
  description: string;
  rawDefault?: string;
  mandatory: boolean;
  units?: string;
  choices: string[];
  range?: string;
}

function collectTypeDetails(
  ctx: ParseContext,
  typeStatement: Statement,
  clauses: LeafClauses,
  depth: number,
): void {
  if (depth > ctx.maxDepth) return;
  for (const sub of subStatements(ctx, typeStatement)) {
    switch (sub.keyword) {
      case "enum":
        if (sub.argument !== undefined) clauses.choices.push(sub.argument);
        break;
      case "range":
        clauses.range ??= sub.argument;
        break;
      case "type":
        collectTypeDetails(ctx, sub, clauses, depth + 1);
        break;
    }
  }
}

function collectClauses(ctx: ParseContext, statement: Statement, depth: number): LeafClauses {
  const clauses: LeafClauses = { description: "", mandatory: false, choices: [] };
  for (const sub of subStatements(ctx, statement)) {
    switch (sub.keyword) {
      case "type":
        clauses.typeToken = sub.argument;
        collectTypeDetails(ctx, sub, clauses, depth + 1);
        break;
      case "description":
        clauses.description = normalizeText(sub.argument);
        break;
      case "default":
        clauses.rawDefault ??= sub.argument;
        break;
      case "mandatory":
        clauses.mandatory = sub.argument === "true";
        break;
      case "units":
        clauses.units = sub.argument;
        break;
      case "enum":
        if (sub.argument !== undefined) clauses.choices.push(sub.argument);
        break;
      case "range":
        clauses.range ??= sub.argument;
        break;
    }
  }
  return clauses;
}

export function parseLeaf(
  ctx: ParseContext,
  statement: Statement,
  path: ReadonlyArray<string>,
  depth: number,
): Parameter | undefined {
  const name = statement.argument;
  if (!name) {
    ctx.diagnostics.report({
      code: "structural-parse-error",
      message: `${statement.keyword} without a name is skipped`,
      location: statement.location,
      path,
    });
    return undefined;
  }

  const leafPath = [...path, name];
  const clauses = collectClauses(ctx, statement, depth);
  const isLeafList = statement.keyword === "leaf-list";

  let type: CanonicalType;
  if (isLeafList) {
    type = "array";
  } else if (clauses.typeToken === undefined) {
    ctx.diagnostics.report({
      code: "unknown-type",
      message: `leaf "${name}" has no type; using string`,
      location: statement.location,
      path: leafPath,
    });
    type = "string";
  } else {
    const resolved = mapSchemaType(clauses.typeToken);
    if (!resolved.known) {
      ctx.diagnostics.report({
        code: "unknown-type",
        message: `type "${clauses.typeToken}" is not a built-in type; using string`,
        location: statement.location,
        path: leafPath,
      });
    }
    type = resolved.type;
  }

  let choices: string[] | undefined = clauses.choices.length > 0 ? clauses.choices : undefined;
  if (choices && type !== "string") {
    ctx.diagnostics.report({
      code: "generation-invariant-violation",
      severity: "warning",
      message: `enumeration values on ${type} ${statement.keyword} "${name}" are dropped`,
      location: statement.location,
      path: leafPath,
    });
    choices = undefined;
  }

  let defaultValue: DefaultValue | undefined;
  if (clauses.rawDefault !== undefined) {
    const coerced = coerceDefault(clauses.rawDefault, type);
    if (clauses.mandatory) {
      ctx.diagnostics.report({
        code: "invalid-default",
        message: `mandatory leaf "${name}" cannot have a default; default dropped`,
        location: statement.location,
        path: leafPath,
      });
    } else if (!coerced.ok) {
      ctx.diagnostics.report({
        code: "invalid-default",
        message: `default of "${name}" dropped: ${coerced.reason}`,
        location: statement.location,
        path: leafPath,
      });
    } else if (choices && !choices.includes(clauses.rawDefault)) {
      ctx.diagnostics.report({
        code: "invalid-default",
        message: `default "${clauses.rawDefault}" of "${name}" is not one of its enum values; default dropped`,
        location: statement.location,
        path: leafPath,
      });
    } else {
      defaultValue = coerced.value;
    }
  }

  return {
    name,
    type,
    schemaType: clauses.typeToken ?? "string",
    description: clauses.description,
    required: clauses.mandatory,
    ...(defaultValue !== undefined ? { default: defaultValue } : {}),
    ...(choices ? { choices } : {}),
    ...(clauses.range !== undefined ? { range: clauses.range } : {}),
    ...(clauses.units !== undefined ? { units: clauses.units } : {}),
  };
}
