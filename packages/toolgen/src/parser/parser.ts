/**
 * Text route of the pipeline: schema description text to Schema IR.
 *
 * Parsing is best-effort. Structurally broken regions are reported as
 * diagnostics and skipped while their well-formed siblings are kept, so
 * `parseSchema` returns a module for any input string.
 *
 * @example
 * ```typescript
 * const { module, diagnostics } = parseSchema(`
 *   module m {
 *     container service {
 *       leaf service-name { type string; mandatory true; }
 *     }
 *   }
 * `);
 * module.containers[0].parameters[0].required; // true
 * ```
 */
import { DEFAULT_MAX_DEPTH, DEFAULT_MODULE_NAME } from "../constants.js";
import {
  DiagnosticCollector,
  type Diagnostic,
  type SourceLocation,
} from "../diagnostics.js";
import {
  deepFreeze,
  type Container,
  type Grouping,
  type ListNode,
  type Module,
  type Parameter,
  type Rpc,
} from "../schema/ir.js";
import { normalizeText, subStatements, type ParseContext } from "./context.js";
import { parseLeaf } from "./leaf.js";
import { tokenize } from "./lexer.js";
import { describeStatement, scanStatements, type Statement } from "./scanner.js";

export interface ParseOptions {
  /**
   * Module name used when the text has no `module` statement.
   */
  moduleName?: string;
  maxDepth?: number;
}

export interface ParseResult {
  module: Module;
  diagnostics: Diagnostic[];
}

interface GroupingUse {
  name: string;
  location: SourceLocation;
  path: ReadonlyArray<string>;
}

interface TextParseContext extends ParseContext {
  uses: GroupingUse[];
  /**
   * Every grouping seen at any level, for resolving `uses` references.
   */
  groupingNames: Set<string>;
}

interface BodyParts {
  description: string;
  namespace?: string;
  prefix?: string;
  key?: string;
  keyLocation?: SourceLocation;
  parameters: Parameter[];
  containers: Container[];
  lists: ListNode[];
  rpcs: Rpc[];
  groupings: Grouping[];
  input?: Parameter[];
  output?: Parameter[];
}

const DATA_KEYWORDS = new Set(["leaf", "leaf-list", "container", "list", "rpc"]);

/**
 * What a body belongs to: `rpc` is only allowed in a module body, `input`
 * and `output` only in an rpc body.
 */
type BodyOwner = "module" | "rpc" | "data";

function misplaced(
  ctx: TextParseContext,
  statement: Statement,
  path: ReadonlyArray<string>,
  allowedIn: string,
): void {
  ctx.diagnostics.report({
    code: "structural-parse-error",
    message: `"${describeStatement(statement)}" is only allowed in ${allowedIn} and is skipped`,
    location: statement.location,
    path,
  });
}

function depthExceeded(
  ctx: TextParseContext,
  statement: Statement,
  path: ReadonlyArray<string>,
): void {
  ctx.diagnostics.report({
    code: "depth-limit-exceeded",
    message: `"${statement.keyword} ${statement.argument ?? ""}" is nested deeper than ${ctx.maxDepth} levels and is skipped`,
    location: statement.location,
    path,
  });
}

function parseBody(
  ctx: TextParseContext,
  statements: ReadonlyArray<Statement>,
  path: ReadonlyArray<string>,
  depth: number,
  owner: BodyOwner,
  parts: BodyParts = {
    description: "",
    parameters: [],
    containers: [],
    lists: [],
    rpcs: [],
    groupings: [],
  },
  seen: Set<string> = new Set(),
): BodyParts {
  for (const statement of statements) {
    const { keyword, argument } = statement;

    if (DATA_KEYWORDS.has(keyword) && argument !== undefined) {
      if (seen.has(argument)) {
        ctx.diagnostics.report({
          code: "duplicate-name",
          message: `"${argument}" is already defined in this scope; the later ${keyword} is dropped`,
          location: statement.location,
          path,
        });
        continue;
      }
      seen.add(argument);
    }

    switch (keyword) {
      case "description":
        parts.description = normalizeText(argument);
        break;
      case "namespace":
        parts.namespace = argument;
        break;
      case "prefix":
        parts.prefix = argument;
        break;
      case "key":
        parts.key = argument;
        parts.keyLocation = statement.location;
        break;
      case "leaf":
      case "leaf-list": {
        const parameter = parseLeaf(ctx, statement, path, depth);
        if (parameter) parts.parameters.push(parameter);
        break;
      }
      case "container": {
        const container = parseContainer(ctx, statement, path, depth + 1);
        if (container) parts.containers.push(container);
        break;
      }
      case "grouping": {
        const grouping = parseContainer(ctx, statement, path, depth + 1);
        if (grouping) {
          parts.groupings.push(grouping);
          ctx.groupingNames.add(grouping.name);
        }
        break;
      }
      case "list": {
        const list = parseList(ctx, statement, path, depth + 1);
        if (list) parts.lists.push(list);
        break;
      }
      case "rpc": {
        if (owner !== "module") {
          misplaced(ctx, statement, path, "a module");
          break;
        }
        const rpc = parseRpc(ctx, statement, path, depth + 1);
        if (rpc) parts.rpcs.push(rpc);
        break;
      }
      case "input":
      case "output":
        if (owner !== "rpc") {
          misplaced(ctx, statement, path, "an rpc");
        } else if (keyword === "input") {
          parts.input = parseParameterBlock(ctx, statement, [...path, "input"], depth + 1);
        } else {
          parts.output = parseParameterBlock(ctx, statement, [...path, "output"], depth + 1);
        }
        break;
      case "choice":
      case "case":
        // Alternatives contribute their data nodes to the enclosing node.
        if (depth + 1 > ctx.maxDepth) {
          depthExceeded(ctx, statement, path);
        } else {
          const before = parts.description;
          parseBody(ctx, subStatements(ctx, statement), path, depth + 1, owner, parts, seen);
          parts.description = before;
        }
        break;
      case "uses":
        if (argument !== undefined) {
          ctx.uses.push({ name: argument, location: statement.location, path });
        }
        break;
    }
  }
  return parts;
}

function requireName(
  ctx: TextParseContext,
  statement: Statement,
  path: ReadonlyArray<string>,
): string | undefined {
  if (statement.argument) return statement.argument;
  ctx.diagnostics.report({
    code: "structural-parse-error",
    message: `${statement.keyword} without a name is skipped`,
    location: statement.location,
    path,
  });
  return undefined;
}

function parseContainer(
  ctx: TextParseContext,
  statement: Statement,
  path: ReadonlyArray<string>,
  depth: number,
): Container | undefined {
  const name = requireName(ctx, statement, path);
  if (name === undefined) return undefined;
  if (depth > ctx.maxDepth) {
    depthExceeded(ctx, statement, path);
    return undefined;
  }
  const body = parseBody(ctx, subStatements(ctx, statement), [...path, name], depth, "data");
  return {
    name,
    description: body.description,
    parameters: body.parameters,
    containers: body.containers,
    lists: body.lists,
  };
}

function parseList(
  ctx: TextParseContext,
  statement: Statement,
  path: ReadonlyArray<string>,
  depth: number,
): ListNode | undefined {
  const name = requireName(ctx, statement, path);
  if (name === undefined) return undefined;
  if (depth > ctx.maxDepth) {
    depthExceeded(ctx, statement, path);
    return undefined;
  }
  const listPath = [...path, name];
  const body = parseBody(ctx, subStatements(ctx, statement), listPath, depth, "data");

  let key: string | undefined;
  if (body.key !== undefined) {
    const keys = body.key.split(/\s+/).filter(Boolean);
    if (keys.length > 1) {
      ctx.diagnostics.report({
        code: "generation-invariant-violation",
        severity: "info",
        message: `composite key "${body.key}"; "${keys[0]}" identifies entries`,
        location: body.keyLocation,
        path: listPath,
      });
    }
    key = keys[0];
    // The generator reports key-less lists, with a severity that follows its mode.
    if (key !== undefined && !body.parameters.some((p) => p.name === key)) {
      key = undefined;
    }
  }

  return {
    name,
    description: body.description,
    ...(key !== undefined ? { key } : {}),
    parameters: body.parameters,
    containers: body.containers,
    lists: body.lists,
  };
}

function flattenContainer(container: Container, prefix: string): Parameter[] {
  const scoped = `${prefix}${container.name}-`;
  return [
    ...container.parameters.map((p) => ({ ...p, name: `${scoped}${p.name}` })),
    ...container.containers.flatMap((c) => flattenContainer(c, scoped)),
    ...container.lists.map((l) => listAsParameter(l, scoped)),
  ];
}

function listAsParameter(list: ListNode, prefix: string): Parameter {
  return {
    name: `${prefix}${list.name}`,
    type: "array",
    schemaType: "list",
    description: list.description,
    required: false,
  };
}

/**
 * `input` / `output` of an rpc: leafs as parameters, nested containers
 * flattened to `<container>-<leaf>`, nested lists as array parameters.
 */
function parseParameterBlock(
  ctx: TextParseContext,
  statement: Statement,
  path: ReadonlyArray<string>,
  depth: number,
): Parameter[] {
  if (depth > ctx.maxDepth) {
    depthExceeded(ctx, statement, path);
    return [];
  }
  const body = parseBody(ctx, subStatements(ctx, statement), path, depth, "data");
  return [
    ...body.parameters,
    ...body.containers.flatMap((c) => flattenContainer(c, "")),
    ...body.lists.map((l) => listAsParameter(l, "")),
  ];
}

function parseRpc(
  ctx: TextParseContext,
  statement: Statement,
  path: ReadonlyArray<string>,
  depth: number,
): Rpc | undefined {
  const name = requireName(ctx, statement, path);
  if (name === undefined) return undefined;
  if (depth > ctx.maxDepth) {
    depthExceeded(ctx, statement, path);
    return undefined;
  }
  const body = parseBody(ctx, subStatements(ctx, statement), [...path, name], depth, "rpc");
  return {
    name,
    description: body.description,
    input: body.input ?? [],
    output: body.output ?? [],
  };
}

function reportGroupingUses(ctx: TextParseContext): void {
  for (const use of ctx.uses) {
    ctx.diagnostics.report({
      code: "unexpanded-grouping",
      message: ctx.groupingNames.has(use.name)
        ? `grouping "${use.name}" is referenced but not expanded`
        : `unknown grouping "${use.name}" is referenced; nothing expanded`,
      location: use.location,
      path: use.path,
    });
  }
}

export function parseSchema(text: string, options: ParseOptions = {}): ParseResult {
  const diagnostics = new DiagnosticCollector();
  const tokens = tokenize(text, diagnostics);
  const ctx: TextParseContext = {
    tokens,
    diagnostics,
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
    uses: [],
    groupingNames: new Set(),
  };
  const fallbackName = options.moduleName ?? DEFAULT_MODULE_NAME;

  const top = scanStatements(tokens, { start: 0, end: tokens.length }, diagnostics);
  const moduleStatements = top.statements.filter((s) => s.keyword === "module");
  // An unclosed module still yields its body, up to the end of the input.
  const moduleStatement =
    moduleStatements[0] ??
    (top.unterminated?.keyword === "module" ? top.unterminated : undefined);

  let name = fallbackName;
  let statements: Statement[];
  if (moduleStatement) {
    if (moduleStatement.argument) {
      name = moduleStatement.argument;
    } else {
      diagnostics.report({
        code: "structural-parse-error",
        message: `module without a name; using "${fallbackName}"`,
        location: moduleStatement.location,
      });
    }
    if (moduleStatements.length > 1) {
      diagnostics.report({
        code: "duplicate-name",
        message: `only the first of ${moduleStatements.length} modules is parsed`,
        location: moduleStatements[1].location,
      });
    }
    for (const stray of top.statements) {
      if (stray === moduleStatement || stray.keyword === "module") continue;
      diagnostics.report({
        code: "structural-parse-error",
        message: `"${describeStatement(stray)}" is outside module "${name}" and is skipped`,
        location: stray.location,
      });
    }
    statements = moduleStatement.body
      ? scanStatements(tokens, moduleStatement.body, diagnostics).statements
      : [];
  } else {
    diagnostics.report({
      code: "missing-module",
      message: `no module statement; parsing top-level statements as module "${fallbackName}"`,
    });
    statements = top.statements;
  }

  const body = parseBody(ctx, statements, [name], 1, "module");
  reportGroupingUses(ctx);

  const module: Module = {
    name,
    ...(body.namespace !== undefined ? { namespace: body.namespace } : {}),
    ...(body.prefix !== undefined ? { prefix: body.prefix } : {}),
    description: body.description,
    containers: body.containers,
    lists: body.lists,
    rpcs: body.rpcs,
    parameters: body.parameters,
    groupings: body.groupings,
  };

  return { module: deepFreeze(module), diagnostics: diagnostics.toArray() };
}
