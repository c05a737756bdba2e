/**
 * ToolSpecGenerator: Schema IR to tool descriptors.
 *
 * Every container and list in the tree gets a get/create/delete family of
 * tools (lists use `add_<scope>_item` instead of create), and every rpc an
 * `invoke_<scope>` tool. Entities are visited depth-first in declaration
 * order: the entity itself, then its nested containers, then its nested
 * lists. Rpcs come last.
 *
 * Parameter order is fixed: the identity parameter, then required
 * parameters in declaration order, then optional parameters in declaration
 * order.
 *
 * @example
 * ```typescript
 * const tools = generate(parseSchema(text).module);
 * tools.map((t) => t.name); // ["get_m_service", "create_m_service", "delete_m_service"]
 * ```
 */
import { DEFAULT_IDENTITY_PARAMETER } from "../constants.js";
import {
  DiagnosticCollector,
  type Diagnostic,
  type DiagnosticInput,
} from "../diagnostics.js";
import { GenerationInvariantError } from "../errors.js";
import {
  deepFreeze,
  type Container,
  type ListNode,
  type Module,
  type Parameter,
  type Rpc,
} from "../schema/ir.js";
import { NameRegistry, parameterName, toolName } from "./naming.js";
import {
  OPERATION_ANNOTATIONS,
  type ToolOperation,
  type ToolParameter,
  type ToolSource,
  type ToolSpec,
} from "./tool-spec.js";

export type GenerationMode = "strict" | "best-effort";

export interface IdentityParameterOptions {
  name: string;
  description?: string;
}

export interface GenerateOptions {
  /**
   * Scope-identity parameter prepended to every tool; `false` leaves it out.
   */
  identity?: IdentityParameterOptions | false;
  /**
   * Also emit an `update_<scope>` tool per container and list.
   */
  includeUpdate?: boolean;
  /**
   * `strict` throws on invariant violations instead of reporting them.
   */
  mode?: GenerationMode;
}

export interface GenerateResult {
  tools: ToolSpec[];
  diagnostics: Diagnostic[];
}

interface GenerateContext {
  diagnostics: DiagnosticCollector;
  names: NameRegistry;
  identity?: ToolParameter;
  includeUpdate: boolean;
  mode: GenerationMode;
  tools: ToolSpec[];
}

const CONFIRM_PARAMETER: ToolParameter = {
  name: "confirm",
  type: "boolean",
  description: "Must be true to carry out the deletion",
  required: true,
  default: false,
};

function identityParameter(
  options: IdentityParameterOptions | false | undefined,
): ToolParameter | undefined {
  if (options === false) return undefined;
  const identity = options ?? DEFAULT_IDENTITY_PARAMETER;
  return {
    name: parameterName(identity.name),
    type: "string",
    description: identity.description ?? DEFAULT_IDENTITY_PARAMETER.description,
    required: true,
  };
}

function violation(ctx: GenerateContext, input: Omit<DiagnosticInput, "code">): void {
  const diagnostic = ctx.diagnostics.report({
    ...input,
    code: "generation-invariant-violation",
    severity: ctx.mode === "strict" ? "error" : "warning",
  });
  if (ctx.mode === "strict") {
    throw new GenerationInvariantError(diagnostic.message, ctx.diagnostics.toArray());
  }
}

function toToolParameter(parameter: Parameter): ToolParameter {
  return {
    name: parameterName(parameter.name),
    schemaName: parameter.name,
    type: parameter.type,
    description: parameter.description,
    required: parameter.required,
    ...(parameter.default !== undefined ? { default: parameter.default } : {}),
    ...(parameter.choices ? { choices: parameter.choices } : {}),
    ...(parameter.range !== undefined ? { range: parameter.range } : {}),
  };
}

function withoutDefault({ default: _dropped, ...rest }: ToolParameter): ToolParameter {
  return rest;
}

/**
 * Identity first, then required parameters, then optional ones. Entity
 * parameters whose identifier is already taken are skipped.
 */
function orderParameters(
  ctx: GenerateContext,
  parameters: ReadonlyArray<ToolParameter>,
  path: ReadonlyArray<string>,
): ToolParameter[] {
  const leading = ctx.identity ? [ctx.identity] : [];
  const taken = new Set(leading.map((p) => p.name));
  const accepted: ToolParameter[] = [];
  for (const parameter of parameters) {
    if (taken.has(parameter.name)) {
      ctx.diagnostics.report({
        code: "duplicate-name",
        message: `parameter "${parameter.schemaName ?? parameter.name}" clashes with "${parameter.name}" and is skipped`,
        path,
      });
      continue;
    }
    taken.add(parameter.name);
    accepted.push(parameter);
  }
  return [
    ...leading,
    ...accepted.filter((p) => p.required),
    ...accepted.filter((p) => !p.required),
  ];
}

function addTool(
  ctx: GenerateContext,
  operation: ToolOperation,
  name: string,
  description: string,
  parameters: ReadonlyArray<ToolParameter>,
  source: ToolSource,
): void {
  ctx.tools.push({
    name: ctx.names.claim(name, source.path),
    description,
    operation,
    parameters: orderParameters(ctx, parameters, source.path),
    annotations: OPERATION_ANNOTATIONS[operation],
    source,
  });
}

function withDescription(summary: string, description: string): string {
  return description ? `${summary}\n\n${description}` : summary;
}

/**
 * get, create or add-item, optional update, delete for one container or list.
 */
function addEntityTools(
  ctx: GenerateContext,
  source: Extract<ToolSource, { kind: "container" | "list" }>,
  key: string | undefined,
): void {
  const { node, path } = source;
  const where = path.join("/");
  const parameters = node.parameters.map(toToolParameter);
  const keyed = parameters.map((p) =>
    p.schemaName === key ? withoutDefault({ ...p, required: true }) : p,
  );

  addTool(
    ctx,
    "get",
    toolName("get", path),
    withDescription(`Get the ${source.kind} ${where}.`, node.description),
    [],
    source,
  );

  if (source.kind === "list") {
    addTool(
      ctx,
      "add-item",
      toolName("add", path, "item"),
      withDescription(`Add an entry to the list ${where}.`, node.description),
      keyed,
      source,
    );
  } else {
    addTool(
      ctx,
      "create",
      toolName("create", path),
      withDescription(`Create or replace the container ${where}.`, node.description),
      keyed,
      source,
    );
  }

  if (ctx.includeUpdate) {
    const changes = keyed.map((p) =>
      p.schemaName === key ? p : withoutDefault({ ...p, required: false }),
    );
    addTool(
      ctx,
      "update",
      toolName("update", path),
      withDescription(
        `Update leafs of the ${source.kind} ${where}. Leafs left out keep their current value.`,
        node.description,
      ),
      changes,
      source,
    );
  }

  addTool(
    ctx,
    "delete",
    toolName("delete", path),
    withDescription(`Delete the ${source.kind} ${where}.`, node.description),
    [CONFIRM_PARAMETER],
    source,
  );
}

function visitContainer(
  ctx: GenerateContext,
  container: Container,
  parent: ReadonlyArray<string>,
): void {
  const path = [...parent, container.name];
  addEntityTools(ctx, { kind: "container", node: container, path }, undefined);
  for (const child of container.containers) visitContainer(ctx, child, path);
  for (const child of container.lists) visitList(ctx, child, path);
}

function visitList(ctx: GenerateContext, list: ListNode, parent: ReadonlyArray<string>): void {
  const path = [...parent, list.name];
  let key = list.key;
  if (key === undefined) {
    violation(ctx, { message: `list "${list.name}" has no key; entries cannot be addressed`, path });
  } else if (!list.parameters.some((p) => p.name === key)) {
    violation(ctx, {
      message: `key "${key}" is not a leaf of list "${list.name}"; list treated as unkeyed`,
      path,
    });
    key = undefined;
  }
  addEntityTools(ctx, { kind: "list", node: list, path }, key);
  for (const child of list.containers) visitContainer(ctx, child, path);
  for (const child of list.lists) visitList(ctx, child, path);
}

function addRpcTool(ctx: GenerateContext, rpc: Rpc, parent: ReadonlyArray<string>): void {
  const path = [...parent, rpc.name];
  const summary =
    rpc.output.length > 0
      ? `Invoke ${path.join("/")}. Returns ${rpc.output.map((p) => p.name).join(", ")}.`
      : `Invoke ${path.join("/")}.`;
  addTool(
    ctx,
    "invoke",
    toolName("invoke", path),
    withDescription(summary, rpc.description),
    rpc.input.map(toToolParameter),
    { kind: "rpc", node: rpc, path },
  );
}

/**
 * Generate tool descriptors and the diagnostics met on the way.
 *
 * @throws {TypeError} when no module is given
 * @throws {GenerationInvariantError} in strict mode, on the first invariant violation
 */
export function generateToolSpecs(
  module: Module | null | undefined,
  options: GenerateOptions = {},
): GenerateResult {
  if (module === null || module === undefined) {
    throw new TypeError("generate() needs a module");
  }
  const diagnostics = new DiagnosticCollector();
  const ctx: GenerateContext = {
    diagnostics,
    names: new NameRegistry(diagnostics),
    identity: identityParameter(options.identity),
    includeUpdate: options.includeUpdate ?? false,
    mode: options.mode ?? "best-effort",
    tools: [],
  };

  const root = [module.name];
  for (const container of module.containers) visitContainer(ctx, container, root);
  for (const list of module.lists) visitList(ctx, list, root);
  for (const rpc of module.rpcs) addRpcTool(ctx, rpc, root);

  return { tools: deepFreeze(ctx.tools), diagnostics: diagnostics.toArray() };
}

export function generate(
  module: Module | null | undefined,
  options: GenerateOptions = {},
): ToolSpec[] {
  return generateToolSpecs(module, options).tools;
}
