/**
 * CodeEmitter: tool descriptors to TypeScript source.
 *
 * Each tool becomes one exported async function that forwards its arguments
 * to the runtime's `invokeTool` and routes failures through
 * `reportToolError`, followed by a `registerTool` call. The output is a pure
 * function of the tool list: the same list always renders to the same bytes,
 * and an empty list renders to the header alone.
 *
 * @example
 * ```typescript
 * const source = emit(generate(parseSchema(text).module), {
 *   runtimeModule: "@acme/device-runtime",
 * });
 * ```
 */
import { DEFAULT_RUNTIME_MODULE, GENERATOR_NAME } from "../constants.js";
import type { ToolParameter, ToolSpec } from "../generator/tool-spec.js";
import type { DefaultValue } from "../schema/ir.js";
import { IdentifierScope } from "./identifiers.js";

export interface EmitOptions {
  /**
   * Module specifier the runtime helpers are imported from.
   */
  runtimeModule?: string;
}

const RUNTIME_IMPORTS = ["invokeTool", "registerTool", "reportToolError"] as const;

const INDENT = "  ";

function literal(value: DefaultValue): string {
  return JSON.stringify(value);
}

function typeOf(parameter: ToolParameter): string {
  switch (parameter.type) {
    case "string":
      return parameter.choices && parameter.choices.length > 0
        ? parameter.choices.map((choice) => JSON.stringify(choice)).join(" | ")
        : "string";
    case "integer":
    case "number":
      return "number";
    case "boolean":
      return "boolean";
    case "array":
      return "string[]";
  }
}

function commentSafe(text: string): string {
  return text.replace(/\*\//g, "*\\/");
}

function describeParameter(parameter: ToolParameter): string {
  const notes: string[] = [parameter.required ? "required" : "optional"];
  if (parameter.default !== undefined) notes.push(`default: ${literal(parameter.default)}`);
  if (parameter.choices && parameter.choices.length > 0) {
    notes.push(`one of: ${parameter.choices.join(", ")}`);
  }
  if (parameter.range !== undefined) notes.push(`range: ${parameter.range}`);
  const description = parameter.description.replace(/\s+/g, " ").trim();
  return [description, `(${notes.join("; ")})`].filter(Boolean).join(" ");
}

function renderDocBlock(tool: ToolSpec, identifiers: ReadonlyArray<string>): string[] {
  const lines = ["/**"];
  for (const line of commentSafe(tool.description).split("\n")) {
    lines.push(line.trim() === "" ? " *" : ` * ${line.trimEnd()}`);
  }
  if (tool.parameters.length > 0) {
    lines.push(" *");
    tool.parameters.forEach((parameter, index) => {
      lines.push(` * @param ${identifiers[index]} - ${commentSafe(describeParameter(parameter))}`);
    });
  }
  lines.push(" */");
  return lines;
}

function renderSignatureEntry(parameter: ToolParameter, identifier: string): string {
  const type = typeOf(parameter);
  if (parameter.required) return `${identifier}: ${type}`;
  if (parameter.default !== undefined) {
    return `${identifier}: ${type} = ${literal(parameter.default)}`;
  }
  return `${identifier}?: ${type}`;
}

function renderTool(tool: ToolSpec, functionName: string): string {
  const scope = new IdentifierScope(RUNTIME_IMPORTS);
  const identifiers = tool.parameters.map((parameter) => scope.declare(parameter.name));
  const toolName = JSON.stringify(tool.name);

  const lines = renderDocBlock(tool, identifiers);
  if (tool.parameters.length === 0) {
    lines.push(`export async function ${functionName}(): Promise<unknown> {`);
  } else {
    lines.push(`export async function ${functionName}(`);
    tool.parameters.forEach((parameter, index) => {
      lines.push(`${INDENT}${renderSignatureEntry(parameter, identifiers[index])},`);
    });
    lines.push("): Promise<unknown> {");
  }

  lines.push(`${INDENT}try {`);
  if (tool.parameters.length === 0) {
    lines.push(`${INDENT.repeat(2)}return await invokeTool(${toolName}, {});`);
  } else {
    lines.push(`${INDENT.repeat(2)}return await invokeTool(${toolName}, {`);
    tool.parameters.forEach((parameter, index) => {
      const key = JSON.stringify(parameter.schemaName ?? parameter.name);
      lines.push(`${INDENT.repeat(3)}${key}: ${identifiers[index]},`);
    });
    lines.push(`${INDENT.repeat(2)}});`);
  }
  lines.push(`${INDENT}} catch (error) {`);
  lines.push(`${INDENT.repeat(2)}return reportToolError(${toolName}, error);`);
  lines.push(`${INDENT}}`);
  lines.push("}");
  lines.push("");
  lines.push(`registerTool(${toolName}, ${functionName});`);
  return lines.join("\n");
}

export function emitHeader(options: EmitOptions = {}): string {
  const runtimeModule = options.runtimeModule ?? DEFAULT_RUNTIME_MODULE;
  return [
    `// Generated by ${GENERATOR_NAME}. Do not edit; regenerate from the schema instead.`,
    `import { ${RUNTIME_IMPORTS.join(", ")} } from ${JSON.stringify(runtimeModule)};`,
  ].join("\n");
}

export function emit(tools: ReadonlyArray<ToolSpec>, options: EmitOptions = {}): string {
  const functions = new IdentifierScope(RUNTIME_IMPORTS);
  const blocks = [emitHeader(options)];
  for (const tool of tools) {
    blocks.push(renderTool(tool, functions.declare(tool.name)));
  }
  return `${blocks.join("\n\n")}\n`;
}
