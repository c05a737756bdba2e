/**
 * Tool manifest: the language-neutral description of the generated tools.
 *
 * Emitted source is one rendering of the tool list; the manifest is the
 * stable artifact other consumers read. Each entry carries the flat
 * parameter list plus an MCP-style `inputSchema`, built from zod schemas
 * converted with `zod-to-json-schema`, so the tools can be registered
 * with an MCP server without further translation.
 */
import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z, type ZodTypeAny } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { GENERATOR_NAME } from "../constants.js";
import type {
  ToolAnnotations,
  ToolOperation,
  ToolParameter,
  ToolSpec,
} from "../generator/tool-spec.js";
import type { CanonicalType, DefaultValue } from "../schema/ir.js";

export interface ManifestParameter {
  name: string;
  type: CanonicalType;
  description: string;
  required: boolean;
  default: DefaultValue | null;
  choices: ReadonlyArray<string> | null;
  range: string | null;
}

export interface ManifestEntry {
  name: string;
  description: string;
  operation: ToolOperation;
  annotations: ToolAnnotations;
  parameters: ManifestParameter[];
  inputSchema: Tool["inputSchema"];
}

export interface ToolManifest {
  generator: string;
  module: string;
  tools: ManifestEntry[];
}

export interface BuildManifestOptions {
  module: string;
}

const NUMERIC_RANGE =
  /^\s*(min|[+-]?\d+(?:\.\d+)?)\s*\.\.\s*(max|[+-]?\d+(?:\.\d+)?)\s*$/;

/**
 * Apply a single-interval range such as `1..65535` or `min..100`. Ranges
 * with several intervals (`1..10 | 20..30`) are left to the description.
 */
function applyRange(schema: z.ZodNumber, range: string | undefined): z.ZodNumber {
  const match = range === undefined ? null : NUMERIC_RANGE.exec(range);
  if (!match) return schema;
  const [, low, high] = match;
  let bounded = schema;
  if (low !== "min") bounded = bounded.gte(Number(low));
  if (high !== "max") bounded = bounded.lte(Number(high));
  return bounded;
}

function baseSchema(parameter: ToolParameter): ZodTypeAny {
  switch (parameter.type) {
    case "string": {
      const [first, ...rest] = parameter.choices ?? [];
      return first === undefined ? z.string() : z.enum([first, ...rest]);
    }
    case "integer":
      return applyRange(z.number().int(), parameter.range);
    case "number":
      return applyRange(z.number(), parameter.range);
    case "boolean":
      return z.boolean();
    case "array":
      return z.array(z.string());
  }
}

/**
 * Schema of one property. Whether it is optional is carried by the
 * `required` list of the enclosing object schema.
 */
export function parameterSchema(parameter: ToolParameter): ZodTypeAny {
  let schema = baseSchema(parameter);
  if (parameter.description) schema = schema.describe(parameter.description);
  return !parameter.required && parameter.default !== undefined
    ? schema.default(parameter.default)
    : schema;
}

function propertyJsonSchema(parameter: ToolParameter): Record<string, unknown> {
  const { $schema: _draft, ...property } = zodToJsonSchema(parameterSchema(parameter), {
    $refStrategy: "none",
  });
  return property;
}

/**
 * Properties are collected with `Object.fromEntries` so that any leaf name,
 * `__proto__` included, becomes an own property.
 */
export function toolInputSchema(tool: ToolSpec): Tool["inputSchema"] {
  const properties = Object.fromEntries(
    tool.parameters.map((parameter) => [parameter.name, propertyJsonSchema(parameter)]),
  );
  const required = tool.parameters.filter((p) => p.required).map((p) => p.name);
  return {
    type: "object",
    properties,
    ...(required.length > 0 ? { required } : {}),
  };
}

function manifestParameter(parameter: ToolParameter): ManifestParameter {
  return {
    name: parameter.name,
    type: parameter.type,
    description: parameter.description,
    required: parameter.required,
    default: parameter.default ?? null,
    choices: parameter.choices ?? null,
    range: parameter.range ?? null,
  };
}

export function buildManifest(
  tools: ReadonlyArray<ToolSpec>,
  options: BuildManifestOptions,
): ToolManifest {
  return {
    generator: GENERATOR_NAME,
    module: options.module,
    tools: tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      operation: tool.operation,
      annotations: tool.annotations,
      parameters: tool.parameters.map(manifestParameter),
      inputSchema: toolInputSchema(tool),
    })),
  };
}

export function renderManifest(manifest: ToolManifest): string {
  return `${JSON.stringify(manifest, null, 2)}\n`;
}
