/**
 * End-to-end runs: parse or analyze, generate, then render source and
 * manifest in one batch pass.
 *
 * In `best-effort` mode (the default) every diagnostic is returned with the
 * result. In `strict` mode any error-severity diagnostic aborts the run with
 * a `GenerationInvariantError` carrying the full list.
 */
import { DEFAULT_MODULE_NAME } from "./constants.js";
import { hasErrors, type Diagnostic } from "./diagnostics.js";
import { emit, type EmitOptions } from "./emitter/emit.js";
import { GenerationInvariantError } from "./errors.js";
import { generateToolSpecs, type GenerateOptions } from "./generator/generate.js";
import type { ToolSpec } from "./generator/tool-spec.js";
import { buildManifest, type ToolManifest } from "./manifest/manifest.js";
import { parseSchema } from "./parser/parser.js";
import { analyzeModel, fragmentsToModule, type AnalyzeOptions } from "./reflect/analyzer.js";
import type { NavigableNode } from "./reflect/navigable.js";
import type { Module } from "./schema/ir.js";
import { logInfo, logWarn } from "./telem/logging.js";

export interface PipelineOptions extends GenerateOptions, EmitOptions {
  /**
   * Module name for schema text without a `module` statement, and for
   * reflectively discovered modules.
   */
  moduleName?: string;
  maxDepth?: number;
}

export interface ReflectivePipelineOptions
  extends PipelineOptions,
    Omit<AnalyzeOptions, "maxDepth"> {
  /**
   * Generate tools for service fragments only.
   */
  servicesOnly?: boolean;
}

export interface PipelineResult {
  module: Module;
  tools: ToolSpec[];
  source: string;
  manifest: ToolManifest;
  diagnostics: Diagnostic[];
}

type Route = "text" | "reflective";

function failOnErrors(
  route: Route,
  diagnostics: ReadonlyArray<Diagnostic>,
  options: PipelineOptions,
): void {
  if (options.mode !== "strict" || !hasErrors(diagnostics)) return;
  const count = diagnostics.filter((d) => d.severity === "error").length;
  throw new GenerationInvariantError(
    `${route} pipeline stopped in strict mode: ${count} error diagnostic${count === 1 ? "" : "s"}`,
    diagnostics,
  );
}

function finish(
  route: Route,
  module: Module,
  upstream: ReadonlyArray<Diagnostic>,
  options: PipelineOptions,
): PipelineResult {
  failOnErrors(route, upstream, options);
  const generated = generateToolSpecs(module, options);
  const diagnostics = [...upstream, ...generated.diagnostics];
  failOnErrors(route, diagnostics, options);

  const result: PipelineResult = {
    module,
    tools: generated.tools,
    source: emit(generated.tools, options),
    manifest: buildManifest(generated.tools, { module: module.name }),
    diagnostics,
  };

  const loggerScope = ["pipeline", route];
  logInfo(`Generated ${result.tools.length} tools for module "${module.name}"`, {
    loggerScope,
    extra: { tools: result.tools.length, diagnostics: diagnostics.length },
  });
  if (hasErrors(diagnostics)) {
    logWarn(`Module "${module.name}" was generated with error diagnostics`, {
      loggerScope,
      extra: { errors: diagnostics.filter((d) => d.severity === "error").length },
    });
  }
  return result;
}

export function runTextPipeline(text: string, options: PipelineOptions = {}): PipelineResult {
  const { module, diagnostics } = parseSchema(text, {
    moduleName: options.moduleName,
    maxDepth: options.maxDepth,
  });
  return finish("text", module, diagnostics, options);
}

export function runReflectivePipeline(
  root: NavigableNode,
  options: ReflectivePipelineOptions = {},
): PipelineResult {
  const analysis = analyzeModel(root, {
    maxDepth: options.maxDepth,
    isService: options.isService,
    ignore: options.ignore,
    sampleDefaults: options.sampleDefaults,
  });
  const module = fragmentsToModule(analysis, {
    name: options.moduleName ?? DEFAULT_MODULE_NAME,
    include: options.servicesOnly ? "services" : "all",
  });
  return finish("reflective", module, analysis.diagnostics, options);
}
