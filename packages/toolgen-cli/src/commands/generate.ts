import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import {
  parseSnapshot,
  renderManifest,
  runReflectivePipeline,
  runTextPipeline,
  snapshotNode,
  UserInputError,
  type Diagnostic,
  type PipelineOptions,
  type PipelineResult,
} from "@yang-toolgen/core";
import type { ResolvedConfig } from "../config/types.js";

export interface GenerateSummary {
  module: string;
  tools: number;
  source: string;
  diagnostics: Diagnostic[];
  outPath?: string;
  manifestPath?: string;
}

async function readInput(file: string): Promise<string> {
  try {
    return await readFile(file, "utf8");
  } catch (error) {
    throw new UserInputError(
      `Cannot read ${file}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
}

function decodeJson(file: string, text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new UserInputError(
      `${file} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
}

async function writeOutput(file: string, contents: string): Promise<string> {
  const target = path.resolve(file);
  await mkdir(path.dirname(target), { recursive: true });
  await writeFile(target, contents, "utf8");
  return target;
}

function identityOption(identity: string | false | undefined): PipelineOptions["identity"] {
  if (identity === undefined || identity === false) return identity;
  return { name: identity };
}

function pipelineOptions(config: ResolvedConfig): PipelineOptions {
  return {
    moduleName: config.moduleName,
    maxDepth: config.maxDepth,
    mode: config.mode,
    identity: identityOption(config.identity),
    includeUpdate: config.includeUpdate,
    runtimeModule: config.runtimeModule,
  };
}

/**
 * Read the input, run the pipeline and write whatever outputs are configured.
 *
 * @throws {UserInputError} when the input cannot be read or decoded
 * @throws {GenerationInvariantError} in strict mode, when the run has errors
 */
export async function runGenerate(config: ResolvedConfig): Promise<GenerateSummary> {
  const text = await readInput(config.input);
  const options = pipelineOptions(config);

  let result: PipelineResult;
  if (config.from === "snapshot") {
    const root = snapshotNode(parseSnapshot(decodeJson(config.input, text)));
    result = runReflectivePipeline(root, {
      ...options,
      // A snapshot file is named after the device or service it was taken from.
      moduleName: config.moduleName ?? path.basename(config.input, path.extname(config.input)),
      servicesOnly: config.servicesOnly,
    });
  } else {
    result = runTextPipeline(text, options);
  }

  const summary: GenerateSummary = {
    module: result.module.name,
    tools: result.tools.length,
    source: result.source,
    diagnostics: result.diagnostics,
  };
  if (config.out) {
    summary.outPath = await writeOutput(config.out, result.source);
  }
  if (config.manifest) {
    summary.manifestPath = await writeOutput(config.manifest, renderManifest(result.manifest));
  }
  return summary;
}
