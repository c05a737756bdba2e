import type { GenerationMode } from "@yang-toolgen/core";

export type InputKind = "text" | "snapshot";

/**
 * Options as commander hands them over, plus the positional input path.
 */
export type CliArgs = {
  input: string;
  out?: string;
  manifest?: string;
  from?: string;
  moduleName?: string;
  mode?: string;
  identity?: string | false; // `false` from --no-identity
  maxDepth?: string;
  includeUpdate?: boolean;
  servicesOnly?: boolean;
  runtimeModule?: string;
  sentryDsn?: string;
  verbose?: boolean;
};

export type EnvArgs = {
  mode?: string;
  identity?: string | false;
  maxDepth?: string;
  runtimeModule?: string;
  sentryDsn?: string;
};

export type MergedArgs = CliArgs;

export type ResolvedConfig = {
  input: string;
  from: InputKind;
  out?: string;
  manifest?: string;
  moduleName?: string;
  mode: GenerationMode;
  identity?: string | false;
  maxDepth?: number;
  includeUpdate: boolean;
  servicesOnly: boolean;
  runtimeModule?: string;
  sentryDsn?: string;
  verbose: boolean;
};
