import { ConfigurationError } from "@yang-toolgen/core";
import { z } from "zod";
import type { InputKind, MergedArgs, ResolvedConfig } from "./types.js";

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const ConfigSchema = z.object({
  input: z.string().min(1, "an input path is required"),
  from: z.enum(["text", "snapshot"]),
  out: z.string().min(1).optional(),
  manifest: z.string().min(1).optional(),
  moduleName: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_.-]*$/, "must be a schema identifier")
    .optional(),
  mode: z.enum(["strict", "best-effort"]).default("best-effort"),
  identity: z
    .union([z.literal(false), z.string().regex(IDENTIFIER, "must be an identifier")])
    .optional(),
  maxDepth: z.coerce.number().int().positive().optional(),
  includeUpdate: z.boolean().default(false),
  servicesOnly: z.boolean().default(false),
  runtimeModule: z.string().min(1).optional(),
  sentryDsn: z.string().url().optional(),
  verbose: z.boolean().default(false),
});

/**
 * How each setting is spelled on the command line, for error messages
 */
const FLAG_NAMES: Record<string, string> = {
  input: "<input>",
  from: "--from",
  out: "--out",
  manifest: "--manifest",
  moduleName: "--module-name",
  mode: "--mode",
  identity: "--identity",
  maxDepth: "--max-depth",
  runtimeModule: "--runtime-module",
  sentryDsn: "--sentry-dsn",
};

/**
 * Snapshots are JSON; anything else is schema text.
 */
export function detectInputKind(input: string): InputKind {
  return input.toLowerCase().endsWith(".json") ? "snapshot" : "text";
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const key = String(issue.path[0] ?? "");
      return `${FLAG_NAMES[key] ?? key}: ${issue.message}`;
    })
    .join("\n");
}

export function finalize(input: MergedArgs): ResolvedConfig {
  const { data, success, error } = ConfigSchema.safeParse({
    ...input,
    from: input.from ?? detectInputKind(input.input),
  });
  if (!success) {
    throw new ConfigurationError(`Invalid configuration:\n${formatIssues(error)}`);
  }
  return data;
}
