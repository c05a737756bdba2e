#!/usr/bin/env tsx

/**
 * Command-line entry point for yang-toolgen.
 *
 * Reads schema text or a configuration snapshot, generates tool wrappers and
 * writes the source (to `--out` or stdout) and, on request, a JSON manifest.
 *
 * @example
 * ```bash
 * yang-toolgen schemas/edge.yang --out src/tools/edge.ts --manifest edge.json
 * yang-toolgen snapshots/r1.json --services-only --mode strict
 * ```
 */

import * as Sentry from "@sentry/node";
import {
  ConfigurationError,
  GenerationInvariantError,
  hasErrors,
  LIB_VERSION,
  logIssue,
  setConsoleLevel,
  UserInputError,
} from "@yang-toolgen/core";
import { Command, Option } from "commander";
import { config } from "dotenv";
import { runGenerate } from "./commands/generate.js";
import { merge, parseCliOptions, parseEnv } from "./config/parse.js";
import { finalize } from "./config/resolve.js";
import type { ResolvedConfig } from "./config/types.js";
import { logDiagnostic, logError, logInfo, logSuccess, logWarn } from "./logger.js";

config();

const SENTRY_TIMEOUT = 5000; // 5 seconds

const program = new Command();

program
  .name("yang-toolgen")
  .description("Generate tool wrappers from YANG-like schemas or configuration snapshots")
  .version(LIB_VERSION)
  .argument("<input>", "Schema text file, or a JSON configuration snapshot")
  .option("-o, --out <file>", "Write generated source here instead of stdout")
  .option("-m, --manifest <file>", "Also write a JSON tool manifest")
  .addOption(
    new Option("--from <kind>", "Input kind (default: by file extension)").choices([
      "text",
      "snapshot",
    ]),
  )
  .option("--module-name <name>", "Module name when the input does not name one")
  .addOption(
    new Option("--mode <mode>", "Stop on error diagnostics, or keep going").choices([
      "strict",
      "best-effort",
    ]),
  )
  .option("--identity <name>", "Name of the scope-identity parameter (or set TOOLGEN_IDENTITY)")
  .option("--no-identity", "Leave the scope-identity parameter out")
  .option("--max-depth <n>", "Nesting depth limit (or set TOOLGEN_MAX_DEPTH)")
  .option("--include-update", "Also generate update tools")
  .option("--services-only", "Snapshots: generate tools for service fragments only")
  .option("--runtime-module <specifier>", "Module the generated code imports its runtime from")
  .option("--sentry-dsn <dsn>", "Report failures to Sentry (or set SENTRY_DSN)")
  .option("-v, --verbose", "Verbose output")
  .addHelpText(
    "after",
    `
Examples:
  $ yang-toolgen edge.yang
  $ yang-toolgen edge.yang --out src/tools/edge.ts --manifest edge.tools.json
  $ yang-toolgen r1.json --services-only --module-name r1
  $ yang-toolgen edge.yang --mode strict --no-identity
`,
  )
  .action(async (input: string, options: Record<string, unknown>) => {
    let cfg: ResolvedConfig;
    try {
      cfg = finalize(merge(parseCliOptions(input, options), parseEnv(process.env)));
    } catch (error) {
      if (!(error instanceof ConfigurationError)) throw error;
      logError(error.message);
      process.exitCode = 1;
      return;
    }

    if (cfg.sentryDsn) {
      Sentry.init({
        dsn: cfg.sentryDsn,
        enableLogs: true,
        release: LIB_VERSION,
        initialScope: {
          tags: {
            "toolgen.input_kind": cfg.from,
            "toolgen.mode": cfg.mode,
          },
        },
        integrations: [Sentry.zodErrorsIntegration()],
        environment:
          process.env.SENTRY_ENVIRONMENT ??
          (process.env.NODE_ENV !== "production" ? "development" : "production"),
      });
    }
    setConsoleLevel(cfg.verbose ? "info" : "warn");

    try {
      const summary = await runGenerate(cfg);
      for (const diagnostic of summary.diagnostics) {
        logDiagnostic(diagnostic);
      }
      if (summary.outPath) {
        logSuccess(`Wrote ${summary.tools} tools for "${summary.module}" to ${summary.outPath}`);
      } else {
        process.stdout.write(summary.source);
      }
      if (hasErrors(summary.diagnostics)) {
        logWarn("Output was generated despite error diagnostics; use --mode strict to fail instead");
      }
      if (summary.manifestPath) {
        logSuccess(`Wrote manifest to ${summary.manifestPath}`);
      }
      if (cfg.verbose) {
        logInfo(`${summary.diagnostics.length} diagnostics`);
      }
    } catch (error) {
      if (error instanceof GenerationInvariantError) {
        error.diagnostics.forEach(logDiagnostic);
        logError(error.message);
      } else if (error instanceof UserInputError) {
        logError(error.message);
      } else {
        const eventId = logIssue(error, {
          loggerScope: ["cli"],
          extra: { input: cfg.input, from: cfg.from },
        });
        logError("Generation failed", `${String(error)} (event ${eventId})`);
      }
      process.exitCode = 1;
    } finally {
      // ensure we've flushed all events
      await Sentry.flush(SENTRY_TIMEOUT);
    }
  });

await program.parseAsync(process.argv);
