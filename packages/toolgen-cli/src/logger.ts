/**
 * Terminal output for the CLI.
 *
 * Status lines go to stderr so that stdout carries nothing but generated
 * source when no `--out` path is given.
 */

import type { Diagnostic } from "@yang-toolgen/core";
import { formatDiagnostic } from "@yang-toolgen/core";
import chalk from "chalk";

function detailText(detail: unknown): string {
  return detail instanceof Error ? detail.message : String(detail);
}

export const logError = (msg: string, detail?: unknown) =>
  process.stderr.write(
    `${chalk.red("✗")} ${msg}${detail !== undefined ? `\n  ${chalk.gray(detailText(detail))}` : ""}\n`,
  );

export const logWarn = (msg: string) =>
  process.stderr.write(`${chalk.yellow("!")} ${msg}\n`);

export const logSuccess = (msg: string) =>
  process.stderr.write(`${chalk.green("✓")} ${msg}\n`);

export const logInfo = (msg: string, detail?: string) =>
  process.stderr.write(
    `${chalk.blue("ℹ")} ${msg}${detail ? `\n  ${chalk.gray(detail)}` : ""}\n`,
  );

const SEVERITY_COLOR = {
  error: chalk.red,
  warning: chalk.yellow,
  info: chalk.gray,
} as const;

export const logDiagnostic = (diagnostic: Diagnostic) =>
  process.stderr.write(`${SEVERITY_COLOR[diagnostic.severity](formatDiagnostic(diagnostic))}\n`);
