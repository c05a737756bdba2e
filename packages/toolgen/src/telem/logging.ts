/**
 * Logging for the pipeline.
 *
 * Messages are forwarded to Sentry's structured logger and, above the
 * console threshold, echoed to stderr. Without an initialised Sentry client
 * the Sentry calls do nothing, so the library logs the same way whether or
 * not the host application reports to Sentry.
 *
 * @example
 * ```typescript
 * logWarn("Schema parsed with errors", {
 *   loggerScope: ["parser"],
 *   extra: { diagnostics: 3 },
 * });
 * ```
 */
import { captureException, logger } from "@sentry/core";

export type LogLevel = "info" | "warn" | "error";

export interface LogOptions {
  /**
   * Component path prefixed to the message, e.g. `["pipeline", "text"]`
   */
  loggerScope?: ReadonlyArray<string>;
  extra?: Record<string, unknown>;
}

export interface LogIssueOptions extends LogOptions {
  contexts?: Record<string, Record<string, unknown>>;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  info: 0,
  warn: 1,
  error: 2,
};

let consoleLevel: LogLevel = "warn";

/**
 * Lowest level echoed to stderr. Sentry forwarding is not affected.
 */
export function setConsoleLevel(level: LogLevel): void {
  consoleLevel = level;
}

function prefix(options: LogOptions): string {
  return options.loggerScope && options.loggerScope.length > 0
    ? `[${options.loggerScope.join(".")}] `
    : "";
}

function echo(level: LogLevel, message: string, options: LogOptions): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[consoleLevel]) return;
  const details =
    options.extra && Object.keys(options.extra).length > 0
      ? ` ${JSON.stringify(options.extra)}`
      : "";
  process.stderr.write(`${prefix(options)}${message}${details}\n`);
}

function attributes(options: LogOptions): Record<string, unknown> {
  return {
    ...(options.loggerScope ? { loggerScope: options.loggerScope.join(".") } : {}),
    ...options.extra,
  };
}

export function logInfo(message: string, options: LogOptions = {}): void {
  logger.info(`${prefix(options)}${message}`, attributes(options));
  echo("info", message, options);
}

export function logWarn(message: string, options: LogOptions = {}): void {
  logger.warn(`${prefix(options)}${message}`, attributes(options));
  echo("warn", message, options);
}

/**
 * Report an unexpected failure and return the Sentry event id.
 */
export function logIssue(error: unknown, options: LogIssueOptions = {}): string {
  const message = error instanceof Error ? error.message : String(error);
  logger.error(`${prefix(options)}${message}`, attributes(options));
  echo("error", message, options);
  const eventId = captureException(error, {
    ...(options.extra ? { extra: options.extra } : {}),
    ...(options.contexts ? { contexts: options.contexts } : {}),
  });
  return eventId;
}
