import type { CliArgs, EnvArgs, MergedArgs } from "./types.js";

function stringOption(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function flagOption(value: unknown): boolean | undefined {
  return typeof value === "boolean" ? value : undefined;
}

/**
 * Turn commander's option bag into typed arguments. `--no-identity` arrives
 * as `identity: false`.
 */
export function parseCliOptions(input: string, options: Record<string, unknown>): CliArgs {
  return {
    input,
    out: stringOption(options.out),
    manifest: stringOption(options.manifest),
    from: stringOption(options.from),
    moduleName: stringOption(options.moduleName),
    mode: stringOption(options.mode),
    identity: options.identity === false ? false : stringOption(options.identity),
    maxDepth: stringOption(options.maxDepth),
    includeUpdate: flagOption(options.includeUpdate),
    servicesOnly: flagOption(options.servicesOnly),
    runtimeModule: stringOption(options.runtimeModule),
    sentryDsn: stringOption(options.sentryDsn),
    verbose: flagOption(options.verbose),
  };
}

/**
 * Settings read from the environment (after dotenv has loaded `.env`).
 * `TOOLGEN_IDENTITY=none` turns the identity parameter off.
 */
export function parseEnv(env: NodeJS.ProcessEnv): EnvArgs {
  const fromEnv: EnvArgs = {};
  if (env.TOOLGEN_MODE) fromEnv.mode = env.TOOLGEN_MODE;
  if (env.TOOLGEN_IDENTITY) {
    fromEnv.identity = env.TOOLGEN_IDENTITY === "none" ? false : env.TOOLGEN_IDENTITY;
  }
  if (env.TOOLGEN_MAX_DEPTH) fromEnv.maxDepth = env.TOOLGEN_MAX_DEPTH;
  if (env.TOOLGEN_RUNTIME_MODULE) fromEnv.runtimeModule = env.TOOLGEN_RUNTIME_MODULE;
  if (env.SENTRY_DSN) fromEnv.sentryDsn = env.SENTRY_DSN;
  return fromEnv;
}

export function merge(cli: CliArgs, env: EnvArgs): MergedArgs {
  // CLI wins over env
  return {
    ...cli,
    mode: cli.mode ?? env.mode,
    identity: cli.identity ?? env.identity,
    maxDepth: cli.maxDepth ?? env.maxDepth,
    runtimeModule: cli.runtimeModule ?? env.runtimeModule,
    sentryDsn: cli.sentryDsn ?? env.sentryDsn,
  };
}
