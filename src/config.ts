import { Config, Effect, Option, Redacted } from "effect";
import type { ToolServerSpec } from "./mcp/factory";
import { LOG_LEVEL_NAMES, type LogLevelName } from "./logging";
import { ConfigError } from "./errors";

export const DEFAULT_INSTRUCTIONS =
  "You are a helpful assistant in a team chat. Use the available tools when they help answer the question, and reply concisely.";

export interface ToolPoolConfig {
  name: string;
  size: number;
  acquireTimeoutMs?: number;
  instructions: string;
  server: ToolServerSpec;
}

export interface BridgeConfig {
  port: number;
  hostname: string;
  secret?: Redacted.Redacted<string>;
  maxBodyBytes: number;
  defaultPool: string;
  requestTimeoutMs?: number;
  logLevel: LogLevelName;
  llm: {
    baseUrl: string;
    apiKey: Redacted.Redacted<string>;
    model: string;
    maxTurns: number;
  };
  pools: ToolPoolConfig[];
}

const nonEmptyString = (name?: string) =>
  Config.string(name).pipe(
    Config.validate({ message: "Expected a non-empty string", validation: (value) => value.trim().length > 0 })
  );

function isAbsoluteUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

const positiveInteger = (name: string) =>
  Config.integer(name).pipe(
    Config.validate({ message: "Expected a positive integer", validation: (value) => value > 0 })
  );

const optionalPositiveInteger = (name: string) =>
  Config.option(positiveInteger(name)).pipe(Config.map(Option.getOrUndefined));

const logLevel = Config.literal(...LOG_LEVEL_NAMES)("LOG_LEVEL").pipe(Config.withDefault<LogLevelName>("info"));

function poolKey(pool: string, suffix: string) {
  return `MCP_${pool.toUpperCase().replace(/[^A-Z0-9]/g, "_")}_${suffix}`;
}

const toolServerSpec = (pool: string) =>
  Effect.gen(function* () {
    const transport = yield* Config.literal("stdio", "http")(poolKey(pool, "TRANSPORT")).pipe(
      Config.withDefault<"stdio" | "http">("stdio")
    );
    if (transport === "http") {
      const url = yield* Config.string(poolKey(pool, "URL")).pipe(
        Config.validate({ message: "Expected an absolute URL", validation: isAbsoluteUrl })
      );
      return { kind: "http", url } satisfies ToolServerSpec;
    }
    const command = yield* nonEmptyString(poolKey(pool, "COMMAND"));
    const args = yield* Config.array(Config.string(), poolKey(pool, "ARGS")).pipe(Config.withDefault<string[]>([]));
    return { kind: "stdio", command, args } satisfies ToolServerSpec;
  });

const toolPool = (name: string) =>
  Effect.gen(function* () {
    const size = yield* positiveInteger(poolKey(name, "POOL_SIZE")).pipe(Config.withDefault(1));
    const acquireTimeoutMs = yield* optionalPositiveInteger(poolKey(name, "ACQUIRE_TIMEOUT_MS"));
    const instructions = yield* Config.string(poolKey(name, "INSTRUCTIONS")).pipe(
      Config.withDefault(DEFAULT_INSTRUCTIONS)
    );
    const server = yield* toolServerSpec(name);
    const pool: ToolPoolConfig = { name, size, instructions, server };
    if (acquireTimeoutMs !== undefined) {
      pool.acquireTimeoutMs = acquireTimeoutMs;
    }
    return pool;
  });

/**
 * Reads the bridge configuration from the active `ConfigProvider` (the
 * process environment unless overridden).
 */
export const loadBridgeConfig: Effect.Effect<BridgeConfig, ConfigError> = Effect.gen(function* () {
  const poolNames = yield* Config.array(nonEmptyString(), "MCP_POOLS").pipe(
    Config.withDefault<string[]>(["stdio"])
  );
  if (poolNames.length === 0) {
    return yield* Effect.fail(new ConfigError("MCP_POOLS must name at least one pool"));
  }
  const pools = yield* Effect.forEach(poolNames, toolPool);

  const defaultPool = yield* Config.string("BRIDGE_DEFAULT_POOL").pipe(Config.withDefault(poolNames[0] ?? "stdio"));
  if (!poolNames.includes(defaultPool)) {
    return yield* Effect.fail(new ConfigError(`BRIDGE_DEFAULT_POOL '${defaultPool}' is not listed in MCP_POOLS`));
  }

  const secret = yield* Config.option(Config.redacted("BRIDGE_SECRET"));
  const requestTimeoutMs = yield* optionalPositiveInteger("BRIDGE_REQUEST_TIMEOUT_MS");

  const config: BridgeConfig = {
    port: yield* Config.integer("BRIDGE_PORT").pipe(
      Config.validate({ message: "Expected a TCP port", validation: (value) => value >= 0 && value <= 65535 }),
      Config.withDefault(8080)
    ),
    hostname: yield* Config.string("BRIDGE_HOST").pipe(Config.withDefault("0.0.0.0")),
    maxBodyBytes: yield* positiveInteger("BRIDGE_MAX_BODY_BYTES").pipe(Config.withDefault(1024 * 1024)),
    defaultPool,
    logLevel: yield* logLevel,
    llm: {
      baseUrl: yield* Config.string("LLM_API_BASE_URL"),
      apiKey: yield* Config.redacted("LLM_API_KEY"),
      model: yield* Config.string("LLM_API_MODEL").pipe(Config.withDefault("gpt-4o-mini")),
      maxTurns: yield* positiveInteger("LLM_MAX_TURNS").pipe(Config.withDefault(8))
    },
    pools
  };
  if (Option.isSome(secret)) {
    config.secret = secret.value;
  }
  if (requestTimeoutMs !== undefined) {
    config.requestTimeoutMs = requestTimeoutMs;
  }
  return config;
}).pipe(
  Effect.mapError((error) =>
    error instanceof ConfigError
      ? error
      : new ConfigError(`Invalid bridge configuration: ${String(error)}`, { details: error })
  )
);
