import { Effect, Redacted } from "effect";
import { createBridge } from "./bridge";
import { loadBridgeConfig, type BridgeConfig } from "./config";
import { createToolServerFactory } from "./mcp/factory";
import type { McpToolServer } from "./mcp/tool-server";
import { createLlmAgent } from "./agent/llm-agent";
import type { AgentRunner } from "./agent/types";
import type { PoolDefinition, TransportConfig } from "./types";
import { loggerLayer } from "./logging";
import { describeError } from "./errors";

function buildBridge(config: BridgeConfig) {
  const pools: Record<string, PoolDefinition<McpToolServer>> = {};
  const agents: Record<string, AgentRunner<McpToolServer>> = {};

  for (const pool of config.pools) {
    pools[pool.name] = {
      capacity: pool.size,
      factory: createToolServerFactory(pool.name, pool.server),
      ...(pool.acquireTimeoutMs !== undefined ? { acquireTimeoutMs: pool.acquireTimeoutMs } : {})
    };
    agents[pool.name] = createLlmAgent({
      baseUrl: config.llm.baseUrl,
      apiKey: Redacted.value(config.llm.apiKey),
      model: config.llm.model,
      maxTurns: config.llm.maxTurns,
      instructions: pool.instructions
    });
  }

  const transport: TransportConfig = {
    port: config.port,
    hostname: config.hostname,
    maxBodyBytes: config.maxBodyBytes
  };
  if (config.secret !== undefined) {
    transport.secret = Redacted.value(config.secret);
  }

  return createBridge({
    pools,
    agents,
    defaultPool: config.defaultPool,
    transport,
    logLevel: config.logLevel,
    ...(config.requestTimeoutMs !== undefined ? { requestTimeoutMs: config.requestTimeoutMs } : {})
  });
}

const config = await Effect.runPromise(
  loadBridgeConfig.pipe(
    Effect.tapError((error) => Effect.logError(error.message)),
    Effect.provide(loggerLayer())
  )
).catch(() => process.exit(1));

const logging = loggerLayer(undefined, config.logLevel);
const bridge = buildBridge(config);
const stopBridge = Effect.tryPromise({ try: () => bridge.stop(), catch: (error) => error });

function exitAfter(effect: Effect.Effect<void, unknown>) {
  return Effect.runFork(
    effect.pipe(
      Effect.tapError((error) => Effect.logError(describeError(error))),
      Effect.match({ onFailure: () => 1, onSuccess: () => 0 }),
      Effect.flatMap((code) => Effect.sync(() => process.exit(code))),
      Effect.provide(logging)
    )
  );
}

let stopping = false;
const onSignal = (signal: NodeJS.Signals) => {
  if (stopping) return;
  stopping = true;
  exitAfter(Effect.logInfo(`Received ${signal}, shutting down`).pipe(Effect.zipRight(stopBridge)));
};
process.on("SIGINT", onSignal);
process.on("SIGTERM", onSignal);

try {
  await bridge.start();
} catch (error) {
  stopping = true;
  exitAfter(stopBridge.pipe(Effect.zipRight(Effect.fail(`Bridge failed to start: ${describeError(error)}`))));
}
