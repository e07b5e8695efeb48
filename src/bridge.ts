import { Effect } from "effect";
import type { PoolStats, PooledServer } from "./pool/types";
import { createPool } from "./pool/pool";
import { createPoolRegistry, type PoolRegistry } from "./pool/registry";
import { createMessageProcessor } from "./processor";
import { startHttpTransport, type HttpTransport } from "./transport/server";
import { loggerLayer } from "./logging";
import type { BridgeOptions, MessageContext, ProcessResult } from "./types";
import { ConfigError } from "./errors";

export interface Bridge<S extends PooledServer> {
  readonly pools: PoolRegistry<S>;
  /** Base URL of the HTTP listener once started. */
  readonly url: string | undefined;
  start: () => Promise<void>;
  stop: () => Promise<void>;
  processMessage: (context: MessageContext) => Promise<ProcessResult>;
  stats: () => Promise<PoolStats[]>;
}

export function createBridge<S extends PooledServer>(options: BridgeOptions<S>): Bridge<S> {
  const poolNames = Object.keys(options.pools);
  if (poolNames.length === 0) {
    throw new ConfigError("At least one pool is required");
  }
  const defaultPool = options.defaultPool ?? poolNames[0] ?? "";
  if (!poolNames.includes(defaultPool)) {
    throw new ConfigError(`Default pool '${defaultPool}' is not configured`);
  }

  const logging = loggerLayer(options.logger, options.logLevel);
  const run = <A, E>(effect: Effect.Effect<A, E>) => Effect.runPromise(Effect.provide(effect, logging));

  const pools = createPoolRegistry<S>();
  for (const [name, definition] of Object.entries(options.pools)) {
    const poolOptions = definition.acquireTimeoutMs !== undefined ? { acquireTimeoutMs: definition.acquireTimeoutMs } : {};
    pools.register(createPool(name, definition.capacity, definition.factory, poolOptions));
  }

  const processor = createMessageProcessor({
    pools,
    agents: options.agents,
    defaultPool,
    logging,
    ...(options.requestTimeoutMs !== undefined ? { requestTimeoutMs: options.requestTimeoutMs } : {})
  });

  const stats = () => run(pools.stats);

  let transport: HttpTransport | undefined;
  let state: "idle" | "started" | "stopped" = "idle";

  const start = async () => {
    if (state !== "idle") {
      throw new ConfigError(`Bridge cannot start once ${state}`);
    }
    state = "started";
    await run(
      Effect.logInfo(`Starting bridge with pools: ${poolNames.join(", ")}`).pipe(Effect.zipRight(pools.initializeAll))
    );
    if (options.transport) {
      transport = await startHttpTransport({ ...options.transport, onMessage: processor.processMessage, health: stats });
      await run(Effect.logInfo(`Listening for chat messages on ${transport.url}`));
    }
  };

  const stop = async () => {
    if (state === "stopped") return;
    state = "stopped";
    const listener = transport;
    transport = undefined;
    // stop accepting first, then fail waiting requests while the listener drains
    const outcomes = await Promise.allSettled([listener?.stop(), run(pools.shutdownAll)]);
    for (const outcome of outcomes) {
      if (outcome.status === "rejected") throw outcome.reason;
    }
    await run(Effect.logInfo("Bridge stopped"));
  };

  return {
    pools,
    get url() {
      return transport?.url;
    },
    start,
    stop,
    processMessage: processor.processMessage,
    stats
  };
}
