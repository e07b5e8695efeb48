import { Duration, Effect, Layer } from "effect";
import type { PooledServer } from "./pool/types";
import type { PoolRegistry } from "./pool/registry";
import type { AgentRunner } from "./agent/types";
import type { MessageContext, ProcessFailure, ProcessResult } from "./types";
import { AgentError, BridgeError, ConfigError, describeError } from "./errors";

export interface MessageProcessorOptions<S extends PooledServer> {
  pools: PoolRegistry<S>;
  agents: Record<string, AgentRunner<S>>;
  defaultPool: string;
  requestTimeoutMs?: number;
  logging?: Layer.Layer<never>;
}

export interface MessageProcessor {
  processMessage: (context: MessageContext) => Promise<ProcessResult>;
  processMessageEffect: (context: MessageContext) => Effect.Effect<ProcessResult>;
}

export function toFailure(error: unknown): ProcessFailure {
  if (error instanceof BridgeError) {
    const failure: ProcessFailure = { ok: false, error: { code: error.code, message: error.message } };
    if (error.retryable !== undefined) {
      failure.error.retryable = error.retryable;
    }
    return failure;
  }
  return { ok: false, error: { code: "internal_error", message: describeError(error) } };
}

export function createMessageProcessor<S extends PooledServer>(
  options: MessageProcessorOptions<S>
): MessageProcessor {
  const timeoutMs = options.requestTimeoutMs;

  const runAgent =
    (agent: AgentRunner<S>, context: MessageContext) =>
    (server: S): Effect.Effect<string, BridgeError> => {
      const call = Effect.tryPromise({
        try: (signal) => agent.run({ message: context, server, signal }),
        catch: (error) =>
          error instanceof BridgeError
            ? error
            : new AgentError("agent_error", `Agent failed: ${describeError(error)}`, { details: error })
      });
      if (timeoutMs === undefined) {
        return call;
      }
      return call.pipe(
        Effect.timeoutFail({
          duration: Duration.millis(timeoutMs),
          onTimeout: () => new AgentError("timeout", `Agent did not answer within ${timeoutMs}ms`, { retryable: true })
        })
      );
    };

  const processMessageEffect = (context: MessageContext): Effect.Effect<ProcessResult> => {
    const poolKey = context.pool ?? options.defaultPool;

    return Effect.gen(function* () {
      yield* Effect.logInfo(`Received message from ${context.senderId}`);

      const agent = Object.hasOwn(options.agents, poolKey) ? options.agents[poolKey] : undefined;
      if (!agent) {
        return yield* Effect.fail(new ConfigError(`No agent configured for pool '${poolKey}'`));
      }
      const pool = yield* options.pools.get(poolKey);

      // one server per request, released exactly once with the run's outcome as its health
      const reply = yield* pool.withServer(runAgent(agent, context));
      yield* Effect.logInfo(`Reply ready (${reply.length} chars)`);
      return { ok: true, reply } satisfies ProcessResult;
    }).pipe(
      Effect.catchAll((error) =>
        Effect.logError(`Failed to process message: ${error.message}`).pipe(Effect.as(toFailure(error)))
      ),
      Effect.catchAllDefect((defect) =>
        Effect.logError(`Unexpected failure while processing message: ${describeError(defect)}`).pipe(
          Effect.as(toFailure(defect))
        )
      ),
      Effect.annotateLogs({ conversationId: context.conversationId, pool: poolKey }),
      Effect.withSpan("MessageProcessor.process")
    );
  };

  const processMessage = (context: MessageContext) => {
    const effect = processMessageEffect(context);
    return Effect.runPromise(options.logging ? Effect.provide(effect, options.logging) : effect);
  };

  return { processMessage, processMessageEffect };
}
