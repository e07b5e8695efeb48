import { describe, expect, it } from "vitest";
import { Effect } from "effect";
import { createPool } from "../../src/pool/pool";
import { createPoolRegistry } from "../../src/pool/registry";
import { createMessageProcessor, toFailure } from "../../src/processor";
import { loggerLayer } from "../../src/logging";
import type { AgentRunner } from "../../src/agent/types";
import { AgentError, PoolNotFoundError } from "../../src/errors";
import { fakeFactory, recordingLogger, type FakeServer } from "../support/fakes";

const echoAgent: AgentRunner<FakeServer> = {
  run: async ({ message, server }) => `echo: ${message.content} from ${server.id}`
};

const message = { conversationId: "room-1", senderId: "alice", content: "hi" };

async function setup(
  agent: AgentRunner<FakeServer>,
  options: { requestTimeoutMs?: number; acquireTimeoutMs?: number; initialize?: boolean } = {}
) {
  const { factory, created } = fakeFactory();
  const logger = recordingLogger();
  const pools = createPoolRegistry<FakeServer>();
  const pool = pools.register(
    createPool("docs", 1, factory, options.acquireTimeoutMs !== undefined ? { acquireTimeoutMs: options.acquireTimeoutMs } : {})
  );
  if (options.initialize !== false) {
    await Effect.runPromise(pool.initialize);
  }
  const processor = createMessageProcessor({
    pools,
    agents: { docs: agent },
    defaultPool: "docs",
    logging: loggerLayer(logger, "info"),
    ...(options.requestTimeoutMs !== undefined ? { requestTimeoutMs: options.requestTimeoutMs } : {})
  });
  return { processor, pool, created, logger };
}

describe("message processor", () => {
  it("runs the agent with a pooled server and returns its reply", async () => {
    const { processor, pool, created } = await setup(echoAgent);

    const result = await processor.processMessage(message);

    expect(result).toEqual({ ok: true, reply: "echo: hi from server-1" });
    expect(created[0]?.disposeCount).toBe(0);
    expect(await Effect.runPromise(pool.stats)).toMatchObject({ available: 1, inUse: 0 });
  });

  it("annotates logs with the conversation and pool", async () => {
    const { processor, logger } = await setup(echoAgent);

    await processor.processMessage(message);

    expect(logger.entries).toContainEqual({
      level: "info",
      message: "Received message from alice",
      meta: { conversationId: "room-1", pool: "docs" }
    });
  });

  it("returns a failure and discards the server when the agent throws", async () => {
    const { processor, pool, created } = await setup({
      run: async () => {
        throw new Error("boom");
      }
    });

    const result = await processor.processMessage(message);

    expect(result).toEqual({ ok: false, error: { code: "agent_error", message: "Agent failed: boom" } });
    expect(created[0]?.disposeCount).toBe(1);
    expect(await Effect.runPromise(pool.stats)).toMatchObject({ tracked: 0, available: 0 });
  });

  it("keeps the code of bridge errors raised by the agent", async () => {
    const { processor } = await setup({
      run: async () => {
        throw new AgentError("llm_error", "LLM responded with 503", { retryable: true });
      }
    });

    const result = await processor.processMessage(message);

    expect(result).toEqual({
      ok: false,
      error: { code: "llm_error", message: "LLM responded with 503", retryable: true }
    });
  });

  it("fails messages routed to a pool without an agent", async () => {
    const { processor } = await setup(echoAgent);

    const result = await processor.processMessage({ ...message, pool: "search" });

    expect(result).toEqual({
      ok: false,
      error: { code: "config_error", message: "No agent configured for pool 'search'" }
    });
  });

  it("fails messages routed to an agent whose pool is missing", async () => {
    const processor = createMessageProcessor({
      pools: createPoolRegistry<FakeServer>(),
      agents: { search: echoAgent },
      defaultPool: "search"
    });

    const result = await processor.processMessage(message);

    expect(result).toEqual({ ok: false, error: { code: "pool_not_found", message: "Pool not configured: search" } });
  });

  it("reports pools that are not ready", async () => {
    const { processor } = await setup(echoAgent, { initialize: false });

    const result = await processor.processMessage(message);

    expect(result).toEqual({
      ok: false,
      error: { code: "pool_state_error", message: "Pool 'docs' cannot acquire while uninitialized", retryable: false }
    });
  });

  it("times out slow agents and aborts their work", async () => {
    let aborted = false;
    const { processor, created } = await setup(
      {
        run: ({ signal }) =>
          new Promise<string>((resolve) => {
            signal.addEventListener("abort", () => {
              aborted = true;
              resolve("too late");
            });
          })
      },
      { requestTimeoutMs: 20 }
    );

    const result = await processor.processMessage(message);

    expect(result).toEqual({
      ok: false,
      error: { code: "timeout", message: "Agent did not answer within 20ms", retryable: true }
    });
    expect(aborted).toBe(true);
    expect(created[0]?.disposeCount).toBe(1);
  });

  it("reports an acquire timeout while the only server is busy", async () => {
    const { processor, pool } = await setup(echoAgent, { acquireTimeoutMs: 30 });
    const held = await Effect.runPromise(pool.acquire);

    const result = await processor.processMessage(message);

    expect(result).toEqual({
      ok: false,
      error: { code: "acquire_timeout", message: "No server available in pool 'docs' after 30ms", retryable: true }
    });
    await Effect.runPromise(pool.release(held));
    expect(await processor.processMessage(message)).toEqual({ ok: true, reply: "echo: hi from server-1" });
  });

  it("reports an exhausted pool once its last server has been discarded", async () => {
    let calls = 0;
    const { processor } = await setup({
      run: async () => {
        calls += 1;
        throw new Error("boom");
      }
    });

    await processor.processMessage(message);
    const result = await processor.processMessage(message);

    expect(result).toEqual({
      ok: false,
      error: { code: "pool_exhausted", message: "Pool 'docs' has no servers left", retryable: false }
    });
    expect(calls).toBe(1);
  });

  it("maps unknown errors to internal failures", () => {
    expect(toFailure(new PoolNotFoundError("docs"))).toEqual({
      ok: false,
      error: { code: "pool_not_found", message: "Pool not configured: docs" }
    });
    expect(toFailure("weird")).toEqual({ ok: false, error: { code: "internal_error", message: "weird" } });
  });
});
