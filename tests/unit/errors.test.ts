import { describe, expect, it } from "vitest";
import {
  AcquireTimeoutError,
  AgentError,
  BridgeError,
  ConfigError,
  PoolInitializationError,
  PoolNotFoundError,
  PoolStateError,
  describeError
} from "../../src/errors";

describe("errors", () => {
  it("creates typed errors", () => {
    const base = new BridgeError("transport_error", "down", { retryable: true });
    expect(base.code).toBe("transport_error");
    expect(base.retryable).toBe(true);

    const config = new ConfigError("oops");
    expect(config.code).toBe("config_error");
    expect(config).toBeInstanceOf(BridgeError);

    const agent = new AgentError("timeout", "slow");
    expect(agent.code).toBe("timeout");
    expect(agent.name).toBe("AgentError");
  });

  it("keeps fatal and transient pool errors apart", () => {
    const cause = new Error("spawn failed");
    const init = new PoolInitializationError("docs", "could not start", { details: cause });
    expect(init.code).toBe("pool_init_error");
    expect(init.retryable).toBe(false);
    expect(init.details).toBe(cause);
    expect(init.poolName).toBe("docs");

    const timeout = new AcquireTimeoutError("docs", 250);
    expect(timeout.code).toBe("acquire_timeout");
    expect(timeout.retryable).toBe(true);
  });

  it("describes pool state and lookup failures", () => {
    const state = new PoolStateError("docs", "initializing", "acquire");
    expect(state.message).toBe("Pool 'docs' cannot acquire while initializing");
    expect(state.status).toBe("initializing");

    expect(new PoolNotFoundError("nope").message).toBe("Pool not configured: nope");
  });

  it("describes unknown errors", () => {
    expect(describeError(new Error("bad"))).toBe("bad");
    expect(describeError("plain")).toBe("plain");
    expect(describeError(42)).toBe("42");
  });
});
