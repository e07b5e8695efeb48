import { describe, expect, it } from "vitest";
import { Effect, Either } from "effect";
import { createPool } from "../../src/pool/pool";
import { createPoolRegistry } from "../../src/pool/registry";
import { ConfigError, PoolInitializationError, PoolNotFoundError } from "../../src/errors";
import { fakeFactory, type FakeServer } from "../support/fakes";

describe("pool registry", () => {
  it("registers pools and looks them up by name", async () => {
    const registry = createPoolRegistry<FakeServer>();
    const docs = registry.register(createPool("docs", 1, fakeFactory().factory));
    registry.register(createPool("search", 1, fakeFactory().factory));

    expect(registry.names()).toEqual(["docs", "search"]);
    expect(await Effect.runPromise(registry.get("docs"))).toBe(docs);
  });

  it("fails lookups for unknown pools", async () => {
    const registry = createPoolRegistry<FakeServer>();

    const result = await Effect.runPromise(Effect.either(registry.get("missing")));

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left).toBeInstanceOf(PoolNotFoundError);
      expect(result.left.message).toBe("Pool not configured: missing");
    }
  });

  it("rejects duplicate pool names", () => {
    const registry = createPoolRegistry<FakeServer>();
    registry.register(createPool("docs", 1, fakeFactory().factory));

    expect(() => registry.register(createPool("docs", 2, fakeFactory().factory))).toThrow(ConfigError);
  });

  it("initializes every pool and reports their stats", async () => {
    const registry = createPoolRegistry<FakeServer>();
    registry.register(createPool("docs", 2, fakeFactory().factory));
    registry.register(createPool("search", 1, fakeFactory().factory));

    await Effect.runPromise(registry.initializeAll);
    const stats = await Effect.runPromise(registry.stats);

    expect(stats.map(({ name, status, tracked }) => ({ name, status, tracked }))).toEqual([
      { name: "docs", status: "ready", tracked: 2 },
      { name: "search", status: "ready", tracked: 1 }
    ]);
  });

  it("shuts every pool down when one fails to initialize", async () => {
    const docs = fakeFactory();
    const search = fakeFactory({ failAt: 2 });
    const later = fakeFactory();
    const registry = createPoolRegistry<FakeServer>();
    registry.register(createPool("docs", 2, docs.factory));
    registry.register(createPool("search", 2, search.factory));
    registry.register(createPool("later", 1, later.factory));

    const result = await Effect.runPromise(Effect.either(registry.initializeAll));

    expect(Either.isLeft(result) && result.left).toBeInstanceOf(PoolInitializationError);
    expect(docs.created.map((server) => server.disposeCount)).toEqual([1, 1]);
    expect(search.created.map((server) => server.disposeCount)).toEqual([1]);
    expect(later.calls()).toBe(0);
    const stats = await Effect.runPromise(registry.stats);
    expect(stats.map((entry) => entry.status)).toEqual(["shutdown", "shutdown", "shutdown"]);
  });

  it("shuts down all pools", async () => {
    const docs = fakeFactory();
    const search = fakeFactory();
    const registry = createPoolRegistry<FakeServer>();
    registry.register(createPool("docs", 1, docs.factory));
    registry.register(createPool("search", 2, search.factory));
    await Effect.runPromise(registry.initializeAll);

    await Effect.runPromise(registry.shutdownAll);

    expect([...docs.created, ...search.created].map((server) => server.disposeCount)).toEqual([1, 1, 1]);
  });
});
