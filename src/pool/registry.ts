import { Effect } from "effect";
import type { PoolStats, PooledServer } from "./types";
import type { Pool } from "./pool";
import { ConfigError, PoolInitializationError, PoolNotFoundError, PoolStateError } from "../errors";

export interface PoolRegistry<S extends PooledServer> {
  register: (pool: Pool<S>) => Pool<S>;
  get: (name: string) => Effect.Effect<Pool<S>, PoolNotFoundError>;
  names: () => string[];
  initializeAll: Effect.Effect<void, PoolInitializationError | PoolStateError>;
  shutdownAll: Effect.Effect<void>;
  stats: Effect.Effect<PoolStats[]>;
}

export function createPoolRegistry<S extends PooledServer>(): PoolRegistry<S> {
  const pools = new Map<string, Pool<S>>();

  const register = (pool: Pool<S>) => {
    if (pools.has(pool.name)) {
      throw new ConfigError(`Pool already registered: ${pool.name}`);
    }
    pools.set(pool.name, pool);
    return pool;
  };

  const get = (name: string) => {
    const pool = pools.get(name);
    return pool ? Effect.succeed(pool) : Effect.fail(new PoolNotFoundError(name));
  };

  const shutdownAll = Effect.gen(function* () {
    for (const pool of pools.values()) {
      yield* pool.shutdown;
    }
  }).pipe(Effect.withSpan("PoolRegistry.shutdownAll"));

  // all-or-nothing across pools: the first failure shuts every pool down
  const initializeAll = Effect.gen(function* () {
    for (const pool of pools.values()) {
      yield* pool.initialize.pipe(
        Effect.tapError((error) =>
          Effect.logError(`Pool '${pool.name}' failed to initialize, shutting down all pools: ${error.message}`).pipe(
            Effect.zipRight(shutdownAll)
          )
        )
      );
    }
  }).pipe(Effect.withSpan("PoolRegistry.initializeAll"));

  const stats = Effect.suspend(() => Effect.forEach(Array.from(pools.values()), (pool) => pool.stats));

  return {
    register,
    get,
    names: () => Array.from(pools.keys()),
    initializeAll,
    shutdownAll,
    stats
  };
}
