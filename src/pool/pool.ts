import { Deferred, Duration, Effect, Either, Exit, Option, Queue, Ref } from "effect";
import type { PoolOptions, PoolStats, PoolStatus, PooledServer, ServerFactory } from "./types";
import {
  AcquireTimeoutError,
  ConfigError,
  PoolExhaustedError,
  PoolInitializationError,
  PoolStateError,
  describeError
} from "../errors";

export interface Pool<S extends PooledServer> {
  readonly name: string;
  readonly capacity: number;
  initialize: Effect.Effect<void, PoolInitializationError | PoolStateError>;
  acquire: Effect.Effect<S, AcquireError>;
  release: (server: S | null | undefined, healthy?: boolean) => Effect.Effect<void, PoolStateError>;
  withServer: <A, E, R>(
    use: (server: S) => Effect.Effect<A, E, R>
  ) => Effect.Effect<A, E | AcquireError, R>;
  shutdown: Effect.Effect<void>;
  stats: Effect.Effect<PoolStats>;
}

export type AcquireError = PoolStateError | PoolExhaustedError | AcquireTimeoutError;

interface PoolState<S> {
  status: PoolStatus;
  tracked: ReadonlySet<S>;
  lent: ReadonlySet<S>;
  // servers this pool has already disposed
  retired: ReadonlySet<S>;
  // acquirers suspended until a release hands them a server, oldest first
  waiters: ReadonlyArray<Waiter<S>>;
}

type WaitError = PoolStateError | PoolExhaustedError;

type Waiter<S> = Deferred.Deferred<S, WaitError>;

type Ticket<S> = { readonly _tag: "server"; readonly server: S } | { readonly _tag: "wait"; readonly waiter: Waiter<S> };

type ReleaseDecision =
  | { readonly _tag: "closed"; readonly status: PoolStatus }
  | { readonly _tag: "recycle" }
  | { readonly _tag: "discard"; readonly reason: "unhealthy" | "foreign" }
  | { readonly _tag: "ignore"; readonly reason: string };

function withItem<T>(set: ReadonlySet<T>, item: T): ReadonlySet<T> {
  const next = new Set(set);
  next.add(item);
  return next;
}

function withoutItem<T>(set: ReadonlySet<T>, item: T): ReadonlySet<T> {
  const next = new Set(set);
  next.delete(item);
  return next;
}

function decideRelease<S>(state: PoolState<S>, server: S, healthy: boolean): ReleaseDecision {
  if (state.status !== "ready") {
    return { _tag: "closed", status: state.status };
  }
  // a lent server is never queued, so handing it back cannot overfill the queue
  if (state.lent.has(server)) {
    return healthy ? { _tag: "recycle" } : { _tag: "discard", reason: "unhealthy" };
  }
  if (state.tracked.has(server)) {
    return { _tag: "ignore", reason: "server is already available (double release)" };
  }
  if (state.retired.has(server)) {
    return { _tag: "ignore", reason: "server was already disposed" };
  }
  return { _tag: "discard", reason: "foreign" };
}

function validate<S extends PooledServer>(name: string, capacity: number, factory: ServerFactory<S>, options: PoolOptions) {
  if (typeof name !== "string" || name.length === 0) {
    throw new ConfigError("Pool name must be a non-empty string");
  }
  if (!Number.isInteger(capacity) || capacity <= 0) {
    throw new ConfigError(`Pool '${name}' capacity must be a positive integer, got ${capacity}`);
  }
  if (typeof factory !== "function") {
    throw new ConfigError(`Pool '${name}' requires a server factory function`);
  }
  const timeout = options.acquireTimeoutMs;
  if (timeout !== undefined && (!Number.isFinite(timeout) || timeout <= 0)) {
    throw new ConfigError(`Pool '${name}' acquireTimeoutMs must be a positive number, got ${timeout}`);
  }
}

/**
 * Creates a fixed-capacity pool of servers.
 *
 * Servers are only ever created by `initialize`, which is all-or-nothing. After
 * that the pool lends them out in FIFO order, recycles healthy releases and
 * disposes unhealthy ones without replacing them, so capacity can only shrink
 * until the pool is shut down.
 */
export function createPool<S extends PooledServer>(
  name: string,
  capacity: number,
  factory: ServerFactory<S>,
  options: PoolOptions = {}
): Pool<S> {
  validate(name, capacity, factory, options);

  const queue = Effect.runSync(Queue.bounded<S>(capacity));
  const stateRef = Effect.runSync(
    Ref.make<PoolState<S>>({
      status: "uninitialized",
      tracked: new Set(),
      lent: new Set(),
      retired: new Set(),
      waiters: []
    })
  );
  // held by every state transition; never held while waiting for a server
  const lock = Effect.runSync(Effect.makeSemaphore(1));

  const annotate = Effect.annotateLogs({ pool: name });

  const disposeServer = (server: S, reason: string) =>
    Effect.tryPromise({ try: () => server.dispose(), catch: (error) => error }).pipe(
      Effect.zipRight(Effect.logDebug(`Disposed server ${server.id} (${reason})`)),
      Effect.catchAll((error) =>
        Effect.logError(`Failed to dispose server ${server.id} (${reason}): ${describeError(error)}`)
      )
    );

  const createServer = Effect.tryPromise({ try: () => factory(), catch: (error) => error });

  const rollback = (created: S[]) =>
    Effect.gen(function* () {
      // emptied first so a second rollback of the same attempt is a no-op
      const servers = created.splice(0);
      if (servers.length > 0) {
        yield* Effect.logWarning(`Cleaning up ${servers.length} servers created before the failure`);
      }
      for (const server of servers) {
        yield* disposeServer(server, "initialization rollback");
      }
      yield* Queue.takeAll(queue);
      yield* Ref.update(stateRef, (state) => ({
        status: "shutdown" as const,
        tracked: new Set<S>(),
        lent: new Set<S>(),
        retired: new Set([...state.retired, ...servers]),
        waiters: []
      }));
    }).pipe(Effect.uninterruptible);

  const initialize = lock
    .withPermits(1)(
      Effect.gen(function* () {
        const { status } = yield* Ref.get(stateRef);
        if (status !== "uninitialized") {
          return yield* Effect.fail(new PoolStateError(name, status, "initialize"));
        }
        yield* Ref.update(stateRef, (state) => ({ ...state, status: "initializing" as const }));
        yield* Effect.logInfo(`Initializing pool with ${capacity} servers`);

        const created: S[] = [];
        yield* Effect.gen(function* () {
          for (let i = 0; i < capacity; i += 1) {
            const label = `server ${i + 1}/${capacity}`;
            yield* Effect.logDebug(`Creating ${label}`);
            const result = yield* Effect.either(createServer);
            if (Either.isLeft(result)) {
              const reason = describeError(result.left);
              yield* Effect.logError(`Failed to create ${label}: ${reason}`);
              yield* rollback(created);
              return yield* Effect.fail(
                new PoolInitializationError(name, `Pool '${name}' failed to create ${label}: ${reason}`, {
                  details: result.left
                })
              );
            }
            const server = result.right;
            created.push(server);
            yield* Queue.offer(queue, server);
            yield* Ref.update(stateRef, (state) => ({ ...state, tracked: withItem(state.tracked, server) }));
            yield* Effect.logDebug(`Created ${label} (${server.id})`);
          }
        }).pipe(Effect.onInterrupt(() => rollback(created)));

        yield* Ref.update(stateRef, (state) => ({ ...state, status: "ready" as const }));
        yield* Effect.logInfo(`Pool ready with ${capacity} servers`);
      })
    )
    .pipe(annotate, Effect.withSpan(`Pool.initialize:${name}`));

  const lendOrEnqueue = lock.withPermits(1)(
    Effect.gen(function* () {
      const state = yield* Ref.get(stateRef);
      if (state.status !== "ready") {
        return yield* Effect.fail(new PoolStateError(name, state.status, "acquire"));
      }
      if (state.tracked.size === 0) {
        return yield* Effect.fail(new PoolExhaustedError(name));
      }
      const next = yield* Queue.poll(queue);
      if (Option.isSome(next)) {
        yield* Ref.set(stateRef, { ...state, lent: withItem(state.lent, next.value) });
        return { _tag: "server", server: next.value } satisfies Ticket<S>;
      }
      const waiter = yield* Deferred.make<S, WaitError>();
      yield* Ref.set(stateRef, { ...state, waiters: [...state.waiters, waiter] });
      return { _tag: "wait", waiter } satisfies Ticket<S>;
    })
  );

  // caller holds the lock; the server is lent and stays lent if a waiter takes it
  const handOff = (server: S) =>
    Effect.gen(function* () {
      const state = yield* Ref.get(stateRef);
      const [next, ...rest] = state.waiters;
      if (next !== undefined) {
        yield* Ref.set(stateRef, { ...state, waiters: rest });
        yield* Deferred.succeed(next, server);
        return;
      }
      yield* Ref.set(stateRef, { ...state, lent: withoutItem(state.lent, server) });
      yield* Queue.offer(queue, server);
    });

  // caller holds the lock
  const failWaiters = (error: WaitError) =>
    Effect.gen(function* () {
      const { waiters } = yield* Ref.get(stateRef);
      yield* Ref.update(stateRef, (state) => ({ ...state, waiters: [] }));
      for (const waiter of waiters) {
        yield* Deferred.fail(waiter, error);
      }
    });

  // a waiter that gives up may already have been handed a server; pass it on
  const abandon = (waiter: Waiter<S>) =>
    lock.withPermits(1)(
      Effect.gen(function* () {
        yield* Ref.update(stateRef, (state) => ({
          ...state,
          waiters: state.waiters.filter((candidate) => candidate !== waiter)
        }));
        const handed = yield* Deferred.poll(waiter);
        const { status } = yield* Ref.get(stateRef);
        // after shutdown the server has already been disposed
        if (Option.isNone(handed) || status !== "ready") return;
        const outcome = yield* Effect.exit(handed.value);
        if (Exit.isSuccess(outcome)) {
          yield* handOff(outcome.value);
        }
      })
    );

  const acquireTimeoutMs = options.acquireTimeoutMs;
  const bounded = (wait: Effect.Effect<S, WaitError>): Effect.Effect<S, AcquireError> =>
    acquireTimeoutMs === undefined
      ? wait
      : wait.pipe(
          Effect.timeoutFail({
            duration: Duration.millis(acquireTimeoutMs),
            onTimeout: () => new AcquireTimeoutError(name, acquireTimeoutMs)
          })
        );

  const acquire: Effect.Effect<S, AcquireError> = Effect.uninterruptibleMask((restore) =>
    Effect.gen(function* () {
      const ticket = yield* lendOrEnqueue;
      if (ticket._tag === "server") return ticket.server;
      // only the wait is interruptible
      return yield* restore(bounded(Deferred.await(ticket.waiter))).pipe(
        Effect.onExit((exit) => (Exit.isSuccess(exit) ? Effect.void : abandon(ticket.waiter)))
      );
    })
  ).pipe(
    Effect.tap((server) =>
      Effect.flatMap(Queue.size(queue), (available) =>
        Effect.logDebug(`Acquired server ${server.id}, ${Math.max(0, available)} available`)
      )
    ),
    annotate,
    Effect.withSpan(`Pool.acquire:${name}`)
  );

  const release = Effect.fn(`Pool.release:${name}`)(function* (server: S | null | undefined, healthy: boolean = true) {
    if (server === null || server === undefined) {
      yield* Effect.logWarning("Ignoring release of an empty server reference").pipe(annotate);
      return;
    }

    const decision = yield* lock.withPermits(1)(
      Effect.gen(function* () {
        const state = yield* Ref.get(stateRef);
        const next = decideRelease(state, server, healthy);
        if (next._tag === "recycle") {
          yield* handOff(server);
        } else if (next._tag === "discard") {
          const tracked = withoutItem(state.tracked, server);
          yield* Ref.set(stateRef, {
            ...state,
            lent: withoutItem(state.lent, server),
            tracked,
            retired: withItem(state.retired, server)
          });
          if (tracked.size === 0) {
            yield* failWaiters(new PoolExhaustedError(name));
          }
        }
        return next;
      })
    );

    switch (decision._tag) {
      case "closed":
        return yield* Effect.fail(new PoolStateError(name, decision.status, "release"));
      case "recycle":
        yield* Effect.logDebug(`Released server ${server.id} back to the pool`).pipe(annotate);
        return;
      case "ignore":
        yield* Effect.logWarning(`Ignoring release of server ${server.id}: ${decision.reason}`).pipe(annotate);
        return;
      case "discard": {
        if (decision.reason === "unhealthy") {
          yield* Effect.logWarning(`Disposing unhealthy server ${server.id}; it will not be replaced`).pipe(annotate);
        } else {
          yield* Effect.logWarning(`Disposing server ${server.id} that does not belong to this pool`).pipe(annotate);
        }
        yield* disposeServer(server, `${decision.reason} release`).pipe(annotate);
        const { tracked } = yield* Ref.get(stateRef);
        yield* Effect.logInfo(`Pool now tracks ${tracked.size}/${capacity} servers`).pipe(annotate);
        return;
      }
    }
  });

  // the wait for a server stays interruptible; acquireUseRelease would mask it
  const withServer = <A, E, R>(use: (server: S) => Effect.Effect<A, E, R>) =>
    Effect.uninterruptibleMask((restore) =>
      Effect.flatMap(restore(acquire), (server) =>
        restore(use(server)).pipe(
          Effect.onExit((exit) =>
            release(server, Exit.isSuccess(exit)).pipe(
              Effect.catchAll((error) =>
                Effect.logWarning(`Could not return server ${server.id}: ${error.message}`).pipe(annotate)
              )
            )
          )
        )
      )
    );

  const shutdown: Effect.Effect<void> = Effect.gen(function* () {
    const drained = yield* lock.withPermits(1)(
      Effect.gen(function* () {
        const state = yield* Ref.get(stateRef);
        if (state.status === "shutdown") return undefined;
        yield* Ref.set(stateRef, {
          status: "shutdown",
          tracked: new Set<S>(),
          lent: new Set<S>(),
          retired: new Set([...state.retired, ...state.tracked]),
          waiters: state.waiters
        });
        yield* Queue.takeAll(queue);
        yield* failWaiters(new PoolStateError(name, "shutdown", "acquire"));
        return { servers: Array.from(state.tracked), inUse: state.lent.size };
      })
    );

    if (drained === undefined) {
      yield* Effect.logWarning("Pool is already shut down");
      return;
    }

    yield* Effect.logInfo(`Shutting down, disposing ${drained.servers.length} servers (${drained.inUse} in use)`);
    for (const server of drained.servers) {
      yield* disposeServer(server, "shutdown");
    }
    yield* Effect.logInfo("Shutdown complete");
  }).pipe(Effect.uninterruptible, annotate, Effect.withSpan(`Pool.shutdown:${name}`));

  const stats: Effect.Effect<PoolStats> = Effect.gen(function* () {
    const state = yield* Ref.get(stateRef);
    const queued = yield* Queue.size(queue);
    return {
      name,
      capacity,
      status: state.status,
      tracked: state.tracked.size,
      available: Math.max(0, queued),
      inUse: state.lent.size
    };
  });

  return { name, capacity, initialize, acquire, release, withServer, shutdown, stats };
}
