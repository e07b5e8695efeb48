/**
 * A ready-to-use, already connected resource owned by a pool. The pool never
 * looks inside it; it only needs an id for diagnostics and a way to dispose it.
 */
export interface PooledServer {
  readonly id: string;
  dispose: () => Promise<void>;
}

export type ServerFactory<S extends PooledServer> = () => Promise<S>;

export type PoolStatus = "uninitialized" | "initializing" | "ready" | "shutdown";

export interface PoolOptions {
  /** Upper bound on how long `acquire` waits for a server. Unbounded when omitted. */
  acquireTimeoutMs?: number;
}

export interface PoolStats {
  name: string;
  capacity: number;
  status: PoolStatus;
  /** Servers the pool currently owns, lent out or not. */
  tracked: number;
  available: number;
  inUse: number;
}
