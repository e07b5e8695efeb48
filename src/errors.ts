import type { PoolStatus } from "./pool/types";

export type BridgeErrorCode =
  | "config_error"
  | "pool_init_error"
  | "pool_state_error"
  | "pool_not_found"
  | "acquire_timeout"
  | "pool_exhausted"
  | "agent_error"
  | "llm_error"
  | "tool_error"
  | "timeout"
  | "transport_error";

export class BridgeError extends Error {
  readonly code: BridgeErrorCode;
  readonly details?: unknown;
  readonly retryable?: boolean;

  constructor(code: BridgeErrorCode, message: string, options?: { details?: unknown; retryable?: boolean }) {
    super(message);
    this.name = "BridgeError";
    this.code = code;
    this.details = options?.details;
    this.retryable = options?.retryable;
  }
}

export class ConfigError extends BridgeError {
  constructor(message: string, options?: { details?: unknown }) {
    super("config_error", message, { details: options?.details });
    this.name = "ConfigError";
  }
}

/**
 * Fatal: a pool could not create its full set of servers. The pool is left
 * in its terminal `shutdown` state and must not be used.
 */
export class PoolInitializationError extends BridgeError {
  readonly poolName: string;

  constructor(poolName: string, message: string, options?: { details?: unknown }) {
    super("pool_init_error", message, { details: options?.details, retryable: false });
    this.name = "PoolInitializationError";
    this.poolName = poolName;
  }
}

export class PoolStateError extends BridgeError {
  readonly poolName: string;
  readonly status: PoolStatus;
  readonly operation: string;

  constructor(poolName: string, status: PoolStatus, operation: string) {
    super("pool_state_error", `Pool '${poolName}' cannot ${operation} while ${status}`, { retryable: false });
    this.name = "PoolStateError";
    this.poolName = poolName;
    this.status = status;
    this.operation = operation;
  }
}

export class PoolNotFoundError extends BridgeError {
  readonly poolName: string;

  constructor(poolName: string) {
    super("pool_not_found", `Pool not configured: ${poolName}`);
    this.name = "PoolNotFoundError";
    this.poolName = poolName;
  }
}

export class AcquireTimeoutError extends BridgeError {
  readonly poolName: string;

  constructor(poolName: string, timeoutMs: number) {
    super("acquire_timeout", `No server available in pool '${poolName}' after ${timeoutMs}ms`, { retryable: true });
    this.name = "AcquireTimeoutError";
    this.poolName = poolName;
  }
}

/**
 * Every server the pool created has been discarded. The pool never replaces
 * servers, so it cannot serve again until it is recreated.
 */
export class PoolExhaustedError extends BridgeError {
  readonly poolName: string;

  constructor(poolName: string) {
    super("pool_exhausted", `Pool '${poolName}' has no servers left`, { retryable: false });
    this.name = "PoolExhaustedError";
    this.poolName = poolName;
  }
}

export class AgentError extends BridgeError {
  constructor(
    code: "agent_error" | "llm_error" | "tool_error" | "timeout",
    message: string,
    options?: { details?: unknown; retryable?: boolean }
  ) {
    super(code, message, options);
    this.name = "AgentError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
