import type { PooledServer, ServerFactory } from "./pool/types";
import type { AgentRunner } from "./agent/types";
import type { LogLevelName } from "./logging";

export interface MessageContext {
  conversationId: string;
  senderId: string;
  content: string;
  messageId?: string;
  senderName?: string;
  /** Pool key to serve this message with; the bridge default when omitted. */
  pool?: string;
}

export interface ProcessSuccess {
  ok: true;
  reply: string;
}

export interface ProcessFailure {
  ok: false;
  error: {
    code: string;
    message: string;
    retryable?: boolean;
  };
}

export type ProcessResult = ProcessSuccess | ProcessFailure;

export interface Logger {
  debug?: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
}

export interface PoolDefinition<S extends PooledServer> {
  capacity: number;
  factory: ServerFactory<S>;
  acquireTimeoutMs?: number;
}

export interface TransportConfig {
  port?: number;
  hostname?: string;
  messagePath?: string;
  maxBodyBytes?: number;
  secret?: string;
  maxSkewMs?: number;
  /** How long `stop` lets in-flight requests finish before dropping their connections. */
  shutdownGraceMs?: number;
}

export interface BridgeOptions<S extends PooledServer> {
  pools: Record<string, PoolDefinition<S>>;
  agents: Record<string, AgentRunner<S>>;
  defaultPool?: string;
  requestTimeoutMs?: number;
  /** HTTP webhook settings; no listener is started when omitted. */
  transport?: TransportConfig;
  logger?: Logger;
  logLevel?: LogLevelName;
}
