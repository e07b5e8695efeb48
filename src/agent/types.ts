import type { PooledServer } from "../pool/types";
import type { MessageContext } from "../types";

export interface AgentRequest<S extends PooledServer> {
  message: MessageContext;
  server: S;
  /** Aborted when the request times out or the bridge stops waiting for it. */
  signal: AbortSignal;
}

export interface AgentRunner<S extends PooledServer> {
  run: (request: AgentRequest<S>) => Promise<string>;
}
