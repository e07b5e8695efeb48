export { createBridge } from "./bridge";
export { createPool } from "./pool/pool";
export { createPoolRegistry } from "./pool/registry";
export { createMessageProcessor } from "./processor";
export { connectToolServer } from "./mcp/tool-server";
export { createToolServerFactory, createTransport } from "./mcp/factory";
export { createLlmAgent } from "./agent/llm-agent";
export { startHttpTransport } from "./transport/server";
export { loadBridgeConfig } from "./config";
export { loggerLayer } from "./logging";
export { signBody, verifySignature, SIGNATURE_HEADER } from "./security";
export {
  BridgeError,
  ConfigError,
  PoolInitializationError,
  PoolStateError,
  PoolNotFoundError,
  PoolExhaustedError,
  AcquireTimeoutError,
  AgentError
} from "./errors";
export type { Bridge } from "./bridge";
export type { Pool, AcquireError } from "./pool/pool";
export type { PoolRegistry } from "./pool/registry";
export type { PooledServer, ServerFactory, PoolOptions, PoolStats, PoolStatus } from "./pool/types";
export type { McpToolServer, ToolDescriptor } from "./mcp/tool-server";
export type { ToolServerSpec } from "./mcp/factory";
export type { AgentRunner, AgentRequest } from "./agent/types";
export type { BridgeConfig, ToolPoolConfig } from "./config";
export type { BridgeOptions, MessageContext, ProcessResult, Logger, PoolDefinition, TransportConfig } from "./types";
