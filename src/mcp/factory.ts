import { getDefaultEnvironment, StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import type { ServerFactory } from "../pool/types";
import { connectToolServer, type McpToolServer } from "./tool-server";

export interface StdioServerSpec {
  kind: "stdio";
  command: string;
  args?: string[];
  /** Added on top of the SDK's safe default environment. */
  env?: Record<string, string>;
  cwd?: string;
}

export interface HttpServerSpec {
  kind: "http";
  url: string;
}

export type ToolServerSpec = StdioServerSpec | HttpServerSpec;

export type ToolServerConnector = (id: string, transport: Transport) => Promise<McpToolServer>;

export function createTransport(spec: ToolServerSpec): Transport {
  if (spec.kind === "http") {
    return new StreamableHTTPClientTransport(new URL(spec.url));
  }
  return new StdioClientTransport({
    command: spec.command,
    args: spec.args ?? [],
    env: { ...getDefaultEnvironment(), ...spec.env },
    ...(spec.cwd !== undefined ? { cwd: spec.cwd } : {})
  });
}

/**
 * Each call spawns (or dials) a fresh server; ids are `<pool>-<n>`.
 */
export function createToolServerFactory(
  poolName: string,
  spec: ToolServerSpec,
  connect: ToolServerConnector = connectToolServer
): ServerFactory<McpToolServer> {
  let created = 0;
  return async () => {
    created += 1;
    return connect(`${poolName}-${created}`, createTransport(spec));
  };
}
