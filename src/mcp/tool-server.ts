import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import type { PooledServer } from "../pool/types";
import { BridgeError, describeError } from "../errors";

export const CLIENT_INFO = { name: "mcp-chat-bridge", version: "0.1.0" };

export interface ToolDescriptor {
  name: string;
  description?: string;
  inputSchema: Record<string, unknown>;
}

export interface McpToolServer extends PooledServer {
  listTools: () => Promise<ToolDescriptor[]>;
  /** Calls a tool and renders its content as text. */
  callTool: (name: string, args: Record<string, unknown>, signal?: AbortSignal) => Promise<string>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function renderToolResult(result: unknown): string {
  if (!isRecord(result)) {
    return String(result);
  }
  if (Array.isArray(result.content)) {
    const parts: unknown[] = result.content;
    const text = parts
      .map((part) => (isRecord(part) && part.type === "text" && typeof part.text === "string" ? part.text : JSON.stringify(part)))
      .join("\n");
    return result.isError === true ? `Error: ${text}` : text;
  }
  if ("toolResult" in result) {
    return JSON.stringify(result.toolResult);
  }
  return JSON.stringify(result);
}

export async function connectToolServer(id: string, transport: Transport): Promise<McpToolServer> {
  const client = new Client(CLIENT_INFO, { capabilities: {} });

  try {
    await client.connect(transport);
  } catch (error) {
    const [closing] = await Promise.allSettled([client.close()]);
    const details = closing?.status === "rejected" ? { error, closeError: closing.reason } : error;
    throw new BridgeError("transport_error", `Failed to connect tool server ${id}: ${describeError(error)}`, {
      details
    });
  }

  return {
    id,
    async listTools() {
      const { tools } = await client.listTools();
      return tools.map((tool) => {
        const descriptor: ToolDescriptor = { name: tool.name, inputSchema: tool.inputSchema };
        if (tool.description !== undefined) {
          descriptor.description = tool.description;
        }
        return descriptor;
      });
    },
    async callTool(name, args, signal) {
      const result = await client.callTool({ name, arguments: args }, undefined, signal ? { signal } : undefined);
      return renderToolResult(result);
    },
    dispose: () => client.close()
  };
}
