import type { AgentRequest, AgentRunner } from "./types";
import type { McpToolServer, ToolDescriptor } from "../mcp/tool-server";
import { AgentError, describeError } from "../errors";

const DEFAULT_MAX_TURNS = 8;

export interface LlmAgentOptions {
  baseUrl: string;
  apiKey: string;
  model: string;
  instructions: string;
  maxTurns?: number;
  fetch?: typeof fetch;
}

interface ToolCall {
  id: string;
  type: "function";
  function: { name: string; arguments: string };
}

type ChatMessage =
  | { role: "system" | "user"; content: string }
  | { role: "assistant"; content: string | null; tool_calls?: ToolCall[] }
  | { role: "tool"; tool_call_id: string; content: string };

interface AssistantReply {
  content: string | null;
  toolCalls: ToolCall[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseToolCall(value: unknown): ToolCall | undefined {
  if (!isRecord(value) || typeof value.id !== "string" || !isRecord(value.function)) return undefined;
  const { name, arguments: args } = value.function;
  if (typeof name !== "string" || typeof args !== "string") return undefined;
  return { id: value.id, type: "function", function: { name, arguments: args } };
}

export function parseAssistantReply(payload: unknown): AssistantReply {
  const choices = isRecord(payload) ? payload.choices : undefined;
  const first: unknown = Array.isArray(choices) ? choices[0] : undefined;
  const message = isRecord(first) ? first.message : undefined;
  if (!isRecord(message)) {
    throw new AgentError("llm_error", "LLM response has no message", { details: payload });
  }

  const content = typeof message.content === "string" ? message.content : null;
  const rawCalls: unknown[] = Array.isArray(message.tool_calls) ? message.tool_calls : [];
  const toolCalls: ToolCall[] = [];
  for (const raw of rawCalls) {
    const call = parseToolCall(raw);
    if (!call) {
      throw new AgentError("llm_error", "LLM response has a malformed tool call", { details: raw });
    }
    toolCalls.push(call);
  }
  return { content, toolCalls };
}

function parseArguments(call: ToolCall): Record<string, unknown> {
  if (call.function.arguments.trim() === "") return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(call.function.arguments);
  } catch (error) {
    throw new AgentError("tool_error", `Invalid arguments for tool ${call.function.name}`, { details: error });
  }
  if (!isRecord(parsed)) {
    throw new AgentError("tool_error", `Arguments for tool ${call.function.name} must be an object`);
  }
  return parsed;
}

function toFunctionTool(tool: ToolDescriptor) {
  return {
    type: "function" as const,
    function: {
      name: tool.name,
      description: tool.description ?? "",
      parameters: tool.inputSchema
    }
  };
}

/**
 * Agent that drives an OpenAI-compatible `/chat/completions` endpoint and
 * answers its tool calls with the pooled MCP server it was lent.
 */
export function createLlmAgent(options: LlmAgentOptions): AgentRunner<McpToolServer> {
  const fetchImpl = options.fetch ?? fetch;
  const maxTurns = options.maxTurns ?? DEFAULT_MAX_TURNS;
  const endpoint = `${options.baseUrl.replace(/\/+$/, "")}/chat/completions`;

  const complete = async (
    messages: ChatMessage[],
    tools: ReturnType<typeof toFunctionTool>[],
    signal: AbortSignal
  ): Promise<AssistantReply> => {
    let response: Response;
    try {
      response = await fetchImpl(endpoint, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          authorization: `Bearer ${options.apiKey}`
        },
        body: JSON.stringify({
          model: options.model,
          messages,
          ...(tools.length > 0 ? { tools } : {})
        }),
        signal
      });
    } catch (error) {
      throw new AgentError("llm_error", `LLM request failed: ${describeError(error)}`, {
        details: error,
        retryable: true
      });
    }

    if (!response.ok) {
      throw new AgentError("llm_error", `LLM responded with ${response.status}`, {
        retryable: response.status >= 500 || response.status === 429
      });
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new AgentError("llm_error", "Failed to parse LLM response", { details: error });
    }
    return parseAssistantReply(payload);
  };

  return {
    async run({ message, server, signal }: AgentRequest<McpToolServer>) {
      const tools = (await server.listTools()).map(toFunctionTool);
      const messages: ChatMessage[] = [
        { role: "system", content: options.instructions },
        { role: "user", content: message.content }
      ];

      for (let turn = 0; turn < maxTurns; turn += 1) {
        const reply = await complete(messages, tools, signal);
        if (reply.toolCalls.length === 0) {
          return reply.content ?? "";
        }

        messages.push({ role: "assistant", content: reply.content, tool_calls: reply.toolCalls });
        for (const call of reply.toolCalls) {
          const output = await server.callTool(call.function.name, parseArguments(call), signal);
          messages.push({ role: "tool", tool_call_id: call.id, content: output });
        }
      }

      throw new AgentError("agent_error", `Agent did not finish within ${maxTurns} turns`);
    }
  };
}
