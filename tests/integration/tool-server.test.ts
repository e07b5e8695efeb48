import { describe, expect, it } from "vitest";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { connectToolServer } from "../../src/mcp/tool-server";
import { BridgeError } from "../../src/errors";
import { SEARCH_TOOL, startInMemoryToolServer } from "../support/in-memory-tool-server";

describe("mcp tool server", () => {
  it("lists the server's tools", async () => {
    const remote = await startInMemoryToolServer();
    const server = await connectToolServer("docs-1", remote.clientTransport);

    const tools = await server.listTools();

    expect(server.id).toBe("docs-1");
    expect(tools).toEqual([SEARCH_TOOL, { name: "broken", inputSchema: { type: "object" } }]);
    await server.dispose();
  });

  it("renders tool results as text", async () => {
    const remote = await startInMemoryToolServer();
    const server = await connectToolServer("docs-1", remote.clientTransport);

    expect(await server.callTool("search", { query: "pools" })).toBe("found pools");
    expect(await server.callTool("broken", {})).toBe("Error: no index");
    expect(remote.calls).toEqual([
      { name: "search", args: { query: "pools" } },
      { name: "broken", args: {} }
    ]);
    await server.dispose();
  });

  it("closes the connection on dispose", async () => {
    const remote = await startInMemoryToolServer();
    const server = await connectToolServer("docs-1", remote.clientTransport);

    await server.dispose();

    expect(remote.isClosed()).toBe(true);
  });

  it("reports transports that fail to start", async () => {
    let closed = false;
    const transport: Transport = {
      start: async () => {
        throw new Error("spawn failed");
      },
      send: async () => {},
      close: async () => {
        closed = true;
      }
    };

    const failure = await connectToolServer("docs-1", transport).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(BridgeError);
    expect(failure).toMatchObject({
      code: "transport_error",
      message: "Failed to connect tool server docs-1: spawn failed"
    });
    expect(closed).toBe(true);
  });
});
