import { createServer, type IncomingMessage, type ServerResponse } from "http";
import type { MessageContext, ProcessResult, TransportConfig } from "../types";
import { SIGNATURE_HEADER, validateTimestamp, verifySignature } from "../security";
import { toFailure } from "../processor";

export interface HttpTransportOptions extends TransportConfig {
  onMessage: (context: MessageContext) => Promise<ProcessResult>;
  health?: () => Promise<unknown>;
}

export interface HttpTransport {
  port: number;
  hostname: string;
  url: string;
  stop: () => Promise<void>;
}

export interface IncomingChatMessage {
  context: MessageContext;
  sentAt?: number;
}

const DEFAULT_MAX_BODY_BYTES = 1024 * 1024; // 1MB
const DEFAULT_MESSAGE_PATH = "/messages";
const DEFAULT_SHUTDOWN_GRACE_MS = 5_000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

export function parseChatMessage(payload: unknown): IncomingChatMessage | undefined {
  if (!isRecord(payload)) return undefined;
  const { conversationId, senderId, content, messageId, senderName, pool, sentAt } = payload;
  if (!nonEmptyString(conversationId) || !nonEmptyString(senderId) || !nonEmptyString(content)) {
    return undefined;
  }

  const context: MessageContext = { conversationId, senderId, content };
  for (const [key, value] of [
    ["messageId", messageId],
    ["senderName", senderName],
    ["pool", pool]
  ] as const) {
    if (value === undefined) continue;
    if (!nonEmptyString(value)) return undefined;
    context[key] = value;
  }

  const message: IncomingChatMessage = { context };
  if (sentAt !== undefined) {
    if (typeof sentAt !== "number") return undefined;
    message.sentAt = sentAt;
  }
  return message;
}

function readBody(req: IncomingMessage, maxBytes: number): Promise<string | null> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > maxBytes) {
        tooLarge = true;
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => resolve(tooLarge ? null : Buffer.concat(chunks).toString("utf8")));
    req.on("error", reject);
  });
}

function send(res: ServerResponse, status: number, body: string, contentType = "text/plain") {
  res.writeHead(status, { "content-type": contentType, "content-length": Buffer.byteLength(body) });
  res.end(body);
}

function sendJson(res: ServerResponse, status: number, body: unknown) {
  send(res, status, JSON.stringify(body), "application/json");
}

export async function startHttpTransport(options: HttpTransportOptions): Promise<HttpTransport> {
  const port = options.port ?? 0;
  const hostname = options.hostname ?? "0.0.0.0";
  const messagePath = options.messagePath ?? DEFAULT_MESSAGE_PATH;
  const maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  const secret = options.secret;
  const shutdownGraceMs = options.shutdownGraceMs ?? DEFAULT_SHUTDOWN_GRACE_MS;

  const handle = async (req: IncomingMessage, res: ServerResponse) => {
    const url = new URL(req.url ?? "/", "http://localhost");

    if (req.method === "GET" && url.pathname === "/health") {
      const pools = options.health ? await options.health() : [];
      sendJson(res, 200, { ok: true, pools });
      return;
    }

    if (req.method !== "POST" || url.pathname !== messagePath) {
      send(res, 404, "Not found");
      return;
    }

    const body = await readBody(req, maxBodyBytes);
    if (body === null) {
      send(res, 413, "Payload too large");
      return;
    }

    if (secret) {
      if (!verifySignature(body, req.headers[SIGNATURE_HEADER], secret)) {
        send(res, 401, "Invalid signature");
        return;
      }
    }

    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch {
      send(res, 400, "Invalid JSON");
      return;
    }

    const message = parseChatMessage(payload);
    if (!message) {
      send(res, 400, "Invalid message");
      return;
    }

    if (secret && (message.sentAt === undefined || !validateTimestamp(message.sentAt, options.maxSkewMs))) {
      send(res, 401, "Request expired");
      return;
    }

    const result = await options.onMessage(message.context);
    sendJson(res, 200, result);
  };

  const server = createServer((req, res) => {
    handle(req, res).catch((error: unknown) => {
      if (res.headersSent) {
        res.destroy(error instanceof Error ? error : undefined);
        return;
      }
      sendJson(res, 500, toFailure(error));
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, hostname, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  const actualPort = typeof address === "object" && address !== null ? address.port : port;

  return {
    port: actualPort,
    hostname,
    url: `http://${hostname}:${actualPort}`,
    stop: () =>
      new Promise<void>((resolve, reject) => {
        const force = setTimeout(() => server.closeAllConnections(), shutdownGraceMs);
        force.unref();
        server.close((error) => {
          clearTimeout(force);
          if (error) reject(error);
          else resolve();
        });
        server.closeIdleConnections();
      })
  };
}
