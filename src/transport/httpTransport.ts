import { randomUUID } from "node:crypto";
import { createServer, IncomingMessage, Server, ServerResponse } from "node:http";
import { AddressInfo } from "node:net";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { errorMessage } from "../domain/errors.js";
import { createComponentLogger } from "../utils/logger.js";

export const MCP_PATH = "/mcp";
export const HEALTH_PATH = "/healthz";

const DEFAULT_MAX_BODY_BYTES = 8 * 1024 * 1024;

const log = createComponentLogger("http");

export interface HttpTransportOptions {
  host: string;
  port: number;
  /** Builds the MCP server for one session. */
  createServer: () => McpServer;
  maxBodyBytes?: number;
}

export interface HttpTransportHandle {
  url: string;
  sessionCount(): number;
  close(): Promise<void>;
}

class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
  }
}

interface Session {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
}

/** Open MCP sessions by id. Closing a transport removes its session. */
class SessionRegistry {
  private readonly sessions = new Map<string, Session>();

  get size(): number {
    return this.sessions.size;
  }

  get(id: string): Session | undefined {
    return this.sessions.get(id);
  }

  add(id: string, session: Session): void {
    this.sessions.set(id, session);
  }

  async remove(id: string): Promise<void> {
    const session = this.sessions.get(id);
    if (!session) {
      return;
    }
    this.sessions.delete(id);
    await session.server.close();
  }

  async closeAll(): Promise<void> {
    const open = [...this.sessions.values()];
    this.sessions.clear();
    await Promise.all(
      open.map(async ({ server, transport }) => {
        await transport.close();
        await server.close();
      }),
    );
  }
}

/**
 * Streamable HTTP transport: one MCP server per session on `/mcp`, a liveness
 * check on `/healthz`. New requests get 503 once `close()` has started.
 */
export async function startHttpTransport(options: HttpTransportOptions): Promise<HttpTransportHandle> {
  const sessions = new SessionRegistry();
  const maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  let closing = false;

  const openSession = async (req: IncomingMessage, res: ServerResponse, body: unknown) => {
    const server = options.createServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (sessionId) => {
        sessions.add(sessionId, { server, transport });
        log.debug({ sessionId }, "MCP session opened");
      },
    });
    transport.onclose = () => {
      const sessionId = transport.sessionId;
      if (!sessionId) {
        return;
      }
      sessions.remove(sessionId).catch((error: unknown) => {
        log.warn({ err: error, sessionId }, "Failed to close MCP session");
      });
    };

    await server.connect(transport);
    await transport.handleRequest(req, res, body);
  };

  const handleMcp = async (req: IncomingMessage, res: ServerResponse) => {
    const sessionId = readSessionId(req);
    const session = sessionId ? sessions.get(sessionId) : undefined;
    if (sessionId && !session) {
      writeJsonRpcError(res, 404, -32001, "Session not found");
      return;
    }

    if (req.method === "POST") {
      const body = await readJsonBody(req, maxBodyBytes);
      if (session) {
        await session.transport.handleRequest(req, res, body);
        return;
      }
      if (!isInitializeRequest(body)) {
        writeJsonRpcError(res, 400, -32000, "Initialize request is required when session is not established");
        return;
      }
      await openSession(req, res, body);
      return;
    }

    if (req.method === "GET" || req.method === "DELETE") {
      if (!session) {
        writeJsonRpcError(res, 400, -32000, "Missing or invalid mcp-session-id");
        return;
      }
      await session.transport.handleRequest(req, res);
      return;
    }

    throw new HttpError(405, "Method not allowed");
  };

  const route = async (req: IncomingMessage, res: ServerResponse) => {
    const { pathname } = new URL(req.url ?? "/", "http://localhost");
    if (closing) {
      throw new HttpError(503, "Server is shutting down");
    }
    if (pathname === HEALTH_PATH) {
      writeJson(res, 200, { ok: true, sessions: sessions.size });
      return;
    }
    if (pathname !== MCP_PATH) {
      throw new HttpError(404, "Not found");
    }
    await handleMcp(req, res);
  };

  const httpServer = createServer((req, res) => {
    route(req, res).catch((error: unknown) => {
      const status = error instanceof HttpError ? error.status : 500;
      if (status === 500) {
        log.error({ err: error, path: req.url }, "HTTP request failed");
      }
      if (!res.headersSent) {
        writeJson(res, status, { error: errorMessage(error) });
      }
    });
  });

  await listen(httpServer, options.host, options.port);
  const { port } = addressOf(httpServer);
  const url = `http://${options.host}:${port}${MCP_PATH}`;
  log.info({ url }, "MCP HTTP server listening");

  return {
    url,
    sessionCount: () => sessions.size,
    close: async () => {
      if (closing) {
        return;
      }
      closing = true;
      await sessions.closeAll();
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => (error ? reject(error) : resolve()));
        httpServer.closeAllConnections();
      });
    },
  };
}

function listen(server: Server, host: string, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve();
    });
  });
}

function addressOf(server: Server): AddressInfo {
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("HTTP server is not bound to a TCP port");
  }
  return address;
}

async function readJsonBody(req: IncomingMessage, maxBytes: number): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  // Drain the whole body even when it is too large; leaving the loop early would
  // destroy the socket before the 413 is written.
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size <= maxBytes) {
      chunks.push(buffer);
    }
  }
  if (size > maxBytes) {
    throw new HttpError(413, `Request body exceeds ${maxBytes} bytes`);
  }

  const raw = Buffer.concat(chunks).toString("utf-8").trim();
  if (!raw) {
    return {};
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new HttpError(400, "Invalid JSON body");
  }
}

function readSessionId(req: IncomingMessage): string | null {
  const header = req.headers["mcp-session-id"];
  if (!header) {
    return null;
  }
  return Array.isArray(header) ? (header[0] ?? null) : header;
}

function writeJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function writeJsonRpcError(res: ServerResponse, status: number, code: number, message: string): void {
  writeJson(res, status, { jsonrpc: "2.0", error: { code, message }, id: null });
}
