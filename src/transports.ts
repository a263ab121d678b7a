/**
 * Wire transports: stdio for locally spawned servers, SSE for agents that
 * connect over HTTP. In SSE mode every event stream gets its own server.
 */

import { createServer, type IncomingMessage, type Server as HttpServer, type ServerResponse } from "http";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Logger } from "pino";

export const SSE_PATH = "/sse";
export const MESSAGES_PATH = "/messages";
export const HEALTH_PATH = "/health";

export interface SseHandler {
  sessions: Map<string, SSEServerTransport>;
  handle: (req: IncomingMessage, res: ServerResponse) => Promise<void>;
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

export async function startStdio(server: Server, log: Logger): Promise<StdioServerTransport> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info({ action: "server_started", transport: "stdio" }, "honeybadger mcp server running on stdio");
  return transport;
}

export function createSseHandler(newServer: () => Server, log: Logger): SseHandler {
  const sessions = new Map<string, SSEServerTransport>();

  async function handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", "http://localhost");

    if (req.method === "GET" && url.pathname === HEALTH_PATH) {
      sendJson(res, 200, { status: "ok", sessions: sessions.size });
      return;
    }

    if (req.method === "GET" && url.pathname === SSE_PATH) {
      const transport = new SSEServerTransport(MESSAGES_PATH, res);
      const server = newServer();
      const { sessionId } = transport;
      sessions.set(sessionId, transport);
      res.on("close", () => {
        sessions.delete(sessionId);
        server.close().catch((error: unknown) => {
          log.warn({ action: "sse_session_close_failed", sessionId, err: error }, "failed to close session");
        });
        log.debug({ action: "sse_session_closed", sessionId }, "sse session closed");
      });
      await server.connect(transport);
      log.debug({ action: "sse_session_opened", sessionId }, "sse session opened");
      return;
    }

    if (req.method === "POST" && url.pathname === MESSAGES_PATH) {
      const sessionId = url.searchParams.get("sessionId");
      const transport = sessionId ? sessions.get(sessionId) : undefined;
      if (!transport) {
        sendJson(res, 404, { error: `Unknown session: ${sessionId ?? "(missing)"}` });
        return;
      }
      await transport.handlePostMessage(req, res);
      return;
    }

    sendJson(res, 404, { error: "Not found" });
  }

  return { sessions, handle };
}

export async function startSseServer(
  newServer: () => Server,
  { host, port }: { host: string; port: number },
  log: Logger,
): Promise<HttpServer> {
  const { handle } = createSseHandler(newServer, log);

  const httpServer = createServer((req, res) => {
    handle(req, res).catch((error: unknown) => {
      log.error({ action: "sse_request_failed", method: req.method, url: req.url, err: error }, "request failed");
      if (!res.headersSent) {
        sendJson(res, 500, { error: "Internal server error" });
      } else {
        res.end();
      }
    });
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(port, host, () => {
      httpServer.off("error", reject);
      resolve();
    });
  });

  log.info(
    { action: "server_started", transport: "sse", host, port },
    `honeybadger mcp server listening on http://${host}:${port}${SSE_PATH}`,
  );
  return httpServer;
}
