#!/usr/bin/env npx tsx

/**
 * MCP server for read-only Honeybadger API access
 * Configuration comes from the environment (and .env in the working directory)
 */

import "dotenv/config";

import type { Server as HttpServer } from "http";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";

import { loadConfigOrExit } from "@/lib/env";
import { HoneybadgerClient } from "@/lib/honeybadger";
import { logger } from "@/lib/logger";
import { createMcpServer } from "@/server";
import { startSseServer, startStdio } from "@/transports";

async function main(): Promise<void> {
  const config = loadConfigOrExit(logger);
  logger.level = config.logLevel;

  const client = new HoneybadgerClient(config);
  const newServer = () => createMcpServer({ client });

  let httpServer: HttpServer | undefined;
  let stdioServer: Server | undefined;

  if (config.transport === "sse") {
    httpServer = await startSseServer(newServer, config, logger);
  } else {
    stdioServer = newServer();
    stdioServer.onclose = () => {
      logger.info({ action: "transport_closed" }, "stdio transport closed");
      process.exit(0);
    };
    await startStdio(stdioServer, logger);
  }

  const shutdown = (signal: string) => {
    logger.info({ action: "shutdown", signal }, "shutting down");
    const closing: Promise<void>[] = [];
    if (stdioServer) closing.push(stdioServer.close());
    if (httpServer) {
      const server = httpServer;
      closing.push(new Promise<void>((resolve) => server.close(() => resolve())));
      server.closeAllConnections();
    }
    Promise.all(closing)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ action: "shutdown_failed", err: error }, "shutdown failed");
        process.exit(1);
      });
  };

  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  logger.fatal({ action: "startup_failed", err: error }, "failed to start honeybadger mcp server");
  process.exit(1);
});
