import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import type { Logger } from "pino";

import type { HoneybadgerClient } from "@/lib/honeybadger";
import { createToolLogger } from "@/lib/logger";
import { errorPayloadResponse, errorResponse } from "@/tools/shared";
import { findTool, tools } from "@/tools";
import type { ToolResponse } from "@/tools/types";
import packageJson from "../package.json";

export const SERVER_NAME = "honeybadger-mcp-server";
export const SERVER_VERSION: string = packageJson.version;

export interface ServerDependencies {
  client: HoneybadgerClient;
  /** Defaults to a child of the root logger tagged with the tool name */
  loggerFor?: (tool: string) => Logger;
}

function toCallToolResult({ content, isError }: ToolResponse) {
  return { content, isError };
}

/**
 * Build an MCP server answering tools/list and tools/call. The server holds
 * no per-call state; one instance is created per transport connection.
 */
export function createMcpServer({ client, loggerFor = createToolLogger }: ServerDependencies): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: tools.map(({ name, description, inputSchema }) => ({
        name,
        description,
        inputSchema,
      })),
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name } = request.params;
    const tool = findTool(name);

    if (!tool) {
      return toCallToolResult(
        errorPayloadResponse({
          error: { code: "UNKNOWN_TOOL", message: `Unknown tool: ${name}`, retryable: false },
        }),
      );
    }

    const log = loggerFor(name);
    const startedAt = Date.now();
    try {
      const result = await tool.handler(request.params.arguments, {
        client,
        logger: log,
        signal: extra.signal,
      });
      log.debug({ action: "tool_call", isError: result.isError, durationMs: Date.now() - startedAt }, "tool call finished");
      return toCallToolResult(result);
    } catch (error) {
      return toCallToolResult(errorResponse(error, log, "tool_call"));
    }
  });

  return server;
}
