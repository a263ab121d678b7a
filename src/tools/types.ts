/**
 * Tool system types for the MCP server
 */

import type { Logger } from "pino";
import type { HoneybadgerClient } from "@/lib/honeybadger";

export interface ToolContext {
  client: HoneybadgerClient;
  logger: Logger;
  /** Aborted when the caller cancels the request or the connection closes */
  signal?: AbortSignal;
}

export interface Tool {
  name: string;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, unknown>;
    required: string[];
  };
  handler: (args: unknown, context: ToolContext) => Promise<ToolResponse>;
}

// Must stay a type alias: interfaces are not assignable to the SDK result index signature
export type ToolResponse = {
  content: Array<{
    type: "text";
    text: string;
  }>;
  isError: boolean;
};
