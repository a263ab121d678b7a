import pino from "pino";
import { HoneybadgerClient } from "@/lib/honeybadger";
import { TEST_CONFIG } from "@/test/fixtures";
import type { ToolContext, ToolResponse } from "../types";

const silent = pino({ level: "silent" });

export function createContext(signal?: AbortSignal): ToolContext {
  return {
    client: new HoneybadgerClient(TEST_CONFIG, { logger: silent }),
    logger: silent,
    signal,
  };
}

export function parseResult(result: ToolResponse): unknown {
  return JSON.parse(result.content[0].text);
}
