/**
 * list_faults - List faults for the configured project
 * GET /v2/projects/{project_id}/faults
 */

import { z } from "zod";
import { FAULT_ORDERS } from "@/types";
import type { ListFaultsParams } from "@/types";
import {
  MAX_LIMIT,
  errorResponse,
  formatZodError,
  jsonResponse,
  limitArg,
  timestampArg,
  validationErrorResponse,
} from "./shared";
import type { Tool, ToolContext, ToolResponse } from "./types";

export const DEFAULT_FAULTS_LIMIT = 10;

export const schema: Pick<Tool, "name" | "description" | "inputSchema"> = {
  name: "list_faults",
  description:
    "List faults (error groups) from Honeybadger for the configured project, with optional search and filtering. " +
    "Returns at most 25 faults.",
  inputSchema: {
    type: "object",
    properties: {
      q: {
        type: "string",
        description: "A search string, passed to Honeybadger unmodified",
      },
      limit: {
        type: "integer",
        minimum: 1,
        maximum: MAX_LIMIT,
        default: DEFAULT_FAULTS_LIMIT,
        description: `Number of faults to return (1-${MAX_LIMIT}, default ${DEFAULT_FAULTS_LIMIT})`,
      },
      order: {
        type: "string",
        enum: FAULT_ORDERS,
        default: "recent",
        description:
          "Order results by: 'recent' (most recently occurred first) or 'frequent' (most notices first)",
      },
      created_after: {
        type: "integer",
        description: "Only faults created after this Unix timestamp (seconds since the epoch)",
      },
      occurred_after: {
        type: "integer",
        description: "Only faults that occurred after this Unix timestamp",
      },
      occurred_before: {
        type: "integer",
        description: "Only faults that occurred before this Unix timestamp",
      },
    },
    required: [],
  },
};

const argsSchema = z.object({
  q: z
    .string({ invalid_type_error: "must be a string" })
    .nullish()
    .transform((value) => value ?? undefined),
  limit: limitArg(DEFAULT_FAULTS_LIMIT),
  order: z
    .enum(["recent", "frequent"], {
      errorMap: () => ({ message: "must be 'recent' or 'frequent'" }),
    })
    .nullish()
    .transform((value) => value ?? "recent"),
  created_after: timestampArg,
  occurred_after: timestampArg,
  occurred_before: timestampArg,
});

export function parseListFaultsArgs(
  args: unknown,
): { ok: true; params: ListFaultsParams } | { ok: false; message: string } {
  const parsed = argsSchema.safeParse(args ?? {});
  if (!parsed.success) {
    return { ok: false, message: formatZodError(parsed.error) };
  }
  const { q, limit, order, created_after, occurred_after, occurred_before } = parsed.data;
  return {
    ok: true,
    params: {
      q,
      limit,
      order,
      createdAfter: created_after,
      occurredAfter: occurred_after,
      occurredBefore: occurred_before,
    },
  };
}

export async function listFaults(args: unknown, context: ToolContext): Promise<ToolResponse> {
  const parsed = parseListFaultsArgs(args);
  if (!parsed.ok) {
    return validationErrorResponse(parsed.message);
  }

  try {
    const faults = await context.client.listFaults(parsed.params, context.signal);
    context.logger.info(
      { action: "list_faults", count: faults.length, limit: parsed.params.limit },
      "listed faults",
    );
    return jsonResponse({ faults });
  } catch (error) {
    return errorResponse(error, context.logger, "list_faults");
  }
}
