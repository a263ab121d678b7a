/**
 * get_fault_details - Fault record plus its most recent notices
 * GET /v2/projects/{project_id}/faults/{fault_id}
 * GET /v2/projects/{project_id}/faults/{fault_id}/notices
 */

import { z } from "zod";
import type { FaultDetailsParams } from "@/types";
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

export const DEFAULT_NOTICES_LIMIT = 5;

export const schema: Pick<Tool, "name" | "description" | "inputSchema"> = {
  name: "get_fault_details",
  description:
    "Get a Honeybadger fault by ID together with its most recent notices (occurrences), " +
    "including message, request context and backtrace. Notices are ordered by creation time, newest first.",
  inputSchema: {
    type: "object",
    properties: {
      fault_id: {
        type: "string",
        description: "The fault ID to get details for",
      },
      limit: {
        type: "integer",
        minimum: 1,
        maximum: MAX_LIMIT,
        default: DEFAULT_NOTICES_LIMIT,
        description: `Number of notices to return (1-${MAX_LIMIT}, default ${DEFAULT_NOTICES_LIMIT})`,
      },
      created_after: {
        type: "integer",
        description: "Only notices created after this Unix timestamp",
      },
      created_before: {
        type: "integer",
        description: "Only notices created before this Unix timestamp",
      },
    },
    required: ["fault_id"],
  },
};

const argsSchema = z.object({
  // Honeybadger fault ids are numeric, so agents often send them as numbers
  fault_id: z
    .union([z.string(), z.number()], {
      errorMap: () => ({ message: "must be a string" }),
    })
    .nullish()
    .transform((value) => (value == null ? "" : String(value).trim()))
    .pipe(z.string().min(1, "is required and must not be empty")),
  limit: limitArg(DEFAULT_NOTICES_LIMIT),
  created_after: timestampArg,
  created_before: timestampArg,
});

export function parseFaultDetailsArgs(
  args: unknown,
): { ok: true; params: FaultDetailsParams } | { ok: false; message: string } {
  const parsed = argsSchema.safeParse(args ?? {});
  if (!parsed.success) {
    return { ok: false, message: formatZodError(parsed.error) };
  }
  const { fault_id, limit, created_after, created_before } = parsed.data;
  return {
    ok: true,
    params: {
      faultId: fault_id,
      limit,
      createdAfter: created_after,
      createdBefore: created_before,
    },
  };
}

export async function getFaultDetails(args: unknown, context: ToolContext): Promise<ToolResponse> {
  const parsed = parseFaultDetailsArgs(args);
  if (!parsed.ok) {
    return validationErrorResponse(parsed.message);
  }

  try {
    const details = await context.client.getFaultDetails(parsed.params, context.signal);
    context.logger.info(
      {
        action: "get_fault_details",
        faultId: parsed.params.faultId,
        notices: details.notices.length,
      },
      "fetched fault details",
    );
    return jsonResponse(details);
  } catch (error) {
    return errorResponse(error, context.logger, "get_fault_details");
  }
}
