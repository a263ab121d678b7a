import { z } from "zod";
import type { Logger } from "pino";
import { toErrorPayload } from "@/lib/errors";
import type { ToolErrorPayload } from "@/types";
import type { ToolResponse } from "./types";

export const MIN_LIMIT = 1;
export const MAX_LIMIT = 25;

export function clampLimit(limit: number): number {
  return Math.min(MAX_LIMIT, Math.max(MIN_LIMIT, Math.trunc(limit)));
}

/** Optional `limit` argument: defaulted, then clamped into [1, 25] */
export function limitArg(defaultLimit: number) {
  return z
    .number({ invalid_type_error: "must be a number" })
    .nullish()
    .transform((value) => clampLimit(value ?? defaultLimit));
}

export const timestampArg = z
  .number({ invalid_type_error: "must be a unix timestamp in seconds" })
  .int("must be a unix timestamp in seconds")
  .nullish()
  .transform((value) => value ?? undefined);

export function formatZodError(error: z.ZodError): string {
  const details = error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
  return `Invalid arguments: ${details.join("; ")}`;
}

export function jsonResponse(data: unknown): ToolResponse {
  return {
    content: [{ type: "text", text: JSON.stringify(data, null, 2) }],
    isError: false,
  };
}

export function errorPayloadResponse(payload: ToolErrorPayload): ToolResponse {
  return {
    content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
    isError: true,
  };
}

export function validationErrorResponse(message: string): ToolResponse {
  return errorPayloadResponse({
    error: { code: "VALIDATION_ERROR", message, retryable: false },
  });
}

/** Convert a thrown error into an error result, logging it on the way */
export function errorResponse(error: unknown, log: Logger, action: string): ToolResponse {
  const payload = toErrorPayload(error);
  const { code, status, retryable } = payload.error;
  if (code === "INTERNAL_ERROR") {
    log.error({ action, code, err: error }, "tool failed unexpectedly");
  } else {
    log.warn({ action, code, status, retryable }, payload.error.message);
  }
  return errorPayloadResponse(payload);
}
