import type { ErrorCode, ToolErrorPayload } from "@/types";

interface HoneybadgerErrorOptions {
  status?: number;
  retryable?: boolean;
  cause?: unknown;
}

/**
 * Failure talking to the Honeybadger API. `status` is set whenever the
 * upstream answered with an HTTP status.
 */
export class HoneybadgerError extends Error {
  readonly code: ErrorCode;
  readonly status?: number;
  readonly retryable: boolean;

  constructor(code: ErrorCode, message: string, options: HoneybadgerErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "HoneybadgerError";
    this.code = code;
    this.status = options.status;
    this.retryable = options.retryable ?? false;
  }
}

export function errorCodeForStatus(status: number): ErrorCode {
  if (status === 404) return "NOT_FOUND";
  if (status === 401 || status === 403) return "HONEYBADGER_AUTH_ERROR";
  if (status === 429) return "HONEYBADGER_RATE_LIMIT";
  return "HONEYBADGER_API_ERROR";
}

export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export function toErrorPayload(error: unknown): ToolErrorPayload {
  if (error instanceof HoneybadgerError) {
    return {
      error: {
        code: error.code,
        message: error.message,
        ...(error.status !== undefined && { status: error.status }),
        retryable: error.retryable,
      },
    };
  }
  return {
    error: {
      code: "INTERNAL_ERROR",
      message: error instanceof Error ? error.message : String(error),
      retryable: false,
    },
  };
}
