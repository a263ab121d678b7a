export type FaultOrder = "recent" | "frequent";

export const FAULT_ORDERS: readonly FaultOrder[] = ["recent", "frequent"];

/** Parameters for the project faults listing, after defaults and clamping */
export interface ListFaultsParams {
  q?: string;
  order: FaultOrder;
  limit: number;
  /** Unix timestamps (seconds) */
  createdAfter?: number;
  occurredAfter?: number;
  occurredBefore?: number;
}

export interface ListNoticesParams {
  limit: number;
  createdAfter?: number;
  createdBefore?: number;
}

export interface FaultDetailsParams extends ListNoticesParams {
  faultId: string;
}

export type TransportKind = "stdio" | "sse";

export type ErrorCode =
  | "VALIDATION_ERROR"
  | "UNKNOWN_TOOL"
  | "NOT_FOUND"
  | "HONEYBADGER_AUTH_ERROR"
  | "HONEYBADGER_RATE_LIMIT"
  | "HONEYBADGER_API_ERROR"
  | "HONEYBADGER_TIMEOUT"
  | "REQUEST_CANCELLED"
  | "NETWORK_ERROR"
  | "DECODE_ERROR"
  | "INTERNAL_ERROR";

/** Body of an error tool result */
export interface ToolErrorPayload {
  error: {
    code: ErrorCode;
    message: string;
    status?: number;
    retryable: boolean;
  };
}
