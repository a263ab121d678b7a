/**
 * Read-only client for the Honeybadger REST API (v2).
 *
 * Every call issues plain GETs with Basic auth (API key as the user name),
 * a per-request timeout, and an optional caller signal that aborts the
 * in-flight request. Responses are decoded with zod before they leave here.
 */

import type { z } from "zod";
import type { Logger } from "pino";
import type { AppConfig } from "@/lib/env";
import { logger as rootLogger } from "@/lib/logger";
import { HoneybadgerError, errorCodeForStatus, isRetryableStatus } from "@/lib/errors";
import {
  faultSchema,
  faultsPageSchema,
  noticesPageSchema,
} from "@/lib/honeybadger-schemas";
import type { Fault, FaultDetails, Notice } from "@/lib/honeybadger-schemas";
import type { FaultDetailsParams, ListFaultsParams, ListNoticesParams } from "@/types";

export const HONEYBADGER_API_BASE = "https://app.honeybadger.io/v2";
export const REQUEST_TIMEOUT_MS = 30_000;

type QueryValue = string | number | undefined;

export interface HoneybadgerClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  logger?: Logger;
}

export function sanitizeErrorBody(body: string): string {
  return body.replace(/<[^>]*>/g, "").trim().slice(0, 500);
}

export class HoneybadgerClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(
    private readonly config: Pick<AppConfig, "apiKey" | "projectId">,
    options: HoneybadgerClientOptions = {},
  ) {
    this.baseUrl = options.baseUrl ?? HONEYBADGER_API_BASE;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.log = options.logger ?? rootLogger;
  }

  async listFaults(params: ListFaultsParams, signal?: AbortSignal): Promise<Fault[]> {
    const page = await this.get(
      "/faults",
      {
        q: params.q,
        order: params.order,
        limit: params.limit,
        created_after: params.createdAfter,
        occurred_after: params.occurredAfter,
        occurred_before: params.occurredBefore,
      },
      faultsPageSchema,
      signal,
    );
    return page.results;
  }

  async getFault(faultId: string, signal?: AbortSignal): Promise<Fault> {
    return this.get(`/faults/${encodeURIComponent(faultId)}`, {}, faultSchema, signal);
  }

  async listNotices(
    faultId: string,
    params: ListNoticesParams,
    signal?: AbortSignal,
  ): Promise<Notice[]> {
    const page = await this.get(
      `/faults/${encodeURIComponent(faultId)}/notices`,
      {
        limit: params.limit,
        created_after: params.createdAfter,
        created_before: params.createdBefore,
      },
      noticesPageSchema,
      signal,
    );
    return page.results.slice(0, params.limit);
  }

  /** Fault record plus its most recent notices; a missing fault never reaches the notices call. */
  async getFaultDetails(params: FaultDetailsParams, signal?: AbortSignal): Promise<FaultDetails> {
    const fault = await this.getFault(params.faultId, signal);
    const notices = await this.listNotices(params.faultId, params, signal);
    return { fault, notices };
  }

  buildUrl(path: string, query: Record<string, QueryValue>): string {
    const url = new URL(`${this.baseUrl}/projects/${encodeURIComponent(this.config.projectId)}${path}`);
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  private authHeader(): string {
    return `Basic ${Buffer.from(`${this.config.apiKey}:`).toString("base64")}`;
  }

  private async get<S extends z.ZodTypeAny>(
    path: string,
    query: Record<string, QueryValue>,
    schema: S,
    signal?: AbortSignal,
  ): Promise<z.output<S>> {
    const url = this.buildUrl(path, query);
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onCallerAbort = () => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener("abort", onCallerAbort, { once: true });
    }

    this.log.debug(
      { action: "honeybadger_request", path, query, apiKey: `${this.config.apiKey.slice(0, 4)}...` },
      "requesting honeybadger api",
    );

    try {
      let response: Response;
      try {
        response = await fetch(url, {
          headers: {
            Authorization: this.authHeader(),
            Accept: "application/json",
          },
          signal: controller.signal,
        });
      } catch (error) {
        throw this.transportError(error, timedOut);
      }

      if (!response.ok) {
        const body = await response.text().catch(() => "");
        const detail = sanitizeErrorBody(body);
        this.log.warn(
          { action: "honeybadger_error_response", path, status: response.status },
          "honeybadger api returned an error status",
        );
        throw new HoneybadgerError(
          errorCodeForStatus(response.status),
          `Honeybadger API ${response.status}${detail ? `: ${detail}` : ""}`,
          { status: response.status, retryable: isRetryableStatus(response.status) },
        );
      }

      let raw: unknown;
      try {
        raw = await response.json();
      } catch (error) {
        if (timedOut || controller.signal.aborted) {
          throw this.transportError(error, timedOut);
        }
        throw new HoneybadgerError("DECODE_ERROR", "Honeybadger API returned invalid JSON", {
          status: response.status,
          cause: error,
        });
      }

      const parsed = schema.safeParse(raw);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
        throw new HoneybadgerError(
          "DECODE_ERROR",
          `Unexpected Honeybadger API response${where}: ${issue?.message ?? "invalid shape"}`,
          { status: response.status, cause: parsed.error },
        );
      }
      return parsed.data;
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onCallerAbort);
    }
  }

  private transportError(error: unknown, timedOut: boolean): HoneybadgerError {
    if (timedOut) {
      return new HoneybadgerError(
        "HONEYBADGER_TIMEOUT",
        `Honeybadger API request timed out after ${this.timeoutMs}ms`,
        { retryable: true, cause: error },
      );
    }
    if (error instanceof Error && error.name === "AbortError") {
      return new HoneybadgerError("REQUEST_CANCELLED", "Honeybadger API request was cancelled", {
        cause: error,
      });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new HoneybadgerError("NETWORK_ERROR", `Could not reach Honeybadger API: ${message}`, {
      retryable: true,
      cause: error,
    });
  }
}
