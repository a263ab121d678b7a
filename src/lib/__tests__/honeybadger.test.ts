import { describe, it, expect, vi, beforeEach } from "vitest";
import pino from "pino";
import { HoneybadgerClient, sanitizeErrorBody } from "@/lib/honeybadger";
import { HoneybadgerError } from "@/lib/errors";
import {
  API_BASE,
  TEST_CONFIG,
  hangingFetch,
  jsonResponse,
  makeFault,
  makeNotice,
  requestedUrl,
} from "@/test/fixtures";

const silent = pino({ level: "silent" });

function createClient(timeoutMs?: number): HoneybadgerClient {
  return new HoneybadgerClient(TEST_CONFIG, { logger: silent, timeoutMs });
}

async function captureError(promise: Promise<unknown>): Promise<HoneybadgerError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof HoneybadgerError) return error;
    throw error;
  }
  throw new Error("expected promise to reject");
}

beforeEach(() => {
  vi.restoreAllMocks();
});

describe("sanitizeErrorBody", () => {
  it("strips html tags and trims", () => {
    expect(sanitizeErrorBody("<html><body>Bad gateway</body></html>\n")).toBe("Bad gateway");
  });

  it("truncates to 500 characters", () => {
    expect(sanitizeErrorBody("x".repeat(800))).toHaveLength(500);
  });
});

describe("HoneybadgerClient.buildUrl", () => {
  it("skips undefined query values", () => {
    const url = createClient().buildUrl("/faults", { q: undefined, limit: 3 });
    expect(url).toBe(`${API_BASE}/faults?limit=3`);
  });
});

describe("HoneybadgerClient.listFaults", () => {
  it("requests the project faults endpoint with query parameters", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(jsonResponse({ results: [] }));

    await createClient().listFaults({ q: "RuntimeError", order: "recent", limit: 10 });

    expect(fetch).toHaveBeenCalledTimes(1);
    const url = requestedUrl(vi.mocked(fetch).mock.calls[0]);
    expect(`${url.origin}${url.pathname}`).toBe(`${API_BASE}/faults`);
    expect(url.searchParams.get("q")).toBe("RuntimeError");
    expect(url.searchParams.get("order")).toBe("recent");
    expect(url.searchParams.get("limit")).toBe("10");
    expect(url.searchParams.has("created_after")).toBe(false);
  });

  it("sends basic auth with the api key as user name", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(jsonResponse({ results: [] }));

    await createClient().listFaults({ order: "recent", limit: 10 });

    const init = vi.mocked(fetch).mock.calls[0][1];
    expect(init?.headers).toEqual({
      Authorization: "Basic dGVzdC1rZXk6",
      Accept: "application/json",
    });
  });

  it("passes timestamp filters as snake_case query parameters", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(jsonResponse({ results: [] }));

    await createClient().listFaults({
      order: "frequent",
      limit: 5,
      createdAfter: 1700000000,
      occurredAfter: 1700000100,
      occurredBefore: 1700000200,
    });

    const url = requestedUrl(vi.mocked(fetch).mock.calls[0]);
    expect(url.searchParams.get("created_after")).toBe("1700000000");
    expect(url.searchParams.get("occurred_after")).toBe("1700000100");
    expect(url.searchParams.get("occurred_before")).toBe("1700000200");
  });

  it("returns the decoded faults in upstream order", async () => {
    const faults = [makeFault({ id: 3 }), makeFault({ id: 1 }), makeFault({ id: 2 })];
    vi.spyOn(globalThis, "fetch").mockResolvedValue(
      jsonResponse({ results: faults, links: { self: "x" } }),
    );

    const result = await createClient().listFaults({ order: "recent", limit: 10 });

    expect(result).toEqual(faults);
  });

  it("returns an empty array when there are no faults", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(jsonResponse({ results: [] }));

    expect(await createClient().listFaults({ order: "recent", limit: 10 })).toEqual([]);
  });

  it("fills defaults for missing optional fields and drops unknown ones", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(
      jsonResponse({ results: [{ id: 7, klass: "NoMethodError", extra: "ignored" }] }),
    );

    const [fault] = await createClient().listFaults({ order: "recent", limit: 10 });

    expect(fault).toEqual({
      id: 7,
      klass: "NoMethodError",
      message: null,
      component: null,
      action: null,
      environment: null,
      resolved: false,
      ignored: false,
      last_notice_at: null,
      notices_count: 0,
      comments_count: 0,
      tags: [],
      assignee: null,
    });
  });

  it("throws HONEYBADGER_API_ERROR with status on 500", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(
      new Response("<html><body>Internal error</body></html>", { status: 500 }),
    );

    const error = await captureError(createClient().listFaults({ order: "recent", limit: 10 }));

    expect(error.code).toBe("HONEYBADGER_API_ERROR");
    expect(error.status).toBe(500);
    expect(error.retryable).toBe(true);
    expect(error.message).toBe("Honeybadger API 500: Internal error");
  });

  it("maps 401 to HONEYBADGER_AUTH_ERROR", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(new Response("", { status: 401 }));

    const error = await captureError(createClient().listFaults({ order: "recent", limit: 10 }));

    expect(error.code).toBe("HONEYBADGER_AUTH_ERROR");
    expect(error.message).toBe("Honeybadger API 401");
    expect(error.retryable).toBe(false);
  });

  it("maps 429 to a retryable HONEYBADGER_RATE_LIMIT", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(new Response("slow down", { status: 429 }));

    const error = await captureError(createClient().listFaults({ order: "recent", limit: 10 }));

    expect(error.code).toBe("HONEYBADGER_RATE_LIMIT");
    expect(error.retryable).toBe(true);
  });

  it("throws DECODE_ERROR on invalid JSON", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(new Response("not json", { status: 200 }));

    const error = await captureError(createClient().listFaults({ order: "recent", limit: 10 }));

    expect(error.code).toBe("DECODE_ERROR");
    expect(error.message).toBe("Honeybadger API returned invalid JSON");
  });

  it("throws DECODE_ERROR naming the offending field on a schema mismatch", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(jsonResponse({ results: [{ id: 1 }] }));

    const error = await captureError(createClient().listFaults({ order: "recent", limit: 10 }));

    expect(error.code).toBe("DECODE_ERROR");
    expect(error.message).toBe("Unexpected Honeybadger API response at results.0.klass: Required");
  });

  it("throws a retryable NETWORK_ERROR when fetch rejects", async () => {
    vi.spyOn(globalThis, "fetch").mockRejectedValue(new TypeError("fetch failed"));

    const error = await captureError(createClient().listFaults({ order: "recent", limit: 10 }));

    expect(error.code).toBe("NETWORK_ERROR");
    expect(error.message).toBe("Could not reach Honeybadger API: fetch failed");
    expect(error.retryable).toBe(true);
  });

  it("throws a retryable HONEYBADGER_TIMEOUT when the request stalls", async () => {
    vi.spyOn(globalThis, "fetch").mockImplementation(hangingFetch);

    const error = await captureError(createClient(10).listFaults({ order: "recent", limit: 10 }));

    expect(error.code).toBe("HONEYBADGER_TIMEOUT");
    expect(error.message).toBe("Honeybadger API request timed out after 10ms");
    expect(error.retryable).toBe(true);
  });

  it("throws REQUEST_CANCELLED when the caller signal is already aborted", async () => {
    vi.spyOn(globalThis, "fetch").mockImplementation(hangingFetch);
    const controller = new AbortController();
    controller.abort();

    const error = await captureError(
      createClient().listFaults({ order: "recent", limit: 10 }, controller.signal),
    );

    expect(error.code).toBe("REQUEST_CANCELLED");
  });

  it("aborts the in-flight request when the caller signal fires", async () => {
    vi.spyOn(globalThis, "fetch").mockImplementation(hangingFetch);
    const controller = new AbortController();

    const pending = createClient().listFaults({ order: "recent", limit: 10 }, controller.signal);
    controller.abort();
    const error = await captureError(pending);

    expect(error.code).toBe("REQUEST_CANCELLED");
  });
});

describe("HoneybadgerClient.getFaultDetails", () => {
  it("merges the fault with at most limit notices", async () => {
    const fault = makeFault({ id: "abc123" });
    const notices = Array.from({ length: 8 }, (_, i) => makeNotice(i));
    vi.spyOn(globalThis, "fetch")
      .mockResolvedValueOnce(jsonResponse(fault))
      .mockResolvedValueOnce(jsonResponse({ results: notices }));

    const details = await createClient().getFaultDetails({ faultId: "abc123", limit: 5 });

    expect(details.fault).toEqual(fault);
    expect(details.notices).toEqual(notices.slice(0, 5));
    expect(fetch).toHaveBeenCalledTimes(2);
    expect(String(vi.mocked(fetch).mock.calls[0][0])).toBe(`${API_BASE}/faults/abc123`);
    expect(String(vi.mocked(fetch).mock.calls[1][0])).toBe(`${API_BASE}/faults/abc123/notices?limit=5`);
  });

  it("passes notice timestamp filters", async () => {
    vi.spyOn(globalThis, "fetch")
      .mockResolvedValueOnce(jsonResponse(makeFault()))
      .mockResolvedValueOnce(jsonResponse({ results: [] }));

    await createClient().getFaultDetails({
      faultId: "1001",
      limit: 3,
      createdAfter: 1700000000,
      createdBefore: 1700009999,
    });

    const url = requestedUrl(vi.mocked(fetch).mock.calls[1]);
    expect(url.searchParams.get("limit")).toBe("3");
    expect(url.searchParams.get("created_after")).toBe("1700000000");
    expect(url.searchParams.get("created_before")).toBe("1700009999");
  });

  it("encodes the fault id in the path", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(jsonResponse(makeFault()));

    await createClient().getFault("a/b");

    expect(String(vi.mocked(fetch).mock.calls[0][0])).toBe(`${API_BASE}/faults/a%2Fb`);
  });

  it("throws NOT_FOUND for a missing fault without requesting notices", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(
      jsonResponse({ errors: "Not found" }, 404),
    );

    const error = await captureError(
      createClient().getFaultDetails({ faultId: "missing", limit: 5 }),
    );

    expect(error.code).toBe("NOT_FOUND");
    expect(error.status).toBe(404);
    expect(error.message).toBe('Honeybadger API 404: {"errors":"Not found"}');
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it("fails the whole call when the notices request fails", async () => {
    vi.spyOn(globalThis, "fetch")
      .mockResolvedValueOnce(jsonResponse(makeFault()))
      .mockResolvedValueOnce(new Response("", { status: 503 }));

    const error = await captureError(
      createClient().getFaultDetails({ faultId: "1001", limit: 5 }),
    );

    expect(error.code).toBe("HONEYBADGER_API_ERROR");
    expect(error.status).toBe(503);
  });
});
