/** Shared test data for Honeybadger API responses */

export const TEST_CONFIG = { apiKey: "test-key", projectId: "12345" } as const;

export const API_BASE = "https://app.honeybadger.io/v2/projects/12345";

export function makeFault(overrides: Record<string, unknown> = {}) {
  return {
    id: 1001,
    project_id: 12345,
    klass: "RuntimeError",
    message: "something broke",
    component: "orders",
    action: "create",
    environment: "production",
    resolved: false,
    ignored: false,
    created_at: "2026-01-05T10:00:00Z",
    last_notice_at: "2026-01-06T09:00:00Z",
    notices_count: 8,
    comments_count: 0,
    url: "https://app.honeybadger.io/projects/12345/faults/1001",
    tags: ["checkout"],
    assignee: null,
    ...overrides,
  };
}

export function makeNotice(index: number, overrides: Record<string, unknown> = {}) {
  return {
    id: `notice-${index}`,
    fault_id: 1001,
    created_at: `2026-01-06T09:0${index % 10}:00Z`,
    message: "RuntimeError: something broke",
    url: `https://app.honeybadger.io/projects/12345/faults/1001/notice-${index}`,
    environment_name: "production",
    environment: { hostname: "web-1" },
    request: { url: "https://shop.example.com/orders", params: {} },
    web_environment: {},
    backtrace: [{ number: "42", file: "[PROJECT_ROOT]/app/models/order.rb", method: "save!" }],
    ...overrides,
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/** A fetch that never settles until its signal aborts */
export function hangingFetch(_input: string | URL | Request, init?: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    const signal = init?.signal;
    const abort = () => {
      const error = new Error("This operation was aborted");
      error.name = "AbortError";
      reject(error);
    };
    if (signal?.aborted) {
      abort();
      return;
    }
    signal?.addEventListener("abort", abort);
  });
}

export function requestedUrl(call: unknown[]): URL {
  return new URL(String(call[0]));
}
