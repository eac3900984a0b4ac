import { describe, it, expect, vi } from "vitest";

import {
  buildRequestBody,
  SuppliesApiClient,
  type FetchFn,
} from "../../../src/api/client.js";
import { ProtocolError, TransientRemoteError } from "../../../src/errors.js";

import type { QueryAxis, SyncWindow } from "../../../src/types/index.js";

vi.mock("../../../src/logger.js", () => ({
  apiLogger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const API_URL = "https://supplies.example.test/api/v1/supplies";
const WINDOW: SyncWindow = {
  start: "2026-10-18T00:00:00+03:00",
  end: "2026-10-19T12:30:45+03:00",
};
const CREATE: QueryAxis = { kind: "name", name: "createDate" };

interface RecordedCall {
  url: string;
  init?: RequestInit;
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function rateLimited(): Response {
  return new Response("Too Many Requests", { status: 429 });
}

/**
 * fetch stand-in that replays responses in order
 */
function queuedFetch(responses: Response[]): {
  fetchFn: FetchFn;
  calls: RecordedCall[];
} {
  const calls: RecordedCall[] = [];
  const fetchFn: FetchFn = (input, init) => {
    calls.push({ url: input.toString(), init });
    const next = responses.shift();
    if (next === undefined) {
      return Promise.reject(new Error("unexpected request"));
    }
    return Promise.resolve(next);
  };
  return { fetchFn, calls };
}

function createClient(responses: Response[]) {
  const { fetchFn, calls } = queuedFetch(responses);
  const sleep = vi.fn((_ms: number) => Promise.resolve());
  const client = new SuppliesApiClient({
    apiUrl: API_URL,
    apiToken: "test-token",
    fetch: fetchFn,
    sleep,
  });
  return { client, calls, sleep };
}

describe("api/client", () => {
  describe("buildRequestBody", () => {
    it("should put the axis name in dates[].Type", () => {
      expect(buildRequestBody(WINDOW, [1, 2], CREATE)).toEqual({
        dates: [
          {
            start: "2026-10-18T00:00:00+03:00",
            end: "2026-10-19T12:30:45+03:00",
            Type: "createDate",
          },
        ],
        statusIDs: [1, 2],
      });
    });

    it("should send legacy axes as integers", () => {
      const body = buildRequestBody(WINDOW, [1], {
        kind: "legacyCode",
        code: 4,
        name: "updatedDate",
      });
      expect(body.dates[0]?.Type).toBe(4);
    });
  });

  describe("SuppliesApiClient.fetchPage", () => {
    it("should POST the filter with limit and offset query parameters", async () => {
      const { client, calls } = createClient([jsonResponse([])]);

      await client.fetchPage(2000, 1000, WINDOW, [1, 2, 3], CREATE);

      expect(calls).toHaveLength(1);
      expect(calls[0]?.url).toBe(`${API_URL}?limit=1000&offset=2000`);
      expect(calls[0]?.init?.method).toBe("POST");

      const headers = new Headers(calls[0]?.init?.headers);
      expect(headers.get("Authorization")).toBe("test-token");
      expect(headers.get("Content-Type")).toBe("application/json");

      expect(JSON.parse(String(calls[0]?.init?.body))).toEqual({
        dates: [
          {
            start: "2026-10-18T00:00:00+03:00",
            end: "2026-10-19T12:30:45+03:00",
            Type: "createDate",
          },
        ],
        statusIDs: [1, 2, 3],
      });
      expect(calls[0]?.init?.signal).toBeInstanceOf(AbortSignal);
    });

    it("should return the records of a 200 response", async () => {
      const records = [
        { supplyID: 1, statusID: 2, extraField: "kept by the API" },
        { supplyID: null, preorderID: 5, phone: null },
      ];
      const { client } = createClient([jsonResponse(records)]);

      const page = await client.fetchPage(0, 1000, WINDOW, [1], CREATE);

      expect(page).toEqual(records);
      expect(client.requestCount).toBe(1);
      expect(client.attemptCount).toBe(1);
    });

    it("should retry 429 responses on the backoff schedule", async () => {
      const { client, calls, sleep } = createClient([
        rateLimited(),
        rateLimited(),
        jsonResponse([{ supplyID: 77 }]),
      ]);

      const page = await client.fetchPage(0, 1000, WINDOW, [1], CREATE);

      expect(page).toEqual([{ supplyID: 77 }]);
      expect(calls).toHaveLength(3);
      expect(sleep.mock.calls).toEqual([[2000], [5000]]);
      expect(client.requestCount).toBe(1);
      expect(client.attemptCount).toBe(3);
    });

    it("should give up once the schedule is exhausted", async () => {
      const { client, calls } = createClient([
        rateLimited(),
        rateLimited(),
        rateLimited(),
        rateLimited(),
      ]);

      const result = client.fetchPage(0, 1000, WINDOW, [1], CREATE);

      await expect(result).rejects.toBeInstanceOf(TransientRemoteError);
      await expect(result).rejects.toThrow(
        "WB API 429: rate limited after 3 attempts"
      );
      expect(calls).toHaveLength(3);
      expect(client.requestCount).toBe(1);
      expect(client.attemptCount).toBe(3);
    });

    it("should fail immediately on other error statuses", async () => {
      const { client, calls, sleep } = createClient([
        new Response('{"title":"unauthorized"}', { status: 401 }),
      ]);

      const result = client.fetchPage(0, 1000, WINDOW, [1], CREATE);

      await expect(result).rejects.toBeInstanceOf(ProtocolError);
      await expect(result).rejects.toThrow(
        'WB API 401: {"title":"unauthorized"}'
      );
      expect(calls).toHaveLength(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it("should not retry a server error that follows a 429", async () => {
      const { client, calls } = createClient([
        rateLimited(),
        new Response("boom", { status: 500 }),
        jsonResponse([]),
      ]);

      await expect(
        client.fetchPage(0, 1000, WINDOW, [1], CREATE)
      ).rejects.toThrow("WB API 500: boom");
      expect(calls).toHaveLength(2);
    });

    it("should reject a 200 body that is not an array", async () => {
      const { client } = createClient([
        jsonResponse({ error: true, errorText: "bad filter" }),
      ]);

      const result = client.fetchPage(0, 1000, WINDOW, [1], CREATE);

      await expect(result).rejects.toBeInstanceOf(ProtocolError);
      await expect(result).rejects.toThrow(/^Unexpected WB response/);
    });

    it("should reject records with unexpected field types", async () => {
      const { client } = createClient([jsonResponse([{ statusID: "done" }])]);

      await expect(
        client.fetchPage(0, 1000, WINDOW, [1], CREATE)
      ).rejects.toBeInstanceOf(ProtocolError);
    });

    it("should reject a body that is not JSON", async () => {
      const { client } = createClient([
        new Response("<html>gateway</html>", { status: 200 }),
      ]);

      await expect(
        client.fetchPage(0, 1000, WINDOW, [1], CREATE)
      ).rejects.toThrow("Unexpected WB response (not JSON): <html>gateway</html>");
    });
  });

  it("should refuse an empty backoff schedule", () => {
    expect(
      () =>
        new SuppliesApiClient({
          apiUrl: API_URL,
          apiToken: "test-token",
          backoffMs: [],
        })
    ).toThrow(RangeError);
  });
});
