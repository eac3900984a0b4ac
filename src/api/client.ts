import { setTimeout as delay } from "node:timers/promises";

import { Value } from "@sinclair/typebox/value";

import { ProtocolError, TransientRemoteError } from "../errors.js";
import { apiLogger } from "../logger.js";
import { axisWireValue, describeAxis } from "../services/sync/planner.js";
import {
  SuppliesResponseSchema,
  type QueryAxis,
  type RawSupply,
  type SuppliesRequestBody,
  type SyncWindow,
} from "../types/index.js";

export const REQUEST_TIMEOUT_MS = 60_000;

/**
 * Wait before each attempt; one attempt per entry
 */
export const DEFAULT_BACKOFF_MS: readonly number[] = [0, 2000, 5000];

const HTTP_OK = 200;
const HTTP_TOO_MANY_REQUESTS = 429;

export type FetchFn = (
  input: string | URL,
  init?: RequestInit
) => Promise<Response>;

export interface SuppliesApiClientOptions {
  apiUrl: string;
  apiToken: string;
  backoffMs?: readonly number[];
  timeoutMs?: number;
  fetch?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
}

export function buildRequestBody(
  window: SyncWindow,
  statuses: readonly number[],
  axis: QueryAxis
): SuppliesRequestBody {
  return {
    dates: [
      { start: window.start, end: window.end, Type: axisWireValue(axis) },
    ],
    statusIDs: [...statuses],
  };
}

function truncate(text: string, max = 500): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

/**
 * Client for POST /api/v1/supplies
 *
 * Requests are issued one at a time. 429 responses are retried on the
 * backoff schedule; every other failure is thrown straight away.
 */
export class SuppliesApiClient {
  private readonly apiUrl: string;
  private readonly apiToken: string;
  private readonly backoffMs: readonly number[];
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly sleep: (ms: number) => Promise<void>;
  private pages = 0;
  private attempts = 0;

  constructor(options: SuppliesApiClientOptions) {
    if (options.backoffMs !== undefined && options.backoffMs.length === 0) {
      throw new RangeError("Backoff schedule needs at least one entry");
    }
    this.apiUrl = options.apiUrl;
    this.apiToken = options.apiToken;
    this.backoffMs = options.backoffMs ?? DEFAULT_BACKOFF_MS;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.fetchFn = options.fetch ?? fetch;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  /**
   * Pages requested so far; a page retried after 429 counts once
   */
  get requestCount(): number {
    return this.pages;
  }

  /**
   * HTTP attempts sent so far, 429 retries included
   */
  get attemptCount(): number {
    return this.attempts;
  }

  /**
   * Fetch one page of supplies for a single axis
   */
  async fetchPage(
    offset: number,
    limit: number,
    window: SyncWindow,
    statuses: readonly number[],
    axis: QueryAxis
  ): Promise<RawSupply[]> {
    const url = new URL(this.apiUrl);
    url.searchParams.set("limit", String(limit));
    url.searchParams.set("offset", String(offset));
    const body = JSON.stringify(buildRequestBody(window, statuses, axis));
    const axisLabel = describeAxis(axis);
    this.pages++;

    let lastStatus = HTTP_TOO_MANY_REQUESTS;
    for (const [index, wait] of this.backoffMs.entries()) {
      const attempt = index + 1;
      if (wait > 0) {
        apiLogger.debug(
          { wait, attempt, axis: axisLabel },
          "Rate limited: waiting before retry"
        );
        await this.sleep(wait);
      }

      const response = await this.send(url, body, axisLabel, offset);
      lastStatus = response.status;

      if (response.status === HTTP_OK) {
        return this.parseBody(response, axisLabel, offset);
      }

      if (response.status !== HTTP_TOO_MANY_REQUESTS) {
        const text = await response.text();
        apiLogger.error(
          { status: response.status, axis: axisLabel, offset },
          "Supplies request failed"
        );
        throw new ProtocolError(
          `WB API ${String(response.status)}: ${truncate(text)}`,
          response.status,
          text
        );
      }

      // Drain the body so the connection can be reused
      await response.text();
      apiLogger.warn(
        { attempt, attempts: this.backoffMs.length, axis: axisLabel, offset },
        "Supplies request rate limited"
      );
    }

    throw new TransientRemoteError(
      `WB API ${String(lastStatus)}: rate limited after ${String(this.backoffMs.length)} attempts`,
      lastStatus,
      this.backoffMs.length
    );
  }

  private async send(
    url: URL,
    body: string,
    axis: string,
    offset: number
  ): Promise<Response> {
    this.attempts++;
    apiLogger.debug({ url: url.toString(), axis, offset }, "Sending supplies request");

    const startTime = performance.now();
    const response = await this.fetchFn(url, {
      method: "POST",
      headers: {
        Authorization: this.apiToken,
        "Content-Type": "application/json",
      },
      body,
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    const duration = Math.round(performance.now() - startTime);

    apiLogger.debug(
      {
        axis,
        offset,
        status: response.status,
        duration: `${String(duration)}ms`,
      },
      "Received supplies response"
    );

    return response;
  }

  private async parseBody(
    response: Response,
    axis: string,
    offset: number
  ): Promise<RawSupply[]> {
    const text = await response.text();

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch {
      throw new ProtocolError(
        `Unexpected WB response (not JSON): ${truncate(text)}`,
        response.status,
        text
      );
    }

    if (!Value.Check(SuppliesResponseSchema, data)) {
      const firstError = Value.Errors(SuppliesResponseSchema, data).First();
      const where =
        firstError !== undefined
          ? ` at ${firstError.path || "/"}: ${firstError.message}`
          : "";
      throw new ProtocolError(
        `Unexpected WB response${where}: ${truncate(text)}`,
        response.status,
        text
      );
    }

    apiLogger.debug(
      { axis, offset, recordCount: data.length },
      "Parsed supplies page"
    );
    return data;
  }
}
