import { Agent, errors, request } from "undici";
import type { LookupClient } from "../../ports/LookupClient";
import type { Identifier } from "../../core/scan/scan.types";
import { LookupRequestError } from "../../core/scan/lookup.errors";

export type LookupHttpClientOptions = {
  idParam: string;
  connectTimeoutMs: number;
  readTimeoutMs: number;
  headers?: Record<string, string>;
  randomFn?: () => number;
};

export const defaultLookupHeaders: Record<string, string> = {
  accept: "application/json, text/plain, */*",
  "content-type": "application/x-www-form-urlencoded"
};

const isTimeoutError = (err: unknown): boolean =>
  err instanceof errors.ConnectTimeoutError ||
  err instanceof errors.HeadersTimeoutError ||
  err instanceof errors.BodyTimeoutError;

const describeError = (err: unknown): string => (err instanceof Error ? err.message : String(err));

const parseRetryAfterMs = (value: string | string[] | undefined): number | undefined => {
  const raw = Array.isArray(value) ? value[0] : value;
  if (raw == null || !/^\d+$/.test(raw.trim())) return undefined;
  return Number(raw.trim()) * 1000;
};

/**
 * POSTs one form-encoded lookup per identifier through a pooled undici agent.
 * The connect timeout bounds the TCP/TLS handshake; the read timeout bounds both the wait for
 * response headers and every gap while the body streams in.
 */
export class LookupHttpClient implements LookupClient {
  private readonly agent: Agent;

  constructor(
    private readonly endpointUrl: string,
    private readonly options: LookupHttpClientOptions
  ) {
    this.agent = new Agent({
      connect: { timeout: options.connectTimeoutMs },
      headersTimeout: options.readTimeoutMs,
      bodyTimeout: options.readTimeoutMs
    });
  }

  async lookup(identifier: Identifier): Promise<unknown> {
    const random = this.options.randomFn ?? Math.random;
    const body = new URLSearchParams({
      r: String(random()),
      [this.options.idParam]: String(identifier)
    }).toString();

    const fail = (kind: "timeout" | "network", err: unknown) =>
      new LookupRequestError({
        kind,
        identifier,
        message: kind === "timeout"
          ? `Lookup request timed out for id=${identifier}: ${describeError(err)}`
          : `Lookup request failed for id=${identifier}: ${describeError(err)}`,
        cause: err
      });

    let response: Awaited<ReturnType<typeof request>>;
    try {
      response = await request(this.endpointUrl, {
        method: "POST",
        headers: { ...defaultLookupHeaders, ...this.options.headers },
        body,
        dispatcher: this.agent
      });
    } catch (err) {
      throw fail(isTimeoutError(err) ? "timeout" : "network", err);
    }

    const { statusCode, headers } = response;
    if (statusCode < 200 || statusCode >= 300) {
      await response.body.dump().catch(() => undefined);
      throw new LookupRequestError({
        kind: "http_status",
        identifier,
        status: statusCode,
        retryDelayMs: statusCode === 429 ? parseRetryAfterMs(headers["retry-after"]) : undefined,
        message: `Lookup request failed for id=${identifier}: HTTP ${statusCode}`
      });
    }

    let text: string;
    try {
      text = await response.body.text();
    } catch (err) {
      throw fail(isTimeoutError(err) ? "timeout" : "network", err);
    }

    try {
      const payload: unknown = JSON.parse(text);
      return payload;
    } catch (err) {
      throw new LookupRequestError({
        kind: "invalid_body",
        identifier,
        status: statusCode,
        message: `Lookup response for id=${identifier} is not valid JSON`,
        cause: err
      });
    }
  }

  async close(): Promise<void> {
    await this.agent.close();
  }
}
