// packages/enforcement/src/hop-client.ts
import { UpstreamTimeoutError, UpstreamUnavailableError } from "@hopguard/errors";
import { currentRequestId } from "@hopguard/request-context";
import { buildHopHeaders } from "./headers";

export interface HopClientOptions {
  /** Identity this component presents as `x-caller-id`. */
  identity: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export interface HopCallOptions {
  /** Identity of the component being called, sent as `x-target-id`. */
  target?: string;
  onBehalfOf?: string;
  headers?: Record<string, string>;
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface HopResponse {
  status: number;
  headers: Headers;
  body: unknown;
}

export type HopMethod = "GET" | "POST" | "DELETE";

export interface HopClient {
  readonly identity: string;
  request(method: HopMethod, url: string, body?: unknown, call?: HopCallOptions): Promise<HopResponse>;
  getJson(url: string, call?: HopCallOptions): Promise<HopResponse>;
  postJson(url: string, body: unknown, call?: HopCallOptions): Promise<HopResponse>;
}

function parseBody(text: string, url: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    throw new UpstreamUnavailableError(`Non-JSON response from ${url}`);
  }
}

/**
 * Outbound calls carrying this component's identity and the current
 * request id. Every call has a timeout; aborts surface as
 * UpstreamTimeoutError, network failures as UpstreamUnavailableError.
 * Non-2xx answers are returned, not thrown. No retries.
 */
export function createHopClient(opts: HopClientOptions): HopClient {
  const doFetch = opts.fetchImpl ?? fetch;
  const defaultTimeout = opts.timeoutMs ?? 5000;

  async function send(
    method: HopMethod,
    url: string,
    body: unknown,
    call: HopCallOptions = {},
  ): Promise<HopResponse> {
    // an abort event that already fired will not fire again
    if (call.signal?.aborted) throw new UpstreamTimeoutError(`Call to ${url} aborted`);

    const ctrl = new AbortController();
    const timeoutMs = call.timeoutMs ?? defaultTimeout;
    let timedOut = false;
    const t = setTimeout(() => {
      timedOut = true;
      ctrl.abort();
    }, timeoutMs);
    const onOuterAbort = () => ctrl.abort();
    call.signal?.addEventListener("abort", onOuterAbort, { once: true });

    const headers: Record<string, string> = {
      accept: "application/json",
      ...buildHopHeaders({
        caller: opts.identity,
        onBehalfOf: call.onBehalfOf,
        target: call.target,
        requestId: currentRequestId(),
      }),
      ...call.headers,
    };
    if (method === "POST") headers["content-type"] = "application/json";

    try {
      const r = await doFetch(url, {
        method,
        headers,
        body: method === "POST" ? JSON.stringify(body ?? {}) : undefined,
        signal: ctrl.signal,
      });
      const text = await r.text();
      return { status: r.status, headers: r.headers, body: parseBody(text, url) };
    } catch (e) {
      if (e instanceof UpstreamUnavailableError) throw e;
      if (ctrl.signal.aborted) {
        throw new UpstreamTimeoutError(
          timedOut ? `Timed out after ${timeoutMs}ms calling ${url}` : `Call to ${url} aborted`,
        );
      }
      throw new UpstreamUnavailableError(
        `Could not reach ${url}: ${e instanceof Error ? e.message : String(e)}`,
      );
    } finally {
      clearTimeout(t);
      call.signal?.removeEventListener("abort", onOuterAbort);
    }
  }

  return {
    identity: opts.identity,
    request: send,
    getJson: (url, c) => send("GET", url, undefined, c),
    postJson: (url, body, c) => send("POST", url, body, c),
  };
}
