// packages/tool-gateway/src/backend.ts

/**
 * Record-of-truth store behind one gateway. The gateway never retries and
 * never deduplicates; every tool call is passed straight through.
 */
export interface RecordBackend {
  search(criteria: Record<string, unknown>): Promise<unknown[]>;
  book(args: Record<string, unknown>): Promise<unknown>;
  get(id: string): Promise<unknown>;
  cancel(id: string): Promise<unknown>;
  listLocations(filter?: Record<string, string>): Promise<unknown[]>;
  details(id: string): Promise<unknown>;
}

/**
 * Business failure from a backend (sold out, unknown booking...). Transport
 * failures use UpstreamUnavailableError / UpstreamTimeoutError instead.
 */
export class BackendError extends Error {
  readonly status?: number;
  readonly body?: unknown;

  constructor(message: string, opts: { status?: number; body?: unknown } = {}) {
    super(message);
    this.name = "BackendError";
    this.status = opts.status;
    this.body = opts.body;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

function pickMessage(body: unknown): string | undefined {
  if (typeof body === "string") return body || undefined;
  if (!body || typeof body !== "object") return undefined;
  for (const key of ["detail", "error", "message"]) {
    const v: unknown = Reflect.get(body, key);
    if (typeof v === "string" && v) return v;
    if (v && typeof v === "object") {
      const nested = pickMessage(v);
      if (nested) return nested;
    }
  }
  return undefined;
}

/** One string for any backend business error, whatever shape it came in. */
export function normalizeBackendError(err: BackendError): string {
  const fromBody = pickMessage(err.body);
  const text = (fromBody ?? err.message).trim() || "backend_error";
  return text.length > 200 ? `${text.slice(0, 200)}...` : text;
}
