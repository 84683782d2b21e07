// packages/errors/src/errors.ts

/**
 * Stable error kinds. These strings are part of the wire contract: every
 * failed response carries one of them in its `error` field.
 */
export type ErrorKind =
  | "validation_error"
  | "forbidden"
  | "decision_unavailable"
  | "upstream_unavailable"
  | "upstream_timeout"
  | "rate_limited"
  | "tool_error"
  | "internal_error";

/**
 * Base class for every error that may cross a hop boundary.
 * Carries a kind + HTTP status, nothing else is rendered to callers.
 */
export class HopError extends Error {
  readonly kind: ErrorKind;
  readonly status: number;
  readonly detail?: Record<string, unknown>;

  constructor(
    kind: ErrorKind,
    message: string,
    status: number,
    detail?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "HopError";
    this.kind = kind;
    this.status = status;
    this.detail = detail;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Malformed input or bad identifiers. Never reaches downstream calls. */
export class ValidationError extends HopError {
  constructor(message: string, detail?: Record<string, unknown>) {
    super("validation_error", message, 400, detail);
    this.name = "ValidationError";
  }
}

/** Policy denied the hop. */
export class ForbiddenError extends HopError {
  constructor(message = "Forbidden", detail?: Record<string, unknown>) {
    super("forbidden", message, 403, detail);
    this.name = "ForbiddenError";
  }
}

/** The decision point could not be reached or gave no usable answer. */
export class DecisionUnavailableError extends HopError {
  constructor(message = "Authorization decision unavailable", detail?: Record<string, unknown>) {
    super("decision_unavailable", message, 503, detail);
    this.name = "DecisionUnavailableError";
  }
}

/** A downstream agent, gateway or backend is down or answered garbage. */
export class UpstreamUnavailableError extends HopError {
  constructor(message = "Upstream unavailable", detail?: Record<string, unknown>) {
    super("upstream_unavailable", message, 502, detail);
    this.name = "UpstreamUnavailableError";
  }
}

/** A downstream call exceeded its timeout. */
export class UpstreamTimeoutError extends HopError {
  constructor(message = "Upstream timed out", detail?: Record<string, unknown>) {
    super("upstream_timeout", message, 504, detail);
    this.name = "UpstreamTimeoutError";
  }
}

/** The callee is up but refused the call for exceeding its rate limit. */
export class RateLimitedError extends HopError {
  constructor(message = "Too many requests", detail?: Record<string, unknown>) {
    super("rate_limited", message, 429, detail);
    this.name = "RateLimitedError";
  }
}

/**
 * Business error reported by a backend (no inventory, unknown booking...).
 * Successful at the protocol level, so status stays 200.
 */
export class ToolError extends HopError {
  readonly tool: string;

  constructor(tool: string, message: string) {
    super("tool_error", message, 200, { tool });
    this.name = "ToolError";
    this.tool = tool;
  }
}

export function isHopError(err: unknown): err is HopError {
  return err instanceof HopError;
}

/** True for the two kinds that mean "the hop itself failed". */
export function isTransportError(err: unknown): err is UpstreamUnavailableError | UpstreamTimeoutError {
  return err instanceof UpstreamUnavailableError || err instanceof UpstreamTimeoutError;
}

/**
 * What an end user is told for each kind. Hop messages can name URLs and
 * component identities; those go to the log, these go to the user.
 */
export const USER_MESSAGES: Readonly<Record<ErrorKind, string>> = {
  validation_error: "The request was not valid.",
  forbidden: "This request is not permitted.",
  decision_unavailable: "Authorization is unavailable right now. Please try again later.",
  upstream_unavailable: "A travel service is unavailable right now. Please try again later.",
  upstream_timeout: "A travel service took too long to answer. Please try again.",
  rate_limited: "Too many requests. Please wait a moment and try again.",
  tool_error: "The travel service could not complete that request.",
  internal_error: "Internal error",
};

export function userMessage(kind: ErrorKind): string {
  return USER_MESSAGES[kind];
}

export interface ErrorBody {
  success: false;
  error: ErrorKind;
  message: string;
}

/**
 * Render any thrown value as the structured failure body.
 * Unknown errors collapse to a generic internal_error.
 */
export function errorBody(err: unknown): ErrorBody {
  if (isHopError(err)) {
    return { success: false, error: err.kind, message: err.message };
  }
  return { success: false, error: "internal_error", message: "Internal error" };
}

export function statusOf(err: unknown): number {
  return isHopError(err) ? err.status : 500;
}

/**
 * Rebuild a typed error from a failure body received from another hop.
 * Returns undefined when the body does not look like one of ours.
 */
export function errorFromBody(body: unknown): HopError | undefined {
  if (!body || typeof body !== "object") return undefined;
  const kind = "error" in body ? body.error : undefined;
  const rawMessage = "message" in body ? body.message : undefined;
  const message = typeof rawMessage === "string" ? rawMessage : undefined;

  switch (kind) {
    case "validation_error":
      return new ValidationError(message ?? "Invalid request");
    case "forbidden":
      return new ForbiddenError(message);
    case "decision_unavailable":
      return new DecisionUnavailableError(message);
    case "upstream_unavailable":
      return new UpstreamUnavailableError(message);
    case "upstream_timeout":
      return new UpstreamTimeoutError(message);
    case "rate_limited":
      return new RateLimitedError(message);
    default:
      return undefined;
  }
}
