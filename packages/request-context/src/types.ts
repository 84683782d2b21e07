// packages/request-context/src/types.ts

/**
 * Identity metadata for one hop, as presented by the caller and
 * resolved by the enforcement point.
 */
export interface HopIdentity {
  /** Identity the caller asserted (x-caller-id). Empty when absent. */
  caller: string;

  /** Orchestrator-of-record when the caller acts on its behalf. */
  onBehalfOf?: string;

  /** Target the caller says it meant to reach (x-target-id). */
  intendedTarget?: string;

  /** Identity of the component handling this hop. */
  self: string;
}

/**
 * End-user identity verified from a bearer token at the entry hop.
 */
export interface EndUserIdentity {
  sub: string;
  issuer: string;
  email?: string;
  scopes?: string[];
  raw: Record<string, unknown>;
}

/**
 * Basic HTTP request metadata that is useful to all layers
 * (audit, rate limiting, debugging).
 */
export interface HopRequestMeta {
  /** Correlation id, carried across hops in x-request-id. */
  requestId: string;

  /** ISO timestamp of when this component received the request. */
  startedAt: string;

  method: string;
  path: string;

  ip?: string;
  userAgent?: string;
}

export type AuthzOutcome = "allow" | "deny" | "unavailable";

export interface HopAuthzMeta {
  outcome?: AuthzOutcome;
  /** Reason reported by the decision point, or the failure reason. */
  reason?: string;
}

/**
 * Routing metadata filled in by the orchestrator and agents.
 */
export interface HopRoutingMeta {
  intent?: string;
  domain?: string;
  agent?: string;
  tool?: string;
  sessionId?: string;
}

export interface HopContext {
  /** HTTP-level metadata about this request. */
  request: HopRequestMeta;

  /** Who is calling this component? Filled by the enforcement point. */
  hop?: HopIdentity;

  /** End user, when the entry hop verifies one. */
  user?: EndUserIdentity;

  authz?: HopAuthzMeta;

  routing?: HopRoutingMeta;

  extras?: Record<string, unknown>;
}
