// packages/enforcement/src/headers.ts
import type { Request } from "express";

export const HOP_HEADERS = {
  caller: "x-caller-id",
  onBehalfOf: "x-on-behalf-of",
  target: "x-target-id",
  requestId: "x-request-id",
} as const;

const IDENTITY_PATTERN = /^[A-Za-z0-9_.:@-]{1,128}$/;

export interface HopHeaderValues {
  caller: string;
  onBehalfOf?: string;
  target?: string;
  requestId?: string;
}

export function buildHopHeaders(v: HopHeaderValues): Record<string, string> {
  const out: Record<string, string> = { [HOP_HEADERS.caller]: v.caller };
  if (v.onBehalfOf) out[HOP_HEADERS.onBehalfOf] = v.onBehalfOf;
  if (v.target) out[HOP_HEADERS.target] = v.target;
  if (v.requestId) out[HOP_HEADERS.requestId] = v.requestId;
  return out;
}

function identityHeader(req: Request, name: string): string | undefined {
  const raw = req.get(name)?.trim();
  return raw && IDENTITY_PATTERN.test(raw) ? raw : undefined;
}

/**
 * Identity claims a caller attached to the request. A missing or malformed
 * caller comes back as "" so the decision point treats it as unknown.
 */
export function readHopHeaders(req: Request): {
  caller: string;
  onBehalfOf?: string;
  intendedTarget?: string;
} {
  return {
    caller: identityHeader(req, HOP_HEADERS.caller) ?? "",
    onBehalfOf: identityHeader(req, HOP_HEADERS.onBehalfOf),
    intendedTarget: identityHeader(req, HOP_HEADERS.target),
  };
}
