// packages/policy-core/src/decide.ts
import { z } from "zod";
import type { PolicyRegistry } from "./registry";

/** Paths anyone may call: liveness and capability discovery. */
export const DISCOVERY_PATHS: readonly string[] = Object.freeze(["/health", "/tools", "/identity"]);

export const DECISION_REASONS = [
  "discovery_path",
  "unknown_caller",
  "target_not_permitted",
  "allowed",
] as const;

export type DecisionReason = (typeof DECISION_REASONS)[number];

export const authorizationRequestSchema = z.object({
  // empty when the caller sent no identity; decide() denies it
  caller_identity: z.string().max(128),
  target_identity: z.string().min(1).max(128),
  path: z.string().min(1).max(2048),
});

export const decisionSchema = z.object({
  allow: z.boolean(),
  reason: z.enum(DECISION_REASONS),
});

export type AuthorizationRequest = z.infer<typeof authorizationRequestSchema>;
export type Decision = z.infer<typeof decisionSchema>;

/**
 * "/Health/?x=1" -> "/health". Query, fragment, repeated and trailing
 * slashes are dropped; Express routes case-insensitively, so we match that.
 */
export function normalizePath(path: string): string {
  const bare = path.split(/[?#]/, 1)[0] ?? "";
  const collapsed = `/${bare}`.replace(/\/{2,}/g, "/").toLowerCase();
  return collapsed.length > 1 ? collapsed.replace(/\/$/, "") : collapsed;
}

export function isDiscoveryPath(path: string): boolean {
  return DISCOVERY_PATHS.includes(normalizePath(path));
}

/**
 * Default-deny decision. Pure: same registry + request, same answer.
 */
export function decide(registry: PolicyRegistry, req: AuthorizationRequest): Decision {
  if (isDiscoveryPath(req.path)) {
    return { allow: true, reason: "discovery_path" };
  }
  if (!req.caller_identity || !registry.get(req.caller_identity)) {
    return { allow: false, reason: "unknown_caller" };
  }
  if (!registry.permits(req.caller_identity, req.target_identity)) {
    return { allow: false, reason: "target_not_permitted" };
  }
  return { allow: true, reason: "allowed" };
}
