// packages/audit/src/audit.ts

import type { RequestHandler } from "express";
import { getHopContext, type AuthzOutcome, type HopContext } from "@hopguard/request-context";

export interface AuditConfig {
  serviceName?: string;
  environment?: string;
}

/**
 * One record per enforced call, allowed or not.
 */
export interface DecisionRecord {
  ts: string;
  kind: "hop.decision";
  serviceName?: string;
  environment?: string;

  request_id: string;
  caller: string;
  on_behalf_of?: string;
  /** The component that enforced the call. */
  target: string;
  /** What the caller says it meant to reach (x-target-id), audit only. */
  intended_target?: string;
  method: string;
  path: string;
  outcome: AuthzOutcome;
  reason: string;
  latency_ms: number;
}

/**
 * One event per finished HTTP response.
 */
export interface AccessEvent {
  ts: string;
  kind: "hop.request";
  serviceName?: string;
  environment?: string;
  requestId?: string;

  http: {
    method: string;
    path: string;
    status: number;
    latencyMs: number;
  };

  /** Request context snapshot (identity, decision, routing). */
  context?: Pick<HopContext, "hop" | "authz" | "routing">;
}

export type AuditEvent = DecisionRecord | AccessEvent;

export type AuditSink = (event: AuditEvent) => void;

/**
 * Default sink: one `[audit]` JSON line per event.
 */
export function createConsoleSink(config: AuditConfig = {}): AuditSink {
  const defaultServiceName = config.serviceName ?? "hopguard";
  const defaultEnv = config.environment ?? process.env.NODE_ENV ?? "dev";

  return (event) => {
    const enriched: AuditEvent = {
      ...event,
      serviceName: event.serviceName ?? defaultServiceName,
      environment: event.environment ?? defaultEnv,
    };
    console.log("[audit]", JSON.stringify(enriched));
  };
}

/** Send to a sink; a throwing sink is logged and otherwise ignored. */
export function safeEmit(sink: AuditSink, event: AuditEvent): void {
  try {
    sink(event);
  } catch (err) {
    console.error("[audit:sink_error]", err instanceof Error ? err.message : String(err));
  }
}

/**
 * Emits one AccessEvent when a response finishes.
 *
 * The hop context is captured when the middleware runs: `finish` fires
 * outside the request's async chain.
 */
export function accessLogMiddleware(sink: AuditSink): RequestHandler {
  return (req, res, next) => {
    const startedAt = Date.now();
    const ctx = getHopContext();

    res.on("finish", () => {
      const event: AccessEvent = {
        ts: new Date().toISOString(),
        kind: "hop.request",
        requestId: ctx?.request.requestId ?? req.get("x-request-id") ?? undefined,
        http: {
          method: req.method,
          path: req.path,
          status: res.statusCode,
          latencyMs: Date.now() - startedAt,
        },
        context: ctx ? { hop: ctx.hop, authz: ctx.authz, routing: ctx.routing } : undefined,
      };
      safeEmit(sink, event);
    });

    next();
  };
}
