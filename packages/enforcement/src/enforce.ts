// packages/enforcement/src/enforce.ts
import type { NextFunction, Request, RequestHandler, Response } from "express";
import { safeEmit, createConsoleSink, type AuditSink } from "@hopguard/audit";
import {
  DecisionUnavailableError,
  ForbiddenError,
  errorBody,
  type HopError,
} from "@hopguard/errors";
import { decisionSchema, type AuthorizationRequest, type Decision } from "@hopguard/policy-core";
import {
  currentRequestId,
  updateHopContext,
  type AuthzOutcome,
} from "@hopguard/request-context";
import type { DecisionClient } from "./decision-client";
import { readHopHeaders } from "./headers";

export interface EnforceOptions {
  /** This component's own identity; always the decision's target. */
  identity: string;
  client: DecisionClient;
  /** Budget for one decision. Default 2000ms. */
  timeoutMs?: number;
  sink?: AuditSink;
}

async function decideWithin(
  client: DecisionClient,
  req: AuthorizationRequest,
  timeoutMs: number,
): Promise<Decision> {
  const ctrl = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      ctrl.abort();
      reject(new DecisionUnavailableError(`No decision within ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    const answer: unknown = await Promise.race([client.decide(req, { signal: ctrl.signal }), timeout]);
    const parsed = decisionSchema.safeParse(answer);
    if (!parsed.success) throw new DecisionUnavailableError("Malformed decision");
    return parsed.data;
  } finally {
    clearTimeout(timer);
  }
}

function fullPath(req: Request) {
  return `${req.baseUrl}${req.path}`;
}

/**
 * Per-hop enforcement point. Asks the decision point whether the presented
 * caller may reach this component, then forwards (allow), answers 403
 * (deny) or 503 (no usable decision). Writes exactly one audit record per
 * call.
 */
export function enforce(opts: EnforceOptions): RequestHandler {
  const timeoutMs = opts.timeoutMs ?? 2000;
  const sink = opts.sink ?? createConsoleSink({ serviceName: opts.identity });

  const check = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const started = Date.now();
    const claimed = readHopHeaders(req);
    const path = fullPath(req);
    const authzReq: AuthorizationRequest = {
      caller_identity: claimed.caller,
      target_identity: opts.identity,
      path,
    };

    const audit = (outcome: AuthzOutcome, reason: string) => {
      safeEmit(sink, {
        ts: new Date().toISOString(),
        kind: "hop.decision",
        request_id: currentRequestId() ?? req.get("x-request-id") ?? "",
        caller: claimed.caller,
        on_behalf_of: claimed.onBehalfOf,
        target: opts.identity,
        intended_target: claimed.intendedTarget,
        method: req.method,
        path,
        outcome,
        reason,
        latency_ms: Date.now() - started,
      });
    };

    const block = (err: HopError, outcome: AuthzOutcome, reason: string) => {
      updateHopContext({ authz: { outcome, reason } });
      audit(outcome, reason);
      res.status(err.status).json(errorBody(err));
    };

    let decision: Decision;
    try {
      decision = await decideWithin(opts.client, authzReq, timeoutMs);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      console.warn("[enforce:unavailable]", { target: opts.identity, path, message });
      block(new DecisionUnavailableError(), "unavailable", "decision_unavailable");
      return;
    }

    if (!decision.allow) {
      console.warn("[enforce:deny]", {
        caller: claimed.caller || "(none)",
        target: opts.identity,
        path,
        reason: decision.reason,
      });
      block(new ForbiddenError(`Caller not permitted: ${decision.reason}`), "deny", decision.reason);
      return;
    }

    const hop = {
      caller: claimed.caller,
      onBehalfOf: claimed.onBehalfOf,
      intendedTarget: claimed.intendedTarget,
      self: opts.identity,
    };
    req.hop = hop;
    updateHopContext({ hop, authz: { outcome: "allow", reason: decision.reason } });
    audit("allow", decision.reason);
    next();
  };

  return (req, res, next) => {
    check(req, res, next).catch(next);
  };
}
