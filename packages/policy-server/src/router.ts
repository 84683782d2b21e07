// packages/policy-server/src/router.ts
import express, { Router } from "express";
import { ValidationError } from "@hopguard/errors";
import {
  authorizationRequestSchema,
  decide,
  type AuthorizationRequest,
  type Decision,
  type PolicyRegistry,
} from "@hopguard/policy-core";

export interface DecisionLogLine extends AuthorizationRequest, Decision {
  ts: string;
  request_id?: string;
}

export interface PolicyRouterOptions {
  registry: PolicyRegistry;
  /** Where decision lines go. Defaults to one `[pdp.decision]` JSON line on stdout. */
  log?: (line: DecisionLogLine) => void;
}

function consoleDecisionLog(line: DecisionLogLine) {
  console.log("[pdp.decision]", JSON.stringify(line));
}

/**
 * Decision endpoint plus diagnostics. Stateless: every answer comes from
 * `decide(registry, body)`.
 */
export function createPolicyRouter(opts: PolicyRouterOptions): Router {
  const { registry } = opts;
  const log = opts.log ?? consoleDecisionLog;
  const r = Router();

  r.get("/health", (_req, res) => {
    res.json({ ok: true, service: "pdp", identities: registry.size });
  });

  r.get("/v1/registry", (_req, res) => {
    res.json({
      identities: registry.entries().map((e) => ({ identity: e.identity, role: e.role })),
    });
  });

  r.post("/v1/decide", express.json({ limit: "16kb" }), (req, res, next) => {
    const parsed = authorizationRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue?.path.join(".") || "body";
      console.warn("[pdp.invalid]", { field, request_id: req.get("x-request-id") });
      next(new ValidationError(`${field}: ${issue?.message ?? "invalid"}`));
      return;
    }

    const decision = decide(registry, parsed.data);
    log({
      ts: new Date().toISOString(),
      request_id: req.get("x-request-id") ?? undefined,
      ...parsed.data,
      ...decision,
    });
    res.json(decision);
  });

  return r;
}
