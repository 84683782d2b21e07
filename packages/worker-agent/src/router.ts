// packages/worker-agent/src/router.ts
import express, { Router } from "express";
import { agentRequestSchema, parseOrThrow, type ToolDescriptor } from "@hopguard/travel-core";
import type { WorkerAgent } from "./agent";

export interface AgentRouterOptions {
  agent: WorkerAgent;
  version?: string;
}

export function describeRules(agent: WorkerAgent): ToolDescriptor[] {
  return agent.rules.map((r) => ({
    name: r.tool,
    description: r.label,
    parameters: { ...r.arguments },
    sideEffect: r.sideEffect,
  }));
}

/**
 * Agent endpoints. /invoke is the only protected route; the rest are
 * discovery paths the decision point always allows.
 */
export function createAgentRouter(opts: AgentRouterOptions): Router {
  const { agent } = opts;
  const r = Router();

  r.get("/health", (_req, res) => {
    res.json({ ok: true, service: agent.identity, domain: agent.domain });
  });

  r.get("/identity", (_req, res) => {
    res.json({ identity: agent.identity, role: "worker", domain: agent.domain, version: opts.version ?? "0.1.0" });
  });

  r.get("/tools", (_req, res) => {
    res.json({ identity: agent.identity, tools: describeRules(agent) });
  });

  r.get("/metrics", (_req, res) => {
    res.json({ service: agent.identity, ...agent.metrics() });
  });

  r.post("/invoke", express.json({ limit: "64kb" }), async (req, res, next) => {
    try {
      const body = parseOrThrow(agentRequestSchema, req.body, "invoke");
      const onBehalfOf = req.hop?.onBehalfOf ?? req.hop?.caller;
      res.json(await agent.process(body, { onBehalfOf: onBehalfOf || undefined }));
    } catch (err) {
      next(err);
    }
  });

  return r;
}
