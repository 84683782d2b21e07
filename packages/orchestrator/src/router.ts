// packages/orchestrator/src/router.ts
import express, { Router, type RequestHandler } from "express";
import { ForbiddenError } from "@hopguard/errors";
import { chatRequestSchema, parseOrThrow } from "@hopguard/travel-core";
import type { Orchestrator } from "./orchestrator";
import type { AgentRegistry } from "./registry";

export interface OrchestratorRouterOptions {
  identity: string;
  orchestrator: Orchestrator;
  agents: AgentRegistry;
  /**
   * Runs before /chat. When set (end-user auth configured), req.user must
   * be populated and caller_id must equal its subject.
   */
  authenticate?: RequestHandler;
}

export function createOrchestratorRouter(opts: OrchestratorRouterOptions): Router {
  const r = Router();
  const chatGuards: RequestHandler[] = opts.authenticate ? [opts.authenticate] : [];

  r.get("/health", (_req, res) => {
    const agents = opts.agents.list();
    res.json({
      ok: true,
      service: opts.identity,
      agents: Object.fromEntries(agents.map((a) => [a.domain, { healthy: a.healthy, tools: a.tools.length }])),
      all_agents_healthy: agents.every((a) => a.healthy),
    });
  });

  r.get("/identity", (_req, res) => {
    res.json({ identity: opts.identity, role: "supervisor" });
  });

  r.get("/agents", (_req, res) => {
    res.json({ agents: opts.agents.list() });
  });

  r.post("/chat", ...chatGuards, express.json({ limit: "64kb" }), async (req, res, next) => {
    try {
      const body = parseOrThrow(chatRequestSchema, req.body, "chat");
      if (opts.authenticate && body.caller_id !== req.user?.sub) {
        throw new ForbiddenError("caller_id does not match the authenticated user");
      }
      res.json(await opts.orchestrator.handle(body));
    } catch (err) {
      next(err);
    }
  });

  return r;
}
