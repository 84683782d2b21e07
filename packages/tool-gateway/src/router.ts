// packages/tool-gateway/src/router.ts
import express, { Router, type ErrorRequestHandler, type Request, type Response } from "express";
import { z } from "zod";
import { UpstreamTimeoutError, UpstreamUnavailableError } from "@hopguard/errors";
import { updateHopContext } from "@hopguard/request-context";
import type { Domain } from "@hopguard/travel-core";
import { BackendError, normalizeBackendError, type RecordBackend } from "./backend";
import { TOOLS_BY_DOMAIN } from "./domains";
import {
  RPC_ERRORS,
  jsonRpcError,
  jsonRpcRequestSchema,
  jsonRpcResult,
  type JsonRpcRequest,
} from "./jsonrpc";
import { SessionStore, type Session } from "./sessions";
import { argumentError, describeTool, inputSchemaOf, type AnyTool, type ToolContext } from "./tools";

export const SESSION_HEADER = "mcp-session-id";
export const PROTOCOL_VERSION = "2025-06-18";

/** What a gateway does with a missing or unknown session id. */
export type SessionPolicy = "renew" | "reject";

export type ToolResult = { ok: true; data: unknown } | { ok: false; error: string };

export interface ToolGatewayOptions {
  identity: string;
  domain: Domain;
  backend: RecordBackend;
  tools?: readonly AnyTool[];
  sessions?: SessionStore;
  sessionPolicy?: SessionPolicy;
  now?: () => Date;
  version?: string;
}

const callParamsSchema = z.object({
  name: z.string().min(1).max(64),
  arguments: z.record(z.unknown()).default({}),
});

/**
 * Resolve and run one tool. Unknown tools and bad arguments come back as
 * result errors, as do backend business errors; transport failures throw.
 */
export async function invokeTool(
  tools: ReadonlyMap<string, AnyTool>,
  name: string,
  args: Record<string, unknown>,
  ctx: ToolContext,
): Promise<ToolResult> {
  const tool = tools.get(name);
  if (!tool) return { ok: false, error: "unsupported_tool" };

  const parsed = tool.args.safeParse(args);
  if (!parsed.success) return { ok: false, error: argumentError(parsed.error) };

  try {
    return { ok: true, data: await tool.run(parsed.data, ctx) };
  } catch (e) {
    if (e instanceof BackendError) return { ok: false, error: normalizeBackendError(e) };
    throw e;
  }
}

export function createToolGatewayRouter(opts: ToolGatewayOptions): Router {
  const tools = new Map<string, AnyTool>(
    (opts.tools ?? TOOLS_BY_DOMAIN[opts.domain]).map((t): [string, AnyTool] => [t.name, t]),
  );
  const sessions = opts.sessions ?? new SessionStore();
  const policy = opts.sessionPolicy ?? "renew";
  const ctx: ToolContext = { backend: opts.backend, now: opts.now ?? (() => new Date()) };
  const r = Router();

  r.get("/health", (_req, res) => {
    res.json({ ok: true, service: opts.identity, domain: opts.domain, sessions: sessions.size });
  });

  r.get("/identity", (_req, res) => {
    res.json({ identity: opts.identity, role: "gateway", domain: opts.domain });
  });

  r.get("/tools", (_req, res) => {
    res.json({ identity: opts.identity, tools: [...tools.values()].map(describeTool) });
  });

  /** Current session, renewed or refused per policy. Sends the refusal itself. */
  function resolveSession(rpc: JsonRpcRequest, req: Request, res: Response): Session | undefined {
    const incoming = req.get(SESSION_HEADER);
    const live = sessions.touch(incoming);
    if (live) return live;

    if (policy === "reject") {
      res.status(404).json(jsonRpcError(rpc.id, RPC_ERRORS.sessionExpired, "session_expired"));
      return undefined;
    }

    const fresh = sessions.create();
    if (incoming) {
      console.log("[gateway:session_renewed]", { service: opts.identity, session: fresh.id });
    }
    return fresh;
  }

  async function callTool(rpc: JsonRpcRequest, req: Request, res: Response) {
    const params = callParamsSchema.safeParse(rpc.params ?? {});
    if (!params.success) {
      res.status(400).json(jsonRpcError(rpc.id, RPC_ERRORS.invalidParams, "Invalid params"));
      return;
    }

    const session = resolveSession(rpc, req, res);
    if (!session) return;
    res.setHeader(SESSION_HEADER, session.id);

    const { name } = params.data;
    updateHopContext({ routing: { tool: name, sessionId: session.id } });

    const started = Date.now();
    try {
      const result = await invokeTool(tools, name, params.data.arguments, ctx);
      console.log("[gateway:tool]", {
        service: opts.identity,
        tool: name,
        ok: result.ok,
        ms: Date.now() - started,
        caller: req.hop?.caller,
      });
      res.json(jsonRpcResult(rpc.id, result));
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      console.error("[gateway:upstream_error]", { service: opts.identity, tool: name, message });

      if (e instanceof UpstreamTimeoutError) {
        res.json(jsonRpcError(rpc.id, RPC_ERRORS.upstreamTimeout, "upstream_timeout", { tool: name }));
      } else if (e instanceof UpstreamUnavailableError) {
        res.json(jsonRpcError(rpc.id, RPC_ERRORS.upstreamUnavailable, "upstream_unavailable", { tool: name }));
      } else {
        res.json(jsonRpcError(rpc.id, RPC_ERRORS.internalError, "internal_error"));
      }
    }
  }

  r.post("/mcp", express.json({ limit: "64kb" }), (req, res, next) => {
    const parsed = jsonRpcRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json(jsonRpcError(null, RPC_ERRORS.invalidRequest, "Invalid Request"));
      return;
    }
    const rpc = parsed.data;

    switch (rpc.method) {
      case "initialize": {
        const session = sessions.create();
        res.setHeader(SESSION_HEADER, session.id);
        res.json(
          jsonRpcResult(rpc.id, {
            protocolVersion: PROTOCOL_VERSION,
            capabilities: { tools: { listChanged: false } },
            serverInfo: { name: opts.identity, version: opts.version ?? "0.1.0" },
            sessionId: session.id,
          }),
        );
        return;
      }

      case "notifications/initialized":
        res.status(202).end();
        return;

      case "tools/list": {
        const session = resolveSession(rpc, req, res);
        if (!session) return;
        res.setHeader(SESSION_HEADER, session.id);
        res.json(
          jsonRpcResult(rpc.id, {
            tools: [...tools.values()].map((t) => ({
              ...describeTool(t),
              inputSchema: inputSchemaOf(t),
            })),
          }),
        );
        return;
      }

      case "tools/call":
        callTool(rpc, req, res).catch(next);
        return;

      default:
        res.status(400).json(jsonRpcError(rpc.id, RPC_ERRORS.methodNotFound, `Method not found: ${rpc.method}`));
    }
  });

  // malformed JSON on /mcp answers in JSON-RPC terms
  const parseErrors: ErrorRequestHandler = (err, _req, res, next) => {
    if (err instanceof SyntaxError) {
      res.status(400).json(jsonRpcError(null, RPC_ERRORS.parseError, "Parse error"));
      return;
    }
    next(err);
  };
  r.use(parseErrors);

  return r;
}
