// packages/tool-gateway/src/client.ts
import { z } from "zod";
import {
  UpstreamTimeoutError,
  UpstreamUnavailableError,
  errorFromBody,
} from "@hopguard/errors";
import type { HopClient, HopResponse } from "@hopguard/enforcement";
import { toolCatalogSchema, type ToolDescriptor } from "@hopguard/travel-core";
import { RPC_ERRORS, jsonRpcResponseSchema } from "./jsonrpc";
import { PROTOCOL_VERSION, SESSION_HEADER, type ToolResult } from "./router";

const toolResultSchema = z.union([
  z.object({ ok: z.literal(true), data: z.unknown() }),
  z.object({ ok: z.literal(false), error: z.string() }),
]);

export interface ToolGatewayClientOptions {
  /** Gateway base URL, e.g. http://lodging-gateway:8080 */
  baseUrl: string;
  /** Gateway identity, sent as x-target-id. */
  target: string;
  client: HopClient;
}

export interface CallOptions {
  onBehalfOf?: string;
}

export interface ToolGatewayClient {
  readonly sessionId: string | undefined;
  callTool(name: string, args: Record<string, unknown>, call?: CallOptions): Promise<ToolResult>;
  listTools(): Promise<ToolDescriptor[]>;
}

/** Non-2xx from the gateway hop itself (enforcement or server failure). */
function hopFailure(res: HopResponse, what: string): Error {
  return errorFromBody(res.body) ?? new UpstreamUnavailableError(`Gateway answered ${res.status} to ${what}`);
}

/**
 * Worker-side gateway client. The session is opened lazily on first call
 * and shared; concurrent first calls wait on the same initialize. A
 * session the gateway reports expired is replaced once per call.
 */
export function createToolGatewayClient(opts: ToolGatewayClientOptions): ToolGatewayClient {
  const base = opts.baseUrl.replace(/\/+$/, "");
  const mcpUrl = `${base}/mcp`;
  let sessionId: string | undefined;
  let opening: Promise<string> | undefined;
  let nextId = 1;

  function adopt(res: HopResponse) {
    const id = res.headers.get(SESSION_HEADER);
    if (id) sessionId = id;
  }

  async function initialize(call: CallOptions): Promise<string> {
    const res = await opts.client.postJson(
      mcpUrl,
      {
        jsonrpc: "2.0",
        id: nextId++,
        method: "initialize",
        params: { protocolVersion: PROTOCOL_VERSION, clientInfo: { name: opts.client.identity } },
      },
      { target: opts.target, onBehalfOf: call.onBehalfOf },
    );
    if (res.status !== 200) throw hopFailure(res, "initialize");

    const parsed = jsonRpcResponseSchema.safeParse(res.body);
    const fromResult =
      parsed.success && "result" in parsed.data && parsed.data.result && typeof parsed.data.result === "object"
        ? Reflect.get(parsed.data.result, "sessionId")
        : undefined;
    const id: unknown = res.headers.get(SESSION_HEADER) ?? fromResult;
    if (typeof id !== "string" || !id) {
      throw new UpstreamUnavailableError("Gateway returned no session id");
    }
    sessionId = id;
    return id;
  }

  function ensureSession(call: CallOptions): Promise<string> {
    if (sessionId) return Promise.resolve(sessionId);
    if (!opening) {
      opening = initialize(call).finally(() => {
        opening = undefined;
      });
    }
    return opening;
  }

  async function callOnce(
    name: string,
    args: Record<string, unknown>,
    call: CallOptions,
    session: string,
  ): Promise<ToolResult | "session_expired"> {
    const res = await opts.client.postJson(
      mcpUrl,
      { jsonrpc: "2.0", id: nextId++, method: "tools/call", params: { name, arguments: args } },
      { target: opts.target, onBehalfOf: call.onBehalfOf, headers: { [SESSION_HEADER]: session } },
    );

    const rpc = jsonRpcResponseSchema.safeParse(res.body);
    if (!rpc.success) throw hopFailure(res, name);

    if ("error" in rpc.data) {
      switch (rpc.data.error.code) {
        case RPC_ERRORS.sessionExpired:
          return "session_expired";
        case RPC_ERRORS.upstreamTimeout:
          throw new UpstreamTimeoutError(`Backend timed out for ${name}`);
        default:
          throw new UpstreamUnavailableError(`Gateway error for ${name}: ${rpc.data.error.message}`);
      }
    }

    adopt(res);
    const result = toolResultSchema.safeParse(rpc.data.result);
    if (!result.success) throw new UpstreamUnavailableError(`Malformed result for ${name}`);
    return result.data;
  }

  return {
    get sessionId() {
      return sessionId;
    },

    async callTool(name, args, call = {}) {
      const used = await ensureSession(call);
      const first = await callOnce(name, args, call, used);
      if (first !== "session_expired") return first;

      if (sessionId === used) sessionId = undefined;
      const fresh = await ensureSession(call);
      const second = await callOnce(name, args, call, fresh);
      if (second === "session_expired") {
        throw new UpstreamUnavailableError(`Gateway rejected a fresh session for ${name}`);
      }
      return second;
    },

    async listTools() {
      const res = await opts.client.getJson(`${base}/tools`, { target: opts.target });
      if (res.status !== 200) throw hopFailure(res, "tools");
      const parsed = toolCatalogSchema.safeParse(res.body);
      if (!parsed.success) throw new UpstreamUnavailableError("Malformed tool catalog");
      return parsed.data.tools;
    },
  };
}
