// packages/tool-gateway/src/jsonrpc.ts
import { z } from "zod";

export type JsonRpcId = string | number | null;

export const RPC_ERRORS = {
  parseError: -32700,
  invalidRequest: -32600,
  methodNotFound: -32601,
  invalidParams: -32602,
  internalError: -32603,
  sessionExpired: -32001,
  upstreamUnavailable: -32003,
  upstreamTimeout: -32004,
} as const;

const idSchema = z.union([z.string(), z.number(), z.null()]);

export const jsonRpcRequestSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: idSchema.optional(),
  method: z.string().min(1),
  params: z.record(z.unknown()).optional(),
});

export type JsonRpcRequest = z.infer<typeof jsonRpcRequestSchema>;

export const jsonRpcResponseSchema = z.union([
  z.object({ jsonrpc: z.literal("2.0"), id: idSchema, result: z.unknown() }),
  z.object({
    jsonrpc: z.literal("2.0"),
    id: idSchema,
    error: z.object({ code: z.number(), message: z.string(), data: z.unknown().optional() }),
  }),
]);

export type JsonRpcResponse = z.infer<typeof jsonRpcResponseSchema>;

export function jsonRpcResult(id: JsonRpcId | undefined, result: unknown): JsonRpcResponse {
  return { jsonrpc: "2.0", id: id ?? null, result };
}

export function jsonRpcError(
  id: JsonRpcId | undefined,
  code: number,
  message: string,
  data?: unknown,
): JsonRpcResponse {
  return { jsonrpc: "2.0", id: id ?? null, error: { code, message, data } };
}
