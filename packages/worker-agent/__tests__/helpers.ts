import { vi } from "vitest";
import type { ToolGatewayClient, ToolResult } from "@hopguard/tool-gateway";

export interface StubCall {
  name: string;
  args: Record<string, unknown>;
  onBehalfOf?: string;
}

export interface StubGateway extends ToolGatewayClient {
  calls: StubCall[];
}

/** Gateway client answering every call from `answer`. */
export function stubGateway(answer: (name: string) => ToolResult | Promise<ToolResult>): StubGateway {
  const calls: StubCall[] = [];
  return {
    calls,
    sessionId: undefined,
    callTool: vi.fn(async (name: string, args: Record<string, unknown>, call?: { onBehalfOf?: string }) => {
      calls.push({ name, args, onBehalfOf: call?.onBehalfOf });
      return answer(name);
    }),
    listTools: vi.fn(async () => []),
  };
}
