import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import express from "express";
import type { Server } from "http";
import { createHopClient } from "@hopguard/enforcement";
import { createToolGatewayClient, createToolGatewayRouter } from "@hopguard/tool-gateway";
import { createWorkerAgent } from "../src";
import { createMemoryBackend, type MemoryBackend } from "../../tool-gateway/__tests__/fixtures/memory-backend";

let server: Server | undefined;

async function start(backend: MemoryBackend): Promise<string> {
  const app = express();
  app.use(createToolGatewayRouter({ identity: "lodging-gateway", domain: "lodging", backend }));
  server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, "127.0.0.1", () => resolve(s));
  });
  const addr = server.address();
  if (!addr || typeof addr === "string") throw new Error("no address");
  return `http://127.0.0.1:${addr.port}`;
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
});
afterEach(async () => {
  vi.restoreAllMocks();
  await new Promise<void>((resolve) => (server ? server.close(() => resolve()) : resolve()));
  server = undefined;
});

describe("agent over a live gateway", () => {
  it("opens one session and reuses it across calls", async () => {
    const backend = createMemoryBackend("lodging");
    const url = await start(backend);
    const gateway = createToolGatewayClient({
      baseUrl: url,
      target: "lodging-gateway",
      client: createHopClient({ identity: "lodging-agent", timeoutMs: 2000 }),
    });
    const agent = createWorkerAgent({ identity: "lodging-agent", domain: "lodging", gateway });

    const first = await agent.process({ message: "Find hotels in Miami" });
    const session = gateway.sessionId;
    const second = await agent.process({ message: "Hotels in Denver" });

    expect(first.message).toBe("Found 2 hotels.");
    expect(first.tools_called).toEqual(["search_hotels"]);
    expect(second.message).toBe("Found 1 hotels.");
    expect(gateway.sessionId).toBe(session);
    expect(backend.calls.map((c) => c.op)).toEqual(["search", "search"]);
  });

  it("surfaces a backend business error as tool_error", async () => {
    const url = await start(createMemoryBackend("lodging"));
    const gateway = createToolGatewayClient({
      baseUrl: url,
      target: "lodging-gateway",
      client: createHopClient({ identity: "lodging-agent", timeoutMs: 2000 }),
    });
    const agent = createWorkerAgent({ identity: "lodging-agent", domain: "lodging", gateway });

    const out = await agent.process({
      message: "Book it",
      parameters: {
        room_type_id: "SOLD-OUT",
        check_in: "2025-04-01",
        check_out: "2025-04-02",
        guest_name: "Ana Test",
        guest_email: "ana@example.com",
      },
      confirm: true,
    });

    expect(out).toEqual({
      success: false,
      message: "No availability",
      error: "tool_error",
      tools_called: ["book_hotel"],
    });
  });
});
