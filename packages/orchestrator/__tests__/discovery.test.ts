import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createAgentRegistry, createHttpDispatcher, discoverAgents, startDiscovery, markHealthy } from "../src";
import { stubClient } from "./helpers";

const endpoints = [
  { domain: "flights" as const, identity: "flights-agent", url: "http://flights-agent/" },
  { domain: "lodging" as const, identity: "lodging-agent", url: "http://lodging-agent" },
];

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
});
afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});

describe("AgentRegistry", () => {
  it("starts agents healthy with trailing slashes removed", () => {
    const registry = createAgentRegistry(endpoints);
    expect(registry.get("flights")).toEqual({
      domain: "flights",
      identity: "flights-agent",
      url: "http://flights-agent",
      healthy: true,
      tools: [],
    });
    expect(registry.get("vehicles")).toBeUndefined();
  });

  it("changes health only through mark", () => {
    const registry = createAgentRegistry(endpoints, () => new Date("2025-01-01T00:00:00Z"));
    const snapshot = registry.get("lodging");
    if (snapshot) snapshot.healthy = false;
    expect(registry.get("lodging")?.healthy).toBe(true);

    registry.mark("lodging", { healthy: false, error: "GET /tools answered 503" });
    expect(registry.get("lodging")).toMatchObject({
      healthy: false,
      lastError: "GET /tools answered 503",
      lastChecked: "2025-01-01T00:00:00.000Z",
    });

    markHealthy(registry, "lodging", ["search_hotels"]);
    expect(registry.get("lodging")).toMatchObject({ healthy: true, tools: ["search_hotels"], lastError: undefined });
  });
});

describe("discoverAgents", () => {
  it("marks each agent by its /tools answer", async () => {
    const registry = createAgentRegistry(endpoints);
    const { client, seen } = stubClient((_m, url) =>
      url.startsWith("http://flights-agent")
        ? { status: 200, body: { identity: "flights-agent", tools: [{ name: "search_flights", description: "flights" }] } }
        : { status: 503, body: { success: false, error: "decision_unavailable", message: "x" } },
    );

    await discoverAgents(registry, client);

    expect(seen.map((s) => [s.url, s.call?.target])).toEqual([
      ["http://flights-agent/tools", "flights-agent"],
      ["http://lodging-agent/tools", "lodging-agent"],
    ]);
    expect(registry.get("flights")).toMatchObject({ healthy: true, tools: ["search_flights"] });
    expect(registry.get("lodging")).toMatchObject({ healthy: false, lastError: "GET /tools answered 503" });
  });

  it("marks unreachable agents unhealthy", async () => {
    const registry = createAgentRegistry(endpoints.slice(0, 1));
    const { client } = stubClient(() => {
      throw new Error("connect ECONNREFUSED");
    });

    await discoverAgents(registry, client);

    expect(registry.get("flights")).toMatchObject({ healthy: false, lastError: "connect ECONNREFUSED" });
  });
});

describe("startDiscovery", () => {
  it("runs now and then on the interval until stopped", async () => {
    vi.useFakeTimers();
    const registry = createAgentRegistry(endpoints.slice(0, 1));
    const { client, seen } = stubClient(() => ({ status: 200, body: { tools: [] } }));

    const stop = startDiscovery(registry, client, 1000);
    await vi.advanceTimersByTimeAsync(0);
    expect(seen).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(1000);
    expect(seen).toHaveLength(2);

    stop();
    await vi.advanceTimersByTimeAsync(5000);
    expect(seen).toHaveLength(2);
  });
});

describe("createHttpDispatcher", () => {
  const agent = { domain: "lodging" as const, identity: "lodging-agent", url: "http://lodging-agent", healthy: true, tools: [] };

  it("posts to /invoke with target and on-behalf-of", async () => {
    const { client, seen } = stubClient(() => ({
      status: 200,
      body: { success: true, message: "Found 0 hotels.", tools_called: ["search_hotels"] },
    }));

    const out = await createHttpDispatcher(client).dispatch(agent, { message: "hotels in Miami" }, { onBehalfOf: "orchestrator" });

    expect(out).toEqual({ success: true, message: "Found 0 hotels.", tools_called: ["search_hotels"] });
    expect(seen[0]?.url).toBe("http://lodging-agent/invoke");
    expect(seen[0]?.call).toEqual({ target: "lodging-agent", onBehalfOf: "orchestrator" });
  });

  it("rebuilds typed errors from the agent's failure body", async () => {
    const { client } = stubClient(() => ({
      status: 403,
      body: { success: false, error: "forbidden", message: "Caller not permitted: target_not_permitted" },
    }));

    await expect(createHttpDispatcher(client).dispatch(agent, { message: "x" })).rejects.toMatchObject({
      kind: "forbidden",
      message: "Caller not permitted: target_not_permitted",
    });
  });

  it("rejects a malformed answer", async () => {
    const { client } = stubClient(() => ({ status: 200, body: { ok: true } }));
    await expect(createHttpDispatcher(client).dispatch(agent, { message: "x" })).rejects.toThrow(
      "Agent lodging-agent answer malformed",
    );
  });

  it("maps a 429 answer to rate_limited whatever the body", async () => {
    const { client } = stubClient(() => ({ status: 429, body: { success: false, error: "rate_limited", message: "Too many requests" } }));

    await expect(createHttpDispatcher(client).dispatch(agent, { message: "x" })).rejects.toMatchObject({
      kind: "rate_limited",
      status: 429,
      detail: { status: 429 },
    });
  });

  it("records the status of an unrecognised failure answer", async () => {
    const { client } = stubClient(() => ({ status: 404, body: undefined }));

    await expect(createHttpDispatcher(client).dispatch(agent, { message: "x" })).rejects.toMatchObject({
      kind: "upstream_unavailable",
      message: "Agent lodging-agent answered 404",
      detail: { status: 404 },
    });
  });
});
