// packages/orchestrator/src/discovery.ts
import type { HopClient } from "@hopguard/enforcement";
import { toolCatalogSchema } from "@hopguard/travel-core";
import { markHealthy, markUnhealthy, type AgentEntry, type AgentRegistry } from "./registry";

async function checkAgent(registry: AgentRegistry, client: HopClient, agent: AgentEntry): Promise<void> {
  try {
    const res = await client.getJson(`${agent.url}/tools`, { target: agent.identity });
    if (res.status !== 200) {
      markUnhealthy(registry, agent.domain, `GET /tools answered ${res.status}`);
      return;
    }
    const catalog = toolCatalogSchema.safeParse(res.body);
    if (!catalog.success) {
      markUnhealthy(registry, agent.domain, "Malformed tool catalog");
      return;
    }
    markHealthy(registry, agent.domain, catalog.data.tools.map((t) => t.name));
  } catch (err) {
    markUnhealthy(registry, agent.domain, err instanceof Error ? err.message : String(err));
  }
}

/** One discovery round over every registered agent. Never rejects. */
export async function discoverAgents(registry: AgentRegistry, client: HopClient): Promise<void> {
  await Promise.all(registry.list().map((agent) => checkAgent(registry, client, agent)));
}

/**
 * Discover now and then every `intervalMs`. The timer does not hold the
 * process open. Returns a stop function.
 */
export function startDiscovery(registry: AgentRegistry, client: HopClient, intervalMs = 30_000): () => void {
  let running = false;
  const round = () => {
    if (running) return;
    running = true;
    discoverAgents(registry, client)
      .catch((err) => console.error("[orchestrator:discovery_error]", err instanceof Error ? err.message : String(err)))
      .finally(() => {
        running = false;
      });
  };

  round();
  const timer = setInterval(round, intervalMs);
  timer.unref();
  return () => clearInterval(timer);
}
