// packages/orchestrator/src/registry.ts
import type { Domain } from "@hopguard/travel-core";

export interface AgentEndpoint {
  domain: Domain;
  /** Identity the agent runs as; sent as x-target-id. */
  identity: string;
  url: string;
}

export interface AgentEntry extends AgentEndpoint {
  healthy: boolean;
  tools: string[];
  lastChecked?: string;
  lastError?: string;
}

export interface HealthMark {
  healthy: boolean;
  tools?: string[];
  error?: string;
}

/**
 * Known agents and their health. `mark` is the only way health changes.
 */
export interface AgentRegistry {
  get(domain: Domain): AgentEntry | undefined;
  list(): AgentEntry[];
  mark(domain: Domain, status: HealthMark): void;
}

/** Agents start healthy and stay so until discovery or a dispatch says otherwise. */
export function createAgentRegistry(endpoints: readonly AgentEndpoint[], now: () => Date = () => new Date()): AgentRegistry {
  const entries = new Map<Domain, AgentEntry>();
  for (const ep of endpoints) {
    entries.set(ep.domain, { ...ep, url: ep.url.replace(/\/+$/, ""), healthy: true, tools: [] });
  }

  return {
    get(domain) {
      const e = entries.get(domain);
      return e ? { ...e, tools: [...e.tools] } : undefined;
    },

    list() {
      return [...entries.values()].map((e) => ({ ...e, tools: [...e.tools] }));
    },

    mark(domain, status) {
      const e = entries.get(domain);
      if (!e) return;
      if (e.healthy !== status.healthy) {
        console.log("[orchestrator:agent_health]", { agent: e.identity, healthy: status.healthy, error: status.error });
      }
      e.healthy = status.healthy;
      if (status.tools) e.tools = [...status.tools];
      e.lastError = status.healthy ? undefined : status.error;
      e.lastChecked = now().toISOString();
    },
  };
}

export const markHealthy = (registry: AgentRegistry, domain: Domain, tools?: string[]) =>
  registry.mark(domain, { healthy: true, tools });

export const markUnhealthy = (registry: AgentRegistry, domain: Domain, error: string) =>
  registry.mark(domain, { healthy: false, error });
