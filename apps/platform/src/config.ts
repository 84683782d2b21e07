// apps/platform/src/config.ts
import { fileURLToPath } from "url";
import type { AgentEndpoint } from "@hopguard/orchestrator";
import type { SessionPolicy } from "@hopguard/tool-gateway";
import { DOMAINS, isDomain, type Domain } from "@hopguard/travel-core";

export const ROLES = ["pdp", "orchestrator", "agent", "gateway"] as const;
export type PlatformRole = (typeof ROLES)[number];

export interface EnvLike {
  [key: string]: string | undefined;
}

export interface PlatformConfig {
  role: PlatformRole;
  port: number;
  identity: string;
  /** Agents and gateways serve exactly one domain. */
  domain?: Domain;

  pdp: {
    /** Unset means decide in-process against the registry file. */
    url?: string;
    timeoutMs: number;
    registryPath: string;
  };

  gateway: {
    url?: string;
    sessionPolicy: SessionPolicy;
    sessionTtlMs: number;
  };

  backendUrl?: string;
  contextServiceUrl?: string;
  agents: AgentEndpoint[];
  discoveryIntervalMs: number;
  hopTimeoutMs: number;

  fallback?: {
    url: string;
    apiKey?: string;
    model: string;
  };

  oauth?: {
    issuer: string;
    audience: string;
    jwksUri?: string;
  };

  rateLimit: {
    windowMs: number;
    limit: number;
  };
}

export const DEFAULT_REGISTRY_PATH = fileURLToPath(new URL("../config/policy-registry.json", import.meta.url));

export function trimTrailingSlashes(input: string): string {
  return input.replace(/\/+$/, "");
}

function text(env: EnvLike, key: string): string | undefined {
  const v = env[key]?.trim();
  return v ? v : undefined;
}

function url(env: EnvLike, key: string): string | undefined {
  const v = text(env, key);
  return v ? trimTrailingSlashes(v) : undefined;
}

function num(env: EnvLike, key: string, fallback: number): number {
  const n = Number(env[key]);
  return env[key] && Number.isFinite(n) && n > 0 ? n : fallback;
}

/**
 * Parses AGENT_URLS_JSON: {"lodging": "http://lodging-agent:8080"} or
 * {"lodging": {"url": "...", "identity": "..."}}. Invalid JSON yields no agents.
 */
export function parseAgentUrls(raw?: string): AgentEndpoint[] {
  if (!raw) return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return [];
  }
  if (!parsed || typeof parsed !== "object") return [];

  const out: AgentEndpoint[] = [];
  for (const [domain, value] of Object.entries(parsed)) {
    if (!isDomain(domain)) continue;
    if (typeof value === "string" && value) {
      out.push({ domain, identity: `${domain}-agent`, url: trimTrailingSlashes(value) });
    } else if (value && typeof value === "object") {
      const u: unknown = Reflect.get(value, "url");
      const id: unknown = Reflect.get(value, "identity");
      if (typeof u === "string" && u) {
        out.push({ domain, identity: typeof id === "string" && id ? id : `${domain}-agent`, url: trimTrailingSlashes(u) });
      }
    }
  }
  return out;
}

function defaultIdentity(role: PlatformRole, domain?: Domain): string {
  if (role === "agent") return `${domain}-agent`;
  if (role === "gateway") return `${domain}-gateway`;
  return role;
}

/**
 * Typed configuration from process.env-style variables. Throws on a
 * missing or unknown ROLE and on a missing DOMAIN for agents and gateways.
 */
export function configFromEnv(env: EnvLike = process.env): PlatformConfig {
  const rawRole = text(env, "ROLE");
  const role = ROLES.find((r) => r === rawRole);
  if (!role) throw new Error(`[config] ROLE must be one of ${ROLES.join(", ")}`);

  const rawDomain = text(env, "DOMAIN");
  const domain = isDomain(rawDomain) ? rawDomain : undefined;
  if ((role === "agent" || role === "gateway") && !domain) {
    throw new Error(`[config] DOMAIN must be one of ${DOMAINS.join(", ")} for role ${role}`);
  }

  const fallbackUrl = url(env, "FALLBACK_LLM_URL");
  const issuer = url(env, "OAUTH_ISSUER");
  const audience = text(env, "OAUTH_AUDIENCE");

  return {
    role,
    port: num(env, "PORT", 8080),
    identity: text(env, "SERVICE_IDENTITY") ?? defaultIdentity(role, domain),
    domain,
    pdp: {
      url: url(env, "PDP_URL"),
      timeoutMs: num(env, "PDP_TIMEOUT_MS", 2000),
      registryPath: text(env, "POLICY_REGISTRY_PATH") ?? DEFAULT_REGISTRY_PATH,
    },
    gateway: {
      url: url(env, "GATEWAY_URL"),
      sessionPolicy: text(env, "GATEWAY_SESSION_POLICY") === "reject" ? "reject" : "renew",
      sessionTtlMs: num(env, "SESSION_TTL_MS", 30 * 60_000),
    },
    backendUrl: url(env, "BACKEND_URL"),
    contextServiceUrl: url(env, "CONTEXT_SERVICE_URL"),
    agents: parseAgentUrls(env.AGENT_URLS_JSON),
    discoveryIntervalMs: num(env, "DISCOVERY_INTERVAL_MS", 30_000),
    hopTimeoutMs: num(env, "HOP_TIMEOUT_MS", 5_000),
    fallback: fallbackUrl
      ? { url: fallbackUrl, apiKey: text(env, "FALLBACK_LLM_API_KEY"), model: text(env, "FALLBACK_LLM_MODEL") ?? "gpt-4o-mini" }
      : undefined,
    oauth: issuer && audience ? { issuer, audience, jwksUri: url(env, "OAUTH_JWKS_URI") } : undefined,
    rateLimit: {
      windowMs: num(env, "RATE_LIMIT_WINDOW_MS", 60_000),
      limit: num(env, "RATE_LIMIT_MAX", 120),
    },
  };
}

/** Boot summary without secret values. */
export function logConfig(config: PlatformConfig): void {
  console.log("[boot] ROLE=%s IDENTITY=%s DOMAIN=%s PORT=%d", config.role, config.identity, config.domain ?? "-", config.port);
  console.log("[boot] PDP=%s", config.pdp.url ?? "in-process");
  console.log("[boot] FALLBACK_LLM_SET=%s FALLBACK_LLM_API_KEY_SET=%s", Boolean(config.fallback), Boolean(config.fallback?.apiKey));
  console.log("[boot] OAUTH_ISSUER_SET=%s OAUTH_AUDIENCE_SET=%s", Boolean(config.oauth?.issuer), Boolean(config.oauth?.audience));
}
