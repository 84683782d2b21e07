// apps/platform/src/app.ts
import bodyParser from "body-parser";
import express, { type Express } from "express";

import { accessLogMiddleware, createConsoleSink, type AuditSink } from "@hopguard/audit";
import {
  createHopClient,
  createHttpDecisionClient,
  createLocalDecisionClient,
  enforce,
  type DecisionClient,
  type HopClient,
} from "@hopguard/enforcement";
import { hopErrorHandler, notFoundHandler } from "@hopguard/errors";
import { createBearerVerifier, requireEndUser } from "@hopguard/identity";
import { limitByCaller } from "@hopguard/limits";
import {
  createAgentRegistry,
  createHttpContextProvider,
  createHttpDispatcher,
  createOrchestrator,
  createOrchestratorRouter,
  type AgentDispatcher,
  type AgentRegistry,
  type ContextProvider,
} from "@hopguard/orchestrator";
import { loadPolicyRegistry, type PolicyRegistry } from "@hopguard/policy-core";
import { createPolicyRouter, type DecisionLogLine } from "@hopguard/policy-server";
import { keepHopContext, withHopContext } from "@hopguard/request-context";
import {
  SessionStore,
  createHttpBackend,
  createToolGatewayClient,
  createToolGatewayRouter,
  type RecordBackend,
  type ToolGatewayClient,
} from "@hopguard/tool-gateway";
import type { Domain } from "@hopguard/travel-core";
import {
  createAgentRouter,
  createChatCompletionsFallback,
  createWorkerAgent,
  type FallbackClassifier,
  type WorkerAgent,
} from "@hopguard/worker-agent";

import type { PlatformConfig } from "./config";

export const VERSION = "0.1.0";

/** Collaborators tests and single-process deployments may inject. */
export interface PlatformDeps {
  decisions?: DecisionClient;
  sink?: AuditSink;
  fetchImpl?: typeof fetch;
}

export interface GatewayDeps extends PlatformDeps {
  backend?: RecordBackend;
  sessions?: SessionStore;
}

export interface AgentDeps extends PlatformDeps {
  gateway?: ToolGatewayClient;
  fallback?: FallbackClassifier;
}

export interface OrchestratorDeps extends PlatformDeps {
  context?: ContextProvider;
  agents?: AgentRegistry;
  dispatcher?: AgentDispatcher;
}

function requireDomain(config: PlatformConfig): Domain {
  if (!config.domain) throw new Error(`[config] DOMAIN is required for role ${config.role}`);
  return config.domain;
}

function requireUrl(value: string | undefined, name: string): string {
  if (!value) throw new Error(`[config] ${name} is required`);
  return value;
}

function decisionClientFor(config: PlatformConfig, deps: PlatformDeps): DecisionClient {
  if (deps.decisions) return deps.decisions;
  if (config.pdp.url) {
    return createHttpDecisionClient({
      baseUrl: config.pdp.url,
      identity: config.identity,
      timeoutMs: config.pdp.timeoutMs,
      fetchImpl: deps.fetchImpl,
    });
  }
  return createLocalDecisionClient(loadPolicyRegistry(config.pdp.registryPath));
}

function hopClientFor(config: PlatformConfig, deps: PlatformDeps): HopClient {
  return createHopClient({ identity: config.identity, timeoutMs: config.hopTimeoutMs, fetchImpl: deps.fetchImpl });
}

/**
 * Shared front of every component: request context, access log, then
 * (for protected components) the enforcement point and the per-caller
 * limiter, then the JSON body.
 */
function baseApp(config: PlatformConfig, deps: PlatformDeps, protectedHop: boolean): Express {
  const sink = deps.sink ?? createConsoleSink({ serviceName: config.identity });
  const app = express();
  app.disable("x-powered-by");

  // -----------------------------
  // Request context + access log
  // -----------------------------
  app.use(withHopContext());
  app.use(accessLogMiddleware(sink));

  if (protectedHop) {
    // -----------------------------
    // Enforcement point, then limits
    // -----------------------------
    app.use(
      enforce({
        identity: config.identity,
        client: decisionClientFor(config, deps),
        timeoutMs: config.pdp.timeoutMs,
        sink,
      }),
    );
    app.use(limitByCaller(config.rateLimit));
  }

  // Parsed once here, after the decision; routers' own parsers then skip.
  app.use(keepHopContext(bodyParser.json({ limit: "64kb" })));
  return app;
}

function finish(app: Express, tag: string): Express {
  app.use(notFoundHandler());
  app.use(hopErrorHandler(tag));
  return app;
}

export interface PdpAppOptions {
  registry?: PolicyRegistry;
  log?: (line: DecisionLogLine) => void;
}

/** The decision point itself is not enforced. */
export function buildPdpApp(config: PlatformConfig, opts: PdpAppOptions = {}): Express {
  const registry = opts.registry ?? loadPolicyRegistry(config.pdp.registryPath);
  console.log("[boot] POLICY_IDENTITIES=%d", registry.size);

  const app = baseApp(config, {}, false);
  app.use(createPolicyRouter({ registry, log: opts.log }));
  return finish(app, "pdp");
}

export function buildGatewayApp(config: PlatformConfig, deps: GatewayDeps = {}): { app: Express; sessions: SessionStore } {
  const domain = requireDomain(config);
  const sessions = deps.sessions ?? new SessionStore({ ttlMs: config.gateway.sessionTtlMs });
  const backend =
    deps.backend ??
    createHttpBackend({
      baseUrl: requireUrl(config.backendUrl, "BACKEND_URL"),
      domain,
      client: hopClientFor(config, deps),
    });

  const app = baseApp(config, deps, true);
  app.use(
    createToolGatewayRouter({
      identity: config.identity,
      domain,
      backend,
      sessions,
      sessionPolicy: config.gateway.sessionPolicy,
      version: VERSION,
    }),
  );
  return { app: finish(app, "gateway"), sessions };
}

export function buildAgentApp(config: PlatformConfig, deps: AgentDeps = {}): { app: Express; agent: WorkerAgent } {
  const domain = requireDomain(config);
  const gateway =
    deps.gateway ??
    createToolGatewayClient({
      baseUrl: requireUrl(config.gateway.url, "GATEWAY_URL"),
      target: `${domain}-gateway`,
      client: hopClientFor(config, deps),
    });
  const fallback =
    deps.fallback ??
    (config.fallback
      ? createChatCompletionsFallback({ ...config.fallback, fetchImpl: deps.fetchImpl })
      : undefined);

  const agent = createWorkerAgent({ identity: config.identity, domain, gateway, fallback });
  const app = baseApp(config, deps, true);
  app.use(createAgentRouter({ agent, version: VERSION }));
  return { app: finish(app, "agent"), agent };
}

export function buildOrchestratorApp(
  config: PlatformConfig,
  deps: OrchestratorDeps = {},
): { app: Express; agents: AgentRegistry; client: HopClient } {
  const client = hopClientFor(config, deps);
  const agents = deps.agents ?? createAgentRegistry(config.agents);
  const context =
    deps.context ??
    createHttpContextProvider({
      baseUrl: requireUrl(config.contextServiceUrl, "CONTEXT_SERVICE_URL"),
      client,
    });
  const orchestrator = createOrchestrator({
    identity: config.identity,
    context,
    agents,
    dispatcher: deps.dispatcher ?? createHttpDispatcher(client),
  });

  // -----------------------------
  // End-user auth (optional)
  // -----------------------------
  const authenticate = config.oauth
    ? requireEndUser(
        createBearerVerifier({
          issuer: config.oauth.issuer,
          audience: config.oauth.audience,
          jwksUri: config.oauth.jwksUri,
        }),
      )
    : undefined;

  const app = baseApp(config, deps, true);
  app.use(createOrchestratorRouter({ identity: config.identity, orchestrator, agents, authenticate }));
  return { app: finish(app, "orchestrator"), agents, client };
}
