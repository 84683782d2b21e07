// apps/platform/src/main.ts
import type { Express } from "express";
import { startDiscovery } from "@hopguard/orchestrator";
import { buildAgentApp, buildGatewayApp, buildOrchestratorApp, buildPdpApp } from "./app";
import { configFromEnv, logConfig, type PlatformConfig } from "./config";

const SWEEP_INTERVAL_MS = 60_000;

function start(config: PlatformConfig): Express {
  switch (config.role) {
    case "pdp":
      return buildPdpApp(config);

    case "gateway": {
      const { app, sessions } = buildGatewayApp(config);
      setInterval(() => {
        const dropped = sessions.sweep();
        if (dropped > 0) console.log("[gateway:sessions]", { dropped, live: sessions.size });
      }, SWEEP_INTERVAL_MS).unref();
      return app;
    }

    case "agent":
      return buildAgentApp(config).app;

    case "orchestrator": {
      const { app, agents, client } = buildOrchestratorApp(config);
      startDiscovery(agents, client, config.discoveryIntervalMs);
      return app;
    }
  }
}

const config = configFromEnv();
logConfig(config);

start(config).listen(config.port, () => {
  console.log(`[platform] ${config.identity} listening on :${config.port}`);
});
