import { describe, it, expect } from "vitest";
import { mkdtempSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { fileURLToPath } from "url";
import { ValidationError } from "@hopguard/errors";

import {
  createPolicyRegistry,
  decide,
  isDiscoveryPath,
  loadPolicyRegistry,
  normalizePath,
  type RegistryFile,
} from "../src";

const file: RegistryFile = {
  identities: [
    { identity: "orchestrator", role: "supervisor", allowed_targets: ["lodging-agent"] },
    { identity: "lodging-agent", role: "worker", allowed_targets: ["lodging-gateway"] },
    { identity: "lodging-gateway", role: "gateway" },
    { identity: "flights-gateway", role: "gateway", allowed_targets: [] },
  ],
};

const registry = createPolicyRegistry(file);

describe("decide", () => {
  it("denies a worker calling another domain's gateway", () => {
    expect(
      decide(registry, {
        caller_identity: "lodging-agent",
        target_identity: "flights-gateway",
        path: "/mcp",
      }),
    ).toEqual({ allow: false, reason: "target_not_permitted" });
  });

  it("allows a worker calling its own gateway", () => {
    expect(
      decide(registry, {
        caller_identity: "lodging-agent",
        target_identity: "lodging-gateway",
        path: "/mcp",
      }),
    ).toEqual({ allow: true, reason: "allowed" });
  });

  it("denies unknown and empty callers", () => {
    for (const caller of ["mallory", "", "Lodging-Agent"]) {
      expect(
        decide(registry, { caller_identity: caller, target_identity: "lodging-gateway", path: "/mcp" }),
      ).toEqual({ allow: false, reason: "unknown_caller" });
    }
  });

  it("allows anyone on discovery paths", () => {
    for (const path of ["/health", "/tools/", "/IDENTITY?verbose=1"]) {
      expect(
        decide(registry, { caller_identity: "mallory", target_identity: "lodging-gateway", path }),
      ).toEqual({ allow: true, reason: "discovery_path" });
    }
  });

  it("does not treat look-alike paths as discovery", () => {
    expect(isDiscoveryPath("/health/details")).toBe(false);
    expect(isDiscoveryPath("/healthz")).toBe(false);
  });

  it("denies gateways, which have no targets", () => {
    expect(
      decide(registry, {
        caller_identity: "lodging-gateway",
        target_identity: "lodging-agent",
        path: "/invoke",
      }).reason,
    ).toBe("target_not_permitted");
  });

  it("gives the same answer for the same input", () => {
    const req = { caller_identity: "orchestrator", target_identity: "lodging-agent", path: "/invoke" };
    expect(decide(registry, req)).toEqual(decide(registry, req));
    expect(req).toEqual({ caller_identity: "orchestrator", target_identity: "lodging-agent", path: "/invoke" });
  });
});

describe("normalizePath", () => {
  it("drops query, repeated and trailing slashes", () => {
    expect(normalizePath("//tools//?a=1")).toBe("/tools");
    expect(normalizePath("health")).toBe("/health");
    expect(normalizePath("/")).toBe("/");
  });
});

describe("createPolicyRegistry", () => {
  it("is frozen", () => {
    const entry = registry.get("lodging-agent");
    expect(Object.isFrozen(registry)).toBe(true);
    expect(Object.isFrozen(entry)).toBe(true);
    expect(Object.isFrozen(entry?.allowed_targets)).toBe(true);
    expect(registry.size).toBe(4);
  });

  it("rejects duplicate identities", () => {
    expect(() =>
      createPolicyRegistry({
        identities: [
          { identity: "a", role: "worker" },
          { identity: "a", role: "gateway" },
        ],
      }),
    ).toThrow('policy registry: duplicate identity "a"');
  });

  it("rejects targets that are not registered", () => {
    expect(() =>
      createPolicyRegistry({
        identities: [{ identity: "a", role: "worker", allowed_targets: ["ghost"] }],
      }),
    ).toThrow('policy registry: "a" targets unregistered identity "ghost"');
  });

  it("rejects unknown roles", () => {
    expect(() =>
      createPolicyRegistry({ identities: [{ identity: "a", role: "admin" }] }),
    ).toThrow(ValidationError);
  });
});

describe("loadPolicyRegistry", () => {
  it("reads a registry file", () => {
    const dir = mkdtempSync(join(tmpdir(), "hopguard-"));
    const path = join(dir, "registry.json");
    writeFileSync(path, JSON.stringify(file));

    expect(loadPolicyRegistry(path).permits("orchestrator", "lodging-agent")).toBe(true);
  });

  it("turns bad JSON into a ValidationError", () => {
    const dir = mkdtempSync(join(tmpdir(), "hopguard-"));
    const path = join(dir, "registry.json");
    writeFileSync(path, "{");

    expect(() => loadPolicyRegistry(path)).toThrow(ValidationError);
  });

  it("loads the shipped platform registry", () => {
    const shipped = loadPolicyRegistry(
      fileURLToPath(new URL("../../../apps/platform/config/policy-registry.json", import.meta.url)),
    );
    expect(shipped.get("lodging-agent")?.allowed_targets).toEqual(["lodging-gateway"]);
    expect(shipped.get("flights-gateway")?.role).toBe("gateway");
  });
});
