// packages/policy-core/src/registry.ts
import { readFileSync } from "fs";
import { z } from "zod";
import { ValidationError } from "@hopguard/errors";

export const ROLES = ["supervisor", "worker", "gateway", "client"] as const;
export type Role = (typeof ROLES)[number];

const identitySchema = z.string().min(1).max(128).regex(/^[A-Za-z0-9_.:@-]+$/);

export const registryFileSchema = z.object({
  identities: z.array(
    z.object({
      identity: identitySchema,
      role: z.enum(ROLES),
      allowed_targets: z.array(identitySchema).default([]),
    }),
  ),
});

export type RegistryFile = z.input<typeof registryFileSchema>;

export interface RegistryEntry {
  readonly identity: string;
  readonly role: Role;
  readonly allowed_targets: readonly string[];
}

/**
 * Identity -> role + exhaustive target whitelist. Read-only once built.
 */
export interface PolicyRegistry {
  readonly size: number;
  get(identity: string): RegistryEntry | undefined;
  permits(caller: string, target: string): boolean;
  entries(): readonly RegistryEntry[];
}

export function createPolicyRegistry(input: unknown): PolicyRegistry {
  const parsed = registryFileSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(
      `policy registry: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid"}`,
    );
  }

  const byIdentity = new Map<string, RegistryEntry>();
  for (const raw of parsed.data.identities) {
    if (byIdentity.has(raw.identity)) {
      throw new ValidationError(`policy registry: duplicate identity "${raw.identity}"`);
    }
    byIdentity.set(
      raw.identity,
      Object.freeze({
        identity: raw.identity,
        role: raw.role,
        allowed_targets: Object.freeze([...new Set(raw.allowed_targets)]),
      }),
    );
  }

  for (const entry of byIdentity.values()) {
    const unknown = entry.allowed_targets.find((t) => !byIdentity.has(t));
    if (unknown) {
      throw new ValidationError(
        `policy registry: "${entry.identity}" targets unregistered identity "${unknown}"`,
      );
    }
  }

  const all = Object.freeze([...byIdentity.values()]);

  return Object.freeze({
    size: byIdentity.size,
    get: (identity: string) => byIdentity.get(identity),
    permits: (caller: string, target: string) =>
      byIdentity.get(caller)?.allowed_targets.includes(target) ?? false,
    entries: () => all,
  });
}

/** Read and validate a registry file. Bad JSON is a ValidationError too. */
export function loadPolicyRegistry(path: string): PolicyRegistry {
  const text = readFileSync(path, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ValidationError(
      `policy registry: ${path} is not valid JSON (${err instanceof Error ? err.message : String(err)})`,
    );
  }
  return createPolicyRegistry(raw);
}
