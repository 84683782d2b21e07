// packages/travel-core/src/validate.ts
import type { z } from "zod";
import { ValidationError } from "@hopguard/errors";

/**
 * Parse `input` with `schema`, throwing ValidationError carrying the first
 * issue's path and message.
 */
export function parseOrThrow<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  label = "body",
): z.infer<S> {
  const result = schema.safeParse(input);
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  const where = issue && issue.path.length ? `${label}.${issue.path.join(".")}` : label;
  throw new ValidationError(`${where}: ${issue?.message ?? "invalid"}`, {
    issues: result.error.issues.length,
  });
}
