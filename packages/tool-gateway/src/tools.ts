// packages/tool-gateway/src/tools.ts
import { z } from "zod";
import type { ToolDescriptor } from "@hopguard/travel-core";
import type { RecordBackend } from "./backend";

export interface ToolContext {
  backend: RecordBackend;
  now: () => Date;
}

export interface ToolDefinition<S extends z.AnyZodObject> {
  name: string;
  description: string;
  args: S;
  /** Human-readable description per argument, for catalogs. */
  params: { [K in keyof z.infer<S>]-?: string };
  /** Books or cancels something. Agents must confirm before calling. */
  sideEffect: boolean;
  run(args: z.infer<S>, ctx: ToolContext): Promise<unknown>;
}

/** A tool as the gateway holds it, argument types erased. */
export interface AnyTool {
  name: string;
  description: string;
  args: z.AnyZodObject;
  params: Readonly<Record<string, string>>;
  sideEffect: boolean;
  run(args: unknown, ctx: ToolContext): Promise<unknown>;
}

export function defineTool<S extends z.AnyZodObject>(def: ToolDefinition<S>): ToolDefinition<S> {
  return def;
}

type JsonSchemaType = "string" | "integer" | "number" | "boolean" | "array" | "object";

function jsonType(schema: z.ZodTypeAny): JsonSchemaType {
  if (schema instanceof z.ZodOptional) return jsonType(schema.unwrap());
  if (schema instanceof z.ZodNullable) return jsonType(schema.unwrap());
  if (schema instanceof z.ZodDefault) return jsonType(schema.removeDefault());
  if (schema instanceof z.ZodEffects) return jsonType(schema.innerType());
  if (schema instanceof z.ZodNumber) return schema.isInt ? "integer" : "number";
  if (schema instanceof z.ZodBoolean) return "boolean";
  if (schema instanceof z.ZodArray) return "array";
  if (schema instanceof z.ZodObject || schema instanceof z.ZodRecord) return "object";
  return "string";
}

/** JSON-schema shaped description of a tool's arguments. */
export function inputSchemaOf(tool: AnyTool) {
  const shape: Record<string, z.ZodTypeAny> = tool.args.shape;
  const properties: Record<string, { type: JsonSchemaType; description?: string }> = {};
  const required: string[] = [];

  for (const [key, schema] of Object.entries(shape)) {
    properties[key] = { type: jsonType(schema), description: tool.params[key] };
    if (!schema.isOptional()) required.push(key);
  }

  return { type: "object" as const, properties, required, additionalProperties: false };
}

export function describeTool(tool: AnyTool): ToolDescriptor {
  return {
    name: tool.name,
    description: tool.description,
    parameters: { ...tool.params },
    sideEffect: tool.sideEffect,
  };
}

/** `invalid_arguments: city: Required` */
export function argumentError(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "invalid_arguments";
  const where = issue.path.length ? `${issue.path.join(".")}: ` : "";
  return `invalid_arguments: ${where}${issue.message}`;
}
