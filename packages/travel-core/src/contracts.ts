// packages/travel-core/src/contracts.ts
import { z } from "zod";

/** Identifiers travelling in headers or bodies: no spaces, no control chars. */
export const identifierSchema = z
  .string()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z0-9_.:@-]+$/, "Invalid identifier");

const recordSchema = z.record(z.unknown());

// ---- Trips / itinerary (context collaborator) ----

export const tripStatusSchema = z.enum(["planning", "booked", "completed", "cancelled"]);

export const tripSchema = z
  .object({
    trip_id: z.string().min(1),
    user_id: z.string().optional(),
    name: z.string().optional(),
    destination: z.string().optional(),
    start_date: z.string().nullish(),
    end_date: z.string().nullish(),
    status: tripStatusSchema.default("planning"),
  })
  .passthrough();

export const itineraryItemSchema = z
  .object({
    item_id: z.string().optional(),
    trip_id: z.string().optional(),
    item_type: z.enum(["flight", "hotel", "car_rental"]),
    status: z.enum(["pending", "confirmed", "cancelled"]).default("pending"),
    booking_reference: z.string().nullish(),
    details: recordSchema.default({}),
  })
  .passthrough();

export const userContextSchema = z.object({
  user: recordSchema.nullish(),
  active_trip: tripSchema.nullish(),
  all_trips: z.array(tripSchema).default([]),
  itinerary: z.array(itineraryItemSchema).default([]),
  recent_messages: z.array(recordSchema).default([]),
});

// ---- Orchestrator -> agent dispatch context ----

export const dispatchContextSchema = z.object({
  active_trip: tripSchema.optional(),
  prior_itinerary_items: z.array(itineraryItemSchema).default([]),
  user_preferences: recordSchema.default({}),
});

// ---- Orchestrator entry ----

export const chatRequestSchema = z.object({
  message: z.string().trim().min(1).max(2000),
  caller_id: identifierSchema,
  conversation_id: identifierSchema.optional(),
  trip_id: identifierSchema.optional(),
  parameters: recordSchema.optional(),
  confirm: z.boolean().optional(),
});

// ---- Worker agent entry ----

export const agentRequestSchema = z.object({
  message: z.string().trim().min(1).max(2000),
  context: dispatchContextSchema.optional(),
  parameters: recordSchema.optional(),
  confirm: z.boolean().optional(),
  conversation_id: identifierSchema.optional(),
});

export const agentResponseSchema = z.object({
  success: z.boolean(),
  message: z.string(),
  data: recordSchema.optional(),
  tools_called: z.array(z.string()).default([]),
  error: z.string().optional(),
  confirmation_required: z.boolean().optional(),
});

export const toolDescriptorSchema = z.object({
  name: z.string(),
  description: z.string(),
  parameters: z.record(z.string()).default({}),
  sideEffect: z.boolean().default(false),
});

export const toolCatalogSchema = z.object({
  identity: z.string().optional(),
  tools: z.array(toolDescriptorSchema),
});

export type TripStatus = z.infer<typeof tripStatusSchema>;
export type Trip = z.infer<typeof tripSchema>;
export type ItineraryItem = z.infer<typeof itineraryItemSchema>;
export type ItineraryItemInput = z.input<typeof itineraryItemSchema>;
export type UserContext = z.infer<typeof userContextSchema>;
export type DispatchContext = z.infer<typeof dispatchContextSchema>;
export type ChatRequest = z.infer<typeof chatRequestSchema>;
export type AgentRequest = z.infer<typeof agentRequestSchema>;
export type AgentResponse = z.infer<typeof agentResponseSchema>;
export type ToolDescriptor = z.infer<typeof toolDescriptorSchema>;
export type ToolCatalog = z.infer<typeof toolCatalogSchema>;

/**
 * Orchestrator entry response.
 */
export interface ChatResponse {
  success: boolean;
  message: string;
  intent?: string;
  domain_used?: string;
  agent_used?: string;
  tools_called: string[];
  data?: Record<string, unknown>;
  context_used: boolean;
  confirmation_required?: boolean;
  error?: string;
}

export function emptyDispatchContext(): DispatchContext {
  return { prior_itinerary_items: [], user_preferences: {} };
}
