// packages/orchestrator/src/orchestrator.ts
import { HopError, isTransportError, userMessage } from "@hopguard/errors";
import { updateHopContext } from "@hopguard/request-context";
import {
  ITEM_TYPE_BY_DOMAIN,
  extractDestination,
  type AgentResponse,
  type ChatRequest,
  type ChatResponse,
  type Domain,
  type Trip,
  type UserContext,
} from "@hopguard/travel-core";
import { emptyUserContext, selectTrip, toDispatchContext, type ContextProvider } from "./context";
import type { AgentDispatcher } from "./dispatcher";
import { classifyIntent, type Intent } from "./intent";
import { formatItinerary } from "./itinerary";
import { markUnhealthy, type AgentRegistry } from "./registry";

export interface OrchestratorOptions {
  /** Sent downstream as the on-behalf-of identity of every dispatch. */
  identity: string;
  context: ContextProvider;
  agents: AgentRegistry;
  dispatcher: AgentDispatcher;
}

export interface Orchestrator {
  handle(req: ChatRequest): Promise<ChatResponse>;
}

const HELP =
  "I'm your travel planner. I can plan new trips, search flights, hotels and rental cars, " +
  "manage your bookings and show your itinerary. What would you like to do?";

const TRIP_HELP =
  "I can help you plan your trip! What would you like to start with: flights, hotels or a rental car?";

const clip = (s: string) => (s.length > 100 ? `${s.slice(0, 100)}...` : s);

function record(value: unknown): Record<string, unknown> | undefined {
  return value && typeof value === "object" && !Array.isArray(value) ? Object.fromEntries(Object.entries(value)) : undefined;
}

/**
 * Down or timed out: the call got no answer, or a 5xx. An agent that
 * answered with a 4xx (rate limit, refusal) is up.
 */
export function agentIsDown(err: HopError): boolean {
  if (!isTransportError(err)) return false;
  const status = err.detail?.status;
  return typeof status !== "number" || status >= 500;
}

/** The booking record a successful book_* call returned, if any. */
export function bookingFrom(result: AgentResponse): Record<string, unknown> | undefined {
  if (!result.success || !result.tools_called.some((t) => t.startsWith("book_"))) return undefined;
  return record(result.data?.booking) ?? record(result.data?.rental);
}

export function createOrchestrator(opts: OrchestratorOptions): Orchestrator {
  async function loadContext(callerId: string): Promise<UserContext | undefined> {
    try {
      return await opts.context.getContext(callerId);
    } catch (err) {
      console.warn("[orchestrator:context_unavailable]", err instanceof Error ? err.message : String(err));
      return undefined;
    }
  }

  async function createTrip(req: ChatRequest, intent: Intent, contextUsed: boolean): Promise<ChatResponse> {
    const base = { intent: intent.type, tools_called: [], context_used: contextUsed };
    const destination = extractDestination(req.message)?.name;
    if (!destination) {
      return { ...base, success: true, message: "Where would you like to go?" };
    }

    try {
      const trip = await opts.context.createTrip(req.caller_id, destination);
      return {
        ...base,
        success: true,
        message: `I've started planning your trip to ${destination}! Would you like me to search for flights, hotels or a car?`,
        data: { trip },
      };
    } catch (err) {
      if (!(err instanceof HopError)) throw err;
      console.warn("[orchestrator:create_trip_failed]", err.message);
      return { ...base, success: false, message: "I had trouble creating your trip. Please try again.", error: err.kind };
    }
  }

  async function appendBooking(trip: Trip, domain: Domain, booking: Record<string, unknown>): Promise<void> {
    const ref = booking.booking_id ?? booking.confirmation_code ?? booking.rental_id;
    try {
      await opts.context.appendItineraryItem(trip.trip_id, {
        item_type: ITEM_TYPE_BY_DOMAIN[domain],
        status: "confirmed",
        booking_reference: typeof ref === "string" ? ref : undefined,
        details: booking,
      });
    } catch (err) {
      console.warn("[orchestrator:itinerary_append_failed]", {
        trip: trip.trip_id,
        message: err instanceof Error ? err.message : String(err),
      });
    }
  }

  async function dispatch(
    req: ChatRequest,
    intent: Intent,
    domain: Domain,
    ctx: UserContext,
    trip: Trip | undefined,
    contextUsed: boolean,
  ): Promise<ChatResponse> {
    const agent = opts.agents.get(domain);
    const base = { intent: intent.type, domain_used: domain, agent_used: agent?.identity, context_used: contextUsed };

    if (!agent || !agent.healthy) {
      return {
        ...base,
        success: false,
        message: `The ${domain} agent is not available right now.`,
        error: "upstream_unavailable",
        tools_called: [],
      };
    }

    updateHopContext({ routing: { agent: agent.identity } });
    let result: AgentResponse;
    try {
      result = await opts.dispatcher.dispatch(
        agent,
        {
          message: req.message,
          context: toDispatchContext(ctx, trip),
          parameters: req.parameters,
          confirm: req.confirm,
          conversation_id: req.conversation_id,
        },
        { onBehalfOf: opts.identity },
      );
    } catch (err) {
      if (!(err instanceof HopError)) throw err;
      console.warn("[orchestrator:dispatch_failed]", { agent: agent.identity, kind: err.kind, message: err.message });
      if (agentIsDown(err)) markUnhealthy(opts.agents, domain, err.message);
      return { ...base, success: false, message: userMessage(err.kind), error: err.kind, tools_called: [] };
    }

    const booking = intent.type === "book" && trip ? bookingFrom(result) : undefined;
    if (booking && trip) await appendBooking(trip, domain, booking);

    return {
      ...base,
      success: result.success,
      message: result.message,
      tools_called: result.tools_called,
      data: result.data,
      error: result.error,
      confirmation_required: result.confirmation_required,
    };
  }

  return {
    async handle(req) {
      const loaded = await loadContext(req.caller_id);
      const contextUsed = loaded !== undefined;
      const ctx = loaded ?? emptyUserContext();
      const trip = selectTrip(ctx, req.trip_id);

      const intent = classifyIntent(req.message, { hasActiveTrip: trip !== undefined });
      updateHopContext({ routing: { intent: intent.type, domain: intent.domain } });
      console.log("[orchestrator]", JSON.stringify({ caller: req.caller_id, intent, message: clip(req.message) }));

      if (intent.type === "query") {
        return {
          success: true,
          message: contextUsed
            ? formatItinerary(ctx, trip)
            : "I couldn't find any trip information. Would you like to plan a new trip?",
          intent: intent.type,
          tools_called: [],
          context_used: contextUsed,
        };
      }

      if (intent.type === "create") return createTrip(req, intent, contextUsed);

      if (intent.domain !== "none") {
        return dispatch(req, intent, intent.domain, ctx, trip, contextUsed);
      }

      return {
        success: true,
        message: intent.confidence > 0 ? TRIP_HELP : HELP,
        intent: intent.type,
        tools_called: [],
        context_used: contextUsed,
      };
    },
  };
}
