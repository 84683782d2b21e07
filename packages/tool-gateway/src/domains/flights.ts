// packages/tool-gateway/src/domains/flights.ts
import { z } from "zod";
import { defineTool, type AnyTool } from "../tools";
import { addDays, formatDate, isoDate, placeArg, recordId } from "./shared";

export const flightsTools: AnyTool[] = [
  defineTool({
    name: "list_airports",
    description: "List airports served",
    args: z.object({}),
    params: {},
    sideEffect: false,
    run: async (_args, { backend }) => ({ airports: await backend.listLocations() }),
  }),
  defineTool({
    name: "search_flights",
    description: "Search flights between two airports",
    args: z.object({
      origin: placeArg,
      destination: placeArg,
      departure_date: isoDate.optional(),
      return_date: isoDate.optional(),
      passengers: z.number().int().min(1).max(9).default(1),
      cabin_class: z.enum(["economy", "business", "first"]).default("economy"),
    }),
    params: {
      origin: "Origin city or airport code",
      destination: "Destination city or airport code",
      departure_date: "Departure date (YYYY-MM-DD), defaults to tomorrow",
      return_date: "Return date for round trips",
      passengers: "Number of passengers (1-9)",
      cabin_class: "economy, business or first",
    },
    sideEffect: false,
    run: async (args, { backend, now }) => {
      const criteria = {
        ...args,
        departure_date: args.departure_date ?? addDays(formatDate(now()), 1),
      };
      const flights = await backend.search(criteria);
      return { flights, count: flights.length, criteria };
    },
  }),
  defineTool({
    name: "get_flight_details",
    description: "Details of one flight",
    args: z.object({ flight_id: recordId }),
    params: { flight_id: "Flight id from search results" },
    sideEffect: false,
    run: async (args, { backend }) => ({ flight: await backend.details(args.flight_id) }),
  }),
  defineTool({
    name: "book_flight",
    description: "Book a seat on a flight",
    args: z.object({
      flight_id: recordId,
      passenger_name: z.string().trim().min(1),
      contact_email: z.string().email(),
      contact_phone: z.string().optional(),
    }),
    params: {
      flight_id: "Flight id from search results",
      passenger_name: "Passenger full name",
      contact_email: "Contact email",
      contact_phone: "Contact phone",
    },
    sideEffect: true,
    run: async (args, { backend }) => ({
      booking: await backend.book({
        flight_id: args.flight_id,
        passengers: [{ name: args.passenger_name }],
        contact_email: args.contact_email,
        contact_phone: args.contact_phone,
      }),
    }),
  }),
  defineTool({
    name: "get_booking",
    description: "Look up a flight booking",
    args: z.object({ booking_id: recordId }),
    params: { booking_id: "Booking id" },
    sideEffect: false,
    run: async (args, { backend }) => ({ booking: await backend.get(args.booking_id) }),
  }),
  defineTool({
    name: "cancel_booking",
    description: "Cancel a flight booking",
    args: z.object({ booking_id: recordId }),
    params: { booking_id: "Booking id" },
    sideEffect: true,
    run: async (args, { backend }) => ({ cancellation: await backend.cancel(args.booking_id) }),
  }),
];
