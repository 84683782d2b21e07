// packages/tool-gateway/src/domains/lodging.ts
import { z } from "zod";
import { defineTool, type AnyTool } from "../tools";
import { dateWindow, isoDate, placeArg, recordId } from "./shared";

export const lodgingTools: AnyTool[] = [
  defineTool({
    name: "list_cities",
    description: "List cities with hotel inventory",
    args: z.object({}),
    params: {},
    sideEffect: false,
    run: async (_args, { backend }) => ({ cities: await backend.listLocations() }),
  }),
  defineTool({
    name: "search_hotels",
    description: "Search hotels in a city",
    args: z.object({
      city: placeArg,
      check_in: isoDate.optional(),
      check_out: isoDate.optional(),
      guests: z.number().int().min(1).max(10).default(1),
      min_stars: z.number().int().min(1).max(5).optional(),
    }),
    params: {
      city: "City name or code",
      check_in: "Check-in date (YYYY-MM-DD), defaults to tomorrow",
      check_out: "Check-out date (YYYY-MM-DD), defaults to one night",
      guests: "Number of guests (1-10)",
      min_stars: "Minimum star rating",
    },
    sideEffect: false,
    run: async (args, { backend, now }) => {
      const stay = dateWindow(now(), args.check_in, args.check_out);
      const criteria = {
        city_code: args.city,
        check_in_date: stay.start,
        check_out_date: stay.end,
        guests: args.guests,
        min_stars: args.min_stars ?? 1,
      };
      const hotels = await backend.search(criteria);
      return { hotels, count: hotels.length, criteria };
    },
  }),
  defineTool({
    name: "get_hotel_details",
    description: "Details and room types of one hotel",
    args: z.object({ hotel_id: recordId }),
    params: { hotel_id: "Hotel id from search results" },
    sideEffect: false,
    run: async (args, { backend }) => ({ hotel: await backend.details(args.hotel_id) }),
  }),
  defineTool({
    name: "book_hotel",
    description: "Reserve a room",
    args: z.object({
      room_type_id: recordId,
      check_in: isoDate,
      check_out: isoDate,
      guests: z.number().int().min(1).max(10).default(1),
      guest_name: z.string().trim().min(1),
      guest_email: z.string().email(),
    }),
    params: {
      room_type_id: "Room type id from hotel details",
      check_in: "Check-in date (YYYY-MM-DD)",
      check_out: "Check-out date (YYYY-MM-DD)",
      guests: "Number of guests",
      guest_name: "Guest full name",
      guest_email: "Guest email",
    },
    sideEffect: true,
    run: async (args, { backend }) => ({
      booking: await backend.book({
        room_type_id: args.room_type_id,
        check_in_date: args.check_in,
        check_out_date: args.check_out,
        num_guests: args.guests,
        guest_name: args.guest_name,
        guest_email: args.guest_email,
      }),
    }),
  }),
  defineTool({
    name: "get_reservation",
    description: "Look up a hotel reservation",
    args: z.object({ booking_id: recordId }),
    params: { booking_id: "Reservation id" },
    sideEffect: false,
    run: async (args, { backend }) => ({ booking: await backend.get(args.booking_id) }),
  }),
  defineTool({
    name: "cancel_reservation",
    description: "Cancel a hotel reservation",
    args: z.object({ booking_id: recordId }),
    params: { booking_id: "Reservation id" },
    sideEffect: true,
    run: async (args, { backend }) => ({ cancellation: await backend.cancel(args.booking_id) }),
  }),
];
