// packages/tool-gateway/src/domains/vehicles.ts
import { z } from "zod";
import { defineTool, type AnyTool } from "../tools";
import { dateWindow, isoDate, placeArg, recordId } from "./shared";

const categories = z.enum(["economy", "compact", "midsize", "fullsize", "suv", "luxury", "van"]);

export const vehiclesTools: AnyTool[] = [
  defineTool({
    name: "list_locations",
    description: "List rental locations, optionally in one city",
    args: z.object({ city: placeArg.optional() }),
    params: { city: "City name or code" },
    sideEffect: false,
    run: async (args, { backend }) => ({
      locations: await backend.listLocations(args.city ? { city_code: args.city } : undefined),
    }),
  }),
  defineTool({
    name: "search_vehicles",
    description: "Search rental vehicles at a location",
    args: z.object({
      location: placeArg,
      dropoff_location: placeArg.optional(),
      pickup_date: isoDate.optional(),
      dropoff_date: isoDate.optional(),
      category: categories.optional(),
    }),
    params: {
      location: "Pickup city or code",
      dropoff_location: "Drop-off city or code, defaults to pickup",
      pickup_date: "Pickup date (YYYY-MM-DD), defaults to tomorrow",
      dropoff_date: "Drop-off date (YYYY-MM-DD), defaults to one day",
      category: "Vehicle category",
    },
    sideEffect: false,
    run: async (args, { backend, now }) => {
      const span = dateWindow(now(), args.pickup_date, args.dropoff_date);
      const criteria = {
        pickup_location_code: args.location,
        dropoff_location_code: args.dropoff_location ?? args.location,
        pickup_date: span.start,
        dropoff_date: span.end,
        category: args.category,
      };
      const vehicles = await backend.search(criteria);
      return { vehicles, count: vehicles.length, criteria };
    },
  }),
  defineTool({
    name: "get_vehicle_details",
    description: "Details of one vehicle",
    args: z.object({ vehicle_id: recordId }),
    params: { vehicle_id: "Vehicle id from search results" },
    sideEffect: false,
    run: async (args, { backend }) => ({ vehicle: await backend.details(args.vehicle_id) }),
  }),
  defineTool({
    name: "book_vehicle",
    description: "Rent a vehicle",
    args: z.object({
      vehicle_id: recordId,
      pickup_date: isoDate,
      dropoff_date: isoDate,
      location: placeArg,
      driver_name: z.string().trim().min(1),
      driver_email: z.string().email(),
    }),
    params: {
      vehicle_id: "Vehicle id from search results",
      pickup_date: "Pickup date (YYYY-MM-DD)",
      dropoff_date: "Drop-off date (YYYY-MM-DD)",
      location: "Pickup city or code",
      driver_name: "Driver full name",
      driver_email: "Driver email",
    },
    sideEffect: true,
    run: async (args, { backend }) => ({
      rental: await backend.book({
        vehicle_id: args.vehicle_id,
        pickup_date: args.pickup_date,
        dropoff_date: args.dropoff_date,
        pickup_location_code: args.location,
        driver_name: args.driver_name,
        driver_email: args.driver_email,
      }),
    }),
  }),
  defineTool({
    name: "get_rental",
    description: "Look up a rental",
    args: z.object({ rental_id: recordId }),
    params: { rental_id: "Rental id" },
    sideEffect: false,
    run: async (args, { backend }) => ({ rental: await backend.get(args.rental_id) }),
  }),
  defineTool({
    name: "cancel_rental",
    description: "Cancel a rental",
    args: z.object({ rental_id: recordId }),
    params: { rental_id: "Rental id" },
    sideEffect: true,
    run: async (args, { backend }) => ({ cancellation: await backend.cancel(args.rental_id) }),
  }),
];
