// packages/worker-agent/src/rules/vehicles.ts
import { hasWord, rule, type DispatchRule, type RuleInput } from "./rule";
import { cityIn, firstDate, preference, secondDate, tripDestination, tripEnd, tripStart } from "./entities";
import { recordArg, wantsBooking, wantsCancel, wantsDetails, wantsList, wantsLookup } from "./shared";

const CATEGORY_WORDS: [string, readonly string[]][] = [
  ["economy", ["economy", "cheap", "cheapest"]],
  ["compact", ["compact", "small"]],
  ["midsize", ["midsize", "mid-size"]],
  ["fullsize", ["fullsize", "full-size"]],
  ["suv", ["suv"]],
  ["luxury", ["luxury"]],
  ["van", ["van", "minivan"]],
];

const DEFAULT_LOCATION = "LAX";

function categoryIn(input: RuleInput): string | undefined {
  return CATEGORY_WORDS.find(([, words]) => hasWord(input.lower, words))?.[0];
}

export const vehicleRules: DispatchRule[] = [
  rule({
    tool: "list_locations",
    label: "rental locations",
    when: (input) => hasWord(input.lower, ["locations", "branches", "offices"]) || wantsList("locations")(input),
    args: { city: { params: ["city"], message: cityIn } },
  }),
  rule({
    tool: "cancel_rental",
    label: "rental cancellation",
    when: wantsCancel,
    args: { rental_id: recordArg("rental_id", "booking_id") },
  }),
  rule({
    tool: "book_vehicle",
    label: "vehicle rental",
    when: wantsBooking,
    args: {
      vehicle_id: recordArg("vehicle_id", "offer_id"),
      pickup_date: { message: firstDate, context: tripStart, required: true },
      dropoff_date: { message: secondDate, context: tripEnd, required: true },
      location: { params: ["location", "city"], message: cityIn, context: tripDestination, required: true },
      driver_name: { params: ["driver_name", "name"], context: preference("full_name"), required: true },
      driver_email: { params: ["driver_email", "email"], context: preference("email"), required: true },
    },
  }),
  rule({
    tool: "get_rental",
    label: "rental",
    when: wantsLookup,
    args: { rental_id: recordArg("rental_id", "booking_id") },
  }),
  rule({
    tool: "get_vehicle_details",
    label: "vehicle details",
    when: wantsDetails,
    args: { vehicle_id: recordArg("vehicle_id") },
  }),
  rule({
    tool: "search_vehicles",
    label: "vehicles",
    when: (input) =>
      hasWord(input.lower, ["car", "cars", "vehicle", "vehicles", "rent", "rental", "suv", "van", "drive"]) ||
      cityIn(input) !== undefined,
    args: {
      location: {
        params: ["location", "city"],
        message: cityIn,
        context: tripDestination,
        fallback: DEFAULT_LOCATION,
        required: true,
      },
      pickup_date: { message: firstDate, context: tripStart },
      dropoff_date: { message: secondDate, context: tripEnd },
      category: { params: ["category"], message: categoryIn },
    },
  }),
];
