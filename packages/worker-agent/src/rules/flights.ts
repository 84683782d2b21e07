// packages/worker-agent/src/rules/flights.ts
import { hasWord, rule, type DispatchRule } from "./rule";
import {
  countIn,
  destinationIn,
  firstDate,
  originIn,
  preference,
  secondDate,
  tripDestination,
  tripEnd,
  tripStart,
} from "./entities";
import { recordArg, wantsBooking, wantsCancel, wantsDetails, wantsList, wantsLookup } from "./shared";

const CABINS = ["economy", "business", "first"] as const;

// route searched when nothing names one
const DEFAULT_ORIGIN = "JFK";
const DEFAULT_DESTINATION = "LAX";

export const flightRules: DispatchRule[] = [
  rule({ tool: "list_airports", label: "airports", when: wantsList("airports"), args: {} }),
  rule({
    tool: "cancel_booking",
    label: "flight cancellation",
    when: wantsCancel,
    args: { booking_id: recordArg("booking_id") },
  }),
  rule({
    tool: "book_flight",
    label: "flight booking",
    when: wantsBooking,
    args: {
      flight_id: recordArg("flight_id", "offer_id"),
      passenger_name: { params: ["passenger_name", "name"], context: preference("full_name"), required: true },
      contact_email: { params: ["contact_email", "email"], context: preference("email"), required: true },
      contact_phone: { params: ["contact_phone", "phone"], context: preference("phone") },
    },
  }),
  rule({
    tool: "get_booking",
    label: "booking",
    when: wantsLookup,
    args: { booking_id: recordArg("booking_id") },
  }),
  rule({
    tool: "get_flight_details",
    label: "flight details",
    when: wantsDetails,
    args: { flight_id: recordArg("flight_id") },
  }),
  rule({
    tool: "search_flights",
    label: "flights",
    when: (input) =>
      hasWord(input.lower, ["flight", "flights", "fly", "flying", "airfare"]) ||
      destinationIn(input) !== undefined,
    args: {
      origin: {
        params: ["origin", "from"],
        message: originIn,
        context: preference("home_airport"),
        fallback: DEFAULT_ORIGIN,
        required: true,
      },
      destination: {
        params: ["destination", "to"],
        message: destinationIn,
        context: tripDestination,
        fallback: DEFAULT_DESTINATION,
        required: true,
      },
      departure_date: { message: firstDate, context: tripStart },
      return_date: { message: secondDate, context: tripEnd },
      passengers: { params: ["passengers", "travelers"], message: countIn(/(?:passengers?|people|adults|travell?ers)/) },
      cabin_class: {
        params: ["cabin_class", "cabin"],
        message: (input) => CABINS.find((c) => hasWord(input.lower, [`${c} class`])),
      },
    },
  }),
];
