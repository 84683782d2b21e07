// packages/worker-agent/src/rules/lodging.ts
import { hasWord, rule, type DispatchRule } from "./rule";
import { cityIn, countIn, firstDate, preference, secondDate, tripDestination, tripEnd, tripStart } from "./entities";
import { recordArg, wantsBooking, wantsCancel, wantsDetails, wantsList, wantsLookup } from "./shared";

const STARS = /\b([1-5])[ -]?stars?\b/;

/** Searched when neither the request nor the trip names a city. */
const DEFAULT_CITY = "MIA";

export const lodgingRules: DispatchRule[] = [
  rule({ tool: "list_cities", label: "cities", when: wantsList("cities"), args: {} }),
  rule({
    tool: "cancel_reservation",
    label: "reservation cancellation",
    when: wantsCancel,
    args: { booking_id: recordArg("booking_id", "reservation_id") },
  }),
  rule({
    tool: "book_hotel",
    label: "hotel reservation",
    when: wantsBooking,
    args: {
      room_type_id: recordArg("room_type_id", "room_id", "offer_id"),
      check_in: { message: firstDate, context: tripStart, required: true },
      check_out: { message: secondDate, context: tripEnd, required: true },
      guests: { params: ["guests"], message: countIn(/(?:guests?|people|adults)/) },
      guest_name: { params: ["guest_name", "name"], context: preference("full_name"), required: true },
      guest_email: { params: ["guest_email", "email"], context: preference("email"), required: true },
    },
  }),
  rule({
    tool: "get_reservation",
    label: "reservation",
    when: wantsLookup,
    args: { booking_id: recordArg("booking_id", "reservation_id") },
  }),
  rule({
    tool: "get_hotel_details",
    label: "hotel details",
    when: wantsDetails,
    args: { hotel_id: recordArg("hotel_id") },
  }),
  rule({
    tool: "search_hotels",
    label: "hotels",
    when: (input) =>
      hasWord(input.lower, ["hotel", "hotels", "stay", "lodging", "room", "rooms", "accommodation"]) ||
      cityIn(input) !== undefined,
    args: {
      city: {
        params: ["city", "destination"],
        message: cityIn,
        context: tripDestination,
        fallback: DEFAULT_CITY,
        required: true,
      },
      check_in: { message: firstDate, context: tripStart },
      check_out: { message: secondDate, context: tripEnd },
      guests: { params: ["guests"], message: countIn(/(?:guests?|people|adults)/) },
      min_stars: {
        params: ["min_stars"],
        message: (input) => {
          const m = STARS.exec(input.lower);
          return m?.[1] ? Number(m[1]) : undefined;
        },
      },
    },
  }),
];
