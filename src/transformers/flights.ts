/**
 * Flight-offers transformer.
 * Reduces the upstream flight-offers payload to the fields the search UI
 * shows: price, total duration and the segments of the outbound itinerary.
 */

import type { FlightOfferSummary, FlightSegmentSummary, NormalizedOffers } from "../types/travel.js";
import { isRecord } from "../lib/validation.js";

function str(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return null;
}

function rec(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

function list(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function toSegment(raw: unknown): FlightSegmentSummary {
  const s = rec(raw);
  const departure = rec(s.departure);
  const arrival = rec(s.arrival);
  return {
    from: str(departure.iataCode),
    to: str(arrival.iataCode),
    departAt: str(departure.at),
    arriveAt: str(arrival.at),
    carrier: str(s.carrierCode),
    flightNumber: str(s.number),
    segmentDuration: str(s.duration),
  };
}

export function toOfferSummary(raw: unknown): FlightOfferSummary {
  const offer = rec(raw);
  const price = rec(offer.price);
  const firstItinerary = rec(list(offer.itineraries)[0]);
  return {
    id: str(offer.id),
    total: str(price.total),
    currency: str(price.currency),
    duration: str(firstItinerary.duration),
    segments: list(firstItinerary.segments).map(toSegment),
  };
}

export function normalizeFlightOffers(raw: unknown): NormalizedOffers {
  const offers = list(rec(raw).data).map(toOfferSummary);
  return { count: offers.length, offers };
}
