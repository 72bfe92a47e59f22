import type { FlightInsight, FlightOfferSummary } from "../types/travel.js";
import { InvalidArgumentError } from "./errors.js";

export interface PricePoint {
  total: number;
  currency: string;
}

const DAY_MS = 86_400_000;

/** A fare at or below this share of the median counts as a deal. */
const DEAL_RATIO = 0.88;

/** Priced offers only: positive total and a currency. */
export function extractPricePoints(offers: FlightOfferSummary[]): PricePoint[] {
  const points: PricePoint[] = [];
  for (const offer of offers) {
    const total = offer.total === null ? NaN : Number(offer.total.trim());
    const currency = offer.currency?.trim();
    if (!offer.total?.trim() || !Number.isFinite(total) || total <= 0) continue;
    if (!currency) continue;
    points.push({ total, currency });
  }
  return points;
}

/** Whole days from the local calendar date of `today` to `departureDate`. */
export function daysToDeparture(departureDate: string, today: Date = new Date()): number {
  const departure = Date.parse(`${departureDate}T00:00:00Z`);
  const start = Date.UTC(today.getFullYear(), today.getMonth(), today.getDate());
  return Math.round((departure - start) / DAY_MS);
}

function median(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

function clamp(value: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, value));
}

/**
 * BOOK/WAIT heuristic over the fares currently on offer.
 *
 * Inside the final week it always says BOOK. Further out it says BOOK only
 * when the cheapest fare is well under the median, otherwise WAIT.
 * Confidence grows near departure and with a tight price spread.
 */
export function computeFlightInsight(
  points: PricePoint[],
  departureDate: string,
  today?: Date,
): FlightInsight {
  if (points.length === 0) {
    throw new InvalidArgumentError("No valid flight prices found");
  }

  const totals = points.map((p) => p.total);
  const best = Math.min(...totals);
  const med = median(totals);
  const bestCurrency = points.find((p) => p.total === best)?.currency ?? points[0].currency;

  const days = Math.max(daysToDeparture(departureDate, today), 0);

  let spread = 0;
  let deal = false;
  if (med > 0) {
    spread = (med - best) / med;
    deal = best <= med * DEAL_RATIO;
  }

  let recommendation: FlightInsight["recommendation"];
  let reason: string;
  if (days <= 7) {
    recommendation = "BOOK";
    reason = "Close to departure: prices often rise in the final week. Booking now reduces risk.";
  } else if (deal) {
    recommendation = "BOOK";
    reason = "This fare is significantly cheaper than other options right now. Lock it in.";
  } else {
    recommendation = "WAIT";
    reason = "Still early: prices often improve closer to departure. Set an alert and recheck in a few days.";
  }

  let confidence = 0.55;
  if (days <= 7) confidence += 0.2;
  else if (days <= 21) confidence += 0.1;
  if (deal) confidence += 0.1;
  if (spread >= 0.18) confidence -= 0.08;
  if (spread <= 0.06) confidence += 0.05;

  return {
    bestPrice: best,
    currency: bestCurrency,
    recommendation,
    reason,
    confidence: Math.round(clamp(confidence, 0.45, 0.85) * 100) / 100,
  };
}
