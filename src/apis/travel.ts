import { Router, type Request, type Response } from "express";
import type { AmadeusClient } from "../providers/amadeus.js";
import { AuthenticationError, InvalidArgumentError, UpstreamError } from "../lib/errors.js";
import { computeFlightInsight, extractPricePoints } from "../lib/flight-insight.js";
import {
  clampInt,
  isValidCurrency,
  isValidDate,
  isValidIata,
  isValidKeyword,
  parseBool,
  queryString,
  safeErrorMessage,
  validateSubTypes,
} from "../lib/validation.js";
import type { FlightSearchParams } from "../types/travel.js";

export type TravelSearchClient = Pick<AmadeusClient, "searchFlights" | "searchHotels" | "searchLocations">;

export interface TravelRouterOptions {
  client: TravelSearchClient;
  defaultCurrency: string;
  affiliateId: string | null;
  domain: string | null;
}

type Parsed<T> = { ok: true; value: T } | { ok: false; error: string };

function parseFlightQuery(req: Request, defaultCurrency: string): Parsed<FlightSearchParams> {
  const origin = (queryString(req.query.origin) ?? "").trim().toUpperCase();
  const destination = (queryString(req.query.destination) ?? "").trim().toUpperCase();
  const departureDate = queryString(req.query.departureDate) ?? "";
  const returnDate = queryString(req.query.returnDate) || undefined;
  const currencyCode = (queryString(req.query.currencyCode) || defaultCurrency).toUpperCase();

  if (!isValidIata(origin)) {
    return { ok: false, error: "Invalid 'origin': must be 3-letter IATA code (e.g. BLR)" };
  }
  if (!isValidIata(destination)) {
    return { ok: false, error: "Invalid 'destination': must be 3-letter IATA code (e.g. DXB)" };
  }
  if (!isValidDate(departureDate)) {
    return { ok: false, error: "Invalid 'departureDate': must be YYYY-MM-DD" };
  }
  if (returnDate !== undefined && (!isValidDate(returnDate) || returnDate < departureDate)) {
    return { ok: false, error: "Invalid 'returnDate': must be YYYY-MM-DD, not before departureDate" };
  }
  if (!isValidCurrency(currencyCode)) {
    return { ok: false, error: "Invalid 'currencyCode': must be a 3-letter ISO code" };
  }

  return {
    ok: true,
    value: {
      origin,
      destination,
      departureDate,
      returnDate,
      adults: clampInt(queryString(req.query.adults), 1, 9, 1),
      nonStop: parseBool(queryString(req.query.nonStop), false),
      max: clampInt(queryString(req.query.max), 1, 50, 20),
      currencyCode,
    },
  };
}

function isRetryable(err: unknown): boolean {
  return err instanceof UpstreamError && err.retryable;
}

/**
 * True when the timeout middleware has already answered. The late result or
 * error is logged and dropped; writing again would throw.
 */
function alreadyAnswered(res: Response, service: string, err?: unknown): boolean {
  if (!res.headersSent) return false;
  const outcome = err === undefined ? "result" : `error (${err instanceof Error ? err.message : String(err)})`;
  console.warn(`[${service}] upstream ${outcome} arrived after the response was sent; dropped`);
  return true;
}

/** Maps upstream-layer errors to a 502, logging under the route's tag. */
function sendUpstreamError(res: Response, service: string, err: unknown): void {
  if (alreadyAnswered(res, service, err)) return;
  if (err instanceof AuthenticationError) {
    console.error(`[${service}] upstream auth error: status=${err.status ?? "-"} message=${err.message}`);
    res.status(502).json({ error: "Upstream authentication failed", retryable: false });
    return;
  }
  if (err instanceof UpstreamError) {
    console.error(`[${service}] upstream error: status=${err.status ?? "-"} message=${err.message}`);
    if (isRetryable(err)) res.setHeader("Retry-After", "5");
    res.status(502).json({
      error: safeErrorMessage(err, "Upstream request failed"),
      upstreamStatus: err.status ?? null,
      retryable: err.retryable,
    });
    return;
  }
  console.error(`[${service}] unexpected error:`, err);
  res.status(500).json({ error: "Internal server error" });
}

export function createTravelRouter(options: TravelRouterOptions): Router {
  const { client, defaultCurrency } = options;
  const router = Router();

  // --- Flight Search ---

  router.get("/api/search/flights", async (req: Request, res: Response) => {
    const parsed = parseFlightQuery(req, defaultCurrency);
    if (!parsed.ok) {
      res.status(400).json({ error: parsed.error });
      return;
    }
    const query = parsed.value;

    try {
      const result = await client.searchFlights(query);
      if (alreadyAnswered(res, "travel-flights")) return;
      res.json({
        query: {
          origin: query.origin,
          destination: query.destination,
          departureDate: query.departureDate,
          returnDate: query.returnDate ?? null,
          adults: query.adults,
          nonStop: query.nonStop,
        },
        count: result.count,
        offers: result.offers,
      });
    } catch (err) {
      sendUpstreamError(res, "travel-flights", err);
    }
  });

  // --- Fare Insight (BOOK / WAIT) ---

  router.get("/api/search/flights/insight", async (req: Request, res: Response) => {
    const parsed = parseFlightQuery(req, defaultCurrency);
    if (!parsed.ok) {
      res.status(400).json({ error: parsed.error });
      return;
    }
    const query = parsed.value;

    try {
      const result = await client.searchFlights(query);
      if (alreadyAnswered(res, "travel-insight")) return;
      const insight = computeFlightInsight(extractPricePoints(result.offers), query.departureDate);
      res.json({
        query: { origin: query.origin, destination: query.destination, departureDate: query.departureDate },
        offersConsidered: result.count,
        insight,
      });
    } catch (err) {
      if (err instanceof InvalidArgumentError) {
        res.status(404).json({ error: "No priced offers found for this route and date" });
        return;
      }
      sendUpstreamError(res, "travel-insight", err);
    }
  });

  // --- Hotel Search ---

  router.get("/api/search/hotels", async (req: Request, res: Response) => {
    const cityCode = (queryString(req.query.cityCode) ?? "").trim().toUpperCase();
    const checkInDate = queryString(req.query.checkIn) ?? "";
    const checkOutDate = queryString(req.query.checkOut) ?? "";

    if (!isValidIata(cityCode)) {
      res.status(400).json({ error: "Invalid 'cityCode': must be 3-letter IATA code (e.g. DEL)" });
      return;
    }
    if (!isValidDate(checkInDate)) {
      res.status(400).json({ error: "Invalid 'checkIn': must be YYYY-MM-DD" });
      return;
    }
    if (!isValidDate(checkOutDate) || checkOutDate <= checkInDate) {
      res.status(400).json({ error: "Invalid 'checkOut': must be YYYY-MM-DD, after checkIn" });
      return;
    }

    const adultsRaw = queryString(req.query.adults);
    const roomsRaw = queryString(req.query.roomQuantity);

    try {
      const data = await client.searchHotels({
        cityCode,
        checkInDate,
        checkOutDate,
        adults: adultsRaw ? clampInt(adultsRaw, 1, 9, 1) : undefined,
        roomQuantity: roomsRaw ? clampInt(roomsRaw, 1, 9, 1) : undefined,
      });
      if (alreadyAnswered(res, "travel-hotels")) return;
      res.json(data);
    } catch (err) {
      sendUpstreamError(res, "travel-hotels", err);
    }
  });

  // --- Location / Airport Search ---

  router.get("/api/search/locations", async (req: Request, res: Response) => {
    const keyword = (queryString(req.query.keyword) ?? "").trim();
    if (!isValidKeyword(keyword)) {
      res.status(400).json({ error: "Provide 'keyword' with 2-50 letters, digits or spaces" });
      return;
    }

    const subType = validateSubTypes(queryString(req.query.subType) || "AIRPORT,CITY");
    if (!subType) {
      res.status(400).json({ error: "Invalid 'subType': use AIRPORT, CITY or both" });
      return;
    }

    try {
      const data = await client.searchLocations({ keyword: keyword.toUpperCase(), subType });
      if (alreadyAnswered(res, "travel-locations")) return;
      res.json(data);
    } catch (err) {
      sendUpstreamError(res, "travel-locations", err);
    }
  });

  // --- Affiliate Info ---

  router.get("/api/affiliate/info", (_req: Request, res: Response) => {
    res.json({ affiliate_id: options.affiliateId, domain: options.domain });
  });

  return router;
}
