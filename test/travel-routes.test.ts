/**
 * Travel routes: HTTP Tests
 * Run: npx vitest run test/travel-routes.test.ts
 *
 * Starts the Express app on an ephemeral local port with a fake search
 * client, so only validation and error mapping are under test.
 */

import { describe, test, expect, beforeAll, afterAll, beforeEach, vi } from "vitest";
import type { Server } from "http";
import { createApp } from "../src/app.js";
import { AuthenticationError, UpstreamError } from "../src/lib/errors.js";
import type {
  FlightSearchParams,
  HotelSearchParams,
  LocationSearchParams,
  NormalizedOffers,
} from "../src/types/travel.js";

// --- Fake client ---

const client = {
  searchFlights: vi.fn<(params: FlightSearchParams) => Promise<NormalizedOffers>>(),
  searchHotels: vi.fn<(params: HotelSearchParams) => Promise<unknown>>(),
  searchLocations: vi.fn<(params: LocationSearchParams) => Promise<unknown>>(),
};

const OFFERS: NormalizedOffers = {
  count: 3,
  offers: ["100.00", "120.00", "130.00"].map((total, i) => ({
    id: String(i + 1),
    total,
    currency: "INR",
    duration: "PT4H5M",
    segments: [],
  })),
};

let server: Server;
let baseUrl = "";

async function startApp(searchTimeoutMs: number) {
  const app = createApp({
    config: { allowOrigins: ["*"], defaultCurrency: "INR", affiliateId: "aff-1", domain: "fares.test", searchTimeoutMs },
    client,
  });
  const started = await new Promise<Server>((resolve) => {
    const s = app.listen(0, "127.0.0.1", () => resolve(s));
  });
  const address = started.address();
  if (address === null || typeof address === "string") throw new Error("server has no TCP address");
  return { server: started, url: `http://127.0.0.1:${address.port}` };
}

function stop(s: Server) {
  return new Promise<void>((resolve, reject) => s.close((err) => (err ? reject(err) : resolve())));
}

beforeAll(async () => {
  ({ server, url: baseUrl } = await startApp(90_000));
});

afterAll(async () => {
  await stop(server);
});

beforeEach(() => {
  client.searchFlights.mockReset();
  client.searchHotels.mockReset();
  client.searchLocations.mockReset();
  vi.spyOn(console, "error").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

async function get(path: string, origin = baseUrl) {
  const res = await fetch(`${origin}${path}`);
  const body: unknown = await res.json();
  return { status: res.status, headers: res.headers, body };
}

// --- Health ---

describe("health and info", () => {
  test("GET /health", async () => {
    const { status, body } = await get("/health");
    expect(status).toBe(200);
    expect(body).toMatchObject({ status: "ok" });
  });

  test("GET /api/affiliate/info", async () => {
    const { body } = await get("/api/affiliate/info");
    expect(body).toEqual({ affiliate_id: "aff-1", domain: "fares.test" });
  });

  test("unknown routes answer 404", async () => {
    const { status, body } = await get("/api/nope");
    expect(status).toBe(404);
    expect(body).toEqual({ error: "Not found" });
  });
});

// --- Flights ---

describe("GET /api/search/flights", () => {
  test("normalizes the query and wraps the client result", async () => {
    client.searchFlights.mockResolvedValueOnce(OFFERS);

    const { status, body } = await get("/api/search/flights?origin=blr&destination=dxb&departureDate=2026-04-30&adults=1");

    expect(status).toBe(200);
    expect(client.searchFlights).toHaveBeenCalledWith({
      origin: "BLR",
      destination: "DXB",
      departureDate: "2026-04-30",
      returnDate: undefined,
      adults: 1,
      nonStop: false,
      max: 20,
      currencyCode: "INR",
    });
    expect(body).toEqual({
      query: { origin: "BLR", destination: "DXB", departureDate: "2026-04-30", returnDate: null, adults: 1, nonStop: false },
      count: 3,
      offers: OFFERS.offers,
    });
  });

  test("clamps counts and reads flags", async () => {
    client.searchFlights.mockResolvedValueOnce({ count: 0, offers: [] });

    await get("/api/search/flights?origin=BLR&destination=DXB&departureDate=2026-04-30&adults=20&max=500&nonStop=true");

    expect(client.searchFlights).toHaveBeenCalledWith(expect.objectContaining({ adults: 9, max: 50, nonStop: true }));
  });

  test("rejects a malformed origin without calling upstream", async () => {
    const { status, body } = await get("/api/search/flights?origin=BANG&destination=DXB&departureDate=2026-04-30");

    expect(status).toBe(400);
    expect(body).toEqual({ error: "Invalid 'origin': must be 3-letter IATA code (e.g. BLR)" });
    expect(client.searchFlights).not.toHaveBeenCalled();
  });

  test("rejects impossible dates and returns before departure", async () => {
    const bad = await get("/api/search/flights?origin=BLR&destination=DXB&departureDate=2026-02-30");
    expect(bad.status).toBe(400);

    const backwards = await get(
      "/api/search/flights?origin=BLR&destination=DXB&departureDate=2026-04-30&returnDate=2026-04-20",
    );
    expect(backwards.status).toBe(400);
    expect(backwards.body).toEqual({ error: "Invalid 'returnDate': must be YYYY-MM-DD, not before departureDate" });
  });

  test("retryable upstream failures map to 502 with Retry-After", async () => {
    client.searchFlights.mockRejectedValueOnce(
      new UpstreamError("amadeus 429: Too many requests", { status: 429, retryable: true }),
    );

    const { status, headers, body } = await get("/api/search/flights?origin=BLR&destination=DXB&departureDate=2026-04-30");

    expect(status).toBe(502);
    expect(headers.get("retry-after")).toBe("5");
    expect(body).toEqual({ error: "amadeus 429: Too many requests", upstreamStatus: 429, retryable: true });
  });

  test("non-retryable upstream failures map to 502 without Retry-After", async () => {
    client.searchFlights.mockRejectedValueOnce(new UpstreamError("amadeus 400: bad request", { status: 400 }));

    const { status, headers, body } = await get("/api/search/flights?origin=BLR&destination=DXB&departureDate=2026-04-30");

    expect(status).toBe(502);
    expect(headers.get("retry-after")).toBeNull();
    expect(body).toEqual({ error: "amadeus 400: bad request", upstreamStatus: 400, retryable: false });
  });

  test("authentication failures map to 502", async () => {
    client.searchFlights.mockRejectedValueOnce(new AuthenticationError("Token exchange rejected (401): invalid_client", { status: 401 }));

    const { status, body } = await get("/api/search/flights?origin=BLR&destination=DXB&departureDate=2026-04-30");

    expect(status).toBe(502);
    expect(body).toEqual({ error: "Upstream authentication failed", retryable: false });
  });

  test("unexpected errors map to 500", async () => {
    client.searchFlights.mockRejectedValueOnce(new Error("boom"));

    const { status, body } = await get("/api/search/flights?origin=BLR&destination=DXB&departureDate=2026-04-30");

    expect(status).toBe(500);
    expect(body).toEqual({ error: "Internal server error" });
  });
});

// --- Insight ---

describe("GET /api/search/flights/insight", () => {
  test("returns a recommendation for priced offers", async () => {
    client.searchFlights.mockResolvedValueOnce(OFFERS);

    const { status, body } = await get("/api/search/flights/insight?origin=BLR&destination=DXB&departureDate=2030-01-15");

    expect(status).toBe(200);
    expect(body).toMatchObject({
      query: { origin: "BLR", destination: "DXB", departureDate: "2030-01-15" },
      offersConsidered: 3,
      insight: { bestPrice: 100, currency: "INR", recommendation: "BOOK", confidence: 0.65 },
    });
  });

  test("answers 404 when nothing is priced", async () => {
    client.searchFlights.mockResolvedValueOnce({ count: 0, offers: [] });

    const { status } = await get("/api/search/flights/insight?origin=BLR&destination=DXB&departureDate=2030-01-15");

    expect(status).toBe(404);
  });
});

// --- Hotels and locations ---

describe("GET /api/search/hotels", () => {
  test("maps checkIn/checkOut to the client parameters", async () => {
    client.searchHotels.mockResolvedValueOnce({ data: [] });

    const { status, body } = await get("/api/search/hotels?cityCode=del&checkIn=2026-05-01&checkOut=2026-05-03");

    expect(status).toBe(200);
    expect(body).toEqual({ data: [] });
    expect(client.searchHotels).toHaveBeenCalledWith({
      cityCode: "DEL",
      checkInDate: "2026-05-01",
      checkOutDate: "2026-05-03",
      adults: undefined,
      roomQuantity: undefined,
    });
  });

  test("rejects a checkout on or before check-in", async () => {
    const { status } = await get("/api/search/hotels?cityCode=DEL&checkIn=2026-05-03&checkOut=2026-05-03");

    expect(status).toBe(400);
    expect(client.searchHotels).not.toHaveBeenCalled();
  });
});

describe("GET /api/search/locations", () => {
  test("upper-cases the keyword and defaults the sub-types", async () => {
    client.searchLocations.mockResolvedValueOnce({ data: [{ iataCode: "BLR" }] });

    const { status } = await get("/api/search/locations?keyword=bangalore");

    expect(status).toBe(200);
    expect(client.searchLocations).toHaveBeenCalledWith({ keyword: "BANGALORE", subType: "AIRPORT,CITY" });
  });

  test("validates keyword and sub-type", async () => {
    expect((await get("/api/search/locations?keyword=b")).status).toBe(400);
    expect((await get("/api/search/locations?keyword=bangalore&subType=HOTEL")).status).toBe(400);
    expect(client.searchLocations).not.toHaveBeenCalled();
  });
});

// --- Late upstream results ---

describe("a search that outlives the route deadline", () => {
  const FLIGHTS = "/api/search/flights?origin=BLR&destination=DXB&departureDate=2026-04-30";

  let slow: Server;
  let slowUrl = "";
  const unhandled: unknown[] = [];
  const onUnhandled = (reason: unknown) => {
    unhandled.push(reason);
  };

  beforeAll(async () => {
    ({ server: slow, url: slowUrl } = await startApp(50));
    process.on("unhandledRejection", onUnhandled);
  });

  afterAll(async () => {
    process.off("unhandledRejection", onUnhandled);
    await stop(slow);
  });

  /** Settles with `settle()` 150ms from now, well past the 50ms deadline. */
  function later<T>(settle: () => T): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      setTimeout(() => {
        try {
          resolve(settle());
        } catch (err) {
          reject(err);
        }
      }, 150);
    });
  }

  test("answers 504 and drops the late result", async () => {
    client.searchFlights.mockImplementationOnce(() => later(() => OFFERS));

    const { status, body } = await get(FLIGHTS, slowUrl);

    expect(status).toBe(504);
    expect(body).toMatchObject({ error: "Request timeout", timeout_ms: 50, retryable: true });
    await vi.waitFor(() =>
      expect(console.warn).toHaveBeenCalledWith(
        "[travel-flights] upstream result arrived after the response was sent; dropped",
      ),
    );
    expect(unhandled).toEqual([]);
  });

  test("answers 504 and drops the late error", async () => {
    client.searchFlights.mockImplementationOnce(() =>
      later(() => {
        throw new UpstreamError("amadeus 503: unavailable", { status: 503, retryable: true });
      }),
    );

    const { status } = await get(FLIGHTS, slowUrl);

    expect(status).toBe(504);
    await vi.waitFor(() =>
      expect(console.warn).toHaveBeenCalledWith(
        "[travel-flights] upstream error (amadeus 503: unavailable) arrived after the response was sent; dropped",
      ),
    );
    expect(console.error).not.toHaveBeenCalledWith(expect.stringContaining("[travel-flights] upstream error"));
    expect(unhandled).toEqual([]);
  });
});
