import type { TTLCache } from "../lib/cache.js";
import { UpstreamError } from "../lib/errors.js";
import { buildCacheKey, toSearchParams, type QueryParams } from "../lib/cache-key.js";
import type { RetryExecutor } from "../lib/retry.js";
import { SingleFlight } from "../lib/single-flight.js";
import type { TokenStore } from "../lib/token-store.js";
import { normalizeFlightOffers } from "../transformers/flights.js";
import type {
  FlightSearchParams,
  HotelSearchParams,
  LocationSearchParams,
  NormalizedOffers,
} from "../types/travel.js";

export const ENDPOINTS = {
  token: "/v1/security/oauth2/token",
  flightOffers: "/v2/shopping/flight-offers",
  hotelOffers: "/v1/shopping/hotel-offers",
  locations: "/v1/reference-data/locations",
} as const;

export interface AmadeusClientOptions {
  baseUrl: string;
  tokens: TokenStore;
  cache: TTLCache<unknown>;
  retry: RetryExecutor;
  /** TTL for cached search results. */
  cacheTtlMs?: number;
  /** Share one upstream call between concurrent misses on the same key. */
  coalesce?: boolean;
}

/**
 * Upstream façade: cache first, then token, then the retried GET.
 * One instance is shared by every request; errors pass through untouched.
 */
export class AmadeusClient {
  private readonly baseUrl: string;
  private readonly cacheTtlMs: number;
  private readonly coalesce: boolean;
  private readonly inflight = new SingleFlight<unknown>();

  constructor(private readonly options: AmadeusClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.cacheTtlMs = options.cacheTtlMs ?? 60_000;
    this.coalesce = options.coalesce ?? true;
  }

  async searchFlights(params: FlightSearchParams): Promise<NormalizedOffers> {
    const query: QueryParams = {
      originLocationCode: params.origin,
      destinationLocationCode: params.destination,
      departureDate: params.departureDate,
      returnDate: params.returnDate,
      adults: params.adults,
      nonStop: params.nonStop,
      max: params.max,
      currencyCode: params.currencyCode,
    };
    const raw = await this.cachedGet(ENDPOINTS.flightOffers, query);
    return normalizeFlightOffers(raw);
  }

  async searchHotels(params: HotelSearchParams): Promise<unknown> {
    return this.cachedGet(ENDPOINTS.hotelOffers, {
      cityCode: params.cityCode,
      checkInDate: params.checkInDate,
      checkOutDate: params.checkOutDate,
      adults: params.adults,
      roomQuantity: params.roomQuantity,
      currency: params.currency,
    });
  }

  async searchLocations(params: LocationSearchParams): Promise<unknown> {
    return this.cachedGet(ENDPOINTS.locations, { keyword: params.keyword, subType: params.subType });
  }

  /** Raw upstream payloads are what the cache holds. */
  private async cachedGet(endpoint: string, query: QueryParams): Promise<unknown> {
    const key = buildCacheKey(endpoint, query);
    const { cache } = this.options;

    const cached = cache.get(key);
    if (cached !== undefined) {
      console.log(`[amadeus] cache hit ${endpoint}`);
      return cached;
    }

    const load = async (): Promise<unknown> => {
      const data = await this.get(endpoint, query);
      cache.set(key, data, this.cacheTtlMs);
      return data;
    };

    return this.coalesce ? this.inflight.run(key, load) : load();
  }

  private async get(endpoint: string, query: QueryParams): Promise<unknown> {
    const { tokens, retry } = this.options;
    const token = await tokens.getValidToken();
    const url = `${this.baseUrl}${endpoint}?${toSearchParams(query)}`;

    return retry.execute(async (signal) => {
      const response = await fetch(url, {
        headers: {
          Authorization: `Bearer ${token.accessToken}`,
          Accept: "application/json",
        },
        signal,
      });
      if (response.status === 401) tokens.invalidate(token.accessToken);
      return response;
    }, readJson);
  }
}

async function readJson(res: Response): Promise<unknown> {
  const text = await res.text();
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new UpstreamError(`amadeus ${res.status}: response body is not valid JSON`, {
      status: res.status,
      detail: text.slice(0, 500),
      retryable: false,
      cause: err,
    });
  }
}
