/** Flight search input, already validated by the route layer. */
export interface FlightSearchParams {
  origin: string;
  destination: string;
  departureDate: string;
  adults: number;
  returnDate?: string;
  nonStop?: boolean;
  max?: number;
  currencyCode?: string;
}

export interface HotelSearchParams {
  cityCode: string;
  checkInDate: string;
  checkOutDate: string;
  adults?: number;
  roomQuantity?: number;
  currency?: string;
}

export interface LocationSearchParams {
  keyword: string;
  /** Comma-separated, e.g. "AIRPORT,CITY". */
  subType: string;
}

export interface FlightSegmentSummary {
  from: string | null;
  to: string | null;
  departAt: string | null;
  arriveAt: string | null;
  carrier: string | null;
  flightNumber: string | null;
  segmentDuration: string | null;
}

export interface FlightOfferSummary {
  id: string | null;
  total: string | null;
  currency: string | null;
  duration: string | null;
  segments: FlightSegmentSummary[];
}

export interface NormalizedOffers {
  count: number;
  offers: FlightOfferSummary[];
}

export type Recommendation = "BOOK" | "WAIT";

export interface FlightInsight {
  bestPrice: number;
  currency: string;
  recommendation: Recommendation;
  reason: string;
  confidence: number;
}
