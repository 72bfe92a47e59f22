// --- Search input validation ---

/** Three-letter IATA airport/city code */
const IATA_CODE = /^[A-Z]{3}$/;

/** ISO calendar date (YYYY-MM-DD) */
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/** ISO 4217 currency code */
const CURRENCY_CODE = /^[A-Z]{3}$/;

/** Location keyword: letters, digits, spaces and a little punctuation */
const KEYWORD = /^[a-zA-Z0-9 _.'-]+$/;

/** Location sub-types accepted by the reference-data endpoint */
const LOCATION_SUBTYPES = new Set(["AIRPORT", "CITY"]);

export function isValidIata(code: string): boolean {
  return IATA_CODE.test(code);
}

export function isValidCurrency(code: string): boolean {
  return CURRENCY_CODE.test(code);
}

/** Format check plus a round-trip through Date, so 2026-02-30 is rejected. */
export function isValidDate(value: string): boolean {
  if (!ISO_DATE.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

export function isValidKeyword(keyword: string): boolean {
  return keyword.length >= 2 && keyword.length <= 50 && KEYWORD.test(keyword);
}

export function validateSubTypes(input: string): string | null {
  const parts = input.split(",").map((s) => s.trim().toUpperCase()).filter(Boolean);
  if (parts.length === 0 || parts.some((p) => !LOCATION_SUBTYPES.has(p))) return null;
  return parts.join(",");
}

export function clampInt(val: string | undefined, min: number, max: number, fallback: number): number {
  if (!val) return fallback;
  const n = parseInt(val, 10);
  if (isNaN(n)) return fallback;
  return Math.max(min, Math.min(max, n));
}

export function parseBool(val: string | undefined, fallback: boolean): boolean {
  if (val === undefined || val === "") return fallback;
  return val.toLowerCase() === "true" || val === "1";
}

/** First value of a query parameter, as a string. */
export function queryString(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (Array.isArray(value) && typeof value[0] === "string") return value[0];
  return undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// --- Safe error messages ---

export function safeErrorMessage(err: unknown, fallback: string): string {
  if (err instanceof Error) {
    const msg = err.message;
    if (msg.includes("://") && msg.includes("@")) return fallback;
    if (msg.startsWith("/") || msg.includes("\\")) return fallback;
    if (msg.length > 200) return fallback;
    return msg;
  }
  return fallback;
}
