import { describe, test, expect } from "vitest";
import { buildCacheKey, toSearchParams } from "../src/lib/cache-key.js";

describe("buildCacheKey", () => {
  test("is independent of parameter order", () => {
    expect(buildCacheKey("/flights", { a: 1, b: 2 })).toBe(buildCacheKey("/flights", { b: 2, a: 1 }));
  });

  test("produces sorted, encoded pairs", () => {
    expect(buildCacheKey("/v2/shopping/flight-offers", { max: 20, adults: 1, nonStop: false })).toBe(
      "/v2/shopping/flight-offers?adults=1&max=20&nonStop=false",
    );
  });

  test("drops undefined values", () => {
    expect(buildCacheKey("/e", { a: "x", b: undefined })).toBe(buildCacheKey("/e", { a: "x" }));
  });

  test("distinguishes endpoints with identical params", () => {
    expect(buildCacheKey("/flights", { a: 1 })).not.toBe(buildCacheKey("/hotels", { a: 1 }));
  });

  test("separators inside values cannot collide with other keys", () => {
    expect(buildCacheKey("/e", { a: "1&b=2" })).not.toBe(buildCacheKey("/e", { a: "1", b: "2" }));
  });
});

describe("toSearchParams", () => {
  test("stringifies values and skips undefined", () => {
    const search = toSearchParams({ keyword: "DEL", adults: 2, nonStop: true, returnDate: undefined });
    expect(search.toString()).toBe("keyword=DEL&adults=2&nonStop=true");
  });
});
