import { describe, expect, it } from "vitest";
import { DAY_MS, fallbackQuote } from "./domain.ts";

describe("fallbackQuote", () => {
  it("marks the quote as a stand-in with no source", () => {
    expect(fallbackQuote("Rental flat", "real_estate", 250_000, 1_700_000_000_000)).toEqual({
      symbol: "Rental flat",
      assetClass: "real_estate",
      price: 250_000,
      asOf: 1_700_000_000_000,
      source: "none",
      isFallback: true,
    });
  });
});

describe("DAY_MS", () => {
  it("is one day in milliseconds", () => {
    expect(DAY_MS).toBe(86_400_000);
  });
});
