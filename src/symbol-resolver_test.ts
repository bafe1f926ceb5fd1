import { describe, expect, it } from "vitest";
import { Either } from "effect";
import type { AssetClass } from "./domain.ts";
import { resolveSymbol } from "./symbol-resolver.ts";

const resolved = (name: string, assetClass: AssetClass) =>
  Either.getOrThrow(resolveSymbol(name, assetClass));

describe("resolveSymbol", () => {
  it.each([
    ["Apple", "stock", "AAPL"],
    ["  APPLE   Inc.  (AAPL) ", "stock", "AAPL"],
    ["aapl", "stock", "AAPL"],
    ["Berkshire Hathaway", "stock", "BRK-B"],
    ["bitcoin", "crypto", "BTC"],
    ["Ethereum", "crypto", "ETH"],
  ] as const)("looks up %s (%s) in the table", (name, assetClass, symbol) => {
    expect(resolved(name, assetClass)).toEqual({ symbol, assetClass, method: "table" });
  });

  it("uses a ticker embedded in parentheses", () => {
    expect(resolved("Acme Robotics (acme)", "stock")).toEqual({
      symbol: "ACME",
      assetClass: "stock",
      method: "embedded",
    });
  });

  it("maps an embedded ticker through the table when known", () => {
    expect(resolved("My favourite coin (btc)", "crypto")).toEqual({
      symbol: "BTC",
      assetClass: "crypto",
      method: "embedded",
    });
  });

  it.each([
    ["zzzz", "ZZZZ"],
    ["brk.a", "BRK.A"],
    [" xyz-w ", "XYZ-W"],
  ])("returns ticker-like input %s verbatim", (name, symbol) => {
    expect(resolved(name, "stock")).toEqual({ symbol, assetClass: "stock", method: "verbatim" });
  });

  it("only consults the table of the given asset class", () => {
    expect(resolved("Apple", "crypto")).toEqual({
      symbol: "APPLE",
      assetClass: "crypto",
      method: "verbatim",
    });
  });

  it.each([
    "Rental flat, Lisbon",
    "Some Private Company",
    "ABCDEFGHIJK",
    "",
  ])("fails for %j", (name) => {
    const result = resolveSymbol(name, "real_estate");
    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe("ResolutionFailure");
      expect(result.left.displayName).toBe(name);
    }
  });
});
