import { describe, expect, it } from "vitest";
import { Effect, Either, Layer, Option, Stream } from "effect";
import type { Investment, PriceQuote } from "./domain.ts";
import { makeInvestment } from "./investment.ts";
import { analyzePortfolio } from "./portfolio.ts";
import { makePriceCache } from "./price-cache.ts";
import { makePriceFetcher, PriceFetcher, type PriceFetcherService } from "./price-fetcher.ts";
import { chainTable } from "./provider-chain.ts";
import { makeRateLimiter } from "./rate-limiter.ts";
import { sampleProvider } from "./providers/mock.ts";

const NOW = Date.UTC(2025, 5, 1);

function investment(id: string, displayName: string, entryPrice: number): Investment {
  return Either.getOrThrow(
    makeInvestment({
      id,
      assetClass: displayName === "Bitcoin" ? "crypto" : "stock",
      displayName,
      entryDate: new Date(Date.UTC(2024, 5, 1)),
      entryPrice,
      amountInvested: 1000,
    }),
  );
}

function fetcherLayer(quoteFor: PriceFetcherService["quoteFor"]) {
  return Layer.succeed(PriceFetcher, {
    fetchCurrent: () => Effect.dieMessage("not used"),
    fetchHistory: () => Stream.empty,
    fetchPriceAt: () => Effect.succeed(Option.none()),
    quoteFor,
  });
}

const quoteAt = (inv: Investment, price: number): PriceQuote => ({
  symbol: inv.displayName.toUpperCase(),
  assetClass: inv.assetClass,
  price,
  asOf: NOW,
  source: "test",
  isFallback: false,
});

describe("analyzePortfolio", () => {
  it("prices holdings still unresolved at the deadline at entry price", async () => {
    const fast = investment("fast", "Fast", 10);
    const slow = investment("slow", "Slow", 20);
    const snapshot = await Effect.runPromise(
      analyzePortfolio([fast, slow], { deadline: "50 millis", now: NOW }).pipe(
        Effect.provide(
          fetcherLayer((inv) =>
            inv.id === "slow" ? Effect.never : Effect.succeed(quoteAt(inv, 12)),
          ),
        ),
      ),
    );

    expect(snapshot.holdings.map((h) => [h.investmentId, h.price, h.isFallback])).toEqual([
      ["fast", 12, false],
      ["slow", 20, true],
    ]);
    expect(snapshot.fallbackHoldings).toEqual(["slow"]);
    expect(snapshot.generatedAt).toBe(NOW);
  });

  it("passes refresh through to the fetcher", async () => {
    const seen: Array<boolean | undefined> = [];
    const only = investment("a", "Fast", 10);
    await Effect.runPromise(
      analyzePortfolio([only], { refresh: true, now: NOW }).pipe(
        Effect.provide(
          fetcherLayer((inv, options) =>
            Effect.sync(() => {
              seen.push(options?.refresh);
              return quoteAt(inv, 10);
            }),
          ),
        ),
      ),
    );
    expect(seen).toEqual([true]);
  });

  it("runs end to end against the sample provider", async () => {
    const apple = investment("apple", "Apple", 200);
    const bitcoin = investment("btc", "Bitcoin", 50000);
    const unknown = investment("flat", "Rental flat, Lisbon", 100);

    const snapshot = await Effect.runPromise(
      Effect.gen(function* () {
        const fetcher = makePriceFetcher({
          chains: chainTable([sampleProvider], [sampleProvider]),
          cache: yield* makePriceCache({ ttl: "5 minutes" }),
          limiter: yield* makeRateLimiter({}),
          policy: { timeout: "1 second", retries: 0 },
        });
        return yield* analyzePortfolio([apple, bitcoin, unknown], { now: NOW }).pipe(
          Effect.provideService(PriceFetcher, fetcher),
        );
      }),
    );

    const [a, b, u] = snapshot.holdings;
    expect([a.symbol, a.price, a.source]).toEqual(["AAPL", 225.3, "test"]);
    expect(a.currentValue).toBeCloseTo(1126.5, 9);
    expect([b.symbol, b.price, b.source]).toEqual(["BTC", 64250, "test"]);
    expect(b.currentValue).toBeCloseTo(1285, 9);
    expect([u.price, u.isFallback]).toEqual([100, true]);
    expect(snapshot.fallbackHoldings).toEqual(["flat"]);
    expect(snapshot.totals.totalInvested).toBe(3000);
  });
});
