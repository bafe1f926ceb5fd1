// Sample-price provider for tests and offline runs (PRICE_PROVIDERS=test).

import { Clock, Effect } from "effect";
import { DAY_MS, type PricePoint } from "../domain.ts";
import { SymbolNotFound, type PriceProvider } from "../price-api.ts";

// --- Sample data ---

const prices: Record<string, number> = {
  AAPL: 225.3,
  MSFT: 415.1,
  GOOGL: 190.5,
  TSLA: 385.2,
  SPY: 560.4,
  BTC: 64250,
  ETH: 3120.5,
  SOL: 148.2,
};

/** Synthetic daily drift, so history series are not flat. */
const DAILY_DRIFT = 0.001;

// --- Mock provider ---

export const sampleProvider: PriceProvider = {
  id: "test",
  fetchCurrent: (symbol) =>
    Effect.gen(function* () {
      const price = prices[symbol.toUpperCase()];
      if (price === undefined) {
        return yield* Effect.fail(new SymbolNotFound({ symbol }));
      }
      return { symbol, price, timestamp: yield* Clock.currentTimeMillis };
    }),
  fetchHistory: (symbol, since) =>
    Effect.gen(function* () {
      const price = prices[symbol.toUpperCase()];
      if (price === undefined) {
        return yield* Effect.fail(new SymbolNotFound({ symbol }));
      }
      const now = yield* Clock.currentTimeMillis;
      const points: PricePoint[] = [];
      for (let ts = since.getTime(); ts <= now; ts += DAY_MS) {
        const daysAgo = Math.floor((now - ts) / DAY_MS);
        points.push({ symbol, price: price * (1 - DAILY_DRIFT * daysAgo), timestamp: ts });
      }
      return points;
    }),
};
