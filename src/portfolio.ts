// One analytics pass: price every holding concurrently, then compute.

import { Clock, Console, Duration, Effect } from "effect";
import { fallbackQuote, type Investment, type PortfolioSnapshot } from "./domain.ts";
import { computeSnapshot } from "./analytics.ts";
import { PriceFetcher } from "./price-fetcher.ts";

export interface AnalyzeOptions {
  /** Per-holding bound on pricing. Holdings still unpriced when it passes
   *  are reported at entry price. */
  readonly deadline?: Duration.DurationInput;
  /** Skip unexpired cached quotes. */
  readonly refresh?: boolean;
  /** Clock reading for holding periods; defaults to the effect Clock. */
  readonly now?: number;
}

export const DEFAULT_DEADLINE: Duration.DurationInput = "30 seconds";

export const analyzePortfolio = (
  investments: ReadonlyArray<Investment>,
  options: AnalyzeOptions = {},
): Effect.Effect<PortfolioSnapshot, never, PriceFetcher> =>
  Effect.gen(function* () {
    const fetcher = yield* PriceFetcher;
    const deadline = options.deadline ?? DEFAULT_DEADLINE;
    const refresh = options.refresh ?? false;

    const priced = yield* Effect.forEach(
      investments,
      (inv) =>
        fetcher.quoteFor(inv, { refresh }).pipe(
          Effect.timeout(deadline),
          Effect.catchTag("TimeoutException", () =>
            Console.debug(`[portfolio] "${inv.displayName}": deadline passed`).pipe(
              Effect.zipRight(Clock.currentTimeMillis),
              Effect.map((at) =>
                fallbackQuote(inv.displayName, inv.assetClass, inv.entryPrice, at),
              ),
            ),
          ),
          Effect.map((quote) => [inv.id, quote] as const),
        ),
      { concurrency: "unbounded" },
    );

    const late = priced.filter(([, q]) => q.isFallback).length;
    yield* Console.debug(
      `[portfolio] priced ${investments.length} holding(s), ${late} at entry price`,
    );

    const now = options.now ?? (yield* Clock.currentTimeMillis);
    return computeSnapshot(investments, new Map(priced), now);
  });
