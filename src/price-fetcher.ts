// Price fetcher: cache, rate limiter and provider chains put together.
//
// Provider and resolution failures stop here: callers always get a quote,
// a synthesized fallback at the holding's entry price when nothing live
// answered. Fallback quotes are never cached, so the next call retries.

import {
  Chunk,
  Clock,
  Console,
  Context,
  Effect,
  Either,
  Layer,
  Option,
  Stream,
} from "effect";
import {
  fallbackQuote,
  type AssetClass,
  type Investment,
  type PricePoint,
  type PriceQuote,
} from "./domain.ts";
import type { PriceProvider } from "./price-api.ts";
import {
  attempt,
  attemptPolicy,
  ProviderChains,
  tryProviders,
  type AttemptPolicy,
  type ProviderTable,
} from "./provider-chain.ts";
import { PriceCache, type PriceCacheService } from "./price-cache.ts";
import {
  currentKey,
  historicalKey,
  isoDate,
} from "./price-cache-state.ts";
import { RateLimiter, type RateLimiterService } from "./rate-limiter.ts";
import { resolveSymbol, type ResolutionFailure } from "./symbol-resolver.ts";

export interface FetchCurrentRequest {
  readonly symbol: string;
  readonly assetClass: AssetClass;
  /** Price reported when no provider answers. */
  readonly fallbackPrice: number;
  /** Bypass an unexpired cache entry. */
  readonly refresh?: boolean;
}

export interface PriceFetcherService {
  readonly fetchCurrent: (request: FetchCurrentRequest) => Effect.Effect<PriceQuote>;
  /** Daily quotes from `since` to now, ascending. Nothing is fetched until
   *  the stream runs; running it again fetches again. */
  readonly fetchHistory: (
    symbol: string,
    assetClass: AssetClass,
    since: Date,
  ) => Stream.Stream<PriceQuote>;
  /** The first daily quote on or after `date`. */
  readonly fetchPriceAt: (
    symbol: string,
    assetClass: AssetClass,
    date: Date,
  ) => Effect.Effect<Option.Option<PriceQuote>>;
  /** Resolve the holding's symbol and fetch its current price. */
  readonly quoteFor: (
    investment: Investment,
    options?: { readonly refresh?: boolean },
  ) => Effect.Effect<PriceQuote>;
}

export class PriceFetcher extends Context.Tag("PriceFetcher")<
  PriceFetcher,
  PriceFetcherService
>() {}

export interface PriceFetcherDeps {
  readonly chains: ProviderTable;
  readonly cache: PriceCacheService;
  readonly limiter: RateLimiterService;
  readonly policy: AttemptPolicy;
}

const toQuote = (
  point: PricePoint,
  symbol: string,
  assetClass: AssetClass,
  provider: PriceProvider,
): PriceQuote => ({
  symbol,
  assetClass,
  price: point.price,
  asOf: point.timestamp,
  source: provider.id,
  isFallback: false,
});

export function makePriceFetcher(deps: PriceFetcherDeps): PriceFetcherService {
  const { chains, cache, limiter, policy } = deps;

  const fetchLive = (symbol: string, assetClass: AssetClass) =>
    tryProviders(chains[assetClass], symbol, (provider) =>
      attempt(
        provider,
        Effect.map(provider.fetchCurrent(symbol), (point) =>
          toQuote(point, symbol, assetClass, provider),
        ),
        limiter,
        policy,
      ),
    ).pipe(
      Effect.map(Option.some),
      Effect.catchTag("AllProvidersFailed", (e) =>
        Console.debug(
          `[fetcher] ${symbol}: no live price (${e.failures.length} provider(s) failed)`,
        ).pipe(Effect.as(Option.none<PriceQuote>())),
      ),
    );

  const fetchCurrent = (request: FetchCurrentRequest): Effect.Effect<PriceQuote> =>
    Effect.gen(function* () {
      const { symbol, assetClass } = request;
      const key = currentKey(symbol, assetClass);
      if (request.refresh === true) yield* cache.invalidate(key);

      const quote = yield* cache.getOrFetch(key, fetchLive(symbol, assetClass));
      if (Option.isSome(quote)) return quote.value;

      const now = yield* Clock.currentTimeMillis;
      return fallbackQuote(symbol, assetClass, request.fallbackPrice, now);
    });

  const fetchHistory = (
    symbol: string,
    assetClass: AssetClass,
    since: Date,
  ): Stream.Stream<PriceQuote> =>
    Stream.unwrap(
      Effect.gen(function* () {
        const quotes = yield* tryProviders(chains[assetClass], symbol, (provider) =>
          attempt(
            provider,
            Effect.map(provider.fetchHistory(symbol, since), (points) =>
              points.map((p) => toQuote(p, symbol, assetClass, provider)),
            ),
            limiter,
            policy,
          ),
        ).pipe(
          Effect.catchTag("AllProvidersFailed", () =>
            Console.debug(`[fetcher] ${symbol}: no history available`).pipe(
              Effect.as<ReadonlyArray<PriceQuote>>([]),
            ),
          ),
        );

        // Closes for days before today are final.
        const today = isoDate(yield* Clock.currentTimeMillis);
        yield* Effect.forEach(
          quotes.filter((q) => isoDate(q.asOf) < today),
          (q) => cache.put(historicalKey(symbol, assetClass, q.asOf), q),
          { discard: true },
        );

        return Stream.fromIterable(
          [...quotes].sort((a, b) => a.asOf - b.asOf),
        );
      }),
    );

  const fetchPriceAt = (
    symbol: string,
    assetClass: AssetClass,
    date: Date,
  ): Effect.Effect<Option.Option<PriceQuote>> =>
    Effect.gen(function* () {
      const cached = yield* cache.get(historicalKey(symbol, assetClass, date));
      if (Option.isSome(cached)) return cached;

      const day = isoDate(date);
      const quotes = yield* Stream.runCollect(fetchHistory(symbol, assetClass, date));
      return Chunk.findFirst(quotes, (q) => isoDate(q.asOf) >= day);
    });

  const quoteFor = (
    investment: Investment,
    options?: { readonly refresh?: boolean },
  ): Effect.Effect<PriceQuote> => {
    const { assetClass, displayName, entryPrice } = investment;
    const resolved: Either.Either<string, ResolutionFailure> =
      investment.resolvedSymbol !== undefined
      ? Either.right(investment.resolvedSymbol)
      : Either.map(resolveSymbol(displayName, assetClass), (r) => r.symbol);

    return Either.match(resolved, {
      onLeft: () =>
        Effect.gen(function* () {
          yield* Console.debug(
            `[fetcher] "${displayName}" (${assetClass}): no symbol, using entry price`,
          );
          const now = yield* Clock.currentTimeMillis;
          return fallbackQuote(displayName, assetClass, entryPrice, now);
        }),
      onRight: (symbol) =>
        fetchCurrent({
          symbol,
          assetClass,
          fallbackPrice: entryPrice,
          refresh: options?.refresh ?? false,
        }),
    });
  };

  return { fetchCurrent, fetchHistory, fetchPriceAt, quoteFor };
}

export const PriceFetcherLive = Layer.effect(
  PriceFetcher,
  Effect.gen(function* () {
    return makePriceFetcher({
      chains: yield* ProviderChains,
      cache: yield* PriceCache,
      limiter: yield* RateLimiter,
      policy: yield* attemptPolicy,
    });
  }),
);
