// Provider chains: ordered providers per asset class, tried in turn.
//
//   MISS → TRYING(p0) → SUCCESS → DONE
//                     → FAIL → TRYING(p1) → ... → ALL_FAILED
//
// Every attempt takes a rate-limiter turn, runs under a timeout, and is
// retried on transient failures. Any failure moves on to the next provider.

import { Config, Console, Context, Duration, Effect, Layer, Option } from "effect";
import type { AssetClass } from "./domain.ts";
import { AlphaVantageKeyConfig, PriceSettingsConfig } from "./config.ts";
import {
  AllProvidersFailed,
  isTransient,
  ProviderTimeout,
  type PriceProvider,
  type ProviderError,
  type ProviderFailure,
} from "./price-api.ts";
import type { RateLimiterService } from "./rate-limiter.ts";
import { makeYahooFinanceProvider } from "./providers/yahoo-finance.ts";
import { makeAlphaVantageProvider } from "./providers/alpha-vantage.ts";
import { makeCoinGeckoProvider } from "./providers/coingecko.ts";
import { sampleProvider } from "./providers/mock.ts";

// --- Chain table ---

export type ProviderTable = Readonly<Record<AssetClass, ReadonlyArray<PriceProvider>>>;

export class ProviderChains extends Context.Tag("ProviderChains")<
  ProviderChains,
  ProviderTable
>() {}

/** Stocks go to the market-data providers, crypto to the crypto provider.
 *  Other classes have no live source and are priced at entry. */
export function chainTable(
  stock: ReadonlyArray<PriceProvider>,
  crypto: ReadonlyArray<PriceProvider>,
): ProviderTable {
  return { stock, crypto, bond: [], real_estate: [], other: [] };
}

// --- Attempt policy ---

export interface AttemptPolicy {
  readonly timeout: Duration.DurationInput;
  readonly retries: number;
}

/** One provider call: limiter turn, bounded time, bounded retries. The
 *  timeout covers the call only, not the wait for a turn. The limiter is
 *  consulted again before each retry. */
export function attempt<A>(
  provider: PriceProvider,
  call: Effect.Effect<A, ProviderError>,
  limiter: RateLimiterService,
  policy: AttemptPolicy,
): Effect.Effect<A, ProviderError> {
  const afterMillis = Duration.toMillis(Duration.decode(policy.timeout));
  const bounded = call.pipe(
    Effect.timeoutFail({
      duration: policy.timeout,
      onTimeout: () => new ProviderTimeout({ provider: provider.id, afterMillis }),
    }),
  );
  return limiter.withTurn(provider.id, bounded).pipe(
    Effect.retry({ times: policy.retries, while: isTransient }),
  );
}

// --- Fallback logic ---

export function tryProviders<A>(
  providers: ReadonlyArray<PriceProvider>,
  symbol: string,
  run: (provider: PriceProvider) => Effect.Effect<A, ProviderError>,
): Effect.Effect<A, AllProvidersFailed> {
  const loop = (
    index: number,
    failures: ReadonlyArray<ProviderFailure>,
  ): Effect.Effect<A, AllProvidersFailed> => {
    if (index >= providers.length) {
      return Effect.fail(new AllProvidersFailed({ symbol, failures }));
    }

    const provider = providers[index];

    return Console.debug(`[chain] ${symbol}: trying ${provider.id}...`).pipe(
      Effect.flatMap(() => run(provider)),
      Effect.tapError((e) =>
        Console.debug(`[chain] ${symbol}: ${provider.id} failed: ${e._tag}`),
      ),
      Effect.catchAll((error) =>
        loop(index + 1, [...failures, { provider: provider.id, error }]),
      ),
    );
  };

  return loop(0, []);
}

// --- Layer ---
// Set PRICE_PROVIDERS to "live" (default) or "test".

const LiveChains = Effect.gen(function* () {
  const yahoo = yield* makeYahooFinanceProvider;
  const coingecko = yield* makeCoinGeckoProvider;
  const alphaVantageKey = yield* AlphaVantageKeyConfig;

  // Alpha Vantage requires an API key; skip it when none is configured.
  const alphavantage = Option.isSome(alphaVantageKey)
    ? [yield* makeAlphaVantageProvider(alphaVantageKey.value)]
    : [];

  const table = chainTable([yahoo, ...alphavantage], [coingecko]);
  yield* Console.debug(
    `[chain] Initialized with stock providers: ${table.stock.map((p) => p.id).join(", ")}`,
  );
  return table;
});

export const ProviderChainsLive = Layer.effect(
  ProviderChains,
  Effect.gen(function* () {
    const mode = yield* Config.literal("live", "test")("PRICE_PROVIDERS").pipe(
      Config.withDefault("live" as const),
    );
    return mode === "test"
      ? chainTable([sampleProvider], [sampleProvider])
      : yield* LiveChains;
  }),
);

export const attemptPolicy = Effect.map(
  PriceSettingsConfig,
  (settings): AttemptPolicy => ({
    timeout: settings.providerTimeout,
    retries: settings.providerRetries,
  }),
);
