// CoinGecko: crypto adapter (free public API, no key, strict rate limit).

import { HttpClient } from "@effect/platform";
import { Clock, Config, Effect, Schema } from "effect";
import { DAY_MS, type PricePoint } from "../domain.ts";
import {
  ParseError,
  SymbolNotFound,
  type PriceProvider,
} from "../price-api.ts";
import rawCoinIds from "../data/coingecko-ids.json" with { type: "json" };
import { mapHttpError } from "./http.ts";

// Ticker → CoinGecko coin id ("BTC" → "bitcoin").
const COIN_IDS: Readonly<Record<string, string>> = Schema.decodeUnknownSync(
  Schema.Record({ key: Schema.String, value: Schema.String }),
)(rawCoinIds);

/** CoinGecko addresses coins by id, not ticker. Unknown tickers are tried
 *  as ids, lower-cased. */
export function coinIdFor(symbol: string): string {
  return COIN_IDS[symbol.toUpperCase()] ?? symbol.toLowerCase();
}

// --- CoinGecko response schemas ---

const SimplePriceResponse = Schema.Record({
  key: Schema.String,
  value: Schema.Struct({
    usd: Schema.optional(Schema.Number),
    last_updated_at: Schema.optional(Schema.Number),
  }),
});

const MarketChartResponse = Schema.Struct({
  prices: Schema.Array(Schema.Tuple(Schema.Number, Schema.Number)),
});

const invalid = (e: { readonly message: string }) =>
  new ParseError({ message: `Invalid response: ${e.message}` });

// --- Decoding ---

export function decodeCoinGeckoPrice(
  json: unknown,
  symbol: string,
  now: number,
): Effect.Effect<PricePoint, ParseError | SymbolNotFound> {
  const id = coinIdFor(symbol);
  return Schema.decodeUnknown(SimplePriceResponse)(json).pipe(
    Effect.mapError(invalid),
    Effect.flatMap((data): Effect.Effect<PricePoint, SymbolNotFound> => {
      const usd = data[id]?.usd;
      return usd === undefined || usd <= 0
        ? Effect.fail(new SymbolNotFound({ symbol }))
        : Effect.succeed({
          symbol,
          price: usd,
          timestamp: (data[id]?.last_updated_at ?? now / 1000) * 1000,
        });
    }),
  );
}

export function decodeCoinGeckoChart(
  json: unknown,
  symbol: string,
): Effect.Effect<ReadonlyArray<PricePoint>, ParseError> {
  return Schema.decodeUnknown(MarketChartResponse)(json).pipe(
    Effect.mapError(invalid),
    Effect.map(({ prices }) =>
      prices
        .filter(([, price]) => price > 0)
        .map(([timestamp, price]): PricePoint => ({ symbol, price, timestamp }))
        .sort((a, b) => a.timestamp - b.timestamp),
    ),
  );
}

// --- CoinGecko adapter ---

export const makeCoinGeckoProvider = Effect.gen(function* () {
  const client = (yield* HttpClient.HttpClient).pipe(
    HttpClient.filterStatusOk,
  );
  const baseUrl = yield* Config.string("COINGECKO_BASE_URL").pipe(
    Config.withDefault("https://api.coingecko.com/api/v3"),
  );

  const getJson = (path: string, symbol: string) =>
    client.get(`${baseUrl}${path}`).pipe(
      Effect.flatMap((response) => response.json),
      Effect.mapError(mapHttpError),
      // Unknown coin ids come back as 404.
      Effect.catchIf(
        (e) => e._tag === "HttpError" && e.status === 404,
        () => Effect.fail(new SymbolNotFound({ symbol })),
      ),
    );

  return {
    id: "coingecko",
    fetchCurrent: (symbol) =>
      Effect.gen(function* () {
        const id = encodeURIComponent(coinIdFor(symbol));
        const json = yield* getJson(
          `/simple/price?ids=${id}&vs_currencies=usd&include_last_updated_at=true`,
          symbol,
        );
        return yield* decodeCoinGeckoPrice(json, symbol, yield* Clock.currentTimeMillis);
      }),
    fetchHistory: (symbol, since) =>
      Effect.gen(function* () {
        const now = yield* Clock.currentTimeMillis;
        const days = Math.max(1, Math.ceil((now - since.getTime()) / DAY_MS));
        const id = encodeURIComponent(coinIdFor(symbol));
        const json = yield* getJson(
          `/coins/${id}/market_chart?vs_currency=usd&days=${days}&interval=daily`,
          symbol,
        );
        const points = yield* decodeCoinGeckoChart(json, symbol);
        return points.filter((p) => p.timestamp >= since.getTime());
      }),
  } satisfies PriceProvider;
});
