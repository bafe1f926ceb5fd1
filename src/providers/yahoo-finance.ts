// Yahoo Finance: chart API adapter (stocks and ETFs, no key required).

import { HttpClient, HttpClientRequest } from "@effect/platform";
import { Clock, Config, Effect, Schema } from "effect";
import type { PricePoint } from "../domain.ts";
import {
  ParseError,
  SymbolNotFound,
  type PriceProvider,
} from "../price-api.ts";
import { mapHttpError } from "./http.ts";

// --- Yahoo response schema ---

const YahooMeta = Schema.Struct({
  symbol: Schema.String,
  regularMarketPrice: Schema.optional(Schema.Number),
  regularMarketTime: Schema.optional(Schema.Number),
});

const YahooResult = Schema.Struct({
  meta: YahooMeta,
  timestamp: Schema.optional(Schema.Array(Schema.Number)),
  indicators: Schema.optional(
    Schema.Struct({
      quote: Schema.Array(
        Schema.Struct({
          close: Schema.optional(Schema.Array(Schema.NullOr(Schema.Number))),
        }),
      ),
    }),
  ),
});

const YahooChartResponse = Schema.Struct({
  chart: Schema.Struct({
    result: Schema.NullOr(Schema.Array(YahooResult)),
    error: Schema.NullOr(
      Schema.Struct({
        description: Schema.optional(Schema.String),
      }),
    ),
  }),
});

type YahooResultType = typeof YahooResult.Type;

// --- Decoding ---

function decodeChart(
  json: unknown,
  symbol: string,
): Effect.Effect<YahooResultType, ParseError | SymbolNotFound> {
  return Schema.decodeUnknown(YahooChartResponse)(json).pipe(
    Effect.mapError(
      (schemaError) =>
        new ParseError({
          message: `Invalid response: ${schemaError.message}`,
        }),
    ),
    Effect.flatMap(({ chart }) =>
      chart.error !== null || chart.result === null || chart.result.length === 0
        ? Effect.fail(new SymbolNotFound({ symbol }))
        : Effect.succeed(chart.result[0]),
    ),
  );
}

/** Timestamp/close pairs with a usable close, in ascending order. */
function closes(result: YahooResultType): PricePoint[] {
  const timestamps = result.timestamp ?? [];
  const values = result.indicators?.quote[0]?.close ?? [];
  const points: PricePoint[] = [];
  timestamps.forEach((ts, i) => {
    const close = values[i];
    if (close !== undefined && close !== null && close > 0) {
      points.push({ symbol: result.meta.symbol, price: close, timestamp: ts * 1000 });
    }
  });
  return points.sort((a, b) => a.timestamp - b.timestamp);
}

/** Latest price: the market price from `meta`, or failing that the most
 *  recent non-empty close in the series. */
export function decodeYahooQuote(
  json: unknown,
  symbol: string,
): Effect.Effect<PricePoint, ParseError | SymbolNotFound> {
  return decodeChart(json, symbol).pipe(
    Effect.flatMap((result): Effect.Effect<PricePoint, ParseError> => {
      const { meta } = result;
      if (
        meta.regularMarketPrice !== undefined &&
        meta.regularMarketPrice > 0 &&
        meta.regularMarketTime !== undefined
      ) {
        return Effect.succeed({
          symbol: meta.symbol,
          price: meta.regularMarketPrice,
          timestamp: meta.regularMarketTime * 1000,
        });
      }
      const last = closes(result).at(-1);
      return last === undefined
        ? Effect.fail(new ParseError({ message: "No price in chart response" }))
        : Effect.succeed(last);
    }),
  );
}

export function decodeYahooHistory(
  json: unknown,
  symbol: string,
): Effect.Effect<ReadonlyArray<PricePoint>, ParseError | SymbolNotFound> {
  return decodeChart(json, symbol).pipe(Effect.map(closes));
}

// --- Yahoo Finance adapter ---

export const makeYahooFinanceProvider = Effect.gen(function* () {
  const client = (yield* HttpClient.HttpClient).pipe(
    HttpClient.filterStatusOk,
    HttpClient.mapRequest(
      HttpClientRequest.setHeader("User-Agent", "Mozilla/5.0"),
    ),
  );
  const baseUrl = yield* Config.string("YAHOO_BASE_URL").pipe(
    Config.withDefault("https://query1.finance.yahoo.com/v8/finance/chart"),
  );

  const getJson = (url: string) =>
    client.get(url).pipe(
      Effect.flatMap((response) => response.json),
      Effect.mapError(mapHttpError),
    );

  return {
    id: "yahoo",
    fetchCurrent: (symbol) =>
      getJson(`${baseUrl}/${encodeURIComponent(symbol)}`).pipe(
        Effect.flatMap((json) => decodeYahooQuote(json, symbol)),
      ),
    fetchHistory: (symbol, since) =>
      Effect.gen(function* () {
        const now = yield* Clock.currentTimeMillis;
        const period1 = Math.floor(since.getTime() / 1000);
        const period2 = Math.floor(now / 1000);
        const json = yield* getJson(
          `${baseUrl}/${encodeURIComponent(symbol)}?period1=${period1}&period2=${period2}&interval=1d`,
        );
        return yield* decodeYahooHistory(json, symbol);
      }),
  } satisfies PriceProvider;
});
