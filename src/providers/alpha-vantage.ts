// Alpha Vantage: secondary stock adapter (requires an API key).

import { HttpClient } from "@effect/platform";
import { Clock, Config, Effect, Schema } from "effect";
import { DAY_MS, type PricePoint } from "../domain.ts";
import {
  ParseError,
  ServiceError,
  SymbolNotFound,
  type PriceProvider,
} from "../price-api.ts";
import { mapHttpError } from "./http.ts";

// --- Alpha Vantage response schemas ---

const AlphaVantageGlobalQuote = Schema.Struct({
  "01. symbol": Schema.String,
  "05. price": Schema.String,
  "07. latest trading day": Schema.String,
});

const AlphaVantageDailySeries = Schema.Record({
  key: Schema.String,
  value: Schema.Struct({ "4. close": Schema.String }),
});

/** Alpha Vantage reports failures as 200 responses carrying one of these
 *  top-level string fields. */
function serviceFailure(obj: Record<string, unknown>): ServiceError | undefined {
  for (const field of ["Error Message", "Note", "Information"]) {
    const message = obj[field];
    if (typeof message === "string") return new ServiceError({ message });
  }
  return undefined;
}

function asObject(json: unknown): Effect.Effect<Record<string, unknown>, ParseError> {
  return typeof json === "object" && json !== null && !Array.isArray(json)
    ? Effect.succeed(Object.fromEntries(Object.entries(json)))
    : Effect.fail(new ParseError({ message: "Response is not an object" }));
}

const parseNumber = (raw: string, what: string): Effect.Effect<number, ParseError> => {
  const value = Number(raw);
  return Number.isNaN(value)
    ? Effect.fail(new ParseError({ message: `Non-numeric ${what}: "${raw}"` }))
    : Effect.succeed(value);
};

const parseDay = (raw: string): Effect.Effect<number, ParseError> => {
  const value = Date.parse(raw);
  return Number.isNaN(value)
    ? Effect.fail(new ParseError({ message: `Invalid trading day: "${raw}"` }))
    : Effect.succeed(value);
};

// --- Decoding ---

export function decodeAlphaVantageQuote(
  json: unknown,
  symbol: string,
): Effect.Effect<PricePoint, ParseError | SymbolNotFound | ServiceError> {
  return asObject(json).pipe(
    Effect.flatMap((obj): Effect.Effect<PricePoint, ParseError | SymbolNotFound | ServiceError> => {
      const failure = serviceFailure(obj);
      if (failure !== undefined) return Effect.fail(failure);

      const globalQuote = obj["Global Quote"];
      if (
        typeof globalQuote !== "object" ||
        globalQuote === null ||
        Object.keys(globalQuote).length === 0
      ) {
        return Effect.fail(new SymbolNotFound({ symbol }));
      }

      return Schema.decodeUnknown(AlphaVantageGlobalQuote)(globalQuote).pipe(
        Effect.mapError(
          (e) => new ParseError({ message: `Invalid response: ${e.message}` }),
        ),
        Effect.flatMap((q) =>
          Effect.all([
            parseNumber(q["05. price"], "price"),
            parseDay(q["07. latest trading day"]),
          ]).pipe(
            Effect.map(([price, timestamp]) => ({
              symbol: q["01. symbol"],
              price,
              timestamp,
            })),
          ),
        ),
      );
    }),
  );
}

export function decodeAlphaVantageDaily(
  json: unknown,
  symbol: string,
  since: Date,
): Effect.Effect<ReadonlyArray<PricePoint>, ParseError | SymbolNotFound | ServiceError> {
  return asObject(json).pipe(
    Effect.flatMap((obj): Effect.Effect<ReadonlyArray<PricePoint>, ParseError | SymbolNotFound | ServiceError> => {
      const failure = serviceFailure(obj);
      if (failure !== undefined) return Effect.fail(failure);

      const series = obj["Time Series (Daily)"];
      if (series === undefined) return Effect.fail(new SymbolNotFound({ symbol }));

      return Schema.decodeUnknown(AlphaVantageDailySeries)(series).pipe(
        Effect.mapError(
          (e) => new ParseError({ message: `Invalid response: ${e.message}` }),
        ),
        Effect.flatMap((days) =>
          Effect.forEach(Object.entries(days), ([day, bar]) =>
            Effect.all([parseNumber(bar["4. close"], "close"), parseDay(day)]).pipe(
              Effect.map(([price, timestamp]): PricePoint => ({
                symbol,
                price,
                timestamp,
              })),
            ),
          ),
        ),
        Effect.map((points) =>
          points
            .filter((p) => p.timestamp >= since.getTime())
            .sort((a, b) => a.timestamp - b.timestamp),
        ),
      );
    }),
  );
}

// --- Alpha Vantage adapter ---

/** Compact responses hold the latest 100 trading days. */
const COMPACT_SPAN_MS = 100 * DAY_MS;

export const makeAlphaVantageProvider = (apiKey: string) =>
  Effect.gen(function* () {
    const client = (yield* HttpClient.HttpClient).pipe(
      HttpClient.filterStatusOk,
    );
    const baseUrl = yield* Config.string("ALPHA_VANTAGE_BASE_URL").pipe(
      Config.withDefault("https://www.alphavantage.co/query"),
    );

    const getJson = (params: string) =>
      client.get(`${baseUrl}?${params}&apikey=${apiKey}`).pipe(
        Effect.flatMap((response) => response.json),
        Effect.mapError(mapHttpError),
      );

    return {
      id: "alphavantage",
      fetchCurrent: (symbol) =>
        getJson(`function=GLOBAL_QUOTE&symbol=${encodeURIComponent(symbol)}`).pipe(
          Effect.flatMap((json) => decodeAlphaVantageQuote(json, symbol)),
        ),
      fetchHistory: (symbol, since) =>
        Effect.gen(function* () {
          const now = yield* Clock.currentTimeMillis;
          const outputSize = now - since.getTime() > COMPACT_SPAN_MS ? "full" : "compact";
          const json = yield* getJson(
            `function=TIME_SERIES_DAILY&symbol=${encodeURIComponent(symbol)}&outputsize=${outputSize}`,
          );
          return yield* decodeAlphaVantageDaily(json, symbol, since);
        }),
    } satisfies PriceProvider;
  });
