// Holdings store: where an analytics pass gets its investments from.
// The engine only ever reads it.

import { FileSystem } from "@effect/platform";
import { Console, Context, Data, Effect, Layer, Schema } from "effect";
import { ASSET_CLASSES, RISK_LEVELS, type Investment } from "./domain.ts";
import { makeInvestment, type InvalidInvestment } from "./investment.ts";

export class HoldingsFileError extends Data.TaggedError("HoldingsFileError")<{
  readonly path: string;
  readonly message: string;
}> {}

export interface HoldingsStoreService {
  readonly load: Effect.Effect<
    ReadonlyArray<Investment>,
    HoldingsFileError | InvalidInvestment
  >;
}

export class HoldingsStore extends Context.Tag("HoldingsStore")<
  HoldingsStore,
  HoldingsStoreService
>() {}

// --- File format ---

const HoldingRecord = Schema.Struct({
  id: Schema.optional(Schema.String),
  assetClass: Schema.Literal(...ASSET_CLASSES),
  name: Schema.String,
  symbol: Schema.optional(Schema.String),
  entryDate: Schema.Date,
  entryPrice: Schema.Number,
  amountInvested: Schema.Number,
  riskLevel: Schema.optional(Schema.Literal(...RISK_LEVELS)),
});

const HoldingsFile = Schema.parseJson(
  Schema.Struct({ investments: Schema.Array(HoldingRecord) }),
);

/** Decode a holdings document. Records keep their file order. */
export function decodeHoldings(
  text: string,
  path: string,
): Effect.Effect<ReadonlyArray<Investment>, HoldingsFileError | InvalidInvestment> {
  return Schema.decodeUnknown(HoldingsFile)(text).pipe(
    Effect.mapError((e) => new HoldingsFileError({ path, message: e.message })),
    Effect.flatMap(({ investments }) =>
      Effect.forEach(investments, (record) =>
        makeInvestment({
          id: record.id,
          assetClass: record.assetClass,
          displayName: record.name,
          resolvedSymbol: record.symbol,
          entryDate: record.entryDate,
          entryPrice: record.entryPrice,
          amountInvested: record.amountInvested,
          riskLevel: record.riskLevel,
        }),
      ),
    ),
  );
}

// --- JSON file implementation ---

export const makeHoldingsFile = (path: string) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return {
      load: fs.readFileString(path).pipe(
        Effect.mapError((e) => new HoldingsFileError({ path, message: e.message })),
        Effect.tap(() => Console.debug(`[holdings] read ${path}`)),
        Effect.flatMap((text) => decodeHoldings(text, path)),
      ),
    } satisfies HoldingsStoreService;
  });

export const HoldingsFileLive = (path: string) =>
  Layer.effect(HoldingsStore, makeHoldingsFile(path));
