// Symbol resolution: free-text asset names to market tickers. Pure.

import { Data, Either, Schema } from "effect";
import type { AssetClass } from "./domain.ts";
import rawSymbols from "./data/symbols.json" with { type: "json" };

// --- Static table ---

const NameTable = Schema.Record({ key: Schema.String, value: Schema.String });

const SymbolTable = Schema.Struct({
  stock: NameTable,
  crypto: NameTable,
  bond: NameTable,
  real_estate: NameTable,
  other: NameTable,
});

const table: Readonly<Record<AssetClass, Readonly<Record<string, string>>>> =
  Schema.decodeUnknownSync(SymbolTable)(rawSymbols);

// --- Result ---

export type ResolutionMethod = "table" | "embedded" | "verbatim";

export interface ResolvedSymbol {
  readonly symbol: string;
  readonly assetClass: AssetClass;
  readonly method: ResolutionMethod;
}

/** No usable symbol. Callers price the holding at its entry price. */
export class ResolutionFailure extends Data.TaggedError("ResolutionFailure")<{
  readonly displayName: string;
  readonly assetClass: AssetClass;
}> {}

// --- Resolution ---

const TICKER = /^[A-Za-z0-9][A-Za-z0-9.-]{0,9}$/;
const EMBEDDED_TICKER = /\(([A-Za-z0-9][A-Za-z0-9.-]{0,9})\)\s*$/;

const normalize = (name: string): string =>
  name.trim().toLowerCase().split(/\s+/).join(" ");

export function resolveSymbol(
  displayName: string,
  assetClass: AssetClass,
): Either.Either<ResolvedSymbol, ResolutionFailure> {
  const found = (symbol: string, method: ResolutionMethod) =>
    Either.right<ResolvedSymbol>({ symbol, assetClass, method });

  const fromTable = table[assetClass][normalize(displayName)];
  if (fromTable !== undefined) return found(fromTable, "table");

  // "Acme Robotics (ACME)"
  const embedded = EMBEDDED_TICKER.exec(displayName);
  if (embedded !== null) {
    const ticker = embedded[1].toUpperCase();
    return found(table[assetClass][ticker.toLowerCase()] ?? ticker, "embedded");
  }

  const trimmed = displayName.trim();
  if (TICKER.test(trimmed)) return found(trimmed.toUpperCase(), "verbatim");

  return Either.left(new ResolutionFailure({ displayName, assetClass }));
}

