// Price providers: adapter contract and provider errors.

import { Data, type Effect } from "effect";
import type { PricePoint } from "./domain.ts";

// --- Errors ---

export class NetworkError extends Data.TaggedError("NetworkError")<{
  readonly message: string;
}> {}

export class HttpError extends Data.TaggedError("HttpError")<{
  readonly status: number;
}> {}

export class ParseError extends Data.TaggedError("ParseError")<{
  readonly message: string;
}> {}

export class SymbolNotFound extends Data.TaggedError("SymbolNotFound")<{
  readonly symbol: string;
}> {}

export class ServiceError extends Data.TaggedError("ServiceError")<{
  readonly message: string;
}> {}

export class ProviderTimeout extends Data.TaggedError("ProviderTimeout")<{
  readonly provider: ProviderId;
  readonly afterMillis: number;
}> {}

export type ProviderError =
  | NetworkError
  | HttpError
  | ParseError
  | SymbolNotFound
  | ServiceError
  | ProviderTimeout;

export interface ProviderFailure {
  readonly provider: ProviderId;
  readonly error: ProviderError;
}

/** Every provider in the chain failed, or the chain was empty. */
export class AllProvidersFailed extends Data.TaggedError("AllProvidersFailed")<{
  readonly symbol: string;
  readonly failures: ReadonlyArray<ProviderFailure>;
}> {}

/** Failures worth one more attempt against the same provider. A missing
 *  symbol is an authoritative answer and is never retried. */
export function isTransient(e: ProviderError): boolean {
  switch (e._tag) {
    case "NetworkError":
    case "ProviderTimeout":
      return true;
    case "HttpError":
      return e.status >= 500;
    case "ParseError":
    case "SymbolNotFound":
    case "ServiceError":
      return false;
  }
}

// --- Adapter ---

export const PROVIDER_IDS = ["yahoo", "alphavantage", "coingecko", "test"] as const;

export type ProviderId = (typeof PROVIDER_IDS)[number];

export interface PriceProvider {
  readonly id: ProviderId;
  readonly fetchCurrent: (
    symbol: string,
  ) => Effect.Effect<PricePoint, ProviderError>;
  /** Daily points from `since` up to now, ascending by timestamp. */
  readonly fetchHistory: (
    symbol: string,
    since: Date,
  ) => Effect.Effect<ReadonlyArray<PricePoint>, ProviderError>;
}
