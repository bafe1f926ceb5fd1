// Price cache: pure state and transitions.
//
// Entries are keyed by (symbol, asset class, granularity). Granularity is
// "current" for live prices, which expire, or an ISO calendar date for
// historical closes, which never do. Entries are replaced, never edited.

import { HashMap, Option } from "effect";
import type { AssetClass, PriceQuote } from "./domain.ts";

// --- Keys ---

export interface PriceKey {
  readonly symbol: string;
  readonly assetClass: AssetClass;
  /** "current", or "YYYY-MM-DD" for a historical close. */
  readonly granularity: string;
}

export const currentKey = (symbol: string, assetClass: AssetClass): PriceKey => ({
  symbol,
  assetClass,
  granularity: "current",
});

export const historicalKey = (
  symbol: string,
  assetClass: AssetClass,
  date: Date | number,
): PriceKey => ({
  symbol,
  assetClass,
  granularity: isoDate(date),
});

export const isHistorical = (key: PriceKey): boolean =>
  key.granularity !== "current";

export const keyId = (key: PriceKey): string =>
  `${key.assetClass}:${key.symbol.toUpperCase()}:${key.granularity}`;

export function isoDate(date: Date | number): string {
  return new Date(date).toISOString().slice(0, 10);
}

// --- State ---

export interface CacheEntry {
  readonly key: PriceKey;
  readonly quote: PriceQuote;
  /** None for entries that never expire. */
  readonly expiresAt: Option.Option<number>;
  readonly seq: number;
}

export interface CacheState {
  readonly entries: HashMap.HashMap<string, CacheEntry>;
  readonly nextSeq: number;
}

export const emptyCache: CacheState = {
  entries: HashMap.empty(),
  nextSeq: 0,
};

// --- Transitions ---

export const isExpired = (entry: CacheEntry, now: number): boolean =>
  Option.match(entry.expiresAt, {
    onNone: () => false,
    onSome: (at) => now >= at,
  });

/** The cached quote, unless it has expired. */
export function lookup(
  state: CacheState,
  key: PriceKey,
  now: number,
): Option.Option<PriceQuote> {
  return HashMap.get(state.entries, keyId(key)).pipe(
    Option.filter((entry) => !isExpired(entry, now)),
    Option.map((entry) => entry.quote),
  );
}

/** Store `quote`, replacing any entry under the same key. When the cache
 *  grows past `maxEntries`, expired entries go first, then the oldest by
 *  insertion. */
export function insert(
  state: CacheState,
  key: PriceKey,
  quote: PriceQuote,
  now: number,
  ttlMs: number,
  maxEntries: number,
): CacheState {
  const entry: CacheEntry = {
    key,
    quote,
    expiresAt: isHistorical(key) ? Option.none() : Option.some(now + ttlMs),
    seq: state.nextSeq,
  };
  const entries = HashMap.set(state.entries, keyId(key), entry);
  return {
    entries: HashMap.size(entries) > maxEntries
      ? evict(entries, now, maxEntries)
      : entries,
    nextSeq: state.nextSeq + 1,
  };
}

export function remove(state: CacheState, key: PriceKey): CacheState {
  return { ...state, entries: HashMap.remove(state.entries, keyId(key)) };
}

function evict(
  entries: HashMap.HashMap<string, CacheEntry>,
  now: number,
  maxEntries: number,
): HashMap.HashMap<string, CacheEntry> {
  const live = HashMap.filter(entries, (entry) => !isExpired(entry, now));
  const excess = HashMap.size(live) - maxEntries;
  if (excess <= 0) return live;

  const oldest = Array.from(HashMap.values(live))
    .sort((a, b) => a.seq - b.seq)
    .slice(0, excess);
  return oldest.reduce(
    (acc, entry) => HashMap.remove(acc, keyId(entry.key)),
    live,
  );
}
