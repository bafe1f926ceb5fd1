// Price cache: Effect shell around price-cache-state.ts.
//
// Adds the clock, a Ref for the entries, and collapsing of concurrent
// misses: the first caller to miss a key forks the lookup, later callers
// for the same key join that fiber instead of starting their own.

import {
  Clock,
  Console,
  Context,
  Duration,
  Effect,
  Fiber,
  HashMap,
  Layer,
  Option,
  Ref,
  SynchronizedRef,
} from "effect";
import type { PriceQuote } from "./domain.ts";
import { PriceSettingsConfig } from "./config.ts";
import {
  emptyCache,
  insert,
  keyId,
  lookup,
  remove,
  type CacheState,
  type PriceKey,
} from "./price-cache-state.ts";

export interface PriceCacheOptions {
  /** Lifetime of "current" entries. Historical entries never expire. */
  readonly ttl: Duration.DurationInput;
  readonly maxEntries?: number;
}

export interface PriceCacheService {
  readonly get: (key: PriceKey) => Effect.Effect<Option.Option<PriceQuote>>;
  readonly put: (
    key: PriceKey,
    quote: PriceQuote,
    ttl?: Duration.DurationInput,
  ) => Effect.Effect<void>;
  /** Drop the entry so the next read goes to the providers. */
  readonly invalidate: (key: PriceKey) => Effect.Effect<void>;
  /** Cached quote, or the result of `fetch`. A `Some` from `fetch` is
   *  stored; a `None` is handed back without being cached. */
  readonly getOrFetch: <R>(
    key: PriceKey,
    fetch: Effect.Effect<Option.Option<PriceQuote>, never, R>,
  ) => Effect.Effect<Option.Option<PriceQuote>, never, R>;
  readonly size: Effect.Effect<number>;
}

export class PriceCache extends Context.Tag("PriceCache")<
  PriceCache,
  PriceCacheService
>() {}

type InFlight = HashMap.HashMap<
  string,
  Fiber.RuntimeFiber<Option.Option<PriceQuote>, never>
>;

type Pending = Effect.Effect<Option.Option<PriceQuote>>;

const settle = (
  pending: Pending,
  running: InFlight,
): readonly [Pending, InFlight] => [pending, running];

export function makePriceCache(
  options: PriceCacheOptions,
): Effect.Effect<PriceCacheService> {
  return Effect.gen(function* () {
    const defaultTtlMs = Duration.toMillis(Duration.decode(options.ttl));
    const maxEntries = options.maxEntries ?? Number.POSITIVE_INFINITY;
    const ref = yield* Ref.make<CacheState>(emptyCache);
    const inFlight = yield* SynchronizedRef.make<InFlight>(HashMap.empty());

    const get = (key: PriceKey) =>
      Effect.gen(function* () {
        const now = yield* Clock.currentTimeMillis;
        return lookup(yield* Ref.get(ref), key, now);
      });

    const put = (
      key: PriceKey,
      quote: PriceQuote,
      ttl?: Duration.DurationInput,
    ) =>
      Effect.gen(function* () {
        const now = yield* Clock.currentTimeMillis;
        const ttlMs = ttl === undefined
          ? defaultTtlMs
          : Duration.toMillis(Duration.decode(ttl));
        yield* Ref.update(ref, (s) =>
          insert(s, key, quote, now, ttlMs, maxEntries),
        );
      });

    const invalidate = (key: PriceKey) =>
      Ref.update(ref, (s) => remove(s, key)).pipe(
        Effect.zipLeft(Console.debug(`[cache] invalidated ${keyId(key)}`)),
      );

    const getOrFetch = <R>(
      key: PriceKey,
      fetch: Effect.Effect<Option.Option<PriceQuote>, never, R>,
    ): Effect.Effect<Option.Option<PriceQuote>, never, R> =>
      Effect.gen(function* () {
        const cached = yield* get(key);
        if (Option.isSome(cached)) {
          yield* Console.debug(`[cache] hit ${keyId(key)}`);
          return cached;
        }

        const id = keyId(key);

        // Check-then-act under the in-flight lock: join a running lookup,
        // take a value stored since the first check, or start the lookup.
        const pending = yield* SynchronizedRef.modifyEffect(
          inFlight,
          (running) =>
            Effect.gen(function* () {
              const existing = HashMap.get(running, id);
              if (Option.isSome(existing)) {
                yield* Console.debug(`[cache] joining in-flight ${id}`);
                return settle(Fiber.join(existing.value), running);
              }

              const stored = yield* get(key);
              if (Option.isSome(stored)) {
                return settle(Effect.succeed(stored), running);
              }

              yield* Console.debug(`[cache] miss ${id}`);
              const fiber = yield* fetch.pipe(
                Effect.tap((result) =>
                  Option.isSome(result) ? put(key, result.value) : Effect.void,
                ),
                Effect.ensuring(
                  SynchronizedRef.update(inFlight, HashMap.remove(id)),
                ),
                Effect.forkDaemon,
              );
              return settle(Fiber.join(fiber), HashMap.set(running, id, fiber));
            }),
        );

        return yield* pending;
      });

    return {
      get,
      put,
      invalidate,
      getOrFetch,
      size: Effect.map(Ref.get(ref), (s) => HashMap.size(s.entries)),
    } satisfies PriceCacheService;
  });
}

export const PriceCacheLive = Layer.effect(
  PriceCache,
  Effect.gen(function* () {
    const settings = yield* PriceSettingsConfig;
    return yield* makePriceCache({
      ttl: settings.cacheTtl,
      maxEntries: settings.cacheMaxEntries,
    });
  }),
);
