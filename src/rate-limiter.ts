// Rate limiter: Effect shell around rate-limiter-state.ts.
//
// One slot per provider: a single-permit semaphore plus the time of the
// last call it let through. A caller holds the permit while it waits out
// the remaining interval, stamps the call, then releases, so turns on the
// same provider are strictly serialized and providers never block each
// other.

import { Clock, Console, Context, Duration, Effect, Layer, Ref } from "effect";
import { PriceSettingsConfig } from "./config.ts";
import { PROVIDER_IDS, type ProviderId } from "./price-api.ts";
import {
  initialSlot,
  recordCall,
  remainingWait,
  type SlotState,
} from "./rate-limiter-state.ts";

export type MinIntervals = Partial<Record<ProviderId, Duration.DurationInput>>;

export interface RateLimiterService {
  /** Suspend until `provider` may be called again, then claim the turn. */
  readonly awaitTurn: (provider: ProviderId) => Effect.Effect<void>;
  /** Claim a turn on `provider`, then run `effect`. */
  readonly withTurn: <A, E, R>(
    provider: ProviderId,
    effect: Effect.Effect<A, E, R>,
  ) => Effect.Effect<A, E, R>;
}

export class RateLimiter extends Context.Tag("RateLimiter")<
  RateLimiter,
  RateLimiterService
>() {}

interface Slot {
  readonly intervalMs: number;
  readonly permit: Effect.Semaphore;
  readonly state: Ref.Ref<SlotState>;
}

export function makeRateLimiter(
  intervals: MinIntervals,
): Effect.Effect<RateLimiterService> {
  return Effect.gen(function* () {
    const slots = new Map<ProviderId, Slot>();
    for (const id of PROVIDER_IDS) {
      const interval = intervals[id];
      slots.set(id, {
        intervalMs: interval === undefined
          ? 0
          : Duration.toMillis(Duration.decode(interval)),
        permit: yield* Effect.makeSemaphore(1),
        state: yield* Ref.make(initialSlot),
      });
    }

    const takeTurn = (provider: ProviderId, slot: Slot): Effect.Effect<void> =>
      Effect.gen(function* () {
        const state = yield* Ref.get(slot.state);
        let now = yield* Clock.currentTimeMillis;
        let wait = remainingWait(state, now, slot.intervalMs);

        // Timers may fire a hair early; re-check until the interval is met.
        while (wait > 0) {
          yield* Console.debug(`[limiter] ${provider}: waiting ${wait}ms`);
          yield* Effect.sleep(Duration.millis(wait));
          now = yield* Clock.currentTimeMillis;
          wait = remainingWait(state, now, slot.intervalMs);
        }

        yield* Ref.set(slot.state, recordCall(now));
      }).pipe(slot.permit.withPermits(1));

    const awaitTurn = (provider: ProviderId): Effect.Effect<void> => {
      const slot = slots.get(provider);
      return slot === undefined ? Effect.void : takeTurn(provider, slot);
    };

    return {
      awaitTurn,
      withTurn: (provider, effect) =>
        Effect.zipRight(awaitTurn(provider), effect),
    } satisfies RateLimiterService;
  });
}

export const RateLimiterLive = Layer.effect(
  RateLimiter,
  Effect.gen(function* () {
    const settings = yield* PriceSettingsConfig;
    return yield* makeRateLimiter(settings.minIntervals);
  }),
);
