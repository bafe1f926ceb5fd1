// Rate limiter: pure spacing arithmetic.
//
// A provider slot remembers when its last call was let through. The next
// call may go once `minIntervalMs` has passed since then.

import { Option } from "effect";

export interface SlotState {
  readonly lastCallAt: Option.Option<number>;
}

export const initialSlot: SlotState = { lastCallAt: Option.none() };

/** Milliseconds the caller still has to wait. Zero when it may go now. */
export function remainingWait(
  state: SlotState,
  now: number,
  minIntervalMs: number,
): number {
  return Option.match(state.lastCallAt, {
    onNone: () => 0,
    onSome: (last) => Math.max(0, last + minIntervalMs - now),
  });
}

/** State after a call is let through at `now`. */
export function recordCall(now: number): SlotState {
  return { lastCallAt: Option.some(now) };
}
