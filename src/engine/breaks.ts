import { windowContains, windowsOverlap } from "../datetime.utils.js";
import type { TimeWindow } from "../types.js";
import type { BreakPolicy } from "./types.js";

/**
 * Break windows derived from a shift. Either may be absent.
 */
export interface BreakPlan {
  breakWindow?: TimeWindow;
  lunchWindow?: TimeWindow;
}

/**
 * Derives the short break and lunch windows for a shift.
 *
 * - The short break starts `breakOffsetMinutes` after the shift starts, for
 *   shifts of at least `minShiftMinutesForBreak`.
 * - Lunch is centred on the shift midpoint, for shifts of at least
 *   `minShiftMinutesForLunch`. When it would overlap the short break it moves
 *   to `lunchDeferralMinutes` after the break ends.
 * - A window that would not fit inside the shift is left out.
 *
 * Windows passed in `fixed` are kept as given and the computed one steers
 * around them: lunch as above, and a computed short break that would overlap
 * a fixed lunch moves to `lunchDeferralMinutes` after that lunch ends.
 *
 * @example 8-hour shift with default policy
 * ```typescript
 * computeBreaks({ start: 540, end: 1020 }, policy);
 * // { breakWindow: { start: 660, end: 675 }, lunchWindow: { start: 765, end: 795 } }
 * ```
 */
export function computeBreaks(
  shift: TimeWindow,
  policy: BreakPolicy,
  fixed: BreakPlan = {},
): BreakPlan {
  const duration = shift.end - shift.start;
  const plan: BreakPlan = {};

  if (fixed.breakWindow) {
    plan.breakWindow = fixed.breakWindow;
  } else if (duration >= policy.minShiftMinutesForBreak) {
    let start = shift.start + policy.breakOffsetMinutes;
    if (
      fixed.lunchWindow &&
      windowsOverlap({ start, end: start + policy.shortBreakMinutes }, fixed.lunchWindow)
    ) {
      start = fixed.lunchWindow.end + policy.lunchDeferralMinutes;
    }
    const candidate = { start, end: start + policy.shortBreakMinutes };
    if (windowContains(shift, candidate)) plan.breakWindow = candidate;
  }

  if (fixed.lunchWindow) {
    plan.lunchWindow = fixed.lunchWindow;
  } else if (duration >= policy.minShiftMinutesForLunch) {
    const midpoint = shift.start + Math.floor(duration / 2);
    let start = midpoint - Math.floor(policy.lunchMinutes / 2);
    if (
      plan.breakWindow &&
      windowsOverlap({ start, end: start + policy.lunchMinutes }, plan.breakWindow)
    ) {
      start = plan.breakWindow.end + policy.lunchDeferralMinutes;
    }
    const candidate = { start, end: start + policy.lunchMinutes };
    if (windowContains(shift, candidate)) plan.lunchWindow = candidate;
  }

  return plan;
}
