import type { Worker } from "../types.js";
import type { EngineContext, WorkerUsage, ZoneState } from "./types.js";
import { compareByShiftStart } from "./utils.js";

/**
 * A worker competing for one zone and time unit.
 */
export interface Candidate {
  readonly worker: Worker;
  readonly usage: WorkerUsage;
}

export interface RankedCandidate extends Candidate {
  /** {@link consecutivePenalty} of the candidate's prospective streak. */
  readonly penalty: number;
}

/**
 * Cost of keeping a worker in the same zone for `minutes` in a row:
 * 0 up to `thresholdHours`, then 1 per hour beyond it.
 *
 * @example
 * ```typescript
 * consecutivePenalty(120, 2); // 0
 * consecutivePenalty(210, 2); // 1.5
 * ```
 */
export function consecutivePenalty(minutes: number, thresholdHours: number): number {
  return Math.max(0, minutes / 60 - thresholdHours);
}

/**
 * Streak length if `usage` were placed in `zone` at `slot`.
 */
export function prospectiveStreak(
  usage: WorkerUsage,
  zone: string,
  slot: number,
  slotMinutes: number,
): number {
  const continues = usage.currentZone === zone && usage.lastSlot === slot - slotMinutes;
  return continues ? usage.consecutiveMinutes + slotMinutes : slotMinutes;
}

/**
 * Orders candidates for `zone` at `slot`: lowest penalty first, then fewest
 * assigned minutes, then earliest shift start, then id.
 */
export function rankCandidates(
  candidates: readonly Candidate[],
  zone: string,
  slot: number,
  context: Pick<EngineContext, "slotMinutes" | "penaltyThresholdHours">,
): RankedCandidate[] {
  return candidates
    .map((candidate) => ({
      ...candidate,
      penalty: consecutivePenalty(
        prospectiveStreak(candidate.usage, zone, slot, context.slotMinutes),
        context.penaltyThresholdHours,
      ),
    }))
    .sort(
      (a, b) =>
        a.penalty - b.penalty ||
        a.usage.assignedMinutes - b.usage.assignedMinutes ||
        compareByShiftStart(a.worker, b.worker),
    );
}

/**
 * Picks the first ranked candidate that does not already hold `zone` at
 * `slot`. Each candidate skipped that way is reported as a double booking.
 *
 * The discretized engine offers each zone once per slot and never to a worker
 * booked at that slot, so inside a run this guard does not fire; it covers
 * callers that rank their own candidate lists.
 */
export function selectCandidate<T extends Candidate>(
  ranked: readonly T[],
  zone: ZoneState,
  slot: number,
  context: Pick<EngineContext, "clock" | "reporter" | "logger">,
): T | undefined {
  for (const candidate of ranked) {
    if (candidate.usage.assignments.get(slot) === zone.name) {
      const time = context.clock.format(slot);
      context.reporter.reportDoubleBooking({
        zone: zone.name,
        time,
        minute: slot,
        workerId: candidate.worker.id,
      });
      context.logger.warn("Skipped double booking", {
        zone: zone.name,
        time,
        workerId: candidate.worker.id,
      });
      continue;
    }
    return candidate;
  }
  return undefined;
}
