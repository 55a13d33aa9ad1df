import { windowContains, windowsOverlap } from "../datetime.utils.js";
import type { Worker, ZoneDefinition } from "../types.js";
import { rankCandidates, selectCandidate, type Candidate } from "./fairness.js";
import type { EngineContext, EngineResult, WorkerUsage, ZoneState } from "./types.js";
import {
  bookSlot,
  compareByShiftStart,
  compareIds,
  createUsage,
  createZoneStates,
  extendStreak,
  hasCapability,
  reportUnfilled,
} from "./utils.js";

/**
 * Whether `worker` can work the whole time unit `[slot, slot + slotMinutes)`:
 * inside the shift and clear of break and lunch.
 */
export function isAvailableForSlot(worker: Worker, slot: number, slotMinutes: number): boolean {
  const unit = { start: slot, end: slot + slotMinutes };
  if (!windowContains(worker.shift, unit)) return false;
  if (worker.breakWindow && windowsOverlap(unit, worker.breakWindow)) return false;
  if (worker.lunchWindow && windowsOverlap(unit, worker.lunchWindow)) return false;
  return true;
}

/**
 * Discretized engine.
 *
 * Primary pass: time units in order, zones in declaration order. Candidates
 * are capable workers available for the whole unit who are not busy in
 * another zone; the fairness ranking picks among them.
 *
 * Resolution pass (when `resolveUnfilled` is set): each gap, in zone then
 * time order, goes to the capable worker whose shift starts strictly after
 * the gap and who holds nothing at that time, preferring the earliest shift
 * start, then the fewest assigned minutes. Gaps nobody can take are reported
 * as unfilled.
 */
export function runDiscretized(
  workers: readonly Worker[],
  zones: readonly ZoneDefinition[],
  context: EngineContext,
): EngineResult {
  const { slotMinutes } = context;
  const zoneStates = createZoneStates(zones);
  const ordered = [...workers].sort(compareByShiftStart);
  const usage = new Map<string, WorkerUsage>();
  const candidatesFor = new Map<string, Candidate>();
  for (const worker of ordered) {
    const record = createUsage(worker.id);
    usage.set(worker.id, record);
    candidatesFor.set(worker.id, { worker, usage: record });
  }
  const pool = [...candidatesFor.values()];

  const gaps: Array<{ zone: ZoneState; slot: number }> = [];

  for (const slot of context.slots) {
    for (const zone of zoneStates) {
      const eligible = pool.filter(
        ({ worker, usage: record }) =>
          hasCapability(worker, zone) &&
          isAvailableForSlot(worker, slot, slotMinutes) &&
          !record.assignments.has(slot),
      );
      const chosen = selectCandidate(
        rankCandidates(eligible, zone.name, slot, context),
        zone,
        slot,
        context,
      );
      if (!chosen) {
        gaps.push({ zone, slot });
        continue;
      }
      bookSlot(zone, chosen.usage, slot, slotMinutes);
      extendStreak(chosen.usage, zone.name, slot, slotMinutes);
      context.logger.debug("Placed worker", {
        workerId: chosen.worker.id,
        zone: zone.name,
        time: context.clock.format(slot),
        penalty: chosen.penalty,
      });
    }

    for (const record of usage.values()) {
      if (record.lastSlot !== slot) {
        record.consecutiveMinutes = 0;
        record.currentZone = undefined;
      }
    }
  }

  const zoneIndex = new Map(zoneStates.map((zone, index) => [zone.name, index]));
  gaps.sort(
    (a, b) => (zoneIndex.get(a.zone.name) ?? 0) - (zoneIndex.get(b.zone.name) ?? 0) || a.slot - b.slot,
  );

  const unfilled: Array<{ zone: string; slot: number }> = [];
  for (const { zone, slot } of gaps) {
    const caller = context.resolveUnfilled ? findEarlyCaller(pool, zone, slot) : undefined;
    if (!caller) {
      reportUnfilled(zone, slot, context);
      unfilled.push({ zone: zone.name, slot });
      continue;
    }
    bookSlot(zone, caller.usage, slot, slotMinutes);
    const time = context.clock.format(slot);
    context.reporter.reportEarlyCallIn({
      zone: zone.name,
      time,
      minute: slot,
      workerId: caller.worker.id,
    });
    context.logger.info("Called worker in early", {
      workerId: caller.worker.id,
      zone: zone.name,
      time,
    });
  }

  return { zones: zoneStates, usage, unfilled };
}

/**
 * Best worker to cover a gap at `slot` before their own shift begins, if any.
 */
export function findEarlyCaller(
  pool: readonly Candidate[],
  zone: ZoneState,
  slot: number,
): Candidate | undefined {
  const callers = pool.filter(
    ({ worker, usage }) =>
      hasCapability(worker, zone) && worker.shift.start > slot && !usage.assignments.has(slot),
  );
  callers.sort(
    (a, b) =>
      a.worker.shift.start - b.worker.shift.start ||
      a.usage.assignedMinutes - b.usage.assignedMinutes ||
      compareIds(a.worker.id, b.worker.id),
  );
  return callers[0];
}
