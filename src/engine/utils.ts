import type { Worker, ZoneDefinition } from "../types.js";
import type { EngineContext, WorkerUsage, ZoneState } from "./types.js";

/**
 * Whether `worker` may be placed in `zone`.
 */
export function hasCapability(worker: Worker, zone: { requiredCapability: string }): boolean {
  return worker.capabilities.has(zone.requiredCapability);
}

/**
 * Creates fresh, empty zone state in declaration order.
 */
export function createZoneStates(zones: readonly ZoneDefinition[]): ZoneState[] {
  return zones.map((zone) => ({
    name: zone.name,
    requiredCapability: zone.requiredCapability,
    occupancy: new Map<number, string>(),
  }));
}

export function createUsage(workerId: string): WorkerUsage {
  return {
    workerId,
    assignedMinutes: 0,
    consecutiveMinutes: 0,
    assignments: new Map<number, string>(),
  };
}

/**
 * Orders workers by shift start, then id. Used wherever the engine needs an
 * order that does not depend on input order.
 */
export function compareByShiftStart(a: Worker, b: Worker): number {
  if (a.shift.start !== b.shift.start) return a.shift.start - b.shift.start;
  return compareIds(a.id, b.id);
}

export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Records `zone` as held by `usage` for the time unit starting at `slot`.
 * Streak bookkeeping is left to {@link extendStreak}.
 */
export function bookSlot(
  zone: ZoneState,
  usage: WorkerUsage,
  slot: number,
  slotMinutes: number,
): void {
  zone.occupancy.set(slot, usage.workerId);
  usage.assignments.set(slot, zone.name);
  usage.assignedMinutes += slotMinutes;
}

/**
 * Updates the consecutive-minutes streak after `usage` was booked into
 * `zone` at `slot`. The streak continues only when the previous time unit
 * was spent in the same zone.
 */
export function extendStreak(
  usage: WorkerUsage,
  zone: string,
  slot: number,
  slotMinutes: number,
): void {
  const continues = usage.currentZone === zone && usage.lastSlot === slot - slotMinutes;
  usage.consecutiveMinutes = continues ? usage.consecutiveMinutes + slotMinutes : slotMinutes;
  usage.currentZone = zone;
  usage.lastSlot = slot;
}

/**
 * Records a time unit of `zone` that nobody could staff.
 */
export function reportUnfilled(
  zone: ZoneState,
  slot: number,
  context: Pick<EngineContext, "clock" | "reporter" | "logger">,
): void {
  const time = context.clock.format(slot);
  context.reporter.reportUnfilled({
    zone: zone.name,
    time,
    minute: slot,
    requiredCapability: zone.requiredCapability,
  });
  context.logger.warn("Zone unfilled", { zone: zone.name, time });
}
