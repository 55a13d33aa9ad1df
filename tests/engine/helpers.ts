import { expect } from "vitest";
import { clockTimeToMinutes, DayClock, slotStarts } from "../../src/datetime.utils.js";
import { DiagnosticsReporterImpl } from "../../src/engine/diagnostics-reporter.js";
import type { EngineContext, EngineResult } from "../../src/engine/types.js";
import { silentLogger } from "../../src/logger.js";
import type { Worker, ZoneDefinition } from "../../src/types.js";

export const DAY = "2025-03-03";

/** `"09:30"` to 570. */
export const m = (time: string) => clockTimeToMinutes(time);

/** `"09:30"` to `"2025-03-03 09:30"`. */
export const at = (time: string) => `${DAY} ${time}`;

export const CASHIER: ZoneDefinition = { name: "Cashier", requiredCapability: "CSH" };
export const ENTRANCE: ZoneDefinition = { name: "Entrance", requiredCapability: "ENT" };

export function worker(
  id: string,
  capabilities: string[],
  shift: [string, string],
  windows: { breakWindow?: [string, string]; lunchWindow?: [string, string] } = {},
): Worker {
  return {
    id,
    capabilities: new Set(capabilities),
    shift: { start: m(shift[0]), end: m(shift[1]) },
    ...(windows.breakWindow && {
      breakWindow: { start: m(windows.breakWindow[0]), end: m(windows.breakWindow[1]) },
    }),
    ...(windows.lunchWindow && {
      lunchWindow: { start: m(windows.lunchWindow[0]), end: m(windows.lunchWindow[1]) },
    }),
  };
}

export function engineContext(
  hours: [string, string],
  slotMinutes: number,
  overrides: Partial<Omit<EngineContext, "clock" | "slots" | "slotMinutes" | "reporter">> = {},
): EngineContext & { reporter: DiagnosticsReporterImpl } {
  return {
    clock: new DayClock(DAY),
    slots: slotStarts({ start: m(hours[0]), end: m(hours[1]) }, slotMinutes),
    slotMinutes,
    penaltyThresholdHours: 2,
    resolveUnfilled: true,
    logger: silentLogger,
    ...overrides,
    reporter: new DiagnosticsReporterImpl(),
  };
}

/** Zone occupancy as `{ zone: { "HH:MM": workerId } }`. */
export function occupancyByZone(result: EngineResult): Record<string, Record<string, string>> {
  const out: Record<string, Record<string, string>> = {};
  for (const zone of result.zones) {
    const entries: Record<string, string> = {};
    for (const [slot, workerId] of [...zone.occupancy].sort(([a], [b]) => a - b)) {
      entries[new DayClock(DAY).format(slot).slice(11)] = workerId;
    }
    out[zone.name] = entries;
  }
  return out;
}

/**
 * Checks capacity, no double booking, skill compliance and break exclusion.
 * A time unit `[slot, slot + slotMinutes)` may not touch a break or lunch.
 */
export function expectScheduleInvariants(
  result: EngineResult,
  workers: readonly Worker[],
  slotMinutes: number,
) {
  const byId = new Map(workers.map((w) => [w.id, w]));
  const seen = new Map<string, Set<number>>();

  for (const zone of result.zones) {
    for (const [slot, workerId] of zone.occupancy) {
      const w = byId.get(workerId);
      expect(w, `unknown worker ${workerId}`).toBeDefined();
      if (!w) continue;

      expect(w.capabilities.has(zone.requiredCapability)).toBe(true);

      const slots = seen.get(workerId) ?? new Set<number>();
      expect(slots.has(slot), `${workerId} double booked at ${slot}`).toBe(false);
      slots.add(slot);
      seen.set(workerId, slots);

      for (const window of [w.breakWindow, w.lunchWindow]) {
        if (!window) continue;
        const overlaps = slot < window.end && window.start < slot + slotMinutes;
        expect(overlaps, `${workerId} placed during a break at ${slot}`).toBe(false);
      }
    }
  }
}
