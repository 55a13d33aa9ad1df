import type { Worker, ZoneDefinition } from "../types.js";
import { buildEvents, groupByInstant, type AssignmentEvent, type AssignmentEventKind } from "./events.js";
import type { EngineContext, EngineResult, WorkerUsage, ZoneState } from "./types.js";
import {
  bookSlot,
  compareByShiftStart,
  createUsage,
  createZoneStates,
  extendStreak,
  hasCapability,
  reportUnfilled,
} from "./utils.js";

/**
 * Lifecycle of a worker during the sweep. `finished` is terminal.
 */
export type WorkerState = "pending" | "available" | "on-break" | "on-lunch" | "finished";

/**
 * Uninterrupted holding of one zone by one worker over `[start, end)`.
 */
export interface Stint {
  readonly workerId: string;
  readonly zone: string;
  readonly start: number;
  readonly end: number;
}

const TRANSITIONS: Record<AssignmentEventKind, { from: WorkerState; to: WorkerState }> = {
  shift_start: { from: "pending", to: "available" },
  break_start: { from: "available", to: "on-break" },
  break_end: { from: "on-break", to: "available" },
  lunch_start: { from: "available", to: "on-lunch" },
  lunch_end: { from: "on-lunch", to: "available" },
  shift_end: { from: "available", to: "finished" },
};

interface SweepWorker {
  readonly worker: Worker;
  state: WorkerState;
  holding?: { zone: string; since: number };
}

/**
 * Walks shift and break events in time order and derives zone holdings.
 *
 * Every event of one instant is applied before anyone is placed. Placement
 * then goes through available workers without a zone, by shift start then
 * id; each takes the first zone in declaration order that matches one of its
 * capabilities and is free. A worker keeps its zone until a break, lunch or
 * the end of its shift.
 *
 * @throws {Error} when an event does not fit the worker's lifecycle.
 */
export function sweepStints(
  workers: readonly Worker[],
  zones: readonly ZoneDefinition[],
  context: Pick<EngineContext, "clock" | "logger">,
): Stint[] {
  const sweep = new Map<string, SweepWorker>();
  for (const worker of [...workers].sort(compareByShiftStart)) {
    sweep.set(worker.id, { worker, state: "pending" });
  }
  const holders = new Map<string, string>();
  const stints: Stint[] = [];

  const release = (entry: SweepWorker, time: number) => {
    if (!entry.holding) return;
    stints.push({
      workerId: entry.worker.id,
      zone: entry.holding.zone,
      start: entry.holding.since,
      end: time,
    });
    holders.delete(entry.holding.zone);
    entry.holding = undefined;
  };

  const apply = (event: AssignmentEvent) => {
    const entry = sweep.get(event.workerId);
    if (!entry) {
      throw new Error(`Event for unknown worker "${event.workerId}"`);
    }
    const transition = TRANSITIONS[event.kind];
    if (entry.state !== transition.from) {
      throw new Error(
        `Illegal transition for worker "${event.workerId}": ${event.kind} while ${entry.state}`,
      );
    }
    if (transition.to !== "available") release(entry, event.time);
    entry.state = transition.to;
  };

  for (const { time, events } of groupByInstant(buildEvents(workers))) {
    for (const event of events) apply(event);

    for (const entry of sweep.values()) {
      if (entry.state !== "available" || entry.holding) continue;
      const zone = zones.find((z) => hasCapability(entry.worker, z) && !holders.has(z.name));
      if (!zone) continue;
      holders.set(zone.name, entry.worker.id);
      entry.holding = { zone: zone.name, since: time };
      context.logger.debug("Placed worker", {
        workerId: entry.worker.id,
        zone: zone.name,
        time: context.clock.format(time),
      });
    }
  }

  return stints;
}

/**
 * Event-sweep engine: derives stints with {@link sweepStints}, then maps them
 * onto time units. A unit `[slot, slot + slotMinutes)` goes to the stint that
 * covers all of it, so a unit cut by a break, lunch or shift boundary has no
 * holder. Time units nobody holds are reported as unfilled; this mode does
 * not try to resolve them.
 */
export function runEventSweep(
  workers: readonly Worker[],
  zones: readonly ZoneDefinition[],
  context: EngineContext,
): EngineResult {
  const stints = sweepStints(workers, zones, context);
  const zoneStates = createZoneStates(zones);
  const usage = new Map<string, WorkerUsage>(
    workers.map((worker) => [worker.id, createUsage(worker.id)]),
  );

  for (const slot of context.slots) {
    const unitEnd = slot + context.slotMinutes;
    for (const zone of zoneStates) {
      const stint = stints.find((s) => s.zone === zone.name && s.start <= slot && unitEnd <= s.end);
      const record = stint && usage.get(stint.workerId);
      if (!record) continue;
      bookSlot(zone, record, slot, context.slotMinutes);
      extendStreak(record, zone.name, slot, context.slotMinutes);
    }
  }

  return { zones: zoneStates, usage, unfilled: reportGaps(zoneStates, context) };
}

/**
 * Reports every empty time unit of every zone, in zone then time order.
 */
export function reportGaps(
  zones: readonly ZoneState[],
  context: Pick<EngineContext, "clock" | "slots" | "reporter" | "logger">,
): Array<{ zone: string; slot: number }> {
  const unfilled: Array<{ zone: string; slot: number }> = [];
  for (const zone of zones) {
    for (const slot of context.slots) {
      if (zone.occupancy.has(slot)) continue;
      reportUnfilled(zone, slot, context);
      unfilled.push({ zone: zone.name, slot });
    }
  }
  return unfilled;
}
