/**
 * Zone schedule entry point.
 *
 * Resolves configuration once, then turns a capability catalog and a day's
 * shift rows into an occupancy table plus diagnostics.
 *
 * @example
 * ```typescript
 * import { defineZoneSchedule } from "zoneroster";
 *
 * const store = defineZoneSchedule({
 *   zones: [
 *     { name: "Entrance", requiredCapability: "ENT" },
 *     { name: "Cashier", requiredCapability: "CSH" },
 *   ],
 *   operatingHours: { start: "09:00", end: "17:00" },
 *   mode: "discretized",
 * });
 *
 * const result = store.run({
 *   catalog: { alice: ["CSH"], bob: ["ENT", "CSH"] },
 *   rows: [
 *     { workerId: "alice", start: "2025-03-03 09:00", end: "2025-03-03 17:00" },
 *     { workerId: "bob", start: "2025-03-03 09:00", end: "2025-03-03 13:00" },
 *   ],
 * });
 *
 * result.occupancy.Cashier[0]; // { time: "2025-03-03 09:00", workerId: "alice" }
 * ```
 *
 * @module
 */

import { resolveSchedulingConfig, type SchedulingConfig, type SchedulingOptions } from "./config.js";
import { slotStarts } from "./datetime.utils.js";
import { SchedulingValidationError } from "./errors.js";
import { runDiscretized } from "./engine/discretized.js";
import { DiagnosticsReporterImpl } from "./engine/diagnostics-reporter.js";
import type { Diagnostic } from "./engine/diagnostics.types.js";
import { runEventSweep } from "./engine/event-sweep.js";
import { projectOccupancy, type OccupancyTable } from "./engine/occupancy.js";
import type { EngineFunction, SchedulingMode } from "./engine/types.js";
import { compareIds } from "./engine/utils.js";
import { buildRoster, type Roster, type RosterInput } from "./roster.js";
import type { TimeWindow, Timestamp, TimestampWindow, Worker } from "./types.js";

const ENGINES: Record<SchedulingMode, EngineFunction> = {
  "event-sweep": runEventSweep,
  discretized: runDiscretized,
};

/**
 * Per-worker summary of a run.
 *
 * @category Schedule
 */
export interface WorkerSummary {
  workerId: string;
  /** Hours spent in zones, counted in whole time units. */
  assignedHours: number;
  breakWindow?: TimestampWindow;
  lunchWindow?: TimestampWindow;
}

/**
 * Result of {@link ZoneSchedule.run}.
 *
 * @category Schedule
 */
export interface ScheduleResult {
  operatingDay: string;
  mode: SchedulingMode;
  slotMinutes: number;
  /** Zone names in declaration order. */
  zones: string[];
  occupancy: OccupancyTable;
  /** Time units left unstaffed, in zone then time order. */
  unfilled: Array<{ zone: string; time: Timestamp }>;
  diagnostics: Diagnostic[];
  /** Workers ordered by id. */
  workers: WorkerSummary[];
}

/**
 * A configured scheduler. Holds no state between runs: each run builds its
 * own workers, zones and usage records.
 *
 * @category Schedule
 */
export class ZoneSchedule {
  readonly #config: SchedulingConfig;

  /** @internal */
  constructor(config: SchedulingConfig) {
    this.#config = config;
  }

  get mode(): SchedulingMode {
    return this.#config.mode;
  }

  get zoneNames(): readonly string[] {
    return this.#config.zones.map((zone) => zone.name);
  }

  get config(): SchedulingConfig {
    return this.#config;
  }

  /**
   * Validates the input and assigns workers to zones.
   *
   * @throws {SchedulingValidationError} when the catalog or any shift row is
   *   invalid. Nothing is assigned in that case.
   */
  run(input: RosterInput): ScheduleResult {
    const config = this.#config;
    const { logger } = config;

    let roster: Roster;
    try {
      roster = buildRoster(input, config);
    } catch (error) {
      if (error instanceof SchedulingValidationError) {
        logger.error("Scheduling input rejected", {
          issues: error.issues.length,
          message: error.message,
        });
      }
      throw error;
    }

    const { clock, workers } = roster;
    const bounds = config.operatingHours ?? shiftBounds(workers);
    const slots = bounds ? slotStarts(bounds, config.slotMinutes) : [];

    logger.info("Scheduling run started", {
      operatingDay: clock.operatingDay,
      mode: config.mode,
      workers: workers.length,
      zones: config.zones.length,
      slots: slots.length,
    });

    const reporter = new DiagnosticsReporterImpl();
    const engine = ENGINES[config.mode];
    const result = engine(workers, config.zones, {
      clock,
      slots,
      slotMinutes: config.slotMinutes,
      penaltyThresholdHours: config.penaltyThresholdHours,
      resolveUnfilled: config.resolveUnfilled,
      reporter,
      logger,
    });

    const diagnostics = reporter.getDiagnostics();
    logger.info("Scheduling run finished", {
      unfilled: result.unfilled.length,
      diagnostics: diagnostics.length,
    });

    return {
      operatingDay: clock.operatingDay,
      mode: config.mode,
      slotMinutes: config.slotMinutes,
      zones: result.zones.map((zone) => zone.name),
      occupancy: projectOccupancy(result.zones, slots, clock, config.placeholderId),
      unfilled: result.unfilled.map(({ zone, slot }) => ({ zone, time: clock.format(slot) })),
      diagnostics,
      workers: [...workers]
        .sort((a, b) => compareIds(a.id, b.id))
        .map((worker) => ({
          workerId: worker.id,
          assignedHours: (result.usage.get(worker.id)?.assignedMinutes ?? 0) / 60,
          ...(worker.breakWindow && { breakWindow: clock.formatWindow(worker.breakWindow) }),
          ...(worker.lunchWindow && { lunchWindow: clock.formatWindow(worker.lunchWindow) }),
        })),
    };
  }
}

/**
 * Creates a {@link ZoneSchedule} from options. Options are validated here,
 * once, so a bad configuration fails before any input is read.
 *
 * @throws {SchedulingValidationError} when an option is invalid.
 *
 * @category Schedule
 */
export function defineZoneSchedule(options: SchedulingOptions = {}): ZoneSchedule {
  return new ZoneSchedule(resolveSchedulingConfig(options));
}

/**
 * One-shot form of `defineZoneSchedule(options).run(input)`.
 *
 * @category Schedule
 */
export function scheduleDay(input: RosterInput, options: SchedulingOptions = {}): ScheduleResult {
  return defineZoneSchedule(options).run(input);
}

function shiftBounds(workers: readonly Worker[]): TimeWindow | undefined {
  let bounds: TimeWindow | undefined;
  for (const { shift } of workers) {
    bounds = bounds
      ? { start: Math.min(bounds.start, shift.start), end: Math.max(bounds.end, shift.end) }
      : { start: shift.start, end: shift.end };
  }
  return bounds;
}
