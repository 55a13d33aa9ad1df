import type { DayClock } from "../datetime.utils.js";
import type { SchedulingLogger } from "../logger.js";
import type { Worker, ZoneDefinition } from "../types.js";
import type { DiagnosticsReporter } from "./diagnostics-reporter.js";

/**
 * How the engine walks the operating day.
 *
 * - `event-sweep`: continuous sweep over shift and break events; workers
 *   hold a zone until they leave for a break or their shift ends.
 * - `discretized`: fixed time buckets with fairness-ranked selection and a
 *   resolution pass for unfilled buckets.
 */
export type SchedulingMode = "event-sweep" | "discretized";

/**
 * Parameters of the break calculator, all in minutes.
 */
export interface BreakPolicy {
  shortBreakMinutes: number;
  lunchMinutes: number;
  /** Shortest shift that gets a short break. */
  minShiftMinutesForBreak: number;
  /** Shortest shift that gets a lunch break. */
  minShiftMinutesForLunch: number;
  /** Offset of the short break from the shift start. */
  breakOffsetMinutes: number;
  /** Gap left after a fixed or earlier window when a computed one moves out of its way. */
  lunchDeferralMinutes: number;
}

/**
 * Per-run zone state. `occupancy` maps a time-unit start (minutes) to the
 * worker holding the zone; presence of an entry is the capacity check.
 */
export interface ZoneState {
  readonly name: string;
  readonly requiredCapability: string;
  readonly occupancy: Map<number, string>;
}

/**
 * Per-worker usage record kept while a run is in progress.
 */
export interface WorkerUsage {
  readonly workerId: string;
  /** Minutes assigned so far across all zones. */
  assignedMinutes: number;
  /** Zone held in the most recent assigned time unit. */
  currentZone?: string;
  /** Length of the current uninterrupted stretch in `currentZone`. */
  consecutiveMinutes: number;
  /** Start of the most recent assigned time unit. */
  lastSlot?: number;
  /** Time-unit start to zone name. */
  readonly assignments: Map<number, string>;
}

/**
 * Everything an engine pass needs besides workers and zones.
 */
export interface EngineContext {
  readonly clock: DayClock;
  /** Start minute of every time unit in the operating hours, ascending. */
  readonly slots: readonly number[];
  readonly slotMinutes: number;
  readonly penaltyThresholdHours: number;
  readonly resolveUnfilled: boolean;
  readonly reporter: DiagnosticsReporter;
  readonly logger: SchedulingLogger;
}

/**
 * Outcome of an engine pass. Zone occupancy only holds real worker ids;
 * gaps are listed in `unfilled`.
 */
export interface EngineResult {
  readonly zones: readonly ZoneState[];
  readonly usage: ReadonlyMap<string, WorkerUsage>;
  /** Gaps left after the pass, in zone then time order. */
  readonly unfilled: ReadonlyArray<{ zone: string; slot: number }>;
}

export type EngineFunction = (
  workers: readonly Worker[],
  zones: readonly ZoneDefinition[],
  context: EngineContext,
) => EngineResult;

