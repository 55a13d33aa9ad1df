/**
 * Zone assignment for a single operating day.
 *
 * Workers bring a shift and a set of capability tags; zones each require one
 * capability and hold at most one worker per time unit. zoneroster computes
 * breaks, places workers into zones, and reports every time unit it could
 * not staff.
 *
 * @remarks
 * ## Core Concepts
 *
 * **Validation first**: the capability catalog and shift rows are checked in
 * full before anything is assigned. Any problem throws a
 * {@link SchedulingValidationError} listing every row and field at fault.
 *
 * **Two engines**:
 * - `event-sweep` walks shift, break and lunch events in time order. A
 *   worker keeps a zone until they leave for a break or their shift ends.
 * - `discretized` fills fixed time units, ranking candidates by a
 *   consecutive-hours penalty and hours worked so far, then tries to cover
 *   gaps with workers whose shift starts later.
 *
 * **Diagnostics**: gaps, skipped double bookings and early call-ins never
 * throw. They are returned alongside the occupancy table; see
 * {@link summarizeDiagnostics}.
 *
 * @example
 * ```typescript
 * import { scheduleDay, summarizeDiagnostics } from "zoneroster";
 *
 * const result = scheduleDay(
 *   {
 *     catalog: { alice: ["CSH"], bob: ["CSH", "ENT"] },
 *     rows: [
 *       { workerId: "alice", start: "2025-03-03 09:00", end: "2025-03-03 17:00" },
 *       { workerId: "bob", start: "2025-03-03 12:00", end: "2025-03-03 20:00" },
 *     ],
 *   },
 *   { zones: [{ name: "Cashier", requiredCapability: "CSH" }] },
 * );
 *
 * for (const { zone, status, unfilledTimes } of summarizeDiagnostics(result.diagnostics)) {
 *   console.log(zone, status, unfilledTimes);
 * }
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Time primitives
// ============================================================================

export type {
  Timestamp,
  TimeWindow,
  TimestampWindow,
  Worker,
  ZoneDefinition,
  CapabilityCatalog,
} from "./types.js";

export { TimestampSchema, ClockTimeSchema, DayStringSchema } from "./types.js";

export { DayClock, parseTimestamp, formatMinutes } from "./datetime.utils.js";

// ============================================================================
// Errors and logging
// ============================================================================

export { SchedulingValidationError } from "./errors.js";

export type { SchedulingIssue } from "./errors.js";

export { silentLogger } from "./logger.js";

export type { SchedulingLogger } from "./logger.js";

// ============================================================================
// Configuration
// ============================================================================

export {
  DEFAULT_ZONES,
  DEFAULT_CAPABILITIES,
  DEFAULT_SLOT_MINUTES,
  PENALTY_PROFILES,
  SchedulingOptionsSchema,
  resolveSchedulingConfig,
} from "./config.js";

export type { SchedulingOptions, SchedulingConfig } from "./config.js";

// ============================================================================
// Roster
// ============================================================================

export { buildRoster, catalogFromDirectory } from "./roster.js";

export type { Roster, RosterInput } from "./roster.js";

export {
  ShiftRowSchema,
  CapabilityCatalogSchema,
  CapabilityDirectorySchema,
} from "./roster.schemas.js";

export type { ShiftRow, CapabilityDirectory } from "./roster.schemas.js";

// ============================================================================
// Engine
// ============================================================================

export { computeBreaks } from "./engine/breaks.js";

export type { BreakPlan } from "./engine/breaks.js";

export type { BreakPolicy, SchedulingMode } from "./engine/types.js";

export { consecutivePenalty } from "./engine/fairness.js";

export type { OccupancyEntry, OccupancyTable } from "./engine/occupancy.js";

// ============================================================================
// Diagnostics
// ============================================================================

export type {
  Diagnostic,
  DiagnosticType,
  UnfilledDiagnostic,
  DoubleBookingDiagnostic,
  EarlyCallInDiagnostic,
  ZoneDiagnosticsSummary,
} from "./engine/diagnostics.types.js";

export { summarizeDiagnostics } from "./engine/diagnostics-reporter.js";

// ============================================================================
// Schedule
// ============================================================================

export { ZoneSchedule, defineZoneSchedule, scheduleDay } from "./schedule.js";

export type { ScheduleResult, WorkerSummary } from "./schedule.js";
