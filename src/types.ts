/**
 * Core time and roster types shared by the validation pass and the engine.
 *
 * @packageDocumentation
 */

import * as z from "zod";

// ============================================================================
// Time Primitives
// ============================================================================

/**
 * Textual timestamp in the fixed `YYYY-MM-DD HH:MM` format.
 *
 * @example
 * ```typescript
 * const opening: Timestamp = "2025-03-03 09:00";
 * ```
 */
export type Timestamp = string;

/**
 * Zod schema for {@link Timestamp}.
 * Only checks the textual shape; calendar validity is checked when the
 * timestamp is converted by a {@link DayClock}.
 */
export const TimestampSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}$/, "Expected a timestamp formatted as YYYY-MM-DD HH:MM");

/**
 * Zod schema for a wall-clock time (`HH:MM`, `24:00` allowed as a closing bound).
 */
export const ClockTimeSchema = z
  .string()
  .regex(/^(?:[01]\d|2[0-3]):[0-5]\d$|^24:00$/, "Expected a time formatted as HH:MM");

/**
 * Zod schema for a calendar day (`YYYY-MM-DD`).
 */
export const DayStringSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Expected a date formatted as YYYY-MM-DD");

/**
 * Half-open time window `[start, end)` in minutes since midnight of the
 * operating day.
 *
 * Windows may extend past 1440 when a shift runs over midnight.
 */
export interface TimeWindow {
  start: number;
  end: number;
}

/**
 * A time window as it appears in input rows and results.
 */
export interface TimestampWindow {
  start: Timestamp;
  end: Timestamp;
}

// ============================================================================
// Roster
// ============================================================================

/**
 * A validated worker record for one operating day.
 *
 * Built by {@link buildRoster} from a shift row, the capability catalog and the
 * break calculator. Frozen once built.
 */
export interface Worker {
  readonly id: string;
  /** Capability tags; an empty set makes the worker unassignable. */
  readonly capabilities: ReadonlySet<string>;
  readonly shift: Readonly<TimeWindow>;
  readonly breakWindow?: Readonly<TimeWindow>;
  readonly lunchWindow?: Readonly<TimeWindow>;
}

/**
 * A named work area requiring exactly one capability tag.
 *
 * A zone holds at most one worker per time unit.
 */
export interface ZoneDefinition {
  name: string;
  requiredCapability: string;
}

/**
 * Capability catalog: worker id to capability tags.
 *
 * @example
 * ```typescript
 * const catalog: CapabilityCatalog = {
 *   alice: ["CSH", "ENT"],
 *   bob: ["CSS"],
 * };
 * ```
 */
export type CapabilityCatalog = Readonly<Record<string, readonly string[]>>;
