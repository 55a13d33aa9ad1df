/**
 * Scheduling configuration: every knob of a run, with defaults.
 *
 * Configuration is an explicit value handed to the entry point. Nothing is
 * read from module-level state, so runs never depend on load order.
 *
 * @module
 */

import * as z from "zod";
import { clockTimeToMinutes, parseDayString } from "./datetime.utils.js";
import { issuesFromSchema, SchedulingValidationError, type SchedulingIssue } from "./errors.js";
import { silentLogger, type SchedulingLogger } from "./logger.js";
import { ClockTimeSchema, DayStringSchema, type TimeWindow, type ZoneDefinition } from "./types.js";
import type { BreakPolicy, SchedulingMode } from "./engine/types.js";

/**
 * Zones used when the caller does not define any, in placement order.
 *
 * @category Configuration
 */
export const DEFAULT_ZONES = [
  { name: "Entrance", requiredCapability: "ENT" },
  { name: "Cashier", requiredCapability: "CSH" },
  { name: "Customer Service", requiredCapability: "CSS" },
  { name: "ACO", requiredCapability: "ACO" },
] as const satisfies readonly ZoneDefinition[];

/**
 * Capability tags accepted when the caller does not define any.
 *
 * @category Configuration
 */
export const DEFAULT_CAPABILITIES: readonly string[] = DEFAULT_ZONES.map(
  (zone) => zone.requiredCapability,
);

/**
 * Consecutive-hours thresholds before the fairness penalty kicks in.
 *
 * @category Configuration
 */
export const PENALTY_PROFILES = {
  standard: 2,
  extended: 4,
} as const;

/**
 * Default time-unit length per mode, in minutes.
 *
 * @category Configuration
 */
export const DEFAULT_SLOT_MINUTES = {
  "event-sweep": 15,
  discretized: 60,
} as const satisfies Record<SchedulingMode, number>;

export const ZoneDefinitionSchema = z.object({
  name: z.string().min(1),
  requiredCapability: z.string().min(1),
});

export const SchedulingModeSchema = z.enum(["event-sweep", "discretized"]);

export const SchedulingOptionsSchema = z.strictObject({
  shortBreakMinutes: z.number().int().positive().default(15),
  lunchMinutes: z.number().int().positive().default(30),
  minShiftHoursForBreak: z.number().nonnegative().default(2),
  minShiftHoursForLunch: z.number().nonnegative().default(4),
  breakOffsetMinutes: z.number().int().nonnegative().default(120),
  lunchDeferralMinutes: z.number().int().nonnegative().default(30),
  penaltyThresholdHours: z.number().nonnegative().default(PENALTY_PROFILES.standard),
  validCapabilities: z
    .array(z.string().min(1))
    .min(1)
    .default(() => [...DEFAULT_CAPABILITIES]),
  zones: z
    .array(ZoneDefinitionSchema)
    .min(1)
    .default(() => DEFAULT_ZONES.map((zone) => ({ ...zone }))),
  operatingDay: DayStringSchema.optional(),
  operatingHours: z.object({ start: ClockTimeSchema, end: ClockTimeSchema }).optional(),
  mode: SchedulingModeSchema.default("event-sweep"),
  slotMinutes: z.number().int().positive().max(1440).optional(),
  placeholderId: z.string().min(1).default("unassigned"),
  resolveUnfilled: z.boolean().default(true),
});

/**
 * Options accepted by {@link defineZoneSchedule} and {@link scheduleDay}.
 * Every field is optional.
 *
 * @category Configuration
 */
export type SchedulingOptions = z.input<typeof SchedulingOptionsSchema> & {
  /** Receives run progress; silent when omitted. */
  logger?: SchedulingLogger;
};

/**
 * Fully resolved configuration for a run.
 *
 * @category Configuration
 */
export interface SchedulingConfig {
  readonly breakPolicy: Readonly<BreakPolicy>;
  readonly penaltyThresholdHours: number;
  readonly validCapabilities: ReadonlySet<string>;
  readonly zones: readonly ZoneDefinition[];
  readonly operatingDay?: string;
  /** Operating-hour bounds in minutes since midnight. */
  readonly operatingHours?: Readonly<TimeWindow>;
  readonly mode: SchedulingMode;
  readonly slotMinutes: number;
  readonly placeholderId: string;
  readonly resolveUnfilled: boolean;
  readonly logger: SchedulingLogger;
}

/**
 * Validates options and fills in defaults.
 *
 * @throws {SchedulingValidationError} when any option is invalid, a zone name
 *   repeats, a zone requires an unknown capability, or the operating hours
 *   are empty.
 *
 * @category Configuration
 */
export function resolveSchedulingConfig(options: SchedulingOptions = {}): SchedulingConfig {
  const { logger, ...rest } = options;
  const parsed = SchedulingOptionsSchema.safeParse(rest);
  if (!parsed.success) {
    throw new SchedulingValidationError(issuesFromSchema(parsed.error.issues, ["options"]));
  }
  const data = parsed.data;
  const issues: SchedulingIssue[] = [];

  const validCapabilities = new Set(data.validCapabilities);
  const seenZones = new Set<string>();
  data.zones.forEach((zone, index) => {
    if (seenZones.has(zone.name)) {
      issues.push({
        path: `options.zones[${index}].name`,
        message: `Duplicate zone name "${zone.name}"`,
      });
    }
    seenZones.add(zone.name);
    if (!validCapabilities.has(zone.requiredCapability)) {
      issues.push({
        path: `options.zones[${index}].requiredCapability`,
        message: `Zone "${zone.name}" requires unknown capability "${zone.requiredCapability}"`,
      });
    }
  });

  if (data.operatingDay !== undefined && !parseDayString(data.operatingDay)) {
    issues.push({
      path: "options.operatingDay",
      message: `Operating day "${data.operatingDay}" does not exist`,
    });
  }

  let operatingHours: TimeWindow | undefined;
  if (data.operatingHours) {
    operatingHours = {
      start: clockTimeToMinutes(data.operatingHours.start),
      end: clockTimeToMinutes(data.operatingHours.end),
    };
    if (operatingHours.start >= operatingHours.end) {
      issues.push({
        path: "options.operatingHours",
        message: `Operating hours start ${data.operatingHours.start} must be before end ${data.operatingHours.end}`,
      });
    }
  }

  if (issues.length > 0) throw new SchedulingValidationError(issues);

  return {
    breakPolicy: {
      shortBreakMinutes: data.shortBreakMinutes,
      lunchMinutes: data.lunchMinutes,
      minShiftMinutesForBreak: Math.round(data.minShiftHoursForBreak * 60),
      minShiftMinutesForLunch: Math.round(data.minShiftHoursForLunch * 60),
      breakOffsetMinutes: data.breakOffsetMinutes,
      lunchDeferralMinutes: data.lunchDeferralMinutes,
    },
    penaltyThresholdHours: data.penaltyThresholdHours,
    validCapabilities,
    zones: data.zones,
    operatingDay: data.operatingDay,
    operatingHours,
    mode: data.mode,
    slotMinutes: data.slotMinutes ?? DEFAULT_SLOT_MINUTES[data.mode],
    placeholderId: data.placeholderId,
    resolveUnfilled: data.resolveUnfilled,
    logger: logger ?? silentLogger,
  };
}
