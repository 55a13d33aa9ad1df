import { DayClock, parseTimestamp, windowContains, windowsOverlap } from "./datetime.utils.js";
import { issuesFromSchema, SchedulingValidationError, type SchedulingIssue } from "./errors.js";
import type { SchedulingConfig } from "./config.js";
import { computeBreaks, type BreakPlan } from "./engine/breaks.js";
import {
  CapabilityCatalogSchema,
  CapabilityDirectorySchema,
  ShiftRowSchema,
  type ShiftRow,
} from "./roster.schemas.js";
import type { CapabilityCatalog, TimeWindow, TimestampWindow, Worker } from "./types.js";

/**
 * Raw inputs of a run: the capability catalog and the day's shift rows.
 */
export interface RosterInput {
  catalog: CapabilityCatalog;
  rows: readonly ShiftRow[];
}

/**
 * Validated workers for one operating day.
 */
export interface Roster {
  readonly clock: DayClock;
  readonly workers: readonly Worker[];
}

/**
 * Converts a directory document into a {@link CapabilityCatalog}.
 *
 * @throws {SchedulingValidationError} when the document has the wrong shape
 *   or lists the same alias twice.
 *
 * @example
 * ```typescript
 * catalogFromDirectory({ employees: [{ alias: "alice", skills: ["CSH"] }] });
 * // { alice: ["CSH"] }
 * ```
 */
export function catalogFromDirectory(document: unknown): CapabilityCatalog {
  const parsed = CapabilityDirectorySchema.safeParse(document);
  if (!parsed.success) {
    throw new SchedulingValidationError(issuesFromSchema(parsed.error.issues, ["directory"]));
  }

  const catalog: Record<string, string[]> = {};
  const issues: SchedulingIssue[] = [];
  parsed.data.employees.forEach((employee, index) => {
    if (Object.hasOwn(catalog, employee.alias)) {
      issues.push({
        path: `directory.employees[${index}].alias`,
        message: `Duplicate alias "${employee.alias}"`,
        workerId: employee.alias,
      });
      return;
    }
    catalog[employee.alias] = [...employee.skills];
  });

  if (issues.length > 0) throw new SchedulingValidationError(issues);
  return catalog;
}

type RosterConfig = Pick<SchedulingConfig, "breakPolicy" | "validCapabilities" | "operatingDay">;

interface ParsedRow {
  index: number;
  row: ShiftRow;
}

/**
 * Validates the catalog and shift rows and builds immutable {@link Worker}
 * records, with break and lunch windows from the break calculator unless the
 * row gives its own.
 *
 * Every issue is collected before failing, so a single error lists all rows
 * and fields at fault.
 *
 * @throws {SchedulingValidationError} on any malformed row, unknown or
 *   duplicate worker, unparsable timestamp, invalid capability, or break
 *   window outside its shift or overlapping the other break.
 */
export function buildRoster(input: RosterInput, config: RosterConfig): Roster {
  const catalogResult = CapabilityCatalogSchema.safeParse(input.catalog);
  if (!catalogResult.success) {
    throw new SchedulingValidationError(issuesFromSchema(catalogResult.error.issues, ["catalog"]));
  }
  const catalog = catalogResult.data;
  const issues: SchedulingIssue[] = [];

  for (const [workerId, capabilities] of Object.entries(catalog)) {
    const invalid = capabilities.filter((tag) => !config.validCapabilities.has(tag));
    if (invalid.length > 0) {
      issues.push({
        path: `catalog.${workerId}`,
        message: `Invalid capabilities for worker "${workerId}": ${invalid.join(", ")}`,
        workerId,
      });
    }
  }

  const parsedRows: ParsedRow[] = [];
  input.rows.forEach((raw: unknown, index) => {
    const result = ShiftRowSchema.safeParse(raw);
    if (result.success) {
      parsedRows.push({ index, row: result.data });
    } else {
      issues.push(...issuesFromSchema(result.error.issues, ["rows", index], { row: index }));
    }
  });

  const operatingDay = config.operatingDay ?? earliestStartDay(parsedRows);
  if (!operatingDay) {
    issues.push({
      path: "rows",
      message: "Cannot determine the operating day: no valid shift rows and no operatingDay option",
    });
    throw new SchedulingValidationError(issues);
  }

  const clock = new DayClock(operatingDay);
  const workers: Worker[] = [];
  const firstRowByWorker = new Map<string, number>();

  for (const { index, row } of parsedRows) {
    const at = (field: string): Pick<SchedulingIssue, "path" | "row" | "workerId"> => ({
      path: `rows[${index}].${field}`,
      row: index,
      workerId: row.workerId,
    });

    const capabilities = Object.hasOwn(catalog, row.workerId) ? catalog[row.workerId] : undefined;
    if (!capabilities) {
      issues.push({ ...at("workerId"), message: `Unknown worker id "${row.workerId}"` });
    }

    const firstRow = firstRowByWorker.get(row.workerId);
    if (firstRow !== undefined) {
      issues.push({
        ...at("workerId"),
        message: `Duplicate shift row for worker "${row.workerId}" (first at row ${firstRow})`,
      });
    } else {
      firstRowByWorker.set(row.workerId, index);
    }

    const shift = toWindow(clock, { start: row.start, end: row.end }, (field, message) =>
      issues.push({ ...at(field), message }),
    );
    if (!shift) continue;

    if (!clock.isOnOperatingDay(shift.start)) {
      issues.push({
        ...at("start"),
        message: `Shift starts on ${row.start.slice(0, 10)}, outside operating day ${operatingDay}`,
      });
    }

    const fixed: BreakPlan = {};
    let windowsValid = true;
    for (const field of ["breakWindow", "lunchWindow"] as const) {
      const given = row[field];
      if (!given) continue;
      const window = toWindow(clock, given, (sub, message) =>
        issues.push({ ...at(`${field}.${sub}`), message }),
      );
      if (window) {
        fixed[field] = window;
      } else {
        windowsValid = false;
      }
    }
    if (!windowsValid || !capabilities) continue;

    const plan = computeBreaks(shift, config.breakPolicy, fixed);
    const planIssues = checkBreakPlan(shift, plan);
    for (const [field, message] of planIssues) {
      issues.push({ ...at(field), message });
    }
    if (planIssues.length > 0) continue;

    workers.push(
      Object.freeze({
        id: row.workerId,
        capabilities: new Set(capabilities),
        shift: Object.freeze(shift),
        ...(plan.breakWindow && { breakWindow: Object.freeze(plan.breakWindow) }),
        ...(plan.lunchWindow && { lunchWindow: Object.freeze(plan.lunchWindow) }),
      }),
    );
  }

  if (issues.length > 0) throw new SchedulingValidationError(issues);

  return { clock, workers };
}

function earliestStartDay(rows: readonly ParsedRow[]): string | undefined {
  let earliest: { day: string; epochMs: number } | undefined;
  for (const { row } of rows) {
    const parts = parseTimestamp(row.start);
    if (!parts) continue;
    if (!earliest || parts.epochMs < earliest.epochMs) {
      earliest = { day: parts.day, epochMs: parts.epochMs };
    }
  }
  return earliest?.day;
}

/**
 * Converts a textual window, reporting unparsable bounds and `start >= end`.
 */
function toWindow(
  clock: DayClock,
  window: TimestampWindow,
  report: (field: "start" | "end", message: string) => void,
): TimeWindow | undefined {
  const start = clock.toMinutes(window.start);
  const end = clock.toMinutes(window.end);
  if (start === undefined) report("start", `Unparsable timestamp "${window.start}"`);
  if (end === undefined) report("end", `Unparsable timestamp "${window.end}"`);
  if (start === undefined || end === undefined) return undefined;
  if (start >= end) {
    report("end", `End ${window.end} must be after start ${window.start}`);
    return undefined;
  }
  return { start, end };
}

/**
 * Computed windows always clear the fixed ones, so an overlap here means the
 * row gave both.
 */
function checkBreakPlan(
  shift: TimeWindow,
  plan: BreakPlan,
): Array<["breakWindow" | "lunchWindow", string]> {
  const problems: Array<["breakWindow" | "lunchWindow", string]> = [];
  for (const field of ["breakWindow", "lunchWindow"] as const) {
    const window = plan[field];
    if (window && !windowContains(shift, window)) {
      problems.push([field, "Window must lie within the shift"]);
    }
  }
  if (plan.breakWindow && plan.lunchWindow && windowsOverlap(plan.breakWindow, plan.lunchWindow)) {
    problems.push(["lunchWindow", "Lunch window overlaps the break window"]);
  }
  return problems;
}
