import type { TimeWindow, Timestamp } from "./types.js";

export const MINUTES_PER_DAY = 24 * 60;

const MS_PER_MINUTE = 60 * 1000;

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2})$/;
const DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Components of a parsed `YYYY-MM-DD HH:MM` timestamp.
 */
export interface TimestampParts {
  /** Calendar day (YYYY-MM-DD). */
  day: string;
  /** Minutes since midnight of `day`. */
  minuteOfDay: number;
  /** Milliseconds since the epoch, interpreting the timestamp as UTC wall time. */
  epochMs: number;
}

/**
 * Parses a `YYYY-MM-DD HH:MM` timestamp.
 *
 * Returns `undefined` for text that does not match the format or names a
 * date or time that does not exist (e.g. `2025-02-30 10:00`, `2025-01-01 24:10`).
 *
 * @example
 * ```typescript
 * parseTimestamp("2025-03-03 09:30");
 * // { day: "2025-03-03", minuteOfDay: 570, epochMs: ... }
 * ```
 */
export function parseTimestamp(value: string): TimestampParts | undefined {
  const match = TIMESTAMP_PATTERN.exec(value);
  if (!match) return undefined;

  const [, year, month, day, hours, minutes] = match.map(Number);
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hours === undefined ||
    minutes === undefined
  ) {
    return undefined;
  }
  if (hours > 23 || minutes > 59) return undefined;

  const epochMs = Date.UTC(year, month - 1, day, hours, minutes);
  const check = new Date(epochMs);
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day
  ) {
    return undefined;
  }

  return {
    day: value.slice(0, 10),
    minuteOfDay: hours * 60 + minutes,
    epochMs,
  };
}

/**
 * Parse a day string (YYYY-MM-DD) to a UTC Date.
 * Returns `undefined` when the day does not exist.
 */
export function parseDayString(day: string): Date | undefined {
  const match = DAY_PATTERN.exec(day);
  if (!match) return undefined;
  const date = new Date(`${day}T00:00:00Z`);
  if (Number.isNaN(date.getTime())) return undefined;
  if (formatDateString(date) !== day) return undefined;
  return date;
}

/**
 * Formats a date as YYYY-MM-DD string (UTC)
 */
export function formatDateString(date: Date): string {
  const year = date.getUTCFullYear();
  const month = (date.getUTCMonth() + 1).toString().padStart(2, "0");
  const day = date.getUTCDate().toString().padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/**
 * Converts an `HH:MM` clock time to minutes since midnight. `24:00` is 1440.
 */
export function clockTimeToMinutes(time: string): number {
  const [hours = 0, minutes = 0] = time.split(":").map(Number);
  return hours * 60 + minutes;
}

/**
 * Formats minutes since midnight as `HH:MM`, wrapping past midnight.
 *
 * @example
 * ```typescript
 * formatMinutes(570);  // "09:30"
 * formatMinutes(1470); // "00:30"
 * ```
 */
export function formatMinutes(minutes: number): string {
  const wrapped = ((minutes % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
  const hours = Math.floor(wrapped / 60);
  const mins = wrapped % 60;
  return `${String(hours).padStart(2, "0")}:${String(mins).padStart(2, "0")}`;
}

/**
 * Checks if two half-open windows overlap.
 *
 * Two windows overlap if: a.start < b.end AND b.start < a.end.
 * Windows that only touch (`a.end === b.start`) do not overlap.
 */
export function windowsOverlap(a: TimeWindow, b: TimeWindow): boolean {
  return a.start < b.end && b.start < a.end;
}

/**
 * Whether `inner` lies fully inside `outer` (bounds inclusive).
 */
export function windowContains(outer: TimeWindow, inner: TimeWindow): boolean {
  return inner.start >= outer.start && inner.end <= outer.end;
}

/**
 * Generates the start minute of every time unit in `[start, end)`.
 *
 * @example
 * ```typescript
 * slotStarts({ start: 540, end: 720 }, 60); // [540, 600, 660]
 * ```
 */
export function slotStarts(bounds: TimeWindow, slotMinutes: number): number[] {
  const starts: number[] = [];
  for (let minute = bounds.start; minute < bounds.end; minute += slotMinutes) {
    starts.push(minute);
  }
  return starts;
}

/**
 * Converts between `YYYY-MM-DD HH:MM` timestamps and minutes since midnight
 * of a single operating day.
 *
 * @example
 * ```typescript
 * const clock = new DayClock("2025-03-03");
 * clock.toMinutes("2025-03-03 09:15"); // 555
 * clock.toMinutes("2025-03-04 00:30"); // 1470
 * clock.format(555);                   // "2025-03-03 09:15"
 * ```
 */
export class DayClock {
  readonly operatingDay: string;
  #midnightMs: number;

  constructor(operatingDay: string) {
    const date = parseDayString(operatingDay);
    if (!date) {
      throw new Error(`Operating day "${operatingDay}" is not a valid YYYY-MM-DD date`);
    }
    this.operatingDay = operatingDay;
    this.#midnightMs = date.getTime();
  }

  /**
   * Minutes since midnight of the operating day, or `undefined` when the
   * timestamp is unparsable.
   */
  toMinutes(value: Timestamp): number | undefined {
    const parts = parseTimestamp(value);
    if (!parts) return undefined;
    return Math.round((parts.epochMs - this.#midnightMs) / MS_PER_MINUTE);
  }

  format(minutes: number): Timestamp {
    const date = new Date(this.#midnightMs + minutes * MS_PER_MINUTE);
    const hours = date.getUTCHours().toString().padStart(2, "0");
    const mins = date.getUTCMinutes().toString().padStart(2, "0");
    return `${formatDateString(date)} ${hours}:${mins}`;
  }

  formatWindow(window: TimeWindow): { start: Timestamp; end: Timestamp } {
    return { start: this.format(window.start), end: this.format(window.end) };
  }

  /** Whether `minutes` falls on the operating day itself. */
  isOnOperatingDay(minutes: number): boolean {
    return minutes >= 0 && minutes < MINUTES_PER_DAY;
  }
}
