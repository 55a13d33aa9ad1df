import type { Worker } from "../types.js";
import { compareIds } from "./utils.js";

/**
 * Lifecycle change of a worker at one instant.
 */
export type AssignmentEventKind =
  | "shift_start"
  | "break_start"
  | "break_end"
  | "lunch_start"
  | "lunch_end"
  | "shift_end";

export interface AssignmentEvent {
  /** Minutes since midnight of the operating day. */
  readonly time: number;
  readonly kind: AssignmentEventKind;
  readonly workerId: string;
}

/**
 * Order of kinds at one instant: arrivals, then returns, then departures.
 */
const KIND_RANK: Record<AssignmentEventKind, number> = {
  shift_start: 0,
  break_end: 1,
  lunch_end: 2,
  break_start: 3,
  lunch_start: 4,
  shift_end: 5,
};

/**
 * Compares events by time, then kind, then worker id.
 */
export function compareEvents(a: AssignmentEvent, b: AssignmentEvent): number {
  if (a.time !== b.time) return a.time - b.time;
  const rank = KIND_RANK[a.kind] - KIND_RANK[b.kind];
  if (rank !== 0) return rank;
  return compareIds(a.workerId, b.workerId);
}

/**
 * Emits the shift, break and lunch events of every worker, sorted with
 * {@link compareEvents}. At most six events per worker.
 *
 * @example
 * ```typescript
 * buildEvents([{ id: "a", capabilities: new Set(), shift: { start: 540, end: 600 } }]);
 * // [
 * //   { time: 540, kind: "shift_start", workerId: "a" },
 * //   { time: 600, kind: "shift_end", workerId: "a" },
 * // ]
 * ```
 */
export function buildEvents(workers: readonly Worker[]): AssignmentEvent[] {
  const events: AssignmentEvent[] = [];
  for (const worker of workers) {
    events.push({ time: worker.shift.start, kind: "shift_start", workerId: worker.id });
    if (worker.breakWindow) {
      events.push({ time: worker.breakWindow.start, kind: "break_start", workerId: worker.id });
      events.push({ time: worker.breakWindow.end, kind: "break_end", workerId: worker.id });
    }
    if (worker.lunchWindow) {
      events.push({ time: worker.lunchWindow.start, kind: "lunch_start", workerId: worker.id });
      events.push({ time: worker.lunchWindow.end, kind: "lunch_end", workerId: worker.id });
    }
    events.push({ time: worker.shift.end, kind: "shift_end", workerId: worker.id });
  }
  return events.sort(compareEvents);
}

/**
 * Groups sorted events by instant, preserving order.
 */
export function groupByInstant(
  events: readonly AssignmentEvent[],
): Array<{ time: number; events: AssignmentEvent[] }> {
  const groups: Array<{ time: number; events: AssignmentEvent[] }> = [];
  let current: { time: number; events: AssignmentEvent[] } | undefined;
  for (const event of events) {
    if (!current || current.time !== event.time) {
      current = { time: event.time, events: [] };
      groups.push(current);
    }
    current.events.push(event);
  }
  return groups;
}
