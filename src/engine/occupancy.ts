import type { DayClock } from "../datetime.utils.js";
import type { Timestamp } from "../types.js";
import type { ZoneState } from "./types.js";

/**
 * One row of a zone's time line.
 *
 * @category Output
 */
export interface OccupancyEntry {
  readonly time: Timestamp;
  /** Worker id, or the placeholder when nobody held the zone. */
  readonly workerId: string;
}

/**
 * Zone name to time-ordered entries, zones in declaration order.
 *
 * @category Output
 */
export type OccupancyTable = Readonly<Record<string, readonly OccupancyEntry[]>>;

/**
 * Projects zone occupancy onto every time unit. Reads only.
 *
 * @example
 * ```typescript
 * projectOccupancy(zones, [540, 600], clock, "unassigned");
 * // {
 * //   Cashier: [
 * //     { time: "2025-03-03 09:00", workerId: "alice" },
 * //     { time: "2025-03-03 10:00", workerId: "unassigned" },
 * //   ],
 * // }
 * ```
 */
export function projectOccupancy(
  zones: readonly ZoneState[],
  slots: readonly number[],
  clock: DayClock,
  placeholderId: string,
): OccupancyTable {
  const table: Record<string, OccupancyEntry[]> = {};
  for (const zone of zones) {
    table[zone.name] = slots.map((slot) => ({
      time: clock.format(slot),
      workerId: zone.occupancy.get(slot) ?? placeholderId,
    }));
  }
  return table;
}
