import { describe, expect, it } from "vitest";
import { DayClock } from "../../src/datetime.utils.js";
import { projectOccupancy } from "../../src/engine/occupancy.js";
import { createZoneStates } from "../../src/engine/utils.js";
import { CASHIER, DAY, ENTRANCE, m } from "./helpers.js";

describe("projectOccupancy", () => {
  it("lists every time unit per zone with the placeholder for gaps", () => {
    const zones = createZoneStates([ENTRANCE, CASHIER]);
    zones[0]?.occupancy.set(m("09:00"), "alice");
    zones[1]?.occupancy.set(m("10:00"), "bob");
    zones[1]?.occupancy.set(m("09:00"), "carol");

    const table = projectOccupancy(zones, [m("09:00"), m("10:00")], new DayClock(DAY), "unassigned");

    expect(table).toEqual({
      Entrance: [
        { time: "2025-03-03 09:00", workerId: "alice" },
        { time: "2025-03-03 10:00", workerId: "unassigned" },
      ],
      Cashier: [
        { time: "2025-03-03 09:00", workerId: "carol" },
        { time: "2025-03-03 10:00", workerId: "bob" },
      ],
    });
    expect(Object.keys(table)).toEqual(["Entrance", "Cashier"]);
  });

  it("formats time units past midnight on the next calendar day", () => {
    const zones = createZoneStates([CASHIER]);
    zones[0]?.occupancy.set(1440, "night");

    const table = projectOccupancy(zones, [1380, 1440], new DayClock(DAY), "back-of-house");

    expect(table.Cashier).toEqual([
      { time: "2025-03-03 23:00", workerId: "back-of-house" },
      { time: "2025-03-04 00:00", workerId: "night" },
    ]);
  });

  it("does not modify zone state", () => {
    const zones = createZoneStates([CASHIER]);
    projectOccupancy(zones, [m("09:00")], new DayClock(DAY), "unassigned");
    expect(zones[0]?.occupancy.size).toBe(0);
  });
});
