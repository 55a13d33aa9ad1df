import { describe, expect, it, vi } from "vitest";
import { SchedulingValidationError } from "../src/errors.js";
import { summarizeDiagnostics } from "../src/engine/diagnostics-reporter.js";
import { defineZoneSchedule, scheduleDay } from "../src/schedule.js";
import type { RosterInput } from "../src/roster.js";

const CASHIER = { name: "Cashier", requiredCapability: "CSH" };

const twoCashiers: RosterInput = {
  catalog: { alice: ["CSH"], bob: ["CSH"] },
  rows: [
    { workerId: "alice", start: "2025-03-03 09:00", end: "2025-03-03 13:00" },
    { workerId: "bob", start: "2025-03-03 09:00", end: "2025-03-03 13:00" },
  ],
};

function createLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("scheduleDay", () => {
  describe("event sweep", () => {
    it("keeps the first worker in the zone and never double-books the second", () => {
      const result = scheduleDay(twoCashiers, { zones: [CASHIER] });

      expect(result.operatingDay).toBe("2025-03-03");
      expect(result.mode).toBe("event-sweep");
      expect(result.slotMinutes).toBe(15);
      expect(result.zones).toEqual(["Cashier"]);

      const cashier = result.occupancy.Cashier ?? [];
      expect(cashier).toHaveLength(16);
      expect(cashier.filter((e) => e.workerId === "bob")).toEqual([]);
      expect(cashier.filter((e) => e.workerId === "unassigned").map((e) => e.time)).toEqual([
        "2025-03-03 11:00",
        "2025-03-03 11:45",
        "2025-03-03 12:00",
      ]);
      expect(result.unfilled).toEqual([
        { zone: "Cashier", time: "2025-03-03 11:00" },
        { zone: "Cashier", time: "2025-03-03 11:45" },
        { zone: "Cashier", time: "2025-03-03 12:00" },
      ]);
      expect(result.workers).toEqual([
        {
          workerId: "alice",
          assignedHours: 3.25,
          breakWindow: { start: "2025-03-03 11:00", end: "2025-03-03 11:15" },
          lunchWindow: { start: "2025-03-03 11:45", end: "2025-03-03 12:15" },
        },
        {
          workerId: "bob",
          assignedHours: 0,
          breakWindow: { start: "2025-03-03 11:00", end: "2025-03-03 11:15" },
          lunchWindow: { start: "2025-03-03 11:45", end: "2025-03-03 12:15" },
        },
      ]);
    });

    it("keeps a worker out of every time unit their computed lunch touches", () => {
      const result = scheduleDay(
        {
          catalog: { alice: ["CSH"] },
          rows: [{ workerId: "alice", start: "2025-03-03 09:00", end: "2025-03-03 16:10" }],
        },
        { zones: [CASHIER] },
      );

      expect(result.workers[0]?.lunchWindow).toEqual({
        start: "2025-03-03 12:20",
        end: "2025-03-03 12:50",
      });
      expect(result.unfilled.map((gap) => gap.time)).toEqual([
        "2025-03-03 11:00",
        "2025-03-03 12:15",
        "2025-03-03 12:30",
        "2025-03-03 12:45",
        "2025-03-03 16:00",
      ]);
      expect(result.occupancy.Cashier?.find((e) => e.time === "2025-03-03 12:15")?.workerId).toBe(
        "unassigned",
      );
    });

    it("reports zones nobody can staff across the default zone set", () => {
      const result = scheduleDay({
        catalog: { alice: ["CSH"] },
        rows: [{ workerId: "alice", start: "2025-03-03 09:00", end: "2025-03-03 10:00" }],
      });

      expect(result.zones).toEqual(["Entrance", "Cashier", "Customer Service", "ACO"]);
      expect(result.occupancy.Cashier?.map((e) => e.workerId)).toEqual([
        "alice",
        "alice",
        "alice",
        "alice",
      ]);
      expect(summarizeDiagnostics(result.diagnostics)).toEqual([
        {
          zone: "Entrance",
          status: "gaps",
          unfilledTimes: [
            "2025-03-03 09:00",
            "2025-03-03 09:15",
            "2025-03-03 09:30",
            "2025-03-03 09:45",
          ],
          doubleBookings: 0,
          earlyCallIns: 0,
        },
        expect.objectContaining({ zone: "Customer Service", status: "gaps" }),
        expect.objectContaining({ zone: "ACO", status: "gaps" }),
      ]);
    });
  });

  describe("discretized", () => {
    it("fills an opening gap with a worker whose shift starts later", () => {
      const result = scheduleDay(
        {
          catalog: { alice: ["CSH"], bob: ["CSH"] },
          rows: [
            { workerId: "alice", start: "2025-03-03 10:00", end: "2025-03-03 12:00" },
            { workerId: "bob", start: "2025-03-03 11:00", end: "2025-03-03 12:00" },
          ],
        },
        {
          mode: "discretized",
          zones: [CASHIER],
          operatingHours: { start: "09:00", end: "12:00" },
        },
      );

      expect(result.occupancy).toEqual({
        Cashier: [
          { time: "2025-03-03 09:00", workerId: "alice" },
          { time: "2025-03-03 10:00", workerId: "alice" },
          { time: "2025-03-03 11:00", workerId: "bob" },
        ],
      });
      expect(result.unfilled).toEqual([]);
      expect(result.diagnostics.map((d) => d.id)).toEqual([
        "early-call-in:Cashier:2025-03-03 09:00:alice",
      ]);
      expect(result.workers.map((w) => [w.workerId, w.assignedHours])).toEqual([
        ["alice", 2],
        ["bob", 1],
      ]);
    });

    it("shows the configured placeholder where a gap stands", () => {
      const result = scheduleDay(
        {
          catalog: { alice: ["CSH"] },
          rows: [{ workerId: "alice", start: "2025-03-03 09:00", end: "2025-03-03 10:00" }],
        },
        {
          mode: "discretized",
          zones: [CASHIER],
          operatingHours: { start: "09:00", end: "11:00" },
          placeholderId: "back-of-house",
        },
      );

      expect(result.occupancy.Cashier).toEqual([
        { time: "2025-03-03 09:00", workerId: "alice" },
        { time: "2025-03-03 10:00", workerId: "back-of-house" },
      ]);
      expect(result.unfilled).toEqual([{ zone: "Cashier", time: "2025-03-03 10:00" }]);
    });
  });

  it("aborts on an unknown worker id without producing a table", () => {
    const logger = createLogger();
    const input: RosterInput = {
      catalog: { alice: ["CSH"] },
      rows: [
        { workerId: "alice", start: "2025-03-03 09:00", end: "2025-03-03 13:00" },
        { workerId: "mallory", start: "2025-03-03 09:00", end: "2025-03-03 13:00" },
      ],
    };

    expect(() => scheduleDay(input, { logger })).toThrow(SchedulingValidationError);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith("Scheduling input rejected", {
      issues: 1,
      message: 'Invalid scheduling input: rows[1].workerId: Unknown worker id "mallory"',
    });
    expect(logger.info).not.toHaveBeenCalled();
  });

  it("rejects invalid options before reading input", () => {
    expect(() => defineZoneSchedule({ slotMinutes: 0 })).toThrow(SchedulingValidationError);
  });

  it("logs run progress", () => {
    const logger = createLogger();

    scheduleDay(twoCashiers, { zones: [CASHIER], logger });

    expect(logger.info).toHaveBeenNthCalledWith(1, "Scheduling run started", {
      operatingDay: "2025-03-03",
      mode: "event-sweep",
      workers: 2,
      zones: 1,
      slots: 16,
    });
    expect(logger.info).toHaveBeenNthCalledWith(2, "Scheduling run finished", {
      unfilled: 3,
      diagnostics: 3,
    });
    expect(logger.warn).toHaveBeenCalledTimes(3);
    expect(logger.debug).toHaveBeenCalledTimes(3);
  });

  it("returns an empty day for an empty roster", () => {
    const result = scheduleDay(
      { catalog: {}, rows: [] },
      { operatingDay: "2025-03-03", zones: [CASHIER] },
    );

    expect(result.occupancy).toEqual({ Cashier: [] });
    expect(result.unfilled).toEqual([]);
    expect(result.workers).toEqual([]);
  });

  it("is deterministic and independent of row order", () => {
    const input: RosterInput = {
      catalog: { alice: ["CSH", "ENT"], bob: ["CSH"], carol: ["ENT", "CSS"] },
      rows: [
        { workerId: "alice", start: "2025-03-03 08:00", end: "2025-03-03 16:00" },
        { workerId: "bob", start: "2025-03-03 09:00", end: "2025-03-03 13:00" },
        { workerId: "carol", start: "2025-03-03 12:00", end: "2025-03-03 20:00" },
      ],
    };
    const reversed: RosterInput = { ...input, rows: [...input.rows].reverse() };

    for (const mode of ["event-sweep", "discretized"] as const) {
      const first = scheduleDay(input, { mode });
      const second = scheduleDay(input, { mode });
      const third = scheduleDay(reversed, { mode });

      expect(second).toEqual(first);
      expect(third.occupancy).toEqual(first.occupancy);
      expect(third.diagnostics).toEqual(first.diagnostics);
    }
  });
});

describe("defineZoneSchedule", () => {
  it("shares no state between runs", () => {
    const store = defineZoneSchedule({ zones: [CASHIER], mode: "discretized" });

    const first = store.run(twoCashiers);
    store.run({
      catalog: { carol: ["CSH"] },
      rows: [{ workerId: "carol", start: "2025-03-03 09:00", end: "2025-03-03 13:00" }],
    });
    const again = store.run(twoCashiers);

    expect(again).toEqual(first);
  });

  it("exposes its resolved configuration", () => {
    const store = defineZoneSchedule({ mode: "discretized" });

    expect(store.mode).toBe("discretized");
    expect(store.zoneNames).toEqual(["Entrance", "Cashier", "Customer Service", "ACO"]);
    expect(store.config.slotMinutes).toBe(60);
  });
});
