import type {
  Diagnostic,
  DoubleBookingDiagnostic,
  EarlyCallInDiagnostic,
  UnfilledDiagnostic,
  ZoneDiagnosticsSummary,
} from "./diagnostics.types.js";

type DiagnosticInput<T extends Diagnostic> = Omit<T, "id" | "type" | "severity" | "message">;

export interface DiagnosticsReporter {
  reportUnfilled(input: DiagnosticInput<UnfilledDiagnostic>): void;
  reportDoubleBooking(input: DiagnosticInput<DoubleBookingDiagnostic>): void;
  reportEarlyCallIn(input: DiagnosticInput<EarlyCallInDiagnostic>): void;

  hasWarnings(): boolean;
  getDiagnostics(): Diagnostic[];
}

/**
 * Collects soft diagnostics during a run. Ids are deterministic, so two runs
 * on the same input report identical lists.
 */
export class DiagnosticsReporterImpl implements DiagnosticsReporter {
  #diagnostics: Diagnostic[] = [];

  reportUnfilled(input: DiagnosticInput<UnfilledDiagnostic>): void {
    this.#diagnostics.push({
      id: `unfilled:${input.zone}:${input.time}`,
      type: "unfilled",
      severity: "warning",
      message: `No eligible worker with capability ${input.requiredCapability} for ${input.zone} at ${input.time}`,
      ...input,
    });
  }

  reportDoubleBooking(input: DiagnosticInput<DoubleBookingDiagnostic>): void {
    this.#diagnostics.push({
      id: `double-booking:${input.zone}:${input.time}:${input.workerId}`,
      type: "double-booking",
      severity: "warning",
      message: `${input.workerId} already holds ${input.zone} at ${input.time}; skipped`,
      ...input,
    });
  }

  reportEarlyCallIn(input: DiagnosticInput<EarlyCallInDiagnostic>): void {
    this.#diagnostics.push({
      id: `early-call-in:${input.zone}:${input.time}:${input.workerId}`,
      type: "early-call-in",
      severity: "info",
      message: `${input.workerId} called in before their shift to cover ${input.zone} at ${input.time}`,
      ...input,
    });
  }

  hasWarnings(): boolean {
    return this.#diagnostics.some((d) => d.severity === "warning");
  }

  getDiagnostics(): Diagnostic[] {
    return [...this.#diagnostics];
  }
}

/**
 * Aggregates diagnostics per zone, in order of first appearance.
 * This is a pure function that doesn't modify the input.
 *
 * @example
 * ```typescript
 * const summaries = summarizeDiagnostics(result.diagnostics);
 * // summaries[0] = {
 * //   zone: "Cashier",
 * //   status: "gaps",
 * //   unfilledTimes: ["2025-03-03 11:00"],
 * //   doubleBookings: 0,
 * //   earlyCallIns: 1,
 * // }
 * ```
 */
export function summarizeDiagnostics(
  diagnostics: readonly Diagnostic[],
): readonly ZoneDiagnosticsSummary[] {
  const groups = new Map<
    string,
    { unfilledTimes: string[]; doubleBookings: number; earlyCallIns: number }
  >();

  for (const diagnostic of diagnostics) {
    let group = groups.get(diagnostic.zone);
    if (!group) {
      group = { unfilledTimes: [], doubleBookings: 0, earlyCallIns: 0 };
      groups.set(diagnostic.zone, group);
    }
    switch (diagnostic.type) {
      case "unfilled":
        group.unfilledTimes.push(diagnostic.time);
        break;
      case "double-booking":
        group.doubleBookings++;
        break;
      case "early-call-in":
        group.earlyCallIns++;
        break;
    }
  }

  const summaries: ZoneDiagnosticsSummary[] = [];
  for (const [zone, group] of groups) {
    summaries.push({
      zone,
      status: group.unfilledTimes.length > 0 ? "gaps" : "staffed",
      unfilledTimes: [...group.unfilledTimes].sort(),
      doubleBookings: group.doubleBookings,
      earlyCallIns: group.earlyCallIns,
    });
  }
  return summaries;
}
