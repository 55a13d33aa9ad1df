import type { Timestamp } from "../types.js";

// =============================================================================
// Diagnostics - recorded during a run, never thrown
// =============================================================================

interface DiagnosticBase {
  /** Deterministic id: `{type}:{zone}:{time}` plus `:{workerId}` where a worker is involved. */
  readonly id: string;
  readonly zone: string;
  /** Start of the affected time unit. */
  readonly time: Timestamp;
  /** Same instant in minutes since midnight of the operating day. */
  readonly minute: number;
  readonly message: string;
}

/**
 * No eligible worker could staff the zone for this time unit.
 */
export interface UnfilledDiagnostic extends DiagnosticBase {
  readonly type: "unfilled";
  readonly severity: "warning";
  readonly requiredCapability: string;
}

/**
 * A worker was proposed for a zone and time unit they already hold; the
 * candidate was skipped.
 */
export interface DoubleBookingDiagnostic extends DiagnosticBase {
  readonly type: "double-booking";
  readonly severity: "warning";
  readonly workerId: string;
}

/**
 * A gap was filled by a worker whose shift starts later in the day.
 */
export interface EarlyCallInDiagnostic extends DiagnosticBase {
  readonly type: "early-call-in";
  readonly severity: "info";
  readonly workerId: string;
}

/** @category Diagnostics */
export type Diagnostic = UnfilledDiagnostic | DoubleBookingDiagnostic | EarlyCallInDiagnostic;

export type DiagnosticType = Diagnostic["type"];

// =============================================================================
// Summary - aggregated view for display
// =============================================================================

/**
 * Diagnostics of one zone, aggregated. Use `summarizeDiagnostics()` to build these.
 *
 * @category Diagnostics
 */
export interface ZoneDiagnosticsSummary {
  readonly zone: string;
  /** `gaps` when at least one time unit stayed unfilled. */
  readonly status: "staffed" | "gaps";
  readonly unfilledTimes: readonly Timestamp[];
  readonly doubleBookings: number;
  readonly earlyCallIns: number;
}
