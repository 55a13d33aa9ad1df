/**
 * Zod schemas for the records external collaborators hand to the library.
 *
 * TypeScript types are derived from these schemas using z.infer so they stay
 * in sync with what the validation pass accepts.
 */

import * as z from "zod";
import { TimestampSchema } from "./types.js";

// --------------------------------------------------------------------------
// Shift rows (Input B)
// --------------------------------------------------------------------------

export const TimestampWindowSchema = z.object({
  start: TimestampSchema,
  end: TimestampSchema,
});

export const ShiftRowSchema = z.object({
  workerId: z.string().min(1),
  start: TimestampSchema,
  end: TimestampSchema,
  /** Replaces the computed short break for this worker. */
  breakWindow: TimestampWindowSchema.optional(),
  /** Replaces the computed lunch break for this worker. */
  lunchWindow: TimestampWindowSchema.optional(),
});

/**
 * One worker's shift on the operating day.
 *
 * @example
 * ```typescript
 * const row: ShiftRow = {
 *   workerId: "alice",
 *   start: "2025-03-03 09:00",
 *   end: "2025-03-03 17:00",
 * };
 * ```
 */
export type ShiftRow = z.infer<typeof ShiftRowSchema>;

// --------------------------------------------------------------------------
// Capability catalog (Input A)
// --------------------------------------------------------------------------

export const CapabilityCatalogSchema = z.record(z.string().min(1), z.array(z.string().min(1)));

/**
 * Directory document listing people and their skills, as exported by staff
 * directories: `{ "employees": [{ "alias": "alice", "skills": ["CSH"] }] }`.
 */
export const CapabilityDirectorySchema = z.object({
  employees: z.array(
    z.object({
      alias: z.string().min(1),
      skills: z.array(z.string().min(1)),
    }),
  ),
});

export type CapabilityDirectory = z.infer<typeof CapabilityDirectorySchema>;
