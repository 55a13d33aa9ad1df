import { SchedulingValidationError } from "../src/errors.js";

/**
 * Runs `fn` and returns the validation error it throws.
 */
export function captureValidationError(fn: () => unknown): SchedulingValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof SchedulingValidationError) return error;
    throw error;
  }
  throw new Error("Expected a SchedulingValidationError");
}
