/**
 * Structured logging hook.
 *
 * Anything with `debug`/`info`/`warn`/`error` methods works, including
 * `console`. The library never writes output on its own: without a logger it
 * stays silent.
 *
 * @example
 * ```typescript
 * scheduleDay(input, { logger: console });
 * ```
 *
 * @category Logging
 */
export interface SchedulingLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const noop = () => {};

export const silentLogger: SchedulingLogger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
