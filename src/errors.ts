/**
 * A single problem found while validating configuration or input records.
 */
export interface SchedulingIssue {
  /** Dotted path to the offending field, e.g. `rows[2].start` or `catalog.alice`. */
  readonly path: string;
  readonly message: string;
  /** Index of the shift row at fault, when the issue comes from a row. */
  readonly row?: number;
  readonly workerId?: string;
}

/**
 * Error thrown when configuration, the capability catalog or shift rows are invalid.
 *
 * Validation runs before any assignment happens, so a run that throws this
 * error produces no partial occupancy table. Every issue found is listed in
 * `issues`, not just the first.
 *
 * @category Validation
 */
export class SchedulingValidationError extends Error {
  public readonly issues: readonly SchedulingIssue[];

  constructor(issues: readonly SchedulingIssue[]) {
    super(formatIssues(issues));
    this.name = "SchedulingValidationError";
    this.issues = issues;
  }
}

function formatIssues(issues: readonly SchedulingIssue[]): string {
  const [first] = issues;
  if (!first) return "Invalid scheduling input";
  const more = issues.length > 1 ? ` (and ${issues.length - 1} more)` : "";
  return `Invalid scheduling input: ${first.path}: ${first.message}${more}`;
}

/**
 * Formats a path as `rows[2].start`.
 */
export function formatIssuePath(path: ReadonlyArray<PropertyKey>): string {
  let out = "";
  for (const segment of path) {
    if (typeof segment === "number") {
      out += `[${segment}]`;
    } else {
      const key = String(segment);
      out += out ? `.${key}` : key;
    }
  }
  return out;
}

/**
 * Converts schema issues into {@link SchedulingIssue}s rooted at `prefix`.
 */
export function issuesFromSchema(
  issues: ReadonlyArray<{ path: ReadonlyArray<PropertyKey>; message: string }>,
  prefix: ReadonlyArray<PropertyKey>,
  extra: { row?: number; workerId?: string } = {},
): SchedulingIssue[] {
  return issues.map((issue) => ({
    path: formatIssuePath([...prefix, ...issue.path]),
    message: issue.message,
    ...extra,
  }));
}
