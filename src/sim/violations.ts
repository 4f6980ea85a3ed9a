/**
 * Generation-time failures.
 *
 * A ConstraintViolation is a value, not an exception: builder operations
 * return it and the rejection-sampling loop in procgen.ts is the only place
 * that retries on it. Errors thrown from here are fatal.
 */

export enum ViolationKind {
  DuplicateDoor = "duplicate_door",
  UnreachableObject = "unreachable_object",
  AmbiguousOrDegenerateDescriptor = "ambiguous_or_degenerate_descriptor",
  PlacementExhausted = "placement_exhausted",
}

export interface ConstraintViolation {
  violation: ViolationKind;
  reason: string;
}

/** Result of a builder step: the value, or the reason the attempt must be discarded. */
export type Checked<T> = T | ConstraintViolation;

export function reject(violation: ViolationKind, reason: string): ConstraintViolation {
  return { violation, reason };
}

export function isViolation(value: unknown): value is ConstraintViolation {
  return (
    typeof value === "object" &&
    value !== null &&
    "violation" in value &&
    "reason" in value
  );
}

/** Fatal generation problem: a misconfigured level or an exhausted attempt budget. */
export class GenerationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GenerationError";
  }
}

export class GenerationBudgetExceeded extends GenerationError {
  readonly attempts: number;
  readonly lastViolation: ConstraintViolation | null;

  constructor(level: string, attempts: number, lastViolation: ConstraintViolation | null) {
    const last = lastViolation ? ` (last rejection: ${lastViolation.reason})` : "";
    super(`level ${level}: no valid mission after ${attempts} attempts${last}`);
    this.name = "GenerationBudgetExceeded";
    this.attempts = attempts;
    this.lastViolation = lastViolation;
  }
}

/** Invalid declarative mission file or genome vector. */
export class MissionFormatError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`invalid mission: ${issues.join("; ")}`);
    this.name = "MissionFormatError";
    this.issues = issues;
  }
}
