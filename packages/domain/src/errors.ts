export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export type PlanningErrorKind = "configuration" | "missing_input" | "invariant_violation" | "sensor_unavailable";

export abstract class PlanningError extends Error {
  abstract readonly kind: PlanningErrorKind;

  protected constructor(message: string, readonly details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
  }
}

/** Invalid physical parameters. Fatal; never retried. */
export class ConfigurationError extends PlanningError {
  readonly kind = "configuration";

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
  }
}

/** Forecast shorter than the horizon, or a price series with gaps. */
export class MissingInputError extends PlanningError {
  readonly kind = "missing_input";

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
  }
}

/** A state the solver should never reach, e.g. no feasible action at all. */
export class InvariantViolationError extends PlanningError {
  readonly kind = "invariant_violation";

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
  }
}

export class SensorUnavailableError extends PlanningError {
  readonly kind = "sensor_unavailable";

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
  }
}

export function isPlanningError(error: unknown): error is PlanningError {
  return error instanceof PlanningError;
}
