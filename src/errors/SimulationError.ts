/**
 * SimulationError - Error taxonomy for the simulation and analysis pipeline
 *
 * Every failure is terminal for the current run. Callers branch on `code`
 * (or on the subclass) to decide whether to re-prompt or abort.
 */

export type SimulationErrorCode =
  | "INVALID_PARAMETER"
  | "MALFORMED_INPUT"
  | "INSUFFICIENT_DATA"
  | "NUMERIC_INSTABILITY";

export class SimulationError extends Error {
  readonly code: SimulationErrorCode;

  constructor(code: SimulationErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Non-positive mass/radius/dt/duration, unknown regime, bad generator input */
export class InvalidParameterError extends SimulationError {
  constructor(message: string) {
    super("INVALID_PARAMETER", message);
  }
}

/** Missing column, non-increasing time, non-numeric value */
export class MalformedInputError extends SimulationError {
  constructor(message: string) {
    super("MALFORMED_INPUT", message);
  }
}

/** Too few usable points for an estimate or a fit */
export class InsufficientDataError extends SimulationError {
  constructor(message: string) {
    super("INSUFFICIENT_DATA", message);
  }
}

/** Timestep too coarse for the dynamics, or a diverging state */
export class NumericInstabilityError extends SimulationError {
  constructor(message: string) {
    super("NUMERIC_INSTABILITY", message);
  }
}

/**
 * Throw InvalidParameterError unless value is a finite number > 0.
 */
export function requirePositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidParameterError(`${name} must be a finite number > 0, got ${value}`);
  }
}

/**
 * Throw InvalidParameterError unless value is a finite number >= 0.
 */
export function requireNonNegative(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidParameterError(`${name} must be a finite number >= 0, got ${value}`);
  }
}
