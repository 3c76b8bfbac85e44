/**
 * stepwise/errors
 *
 * Errors raised by the state machine and the future implementation.
 *
 * Every error here is a *defect*: it signals that the step graph or an awaiter
 * was used against its protocol, not that the user's computation failed.
 * Defects fault the task they occur in but are never handed to a `tryWith`
 * handler.
 *
 * @example
 * ```typescript
 * import { isDefect } from 'stepwise/errors';
 *
 * const outcome = task((b) => b.tryWith(() => body(b), (e) => b.return(fallback)));
 * outcome.then(undefined, (e) => {
 *   if (isDefect(e)) reportBug(e);
 * });
 * ```
 */

import { TaggedError } from "./tagged-error";

// =============================================================================
// Label Table Defects
// =============================================================================

/**
 * Raised when a jump targets a label that this state machine did not allocate,
 * or one whose continuation was never installed.
 */
export class LabelError extends TaggedError("LabelError", {
  message: (p: {
    /** The label that was jumped to */
    label: number;
    /** Why the jump was rejected */
    reason: "foreign" | "uninstalled";
  }) =>
    p.reason === "foreign"
      ? `LabelError: label ${p.label} does not belong to this state machine`
      : `LabelError: label ${p.label} has no continuation installed`,
}) {}

/**
 * Raised when a continuation returns something other than a step.
 */
export class StepShapeError extends TaggedError("StepShapeError", {
  message: (p: {
    /** The label whose continuation misbehaved */
    label: number;
    /** What the continuation returned */
    received: unknown;
  }) => `StepShapeError: label ${p.label} produced ${describe(p.received)}, expected a step`,
}) {}

// =============================================================================
// Awaiter Defects
// =============================================================================

/**
 * Raised when a result is read from an awaiter that has not completed.
 */
export class FutureNotCompletedError extends TaggedError("FutureNotCompletedError", {
  message: (p: { operation: string }) =>
    `FutureNotCompletedError: ${p.operation} called before the future completed`,
}) {}

// =============================================================================
// Union Type
// =============================================================================

export type StepwiseDefect = LabelError | StepShapeError | FutureNotCompletedError;

export function isLabelError(error: unknown): error is LabelError {
  return error instanceof LabelError;
}

export function isStepShapeError(error: unknown): error is StepShapeError {
  return error instanceof StepShapeError;
}

export function isFutureNotCompletedError(error: unknown): error is FutureNotCompletedError {
  return error instanceof FutureNotCompletedError;
}

/**
 * Checks if an error is a protocol defect rather than a failure of the
 * computation itself.
 */
export function isDefect(error: unknown): error is StepwiseDefect {
  return isLabelError(error) || isStepShapeError(error) || isFutureNotCompletedError(error);
}

function describe(value: unknown): string {
  if (value === null || value === undefined) return String(value);
  if (Array.isArray(value)) return "an array";
  return typeof value === "object" ? "an object" : `a ${typeof value}`;
}
