/**
 * One unit of synchronous progress through a task.
 *
 * A step either finishes with a value, hands the rest of the task off to
 * another future, or suspends on an awaiter and names the label to resume at.
 */

import type { Awaiter, Future } from "../future";
import type { Label } from "./state-machine";

export type ReturnStep<T> = { readonly kind: "return"; readonly value: T };

export type ReturnFromStep<T> = { readonly kind: "returnFrom"; readonly future: Future<T> };

export type AwaitStep<T> = {
  readonly kind: "await";
  readonly awaiter: Awaiter<unknown>;
  readonly resume: Label<T>;
};

export type Step<T> = ReturnStep<T> | ReturnFromStep<T> | AwaitStep<T>;

export type StepKind = Step<unknown>["kind"];

export const Step = {
  return: <T>(value: T): ReturnStep<T> => ({ kind: "return", value }),

  returnFrom: <T>(future: Future<T>): ReturnFromStep<T> => ({ kind: "returnFrom", future }),

  await: <T>(awaiter: Awaiter<unknown>, resume: Label<T>): AwaitStep<T> => ({
    kind: "await",
    awaiter,
    resume,
  }),
} as const;

const STEP_KINDS: ReadonlySet<unknown> = new Set<StepKind>(["return", "returnFrom", "await"]);

/**
 * Structural check used by the state machine's assertions.
 */
export function isStep(value: unknown): value is Step<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    STEP_KINDS.has(value.kind)
  );
}
