/**
 * Control-flow combinators.
 *
 * Each combinator maps one construct of sequential code onto the step
 * protocol, sharing the enclosing state machine. They are built so that a
 * suspension anywhere inside a construct resumes back into it: a resumed
 * `tryWith` body still reaches its handler, a resumed `tryFinally` body still
 * runs its compensation.
 *
 * @example
 * ```typescript
 * const sm = new StateMachine();
 * const step = tryFinally(sm,
 *   () => bind(sm, fetchUser(id), (user) => ret(user.name)),
 *   () => connection.close()
 * );
 * ```
 */

import { isDefect } from "../errors";
import type { Future } from "../future";
import { awaitResult } from "./bind";
import type { Label, StateMachine } from "./state-machine";
import { Step } from "./step";

/**
 * A resource released by `using`.
 */
export interface Disposable {
  dispose(): void;
}

// =============================================================================
// Terminal Steps
// =============================================================================

/** The implicit empty branch: finish without a value. */
export function zero(): Step<void> {
  return Step.return(undefined);
}

/** Finish with `value`. */
export function ret<T>(value: T): Step<T> {
  return Step.return(value);
}

/** Finish by handing the task off to `future`; nothing runs after it. */
export function returnFrom<T>(future: Future<T>): Step<T> {
  return Step.returnFrom(future);
}

// =============================================================================
// Sequencing
// =============================================================================

/**
 * Run `first` to completion, then `rest`.
 *
 * `first` carries no value, so two terminal returns cannot be sequenced.
 * A hand-off in `first` is awaited (its failure propagates) before `rest`.
 */
export function combine<T>(sm: StateMachine, first: Step<void>, rest: () => Step<T>): Step<T> {
  let step = first;
  const cont = sm.code(rest);
  const entry = sm.allocateLabel<T>();

  sm.setCode(entry, () => {
    const current = step;
    switch (current.kind) {
      case "return":
        return sm.jump(cont);
      case "returnFrom":
        return awaitResult(sm, current.future.getAwaiter(), () => sm.jump(cont));
      case "await": {
        const resumeFirst = current.resume;
        const resume = sm.code(() => {
          step = sm.jump(resumeFirst);
          return sm.jump(entry);
        });
        return Step.await(current.awaiter, resume);
      }
    }
  });

  return sm.jump(entry);
}

// =============================================================================
// Loops
// =============================================================================

/**
 * Run `body` while `condition` holds.
 *
 * Iterations that finish synchronously run in a flat loop; an iteration that
 * suspends is combined with a jump back to the loop head.
 */
export function whileLoop(
  sm: StateMachine,
  condition: () => boolean,
  body: () => Step<void>
): Step<void> {
  const entry = sm.allocateLabel<void>();

  sm.setCode(entry, () => {
    while (condition()) {
      const step = body();
      if (step.kind !== "return") {
        return combine(sm, step, () => sm.jump(entry));
      }
    }
    return zero();
  });

  return sm.jump(entry);
}

/**
 * Run `body` for each item of `sequence`, one at a time, in order.
 *
 * The iterator is closed through `return()` exactly once when the loop ends,
 * however it ends: after exhaustion, when `body` or `next()` throws, or on a
 * failure after resumption. Unlike `for...of`, which calls `return()` only on
 * early exit, this also closes an iterator that has already finished.
 */
export function forLoop<T>(
  sm: StateMachine,
  sequence: Iterable<T>,
  body: (item: T) => Step<void>
): Step<void> {
  const iterator = sequence[Symbol.iterator]();
  const enumerator: Disposable = {
    dispose: () => {
      iterator.return?.();
    },
  };

  return using(sm, enumerator, () => {
    let current: T;
    return whileLoop(
      sm,
      () => {
        const next = iterator.next();
        if (next.done) {
          return false;
        }
        current = next.value;
        return true;
      },
      () => body(current)
    );
  });
}

// =============================================================================
// Exceptions and Cleanup
// =============================================================================

/**
 * Run `code`, handing any failure to `handler`: a synchronous throw, a throw
 * after resumption, or the failure of a future `code` hands off to.
 *
 * Defects are not handled; they propagate.
 */
export function tryWith<T>(
  sm: StateMachine,
  code: () => Step<T>,
  handler: (error: unknown) => Step<T>
): Step<T> {
  const entry = sm.allocateLabel<T>();
  let inner: Label<T> = sm.code(code);

  sm.setCode(entry, () => {
    let step: Step<T>;
    try {
      step = sm.jump(inner);
    } catch (error) {
      if (isDefect(error)) throw error;
      return handler(error);
    }

    switch (step.kind) {
      case "return":
        return step;
      case "returnFrom": {
        const awaiter = step.future.getAwaiter();
        const settle = (): Step<T> => {
          let value: T;
          try {
            value = awaiter.getResult();
          } catch (error) {
            if (isDefect(error)) throw error;
            return handler(error);
          }
          return Step.return(value);
        };
        return awaiter.isCompleted ? settle() : Step.await(awaiter, sm.code(settle));
      }
      case "await":
        // Resume through the entry so the resumed body is inside the try again.
        inner = step.resume;
        return Step.await(step.awaiter, entry);
    }
  });

  return sm.jump(entry);
}

/**
 * Run `code`, then `compensation`, exactly once, on whichever path `code`
 * finishes by. Compensation is deferred while `code` is suspended and runs
 * before a failure propagates.
 */
export function tryFinally<T>(
  sm: StateMachine,
  code: () => Step<T>,
  compensation: () => void
): Step<T> {
  const entry = sm.allocateLabel<T>();
  let inner: Label<T> = sm.code(code);
  let compensated = false;
  const compensate = () => {
    if (compensated) return;
    compensated = true;
    compensation();
  };

  sm.setCode(entry, () => {
    let step: Step<T>;
    try {
      step = sm.jump(inner);
    } catch (error) {
      compensate();
      throw error;
    }

    switch (step.kind) {
      case "return":
        compensate();
        return step;
      case "returnFrom": {
        const awaiter = step.future.getAwaiter();
        const settle = (): Step<T> => {
          let value: T;
          try {
            value = awaiter.getResult();
          } catch (error) {
            compensate();
            throw error;
          }
          compensate();
          return Step.return(value);
        };
        return awaiter.isCompleted ? settle() : Step.await(awaiter, sm.code(settle));
      }
      case "await":
        inner = step.resume;
        return Step.await(step.awaiter, entry);
    }
  });

  return sm.jump(entry);
}

/**
 * Run `body` with `resource`, disposing it once `body` is done.
 * `null` and `undefined` are accepted and never disposed.
 */
export function using<R extends Disposable | null | undefined, T>(
  sm: StateMachine,
  resource: R,
  body: (resource: R) => Step<T>
): Step<T> {
  return tryFinally(
    sm,
    () => body(resource),
    () => {
      if (resource != null) {
        resource.dispose();
      }
    }
  );
}
