/**
 * Await adapters: turn "wait for this, then continue with its value" into a
 * step.
 *
 * When the awaitable has already completed the continuation runs right away
 * on the calling stack and no label is allocated. Otherwise the continuation
 * is installed under a fresh label and the step suspends on the awaiter.
 *
 * Chains of already-completed awaitables therefore recurse on the stack; a
 * very long synchronous chain grows it accordingly.
 */

import {
  isConfigurable,
  toAwaitable,
  type Awaitable,
  type AwaitableLike,
  type Awaiter,
} from "../future";
import type { StateMachine } from "./state-machine";
import { Step } from "./step";

/**
 * Continue with the result of `awaiter`, suspending if it has not completed.
 */
export function awaitResult<T1, T2>(
  sm: StateMachine,
  awaiter: Awaiter<T1>,
  continuation: (value: T1) => Step<T2>
): Step<T2> {
  if (awaiter.isCompleted) {
    return continuation(awaiter.getResult());
  }
  const resume = sm.code(() => continuation(awaiter.getResult()));
  return Step.await(awaiter, resume);
}

/**
 * Await `source` and continue with its value. Resumption follows the
 * awaitable's own context behaviour; for a `Future` that is the context
 * ambient when the task suspended.
 */
export function bind<T1, T2>(
  sm: StateMachine,
  source: AwaitableLike<T1>,
  continuation: (value: T1) => Step<T2>
): Step<T2> {
  return awaitResult(sm, toAwaitable(source).getAwaiter(), continuation);
}

/**
 * Like `bind`, but resumes on whatever stack completes the awaitable instead
 * of the captured context.
 */
export function bindDetached<T1, T2>(
  sm: StateMachine,
  source: AwaitableLike<T1>,
  continuation: (value: T1) => Step<T2>
): Step<T2> {
  return awaitResult(sm, detach(toAwaitable(source)).getAwaiter(), continuation);
}

function detach<T>(awaitable: Awaitable<T>): Awaitable<T> {
  return isConfigurable(awaitable) ? awaitable.configureAwait(false) : awaitable;
}
