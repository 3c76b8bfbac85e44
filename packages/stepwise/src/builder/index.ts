/**
 * stepwise/builder
 *
 * The surface a front end targets: one method per construct of sequential
 * code, each a direct call into the core combinators. A builder owns one
 * state machine, and `task()` makes a fresh builder per run so the label
 * table lives exactly as long as the task.
 *
 * ## Translation
 *
 * | Sequential code            | Builder call                                  |
 * |----------------------------|-----------------------------------------------|
 * | `const x = await e; rest`  | `b.bind(e, (x) => rest)`                      |
 * | `s1; s2`                   | `b.combine(s1, () => s2)`                     |
 * | `while (c) s`              | `b.while(() => c, () => s)`                   |
 * | `for (const x of xs) s`    | `b.for(xs, (x) => s)`                         |
 * | `try s catch (e) h`        | `b.tryWith(() => s, (e) => h)`                |
 * | `try s finally f`          | `b.tryFinally(() => s, () => f)`              |
 * | `using r = e; s`           | `b.using(e, (r) => s)`                        |
 * | `return x`                 | `b.return(x)`                                 |
 * | `return await e` (tail)    | `b.returnFrom(e)`                             |
 * | empty `else`               | `b.zero()`                                    |
 *
 * @example
 * ```typescript
 * import { task } from 'stepwise';
 *
 * const total = task((b) => {
 *   let sum = 0;
 *   return b.combine(
 *     b.for(orderIds, (id) => b.bind(loadOrder(id), (order) => {
 *       sum += order.amount;
 *       return b.zero();
 *     })),
 *     () => b.return(sum)
 *   );
 * });
 * ```
 */

import {
  bind,
  bindDetached,
  combine,
  forLoop,
  ret,
  returnFrom,
  run,
  StateMachine,
  tryFinally,
  tryWith,
  using,
  whileLoop,
  zero,
  type Disposable,
  type RunOptions,
  type StateMachineOptions,
  type Step,
} from "../core";
import { Future, isAwaitable, type AwaitableLike } from "../future";

// =============================================================================
// Options
// =============================================================================

export interface TaskOptions<C = unknown> extends RunOptions<C>, StateMachineOptions {}

// =============================================================================
// Builder
// =============================================================================

export class TaskBuilder {
  constructor(
    /** The state machine every step of this builder is recorded in. */
    readonly machine: StateMachine,
    /**
     * Whether binds resume on the context captured at suspension (`true`),
     * or on whatever stack completes the awaitable (`false`).
     */
    readonly continueOnCapturedContext: boolean = true
  ) {}

  /** Defer building a step until it is run. */
  delay<T>(code: () => Step<T>): () => Step<T> {
    return code;
  }

  zero(): Step<void> {
    return zero();
  }

  return<T>(value: T): Step<T> {
    return ret(value);
  }

  /**
   * Finish with the outcome of `source`. A `Future` is handed off as-is; any
   * other awaitable is awaited and its value returned.
   */
  returnFrom<T>(source: AwaitableLike<T>): Step<T> {
    if (source instanceof Future) {
      return returnFrom(source);
    }
    if (isAwaitable(source)) {
      return this.bind(source, (value) => ret(value));
    }
    return returnFrom(Future.from(source));
  }

  bind<T1, T2>(source: AwaitableLike<T1>, continuation: (value: T1) => Step<T2>): Step<T2> {
    return this.continueOnCapturedContext
      ? bind(this.machine, source, continuation)
      : bindDetached(this.machine, source, continuation);
  }

  combine<T>(first: Step<void>, rest: () => Step<T>): Step<T> {
    return combine(this.machine, first, rest);
  }

  while(condition: () => boolean, body: () => Step<void>): Step<void> {
    return whileLoop(this.machine, condition, body);
  }

  for<T>(sequence: Iterable<T>, body: (item: T) => Step<void>): Step<void> {
    return forLoop(this.machine, sequence, body);
  }

  tryWith<T>(code: () => Step<T>, handler: (error: unknown) => Step<T>): Step<T> {
    return tryWith(this.machine, code, handler);
  }

  tryFinally<T>(code: () => Step<T>, compensation: () => void): Step<T> {
    return tryFinally(this.machine, code, compensation);
  }

  using<R extends Disposable | null | undefined, T>(resource: R, body: (resource: R) => Step<T>): Step<T> {
    return using(this.machine, resource, body);
  }
}

// =============================================================================
// Entry Points
// =============================================================================

/**
 * Build and run a task whose binds resume on the captured resume context.
 */
export function task<T, C = unknown>(
  body: (builder: TaskBuilder) => Step<T>,
  options: TaskOptions<C> = {}
): Future<T> {
  const builder = new TaskBuilder(new StateMachine(options), true);
  return run(builder.machine, () => body(builder), options);
}

/**
 * Build and run a task whose binds do not return to the captured resume
 * context.
 */
export function detachedTask<T, C = unknown>(
  body: (builder: TaskBuilder) => Step<T>,
  options: TaskOptions<C> = {}
): Future<T> {
  const builder = new TaskBuilder(new StateMachine(options), false);
  return run(builder.machine, () => body(builder), options);
}
