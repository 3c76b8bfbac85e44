/**
 * stepwise/testing
 *
 * Deterministic test doubles for tasks: awaitables that complete on demand,
 * iterables and resources that count how they are used, and a resume context
 * that records what is posted to it.
 */

import type { Disposable, TaskEvent } from "../core";
import { createFuture, Future, type Awaitable, type Awaiter, type ResumeContext } from "../future";

// =============================================================================
// Controlled Awaitable
// =============================================================================

/**
 * Counters for how a task used an awaitable.
 */
export interface AwaitableStats {
  /** Awaiters handed out. */
  awaiters: number;
  /** Reads of `isCompleted`. */
  completedChecks: number;
  /** Calls to `getResult()`. */
  resultReads: number;
  /** Calls to `onCompleted()`. */
  registrations: number;
}

export interface ControlledAwaitable<T> {
  awaitable: Awaitable<T>;
  /** Complete successfully; registered callbacks run synchronously. */
  complete(value: T): void;
  /** Complete with a failure; registered callbacks run synchronously. */
  fail(error: unknown): void;
  readonly stats: AwaitableStats;
}

/**
 * An awaitable that completes only when told to, counting every use of its
 * awaiter. It has no context variant, so it resumes on the completing stack.
 *
 * @example
 * ```typescript
 * const pending = createControlledAwaitable<number>();
 * const future = task((b) => b.bind(pending.awaitable, (n) => b.return(n + 1)));
 * pending.complete(1);
 * expect(pending.stats.registrations).toBe(1);
 * ```
 */
export function createControlledAwaitable<T>(): ControlledAwaitable<T> {
  const { future, resolve, reject } = createFuture<T>();
  const stats: AwaitableStats = {
    awaiters: 0,
    completedChecks: 0,
    resultReads: 0,
    registrations: 0,
  };

  const awaitable: Awaitable<T> = {
    getAwaiter: (): Awaiter<T> => {
      stats.awaiters++;
      const inner = future.configureAwait(false).getAwaiter();
      return {
        get isCompleted() {
          stats.completedChecks++;
          return inner.isCompleted;
        },
        getResult() {
          stats.resultReads++;
          return inner.getResult();
        },
        onCompleted(callback) {
          stats.registrations++;
          inner.onCompleted(callback);
        },
      };
    },
  };

  return {
    awaitable,
    stats,
    complete: (value) => {
      resolve(value);
    },
    fail: (error) => {
      reject(error);
    },
  };
}

// =============================================================================
// Asynchronous Futures
// =============================================================================

/**
 * A future that fulfils with `value` on a later turn of the event loop.
 */
export function yieldFuture(): Future<void>;
export function yieldFuture<T>(value: T): Future<T>;
export function yieldFuture<T>(value?: T): Future<T | undefined> {
  return Future.from(new Promise<T | undefined>((resolve) => setImmediate(() => resolve(value))));
}

/**
 * A future that rejects with `error` on a later turn of the event loop.
 */
export function failLater<T = never>(error: unknown): Future<T> {
  return Future.from(new Promise<T>((_, reject) => setImmediate(() => reject(error))));
}

// =============================================================================
// Counting Iterable
// =============================================================================

export interface IterableStats {
  /** Calls to `next()`, including the one that reported exhaustion. */
  nextCalls: number;
  /** `next()` calls that produced an item. */
  yielded: number;
  /** Calls to `return()`. */
  returnCalls: number;
}

/**
 * An iterable over `items` that counts how its iterator is driven.
 */
export function createCountingIterable<T>(items: readonly T[]): {
  iterable: Iterable<T>;
  stats: IterableStats;
} {
  const stats: IterableStats = { nextCalls: 0, yielded: 0, returnCalls: 0 };

  const iterable: Iterable<T> = {
    [Symbol.iterator]: (): Iterator<T> => {
      let index = 0;
      return {
        next: (): IteratorResult<T> => {
          stats.nextCalls++;
          if (index < items.length) {
            stats.yielded++;
            return { done: false, value: items[index++] };
          }
          return { done: true, value: undefined };
        },
        return: (): IteratorResult<T> => {
          stats.returnCalls++;
          index = items.length;
          return { done: true, value: undefined };
        },
      };
    },
  };

  return { iterable, stats };
}

// =============================================================================
// Tracked Resource
// =============================================================================

export interface TrackedResource extends Disposable {
  readonly name: string;
  /** Number of `dispose()` calls. */
  readonly disposeCount: number;
}

/**
 * A disposable that counts its releases.
 * Pass `log` to record the release alongside other test events.
 */
export function createTrackedResource(name: string, log?: string[]): TrackedResource {
  let disposeCount = 0;
  return {
    name,
    get disposeCount() {
      return disposeCount;
    },
    dispose() {
      disposeCount++;
      log?.push(`dispose:${name}`);
    },
  };
}

// =============================================================================
// Recording Context
// =============================================================================

export interface RecordingContext extends ResumeContext {
  readonly name: string;
  /** Number of callbacks posted. */
  readonly posts: number;
}

/**
 * A resume context that runs posted callbacks immediately and counts them.
 */
export function createRecordingContext(name: string): RecordingContext {
  let posts = 0;
  return {
    name,
    get posts() {
      return posts;
    },
    post(callback) {
      posts++;
      callback();
    },
  };
}

// =============================================================================
// Event Collector
// =============================================================================

/**
 * Collect task events for assertions.
 *
 * @example
 * ```typescript
 * const collector = createEventCollector();
 * await task(body, { onEvent: collector.onEvent });
 * expect(collector.types()).toEqual(["task_start", "task_success"]);
 * ```
 */
export function createEventCollector<C = unknown>(): {
  events: TaskEvent<C>[];
  onEvent: (event: TaskEvent<C>) => void;
  types: () => TaskEvent<C>["type"][];
} {
  const events: TaskEvent<C>[] = [];
  return {
    events,
    onEvent: (event) => {
      events.push(event);
    },
    types: () => events.map((event) => event.type),
  };
}
