/**
 * stepwise/future
 *
 * A future whose completion can be inspected synchronously.
 *
 * Native promises never report completion synchronously, so the state machine
 * cannot take its fast path on them. `Future` keeps its outcome as a Result,
 * exposes it through the awaiter capability, and still interoperates with
 * `await` through `then`.
 *
 * @example
 * ```typescript
 * import { createFuture, Future } from 'stepwise/future';
 *
 * const { future, resolve } = createFuture<number>();
 * future.status; // "pending"
 * resolve(42);
 * future.result; // { ok: true, value: 42 }
 *
 * Future.resolve(1).getAwaiter().isCompleted; // true
 * ```
 */

import { FutureNotCompletedError } from "../errors";
import { err, ok, unwrap, type Result } from "../result";
import { currentContext, resumeOn, type ResumeFailure } from "./context";

export {
  currentContext,
  runInContext,
  resumeOn,
  type ResumeContext,
  type ResumeFailure,
} from "./context";

// =============================================================================
// Awaiter Capability
// =============================================================================

/**
 * Capability obtained from an awaitable to check for completion, read the
 * outcome, and be told when it completes.
 */
export interface Awaiter<T> {
  /** Non-blocking completion check. */
  readonly isCompleted: boolean;
  /**
   * Read the outcome. Valid only once completed; rethrows the original
   * failure.
   */
  getResult(): T;
  /**
   * Invoke `callback` once, when the awaitable completes. It receives a
   * `ResumeFailure` if the captured resume context could not run it.
   */
  onCompleted(callback: (failure?: ResumeFailure) => void): void;
}

/**
 * Anything a task can await.
 */
export interface Awaitable<T> {
  getAwaiter(): Awaiter<T>;
}

/**
 * An awaitable that can produce a variant which does not resume on the
 * captured context.
 */
export interface ConfigurableAwaitable<T> extends Awaitable<T> {
  configureAwait(continueOnCapturedContext: boolean): Awaitable<T>;
}

/**
 * Everything the await adapters accept: the awaiter capability, or a native
 * thenable adapted through `Future.from`.
 */
export type AwaitableLike<T> = Awaitable<T> | PromiseLike<T>;

export type FutureStatus = "pending" | "fulfilled" | "rejected";

export type Resolve<T> = (value: T) => boolean;
export type Reject = (error: unknown) => boolean;

export interface NewFuture<T> {
  future: Future<T>;
  /** Fulfil the future. Returns false if it had already settled. */
  resolve: Resolve<T>;
  /** Fault the future. Returns false if it had already settled. */
  reject: Reject;
}

// =============================================================================
// Source
// =============================================================================

/**
 * Settlement state behind a future. Only `createFuture` hands out the ability
 * to settle it.
 * @internal
 */
export class FutureSource<T> {
  outcome: Result<T, unknown> | undefined;
  private watchers: Array<() => void> = [];

  settle(outcome: Result<T, unknown>): boolean {
    if (this.outcome) {
      return false;
    }
    this.outcome = outcome;
    this.notify();
    return true;
  }

  watch(callback: () => void): void {
    if (this.outcome) {
      callback();
    } else {
      this.watchers.push(callback);
    }
  }

  private notify(): void {
    const watchers = this.watchers;
    this.watchers = [];

    let failure: { error: unknown } | undefined;
    for (const watcher of watchers) {
      try {
        watcher();
      } catch (error) {
        failure ??= { error };
      }
    }
    if (failure) {
      throw failure.error;
    }
  }
}

class FutureAwaiter<T> implements Awaiter<T> {
  constructor(
    private readonly source: FutureSource<T>,
    private readonly continueOnCapturedContext: boolean
  ) {}

  get isCompleted(): boolean {
    return this.source.outcome !== undefined;
  }

  getResult(): T {
    const outcome = this.source.outcome;
    if (!outcome) {
      throw new FutureNotCompletedError({ operation: "getResult()" });
    }
    return unwrap(outcome);
  }

  onCompleted(callback: (failure?: ResumeFailure) => void): void {
    const context = this.continueOnCapturedContext ? currentContext() : undefined;
    this.source.watch(context ? resumeOn(context, callback) : callback);
  }
}

// =============================================================================
// Future
// =============================================================================

export class Future<T> implements ConfigurableAwaitable<T>, PromiseLike<T> {
  static resolve(): Future<void>;
  static resolve<T>(value: T): Future<T>;
  static resolve<T>(value?: T): Future<T | undefined> {
    const { future, resolve } = createFuture<T | undefined>();
    resolve(value);
    return future;
  }

  static reject<T = never>(error: unknown): Future<T> {
    const { future, reject } = createFuture<T>();
    reject(error);
    return future;
  }

  /**
   * Adapt a thenable. A `Future` is returned as-is; anything else yields a
   * pending future that settles when the thenable does.
   */
  static from<T>(source: Future<T> | PromiseLike<T>): Future<T> {
    if (source instanceof Future) {
      return source;
    }
    const { future, resolve, reject } = createFuture<T>();
    void Promise.resolve(source).then(resolve, reject);
    return future;
  }

  private promise: Promise<T> | undefined;

  /** @internal Use `createFuture` or the static constructors. */
  constructor(private readonly source: FutureSource<T>) {}

  get status(): FutureStatus {
    const outcome = this.source.outcome;
    if (!outcome) return "pending";
    return outcome.ok ? "fulfilled" : "rejected";
  }

  /** The settled outcome, or undefined while pending. */
  get result(): Result<T, unknown> | undefined {
    return this.source.outcome;
  }

  getAwaiter(): Awaiter<T> {
    return new FutureAwaiter(this.source, true);
  }

  configureAwait(continueOnCapturedContext: boolean): Awaitable<T> {
    return {
      getAwaiter: () => new FutureAwaiter(this.source, continueOnCapturedContext),
    };
  }

  then<R1 = T, R2 = never>(
    onfulfilled?: ((value: T) => R1 | PromiseLike<R1>) | null,
    onrejected?: ((reason: unknown) => R2 | PromiseLike<R2>) | null
  ): Promise<R1 | R2> {
    return this.toPromise().then(onfulfilled, onrejected);
  }

  private toPromise(): Promise<T> {
    this.promise ??= new Promise<T>((resolve, reject) => {
      this.source.watch(() => {
        const outcome = this.source.outcome;
        if (!outcome) return;
        if (outcome.ok) {
          resolve(outcome.value);
        } else {
          reject(outcome.error);
        }
      });
    });
    return this.promise;
  }
}

/**
 * Create a pending future together with the functions that settle it.
 */
export function createFuture<T>(): NewFuture<T> {
  const source = new FutureSource<T>();
  return {
    future: new Future(source),
    resolve: (value: T) => source.settle(ok(value)),
    reject: (error: unknown) => source.settle(err(error)),
  };
}

// =============================================================================
// Dispatch
// =============================================================================

/**
 * Checks if a value exposes the awaiter capability.
 */
export function isAwaitable<T>(value: AwaitableLike<T>): value is Awaitable<T> {
  return "getAwaiter" in value && typeof value.getAwaiter === "function";
}

/**
 * Checks if an awaitable can produce a context-unaffiliated variant.
 */
export function isConfigurable<T>(value: Awaitable<T>): value is ConfigurableAwaitable<T> {
  return "configureAwait" in value && typeof value.configureAwait === "function";
}

/**
 * Normalise an awaitable-like value to something with an awaiter.
 */
export function toAwaitable<T>(source: AwaitableLike<T>): Awaitable<T> {
  return isAwaitable(source) ? source : Future.from(source);
}
