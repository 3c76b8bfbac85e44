/**
 * The driver: turns a step graph into a future.
 *
 * `run` evaluates the first step synchronously. A task that finishes without
 * suspending gets an already-settled future and no driver at all; a task that
 * hands off to another future gets that future back unchanged. Only a task
 * that suspends is given a driver, which re-enters the state machine each
 * time the awaiter it waits on completes.
 */

import { StepShapeError } from "../errors";
import {
  createFuture,
  Future,
  type Awaiter,
  type Reject,
  type Resolve,
  type ResumeFailure,
} from "../future";
import type { Label, LabelId, StateMachine } from "./state-machine";
import { isStep, type Step } from "./step";

/** Label reported for a malformed first step, which no label produced. */
const FIRST_STEP_LABEL: LabelId = -1;

// =============================================================================
// Events
// =============================================================================

/**
 * Event stream for task execution. Use it for logging, telemetry or
 * debugging; the driver itself never writes anywhere.
 */
export type TaskEvent<C = unknown> =
  | { type: "task_start"; taskId: string; ts: number; context?: C }
  | { type: "task_suspend"; taskId: string; label: LabelId; ts: number; context?: C }
  | { type: "task_resume"; taskId: string; label: LabelId; ts: number; context?: C }
  | { type: "task_handoff"; taskId: string; ts: number; context?: C }
  | {
      type: "task_success";
      taskId: string;
      ts: number;
      durationMs: number;
      /** True when the task finished without ever suspending. */
      synchronous: boolean;
      context?: C;
    }
  | {
      type: "task_error";
      taskId: string;
      ts: number;
      durationMs: number;
      error: unknown;
      synchronous: boolean;
      context?: C;
    };

export type DriverState = "notStarted" | "running" | "suspended" | "fulfilled" | "faulted";

// =============================================================================
// Run Options
// =============================================================================

export interface RunOptions<C = unknown> {
  /**
   * Listener for task events (start, suspend, resume, hand-off, outcome).
   */
  onEvent?: (event: TaskEvent<C>, ctx: C | undefined) => void;
  /**
   * Unique ID for this task. Defaults to a random UUID, generated only when
   * `onEvent` is set.
   */
  taskId?: string;
  /**
   * Arbitrary context object attached to every event.
   * Useful for passing request IDs or loggers.
   */
  context?: C;
}

type EventInput<C> = DistributiveOmit<TaskEvent<C>, "taskId" | "ts">;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

type Emit<C> = (event: EventInput<C>) => void;

function createEmitter<C>(options: RunOptions<C>): Emit<C> {
  const { onEvent, context } = options;
  if (!onEvent) {
    return () => {};
  }
  const taskId = options.taskId ?? crypto.randomUUID();
  return (event) => {
    const stamped: TaskEvent<C> =
      context === undefined
        ? { ...event, taskId, ts: Date.now() }
        : { ...event, taskId, ts: Date.now(), context };
    try {
      onEvent(stamped, context);
    } catch (error) {
      // Listener failures surface as uncaught errors, not task failures.
      queueMicrotask(() => {
        throw error;
      });
    }
  };
}

// =============================================================================
// Driver
// =============================================================================

/**
 * Re-enters a suspended task each time the awaiter it waits on completes.
 * Exactly one advance is in flight at a time: the next is only ever triggered
 * by the callback registered at the end of the previous one.
 * @internal
 */
class Driver<T, C> {
  private state: DriverState = "notStarted";
  private pending: Step<T> | undefined;
  private current: Label<T> | undefined;

  constructor(
    private readonly sm: StateMachine,
    first: Step<T>,
    private readonly resolve: Resolve<T>,
    private readonly reject: Reject,
    private readonly emit: Emit<C>,
    private readonly startedAt: number
  ) {
    this.pending = first;
  }

  advance(): void {
    this.state = "running";
    let step: Step<T>;
    try {
      step = this.next();
    } catch (error) {
      this.fail(error);
      return;
    }

    switch (step.kind) {
      case "return":
        this.succeed(step.value);
        return;
      case "returnFrom":
        this.handOff(step.future);
        return;
      case "await":
        this.current = step.resume;
        this.state = "suspended";
        this.emit({ type: "task_suspend", label: step.resume.id });
        this.register(step.awaiter);
        return;
    }
  }

  private next(): Step<T> {
    const first = this.pending;
    if (first) {
      this.pending = undefined;
      return first;
    }
    const label = this.current;
    if (!label) {
      throw new Error("Driver advanced with no resume label");
    }
    this.emit({ type: "task_resume", label: label.id });
    const step = this.sm.jump(label);
    if (!isStep(step)) {
      throw new StepShapeError({ label: label.id, received: step });
    }
    return step;
  }

  /**
   * Register a callback that advances at most once, and only while suspended.
   * A resume context that cannot take the resumption faults the task.
   */
  private register(awaiter: Awaiter<unknown>): void {
    let fired = false;
    const resume = (failure?: ResumeFailure) => {
      if (fired || this.state !== "suspended") return;
      fired = true;
      if (failure) {
        this.fail(failure.error);
        return;
      }
      this.advance();
    };
    try {
      awaiter.onCompleted(resume);
    } catch (error) {
      this.fail(error);
    }
  }

  private handOff(future: Future<T>): void {
    const awaiter = future.configureAwait(false).getAwaiter();
    const settle = () => {
      let value: T;
      try {
        value = awaiter.getResult();
      } catch (error) {
        this.fail(error);
        return;
      }
      this.succeed(value);
    };
    this.emit({ type: "task_handoff" });
    if (awaiter.isCompleted) {
      settle();
    } else {
      this.state = "suspended";
      awaiter.onCompleted(settle);
    }
  }

  private succeed(value: T): void {
    this.state = "fulfilled";
    this.emit({
      type: "task_success",
      durationMs: performance.now() - this.startedAt,
      synchronous: false,
    });
    this.resolve(value);
  }

  private fail(error: unknown): void {
    this.state = "faulted";
    this.emit({
      type: "task_error",
      error,
      durationMs: performance.now() - this.startedAt,
      synchronous: false,
    });
    this.reject(error);
  }
}

// =============================================================================
// run
// =============================================================================

/**
 * Run a step graph as a future.
 *
 * Never throws: a failure while producing the first step, or a first step
 * that is not a step at all, yields an already-rejected future.
 *
 * @example
 * ```typescript
 * const sm = new StateMachine();
 * const future = run(sm, () => bind(sm, loadConfig(), (config) => ret(config.port)));
 * const port = await future;
 * ```
 */
export function run<T, C = unknown>(
  sm: StateMachine,
  code: () => Step<T>,
  options: RunOptions<C> = {}
): Future<T> {
  const emit = createEmitter(options);
  const startedAt = performance.now();

  emit({ type: "task_start" });

  let first: Step<T>;
  try {
    first = code();
    // Checked regardless of `sm.assertions`.
    if (!isStep(first)) {
      throw new StepShapeError({ label: FIRST_STEP_LABEL, received: first });
    }
  } catch (error) {
    emit({
      type: "task_error",
      error,
      durationMs: performance.now() - startedAt,
      synchronous: true,
    });
    return Future.reject<T>(error);
  }

  switch (first.kind) {
    case "return":
      emit({
        type: "task_success",
        durationMs: performance.now() - startedAt,
        synchronous: true,
      });
      return Future.resolve(first.value);
    case "returnFrom":
      emit({ type: "task_handoff" });
      return first.future;
    case "await": {
      const { future, resolve, reject } = createFuture<T>();
      const driver = new Driver<T, C>(sm, first, resolve, reject, emit, startedAt);
      driver.advance();
      return future;
    }
  }
}
