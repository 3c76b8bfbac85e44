/**
 * The label table behind one task.
 *
 * Every resumable point of a task is a label: an integer id with a
 * continuation installed under it. Combinators allocate labels as they build
 * the step graph (loops and try blocks do so lazily, while running) and
 * resuming after a suspension is a jump to the label the suspension named.
 *
 * Labels are stored type-erased in a dense array indexed by id. The `Label<T>`
 * handle returned to the caller carries the result type, so a jump through the
 * handle recovers it; the runtime checks below back that up.
 */

import { LabelError, StepShapeError } from "../errors";
import { isStep, type Step } from "./step";

export type LabelId = number;

export interface StateMachineOptions {
  /**
   * Verify on every jump that the continuation produced a step.
   * Foreign and uninstalled labels are always rejected.
   * @default true
   */
  assertions?: boolean;
}

export const DEFAULT_STATE_MACHINE_OPTIONS: Required<StateMachineOptions> = {
  assertions: true,
};

/**
 * Handle to one label of a state machine.
 */
export class Label<T> {
  /** @internal Installed by `StateMachine.setCode`. */
  continuation: (() => Step<T>) | undefined;

  /** @internal Use `StateMachine.allocateLabel`. */
  constructor(
    readonly id: LabelId,
    readonly machine: StateMachine
  ) {}
}

export class StateMachine {
  private readonly labels: Array<Label<unknown>> = [];
  private readonly assertions: boolean;

  constructor(options: StateMachineOptions = {}) {
    this.assertions = options.assertions ?? DEFAULT_STATE_MACHINE_OPTIONS.assertions;
  }

  /** Number of labels allocated so far. */
  get labelCount(): number {
    return this.labels.length;
  }

  /**
   * Reserve the next label. Its continuation can be installed later, which is
   * how a continuation refers to a label defined after it.
   */
  allocateLabel<T>(): Label<T> {
    const label = new Label<T>(this.labels.length, this);
    this.labels.push(label);
    return label;
  }

  /** Install or replace the continuation of `label`. */
  setCode<T>(label: Label<T>, continuation: () => Step<T>): void {
    this.own(label);
    label.continuation = continuation;
  }

  /** Allocate a label and install `continuation` under it. */
  code<T>(continuation: () => Step<T>): Label<T> {
    const label = this.allocateLabel<T>();
    label.continuation = continuation;
    return label;
  }

  /** Run the continuation installed under `label`. */
  jump<T>(label: Label<T>): Step<T> {
    this.own(label);
    const continuation = label.continuation;
    if (!continuation) {
      throw new LabelError({ label: label.id, reason: "uninstalled" });
    }
    const step = continuation();
    if (this.assertions && !isStep(step)) {
      throw new StepShapeError({ label: label.id, received: step });
    }
    return step;
  }

  private own(label: Label<unknown>): void {
    if (label.machine !== this || this.labels[label.id] !== label) {
      throw new LabelError({ label: label.id, reason: "foreign" });
    }
  }
}
