/**
 * stepwise/core
 *
 * The state machine, the step protocol, the combinators built on them and the
 * driver that runs a step graph as a future.
 */

export { Step, isStep, type ReturnStep, type ReturnFromStep, type AwaitStep, type StepKind } from "./step";

export {
  StateMachine,
  Label,
  DEFAULT_STATE_MACHINE_OPTIONS,
  type LabelId,
  type StateMachineOptions,
} from "./state-machine";

export { bind, bindDetached, awaitResult } from "./bind";

export {
  zero,
  ret,
  returnFrom,
  combine,
  whileLoop,
  forLoop,
  tryWith,
  tryFinally,
  using,
  type Disposable,
} from "./combinators";

export { run, type RunOptions, type TaskEvent, type DriverState } from "./run";
