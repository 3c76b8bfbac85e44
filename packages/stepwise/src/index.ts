/**
 * stepwise
 *
 * Resumable task state machines over futures: sequential, synchronous-looking
 * code compiled into a label table and a step protocol, driven to completion
 * by `run`.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { task } from 'stepwise';
 *
 * const greeting = task((b) =>
 *   b.bind(fetchUser(id), (user) =>
 *     b.tryFinally(
 *       () => b.bind(fetchProfile(user), (profile) => b.return(`Hi ${profile.name}`)),
 *       () => audit.flush()
 *     )
 *   )
 * );
 *
 * greeting.status; // "pending" until fetchUser and fetchProfile complete
 * await greeting;
 * ```
 *
 * ## Entry Points
 *
 * - `stepwise` - everything below
 * - `stepwise/core` - state machine, combinators and `run`
 * - `stepwise/builder` - `task`, `detachedTask` and `TaskBuilder`
 * - `stepwise/future` - `Future`, awaiters and resume contexts
 * - `stepwise/errors` - defect types
 * - `stepwise/testing` - deterministic test doubles
 */

export * from "./result";
export * from "./tagged-error";
export * from "./errors";
export * from "./future";
export * from "./core";
export * from "./builder";
