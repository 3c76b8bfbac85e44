/**
 * Resume contexts.
 *
 * A resume context decides where a suspended computation continues once the
 * future it waits on completes. Code running inside `runInContext(ctx, fn)` has
 * `ctx` as its ambient context; a context-propagating awaiter captures that
 * context when it registers and resumes through `ctx.post`.
 *
 * @example
 * ```typescript
 * const ui: ResumeContext = {
 *   name: "ui",
 *   post: (callback) => queueMicrotask(callback),
 * };
 *
 * runInContext(ui, () => task((b) => b.bind(load(), (data) => b.return(render(data)))));
 * ```
 */

import { AsyncLocalStorage } from "node:async_hooks";

export interface ResumeContext {
  /** Label used in diagnostics. */
  readonly name?: string;
  /** Schedule `callback` to run on this context. */
  post(callback: () => void): void;
}

const ambient = new AsyncLocalStorage<ResumeContext>();

/**
 * The context the calling code runs on, if any.
 */
export function currentContext(): ResumeContext | undefined {
  return ambient.getStore();
}

/**
 * Run `fn` with `context` as the ambient resume context.
 */
export function runInContext<T>(context: ResumeContext, fn: () => T): T {
  return ambient.run(context, fn);
}

/**
 * Passed to a completion callback when its resume context refused the
 * resumption.
 */
export interface ResumeFailure {
  /** What `post` threw. */
  error: unknown;
}

/**
 * Wrap `callback` so it resumes on `context`: posted there, and run with
 * `context` ambient so nested awaits capture it again.
 *
 * If `post` throws before the callback starts, the callback is called
 * directly with the failure instead. Errors thrown by the callback itself
 * propagate unchanged.
 */
export function resumeOn(
  context: ResumeContext,
  callback: (failure?: ResumeFailure) => void
): () => void {
  return () => {
    let entered = false;
    try {
      context.post(() => {
        entered = true;
        runInContext(context, () => callback());
      });
    } catch (error) {
      if (entered) throw error;
      callback({ error });
    }
  };
}
