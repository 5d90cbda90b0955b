/**
 * Execution contexts for the non-blocking evaluation surface.
 *
 * @module core/executor
 */

/** Runs a task at some point, possibly in another turn of the event loop. */
export type Executor = (task: () => void) => void;

/** Defers the task to the check phase, off the caller's stack. */
export const immediateExecutor: Executor = (task) => {
  setImmediate(task);
};

/** Runs the task synchronously in the calling context. */
export const inlineExecutor: Executor = (task) => {
  task();
};
