/**
 * Where completions, progress updates and response interpretations run.
 */
export interface CompletionQueue {
  dispatch(task: () => void): void;
}

export const CompletionQueues = {
  /** Runs tasks on the next turn of the event loop (`setImmediate`) */
  immediate: {
    dispatch(task: () => void): void {
      setImmediate(task);
    },
  } satisfies CompletionQueue,

  /** Runs tasks once the current job finishes (`queueMicrotask`) */
  microtask: {
    dispatch(task: () => void): void {
      queueMicrotask(task);
    },
  } satisfies CompletionQueue,

  /** Runs tasks synchronously on the caller's stack */
  inline: {
    dispatch(task: () => void): void {
      task();
    },
  } satisfies CompletionQueue,
};
