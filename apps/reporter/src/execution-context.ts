import { AsyncLocalStorage } from "node:async_hooks";

// =============================================================================
// Execution Context
// =============================================================================
// Identifies the simulated user (or any other unit of concurrent work) that
// issued a request. The load generator wraps each user loop:
//
//   runInExecutionContext(async () => {
//     while (running) await user.runTask();
//   });
//
// and every sample recorded inside carries that context's id.
// =============================================================================

/** Returned when no execution context is active (e.g. a one-off debug request) */
export const NO_EXECUTION_CONTEXT = -1;

interface ExecutionContext {
  id: number;
}

const contextStorage = new AsyncLocalStorage<ExecutionContext>();
let lastAssignedId = 0;

/**
 * Run `fn` inside an execution context. Ids are assigned from a process-wide
 * counter unless one is passed explicitly.
 */
export function runInExecutionContext<T>(fn: () => T, id?: number): T {
  const ctx: ExecutionContext = { id: id ?? ++lastAssignedId };
  return contextStorage.run(ctx, fn);
}

export function currentExecutionContextId(): number {
  return contextStorage.getStore()?.id ?? NO_EXECUTION_CONTEXT;
}

/** Supplies the id stamped on each sample */
export type ExecutionContextProvider = () => number;
