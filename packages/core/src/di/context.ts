import { AsyncLocalStorage } from "node:async_hooks";

/** Identity of one dependency context. `context` bindings cache one value per context. */
export type DependencyContext = {
  readonly id: number;
};

export const ROOT_CONTEXT: DependencyContext = Object.freeze({ id: 0 });

const contextStore = new AsyncLocalStorage<DependencyContext>();
let nextContextId = 1;

/**
 * Get the dependency context of the current async call chain.
 *
 * Returns `ROOT_CONTEXT` outside `runInDependencyContext` (startup code,
 * background tasks), so `context` bindings still behave as singletons there.
 */
export function currentDependencyContext(): DependencyContext {
  return contextStore.getStore() ?? ROOT_CONTEXT;
}

/**
 * Runs `fn` in a fresh dependency context. Everything `fn` awaits or schedules
 * sees the same context, so a `context` binding is constructed at most once
 * for the whole unit of work (a request, a job).
 */
export function runInDependencyContext<R>(fn: () => R): R {
  return contextStore.run({ id: nextContextId++ }, fn);
}
