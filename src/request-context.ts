import { AsyncLocalStorage } from "node:async_hooks";

export interface RequestContext {
  sessionId?: string;
  /** Name of the tool being dispatched, set by `ToolHandlers.callTool`. */
  toolName?: string;
}

const requestContextStorage = new AsyncLocalStorage<RequestContext>();

export function runWithRequestContext<T>(
  context: RequestContext,
  fn: () => Promise<T>,
): Promise<T> {
  return requestContextStorage.run(context, fn);
}

/**
 * Runs `fn` with `overrides` layered on top of the current context, so a tool
 * call keeps the session id of the HTTP request that carried it.
 */
export function extendRequestContext<T>(
  overrides: RequestContext,
  fn: () => Promise<T>,
): Promise<T> {
  return requestContextStorage.run({ ...getRequestContext(), ...overrides }, fn);
}

export function getRequestContext(): RequestContext {
  return requestContextStorage.getStore() || {};
}
