import { AsyncLocalStorage } from "node:async_hooks";

/** Correlation fields attached to every log entry emitted while serving a request. */
export interface RequestContext {
  readonly requestId: string;
  readonly method: string;
  readonly path: string;
}

const storage = new AsyncLocalStorage<RequestContext>();

/** Runs {@link callback} with {@link context} visible to downstream helpers. */
export function runWithRequestContext<T>(context: RequestContext, callback: () => T): T {
  return storage.run(context, callback);
}

/** Context of the request currently being served, if any. */
export function getRequestContext(): RequestContext | undefined {
  return storage.getStore();
}
