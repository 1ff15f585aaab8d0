import { AsyncLocalStorage } from "async_hooks";
import { randomUUID } from "crypto";

const traceIds = new AsyncLocalStorage<string>();

export const getTraceId = (): string | undefined => traceIds.getStore();

/**
 * Runs `fn` with `traceId` as the active trace. Without one, the active trace
 * is kept, or a new id is generated when there is none.
 */
export const runInTrace = <T>(fn: () => T, traceId?: string): T => {
  return traceIds.run(traceId ?? getTraceId() ?? randomUUID(), fn);
};
