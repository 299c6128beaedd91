import { AsyncLocalStorage } from "node:async_hooks";

/**
 * Per-call identity carried alongside configuration reads so audit records
 * can name who asked. The surrounding application opens a context per
 * inbound request; reads outside any context are attributed to "system".
 */
export type RequestContext = {
  requestId?: string;
  actorId?: string;
};

const storage = new AsyncLocalStorage<RequestContext>();

export const SYSTEM_ACTOR = "system";

export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return storage.run({ ...context }, fn);
}

export function currentActor(): string {
  const actor = storage.getStore()?.actorId?.trim();
  return actor && actor.length > 0 ? actor : SYSTEM_ACTOR;
}
