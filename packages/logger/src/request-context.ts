import { AsyncLocalStorage } from 'node:async_hooks';

import type { RequestScope } from './interfaces';

const scopes = new AsyncLocalStorage<RequestScope>();

/**
 * Runs `callback` with `reqId` attached to every record logged inside it,
 * including from async continuations. Nested calls shadow the outer id.
 */
export function withRequestId<R>(reqId: string, callback: () => R): R {
  return scopes.run({ reqId }, callback);
}

export function getRequestId(): string | undefined {
  return scopes.getStore()?.reqId;
}
