import { AsyncLocalStorage } from 'node:async_hooks';

/**
 * Per-request state shared with code that has no access to `req`, such as the
 * event emitter. `reviewId` is filled in once a PO review has been recorded.
 */
export type RequestContext = {
  requestId: string;
  reviewId?: string;
};

const storage = new AsyncLocalStorage<RequestContext>();

export function runWithRequestContext<T>(context: RequestContext, fn: () => T): T {
  return storage.run(context, fn);
}

export function getRequestContext(): RequestContext | undefined {
  return storage.getStore();
}

/** Links the current request to the review it produced. No-op outside a request. */
export function tagRequestWithReview(reviewId: string): void {
  const store = storage.getStore();
  if (store) store.reviewId = reviewId;
}
