/**
 * AsyncLocalStorage Context Management
 *
 * Carries the correlation ID of a pipeline run (and the caller identity it was
 * invoked with) across every async hop of extraction, mapping and filling.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  correlationId: string;
  documentHash?: string;
  userId?: string;
  sessionId?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Get the current request context
 */
export function getContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Get the correlation ID from the current context, or generate a new one
 */
export function getCorrelationId(): string {
  const context = getContext();
  return context?.correlationId || ulid();
}

/**
 * Run an async function within a new AsyncLocalStorage context
 */
export async function runWithContextAsync<T>(
  context: RequestContext,
  fn: () => Promise<T>
): Promise<T> {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Attach the document hash to the active context once it is known.
 * No-op outside a context.
 */
export function setDocumentHash(documentHash: string): void {
  const context = getContext();
  if (context) {
    context.documentHash = documentHash;
  }
}

export { asyncLocalStorage };
