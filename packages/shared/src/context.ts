/**
 * AsyncLocalStorage Context Management
 *
 * Carries the correlation ID and the uploaded document's name through one
 * request, so every log line of a pipeline run can be tied back to it.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  correlationId: string;
  documentName?: string;
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
 * Run a function within a new AsyncLocalStorage context
 */
export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Attach the document name to the active context, if there is one.
 */
export function setDocumentName(documentName: string): void {
  const context = getContext();
  if (context) {
    context.documentName = documentName;
  }
}
