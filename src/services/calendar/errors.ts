/**
 * @fileoverview Mapping of calendar failures onto StoreError.
 *
 * - 404 / 410 → NotFound
 * - other 4xx → Rejected
 * - anything else (5xx, network, timeouts) → Unreachable
 */

import { StoreError } from '../../utils/errors.js';

function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('code' in error && typeof error.code === 'number') return error.code;
  if (
    'response' in error &&
    typeof error.response === 'object' &&
    error.response !== null &&
    'status' in error.response &&
    typeof error.response.status === 'number'
  ) {
    return error.response.status;
  }
  return undefined;
}

/**
 * Map any failure from the Calendar API onto the store error taxonomy.
 */
export function toStoreError(error: unknown, operation: string, eventId?: string): StoreError {
  if (error instanceof StoreError) return error;

  const status = statusOf(error);
  const message = error instanceof Error ? error.message : String(error);
  const context = { operation, eventId, status };

  if (status === 404 || status === 410) {
    return new StoreError('NotFound', eventId ? `Event ${eventId} not found` : message, context);
  }
  if (status !== undefined && status >= 400 && status < 500) {
    return new StoreError('Rejected', message, context);
  }
  return new StoreError('Unreachable', message, context);
}
