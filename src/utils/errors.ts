/**
 * @fileoverview Standardized error handling utilities.
 *
 * Provides consistent error patterns across the codebase:
 * - AppError: Base class for application-specific errors
 * - ParseError / ResolverError / StoreError: the scheduling error taxonomy
 * - withErrorContext: Wraps operations with consistent error logging
 * - safeExecute: Returns result objects instead of throwing
 */

import { createLogger } from './observability/index.js';

const log = createLogger({ domain: 'errors' });

/**
 * Base class for application-specific errors.
 * Includes error code, recoverability flag, and optional context.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export type ParseErrorKind = 'Unparseable' | 'UnrecognizedTime' | 'InvalidRange';

/**
 * Free-text time input could not be turned into a schedule.
 * Shown inline; the user's input stays in place for correction.
 */
export class ParseError extends AppError {
  constructor(
    public readonly kind: ParseErrorKind,
    message: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'PARSE_ERROR', true, context);
    this.name = 'ParseError';
  }
}

export type ResolverErrorKind = 'InvalidDuration' | 'MissingTitle' | 'EditInProgress';

/**
 * A schedule or edit that cannot become a valid event.
 */
export class ResolverError extends AppError {
  constructor(
    public readonly kind: ResolverErrorKind,
    message: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'RESOLVER_ERROR', true, context);
    this.name = 'ResolverError';
  }
}

export type StoreErrorKind = 'Unreachable' | 'Rejected' | 'NotFound';

/**
 * The calendar store failed, refused, or never answered.
 */
export class StoreError extends AppError {
  constructor(
    public readonly kind: StoreErrorKind,
    message: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'STORE_ERROR', true, context);
    this.name = 'StoreError';
  }
}

/**
 * Result type for operations that may fail.
 * Prefer this over try-catch when callers need to handle both cases.
 */
export type Result<T, E = string> =
  | { success: true; data: T }
  | { success: false; error: E };

export function ok<T>(data: T): { success: true; data: T } {
  return { success: true, data };
}

export function fail<E>(error: E): { success: false; error: E } {
  return { success: false, error };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Execute an async function with consistent error logging.
 * Errors are logged and re-thrown for the caller to handle.
 */
export async function withErrorContext<T>(
  fn: () => Promise<T>,
  context: string
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    log.error('operation_failed', { operation: context, error: describeError(error) });
    throw error;
  }
}

/**
 * Execute an async function and return a Result object.
 * Use for operations where the caller wants to handle failure without exceptions.
 */
export async function safeExecute<T>(
  fn: () => Promise<T>,
  context: string
): Promise<Result<T>> {
  try {
    const data = await fn();
    return { success: true, data };
  } catch (error) {
    log.error('operation_failed', { operation: context, error: describeError(error) });
    return {
      success: false,
      error: describeError(error),
    };
  }
}
