/**
 * Shared result types
 */

export * from './attendance.js';
export * from './leave.js';

/**
 * Typed result for operations whose failures are expected outcomes
 * (verification, derivation) rather than exceptions.
 */
export type ServiceResult<T, E = ServiceError> =
  | { success: true; data: T }
  | { success: false; error: E };

export interface ServiceError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
