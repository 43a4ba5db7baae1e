import type { Logger } from 'pino';
import { DomainError, UnexpectedError } from './errors';

export type OperationResult<T> =
     | { succeeded: true; value: T }
     | { succeeded: false; error: DomainError };

export function ok<T>(value: T): OperationResult<T> {
     return { succeeded: true, value };
}

export function fail<T = never>(error: DomainError): OperationResult<T> {
     return { succeeded: false, error };
}

/**
 * Operation boundary: domain failures thrown from below (e.g. a stale-version
 * write) become typed results, anything else is logged with the given context
 * and reported as an opaque failure.
 */
export async function runOperation<T>(
     log: Logger,
     context: Record<string, unknown>,
     failureMessage: string,
     operation: () => Promise<OperationResult<T>>
): Promise<OperationResult<T>> {
     try {
          return await operation();
     } catch (err) {
          if (err instanceof DomainError) {
               log.warn({ err, ...context }, failureMessage);
               return fail(err);
          }

          log.error({ err, ...context }, failureMessage);
          return fail(new UnexpectedError());
     }
}
