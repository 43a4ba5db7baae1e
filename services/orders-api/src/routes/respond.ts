import type { FastifyPluginOptions, FastifyReply, FastifyRequest } from 'fastify';
import type { UnitOfWork } from '@fulfillment/shared/src/services/unit-of-work';
import { DomainError, ValidationError } from '@fulfillment/shared/src/utils/errors';
import { createChildLogger } from '@fulfillment/shared/src/utils/logger';
import { fail, ok, OperationResult } from '@fulfillment/shared/src/utils/result';

const log = createChildLogger({ component: 'orders-api' });

export interface RouteDependencies extends FastifyPluginOptions {
     unitOfWork: UnitOfWork;
}

export type IdentityHeader = 'x-buyer-id' | 'x-store-id' | 'x-user-id';

/** Caller identity as forwarded by the gateway; empty when absent. */
export function identity(request: FastifyRequest, header: IdentityHeader): string {
     const value = request.headers[header];
     return typeof value === 'string' ? value.trim() : '';
}

export function sendError(reply: FastifyReply, error: DomainError): FastifyReply {
     return reply.code(error.statusCode).send({
          error: error.code,
          message: error.message,
          errors: error.errors,
     });
}

interface RespondOptions<T> {
     failureMessage: string;
     statusCode?: number;
     present?: (value: T) => unknown;
}

/**
 * Sends an operation result. Failures carry their own status code; anything
 * thrown outside the operation boundary (e.g. BEGIN failing) is a 500.
 */
export async function respond<T>(
     reply: FastifyReply,
     run: () => Promise<OperationResult<T>>,
     options: RespondOptions<T>
): Promise<FastifyReply> {
     try {
          const result = await run();
          if (!result.succeeded) {
               return sendError(reply, result.error);
          }

          const body = options.present ? options.present(result.value) : result.value;
          return reply.code(options.statusCode ?? 200).send(body);
     } catch (error) {
          if (error instanceof DomainError) {
               return sendError(reply, error);
          }

          log.error({ err: error }, options.failureMessage);
          return reply.code(500).send({
               error: 'INTERNAL_ERROR',
               message: 'An unexpected error occurred',
          });
     }
}

function isOneOf<T extends string>(allowed: readonly T[], value: string): value is T {
     return allowed.some((candidate) => candidate === value);
}

/**
 * Parses a comma separated status filter. Unknown values are reported the
 * same way the services report bad input.
 */
export function parseStatuses<T extends string>(
     allowed: readonly T[],
     raw: string | undefined
): OperationResult<T[] | undefined> {
     if (raw === undefined || raw.trim() === '') {
          return ok<T[] | undefined>(undefined);
     }

     const statuses: T[] = [];
     const unknown: string[] = [];
     for (const part of raw.split(',')) {
          const value = part.trim().toUpperCase();
          if (isOneOf(allowed, value)) {
               statuses.push(value);
          } else {
               unknown.push(`Unknown status '${part.trim()}'.`);
          }
     }

     if (unknown.length > 0) {
          return fail(new ValidationError(unknown));
     }
     return ok<T[] | undefined>(statuses);
}

export function parseDate(value: string | undefined): Date | undefined {
     return value ? new Date(value) : undefined;
}
