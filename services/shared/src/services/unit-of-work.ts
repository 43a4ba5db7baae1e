import { withTransaction } from '../db/client';
import { createPgRepositories } from '../repositories/pg';
import { DomainError } from '../utils/errors';
import { fail, OperationResult } from '../utils/result';
import { createOrderServices, OrderServices, ServiceContext } from './container';

/**
 * Runs one operation against services whose repositories share a single
 * transaction. A failed result rolls the transaction back.
 */
export type UnitOfWork = <T>(
     work: (services: OrderServices) => Promise<OperationResult<T>>
) => Promise<OperationResult<T>>;

class RollbackRequested extends Error {
     constructor(public readonly failure: DomainError) {
          super(failure.message);
          this.name = 'RollbackRequested';
     }
}

export function createPgUnitOfWork(context: Omit<ServiceContext, 'repositories'>): UnitOfWork {
     return async <T>(
          work: (services: OrderServices) => Promise<OperationResult<T>>
     ): Promise<OperationResult<T>> => {
          try {
               return await withTransaction(async (client) => {
                    const result = await work(
                         createOrderServices({ ...context, repositories: createPgRepositories(client) })
                    );
                    if (!result.succeeded) {
                         throw new RollbackRequested(result.error);
                    }
                    return result;
               });
          } catch (err) {
               if (err instanceof RollbackRequested) {
                    return fail(err.failure);
               }
               throw err;
          }
     };
}
