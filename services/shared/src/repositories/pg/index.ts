import type { PoolClient } from 'pg';
import type { Repositories } from '../types';
import { PgOrderRepository } from './order-repository';
import { PgReturnRequestRepository } from './return-request-repository';
import { PgShippingStatusHistoryRepository } from './shipping-history-repository';
import { PgSubOrderRepository } from './sub-order-repository';

export { PgOrderRepository, PgReturnRequestRepository, PgShippingStatusHistoryRepository, PgSubOrderRepository };

/** Repositories bound to one client, so they share its transaction. */
export function createPgRepositories(client: PoolClient): Repositories {
     return {
          orders: new PgOrderRepository(client),
          subOrders: new PgSubOrderRepository(client),
          returnRequests: new PgReturnRequestRepository(client),
          shippingHistory: new PgShippingStatusHistoryRepository(client),
     };
}
