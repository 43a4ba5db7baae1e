import type { PoolClient } from 'pg';
import type { ShippingStatusHistory } from '../../types/order.types';
import type { ShippingStatusHistoryRepository } from '../types';
import { mapShippingHistory, nullable, ShippingHistoryRow } from './rows';

const SAVEPOINT = 'shipping_history_insert';

export class PgShippingStatusHistoryRepository implements ShippingStatusHistoryRepository {
     constructor(private readonly client: PoolClient) {}

     /**
      * Inserts under a savepoint: a failed insert is rolled back on its own and
      * rethrown, and the surrounding transaction stays usable.
      */
     async add(entry: ShippingStatusHistory): Promise<void> {
          await this.client.query(`SAVEPOINT ${SAVEPOINT}`);
          try {
               await this.client.query(
                    `
          INSERT INTO shipping_status_history (
            id, sub_order_id, previous_status, new_status, changed_at,
            tracking_number, shipping_carrier, notes
          ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
        `,
                    [
                         entry.id,
                         entry.subOrderId,
                         nullable(entry.previousStatus),
                         entry.newStatus,
                         entry.changedAt,
                         nullable(entry.trackingNumber),
                         nullable(entry.shippingCarrier),
                         nullable(entry.notes),
                    ]
               );
               await this.client.query(`RELEASE SAVEPOINT ${SAVEPOINT}`);
          } catch (err) {
               await this.client.query(`ROLLBACK TO SAVEPOINT ${SAVEPOINT}`);
               throw err;
          }
     }

     async getBySubOrderId(subOrderId: string): Promise<ShippingStatusHistory[]> {
          const { rows } = await this.client.query<ShippingHistoryRow>(
               `
        SELECT *
        FROM shipping_status_history
        WHERE sub_order_id = $1
        ORDER BY changed_at ASC
      `,
               [subOrderId]
          );
          return rows.map(mapShippingHistory);
     }
}
