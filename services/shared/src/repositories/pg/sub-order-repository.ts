import type { PoolClient } from 'pg';
import type { Page, SellerSubOrder, SellerSubOrderFilter } from '../../types/order.types';
import type { SubOrderRepository } from '../types';
import { ConcurrencyConflictError } from '../../utils/errors';
import { hydrateSubOrders, nullable, SubOrderRow } from './rows';

export class PgSubOrderRepository implements SubOrderRepository {
     constructor(private readonly client: PoolClient) {}

     async getById(subOrderId: string): Promise<SellerSubOrder | undefined> {
          const { rows } = await this.client.query<SubOrderRow>(
               'SELECT * FROM seller_sub_orders WHERE id = $1',
               [subOrderId]
          );
          const [subOrder] = await hydrateSubOrders(this.client, rows);
          return subOrder;
     }

     async getByStoreId(storeId: string): Promise<SellerSubOrder[]> {
          const { rows } = await this.client.query<SubOrderRow>(
               'SELECT * FROM seller_sub_orders WHERE store_id = $1 ORDER BY created_at DESC',
               [storeId]
          );
          return hydrateSubOrders(this.client, rows);
     }

     async findForStore(filter: SellerSubOrderFilter): Promise<Page<SellerSubOrder>> {
          const conditions = ['s.store_id = $1'];
          const params: unknown[] = [filter.storeId];

          if (filter.statuses && filter.statuses.length > 0) {
               params.push(filter.statuses);
               conditions.push(`s.status = ANY($${params.length}::text[])`);
          }
          if (filter.fromDate) {
               params.push(filter.fromDate);
               conditions.push(`s.created_at >= $${params.length}`);
          }
          if (filter.toDate) {
               params.push(filter.toDate);
               conditions.push(`s.created_at <= $${params.length}`);
          }
          if (filter.buyerSearchTerm) {
               params.push(`%${filter.buyerSearchTerm}%`);
               conditions.push(
                    `(o.buyer_id ILIKE $${params.length}
                      OR o.buyer_email ILIKE $${params.length}
                      OR o.delivery_address->>'fullName' ILIKE $${params.length})`
               );
          }

          const where = conditions.join(' AND ');

          const { rows: countRows } = await this.client.query<{ total: string }>(
               `
        SELECT COUNT(*) AS total
        FROM seller_sub_orders s
        JOIN orders o ON o.id = s.order_id
        WHERE ${where}
      `,
               params
          );

          const { rows } = await this.client.query<SubOrderRow>(
               `
        SELECT s.*
        FROM seller_sub_orders s
        JOIN orders o ON o.id = s.order_id
        WHERE ${where}
        ORDER BY s.created_at DESC
        LIMIT $${params.length + 1} OFFSET $${params.length + 2}
      `,
               [...params, filter.pageSize, (filter.page - 1) * filter.pageSize]
          );

          return {
               items: await hydrateSubOrders(this.client, rows),
               totalCount: parseInt(countRows[0]?.total ?? '0', 10),
               page: filter.page,
               pageSize: filter.pageSize,
          };
     }

     async update(subOrder: SellerSubOrder): Promise<void> {
          const result = await this.client.query(
               `
        UPDATE seller_sub_orders
        SET status = $3,
            tracking_number = $4,
            shipping_carrier = $5,
            confirmed_at = $6,
            failed_at = $7,
            shipped_at = $8,
            delivered_at = $9,
            cancelled_at = $10,
            refunded_at = $11,
            last_updated_at = $12,
            version = version + 1
        WHERE id = $1 AND version = $2
      `,
               [
                    subOrder.id,
                    subOrder.version,
                    subOrder.status,
                    nullable(subOrder.trackingNumber),
                    nullable(subOrder.shippingCarrier),
                    nullable(subOrder.confirmedAt),
                    nullable(subOrder.failedAt),
                    nullable(subOrder.shippedAt),
                    nullable(subOrder.deliveredAt),
                    nullable(subOrder.cancelledAt),
                    nullable(subOrder.refundedAt),
                    subOrder.lastUpdatedAt,
               ]
          );

          if (result.rowCount === 0) {
               throw new ConcurrencyConflictError('SubOrder', subOrder.id);
          }

          for (const item of subOrder.items) {
               await this.client.query(
                    `
          UPDATE seller_sub_order_items
          SET status = $2,
              preparing_at = $3,
              shipped_at = $4,
              delivered_at = $5,
              cancelled_at = $6,
              last_updated_at = $7
          WHERE id = $1
        `,
                    [
                         item.id,
                         item.status,
                         nullable(item.preparingAt),
                         nullable(item.shippedAt),
                         nullable(item.deliveredAt),
                         nullable(item.cancelledAt),
                         item.lastUpdatedAt,
                    ]
               );
          }

          subOrder.version += 1;
     }
}
