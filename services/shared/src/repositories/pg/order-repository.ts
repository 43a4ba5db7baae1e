import type { PoolClient } from 'pg';
import type { BuyerOrderFilter, Order, Page } from '../../types/order.types';
import type { OrderRepository } from '../types';
import { ConcurrencyConflictError } from '../../utils/errors';
import { hydrateOrders, nullable, OrderRow } from './rows';

export class PgOrderRepository implements OrderRepository {
     constructor(private readonly client: PoolClient) {}

     async getById(orderId: string): Promise<Order | undefined> {
          const { rows } = await this.client.query<OrderRow>(
               'SELECT * FROM orders WHERE id = $1',
               [orderId]
          );
          const [order] = await hydrateOrders(this.client, rows);
          return order;
     }

     async getByPaymentTransactionId(paymentTransactionId: string): Promise<Order | undefined> {
          const { rows } = await this.client.query<OrderRow>(
               `
        SELECT *
        FROM orders
        WHERE payment_transaction_id = $1
        ORDER BY created_at DESC
        LIMIT 1
      `,
               [paymentTransactionId]
          );
          const [order] = await hydrateOrders(this.client, rows);
          return order;
     }

     async getByBuyerId(buyerId: string): Promise<Order[]> {
          const { rows } = await this.client.query<OrderRow>(
               'SELECT * FROM orders WHERE buyer_id = $1 ORDER BY created_at DESC',
               [buyerId]
          );
          return hydrateOrders(this.client, rows);
     }

     async findForBuyer(filter: BuyerOrderFilter): Promise<Page<Order>> {
          const conditions = ['o.buyer_id = $1'];
          const params: unknown[] = [filter.buyerId];

          if (filter.statuses && filter.statuses.length > 0) {
               params.push(filter.statuses);
               conditions.push(`o.status = ANY($${params.length}::text[])`);
          }
          if (filter.fromDate) {
               params.push(filter.fromDate);
               conditions.push(`o.created_at >= $${params.length}`);
          }
          if (filter.toDate) {
               params.push(filter.toDate);
               conditions.push(`o.created_at <= $${params.length}`);
          }
          if (filter.storeId) {
               params.push(filter.storeId);
               conditions.push(
                    `EXISTS (SELECT 1 FROM seller_sub_orders s WHERE s.order_id = o.id AND s.store_id = $${params.length})`
               );
          }

          const where = conditions.join(' AND ');

          const { rows: countRows } = await this.client.query<{ total: string }>(
               `SELECT COUNT(*) AS total FROM orders o WHERE ${where}`,
               params
          );

          const { rows } = await this.client.query<OrderRow>(
               `
        SELECT o.*
        FROM orders o
        WHERE ${where}
        ORDER BY o.created_at DESC
        LIMIT $${params.length + 1} OFFSET $${params.length + 2}
      `,
               [...params, filter.pageSize, (filter.page - 1) * filter.pageSize]
          );

          return {
               items: await hydrateOrders(this.client, rows),
               totalCount: parseInt(countRows[0]?.total ?? '0', 10),
               page: filter.page,
               pageSize: filter.pageSize,
          };
     }

     async add(order: Order): Promise<void> {
          await this.client.query(
               `
        INSERT INTO orders (
          id, buyer_id, buyer_email, order_number, status,
          payment_transaction_id, payment_method_name,
          items_subtotal, shipping_total, total_amount, delivery_address,
          created_at, last_updated_at, confirmed_at, failed_at, refunded_at, version
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11::jsonb, $12, $13, $14, $15, $16, $17)
      `,
               [
                    order.id,
                    order.buyerId,
                    nullable(order.buyerEmail),
                    order.orderNumber,
                    order.status,
                    order.paymentTransactionId,
                    nullable(order.paymentMethodName),
                    order.itemsSubtotal,
                    order.shippingTotal,
                    order.totalAmount,
                    JSON.stringify(order.deliveryAddress),
                    order.createdAt,
                    order.lastUpdatedAt,
                    nullable(order.confirmedAt),
                    nullable(order.failedAt),
                    nullable(order.refundedAt),
                    order.version,
               ]
          );

          for (const [position, item] of order.items.entries()) {
               await this.client.query(
                    `
          INSERT INTO order_items (
            id, order_id, position, product_id, product_title,
            store_id, store_name, unit_price, quantity, created_at
          ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
        `,
                    [
                         item.id,
                         order.id,
                         position,
                         item.productId,
                         item.productTitle,
                         item.storeId,
                         item.storeName,
                         item.unitPrice,
                         item.quantity,
                         item.createdAt,
                    ]
               );
          }

          for (const subOrder of order.subOrders) {
               await this.client.query(
                    `
          INSERT INTO seller_sub_orders (
            id, order_id, store_id, store_name, sequence, sub_order_number, status,
            items_subtotal, shipping_cost, total_amount, shipping_method_name,
            created_at, last_updated_at, version
          ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)
        `,
                    [
                         subOrder.id,
                         order.id,
                         subOrder.storeId,
                         subOrder.storeName,
                         subOrder.sequence,
                         subOrder.subOrderNumber,
                         subOrder.status,
                         subOrder.itemsSubtotal,
                         subOrder.shippingCost,
                         subOrder.totalAmount,
                         nullable(subOrder.shippingMethodName),
                         subOrder.createdAt,
                         subOrder.lastUpdatedAt,
                         subOrder.version,
                    ]
               );

               for (const [position, item] of subOrder.items.entries()) {
                    await this.client.query(
                         `
            INSERT INTO seller_sub_order_items (
              id, sub_order_id, position, product_id, product_title,
              unit_price, quantity, status, created_at, last_updated_at
            ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
          `,
                         [
                              item.id,
                              subOrder.id,
                              position,
                              item.productId,
                              item.productTitle,
                              item.unitPrice,
                              item.quantity,
                              item.status,
                              item.createdAt,
                              item.lastUpdatedAt,
                         ]
                    );
               }
          }
     }

     async update(order: Order): Promise<void> {
          await this.updateHeader(order);

          for (const subOrder of order.subOrders) {
               const result = await this.client.query(
                    `
          UPDATE seller_sub_orders
          SET status = $3,
              confirmed_at = $4,
              failed_at = $5,
              last_updated_at = $6,
              version = version + 1
          WHERE id = $1 AND version = $2
        `,
                    [
                         subOrder.id,
                         subOrder.version,
                         subOrder.status,
                         nullable(subOrder.confirmedAt),
                         nullable(subOrder.failedAt),
                         subOrder.lastUpdatedAt,
                    ]
               );

               if (result.rowCount === 0) {
                    throw new ConcurrencyConflictError('SubOrder', subOrder.id);
               }
               subOrder.version += 1;
          }
     }

     async updateHeader(order: Order): Promise<void> {
          const result = await this.client.query(
               `
        UPDATE orders
        SET status = $3,
            confirmed_at = $4,
            failed_at = $5,
            refunded_at = $6,
            last_updated_at = $7,
            version = version + 1
        WHERE id = $1 AND version = $2
      `,
               [
                    order.id,
                    order.version,
                    order.status,
                    nullable(order.confirmedAt),
                    nullable(order.failedAt),
                    nullable(order.refundedAt),
                    order.lastUpdatedAt,
               ]
          );

          if (result.rowCount === 0) {
               throw new ConcurrencyConflictError('Order', order.id);
          }
          order.version += 1;
     }
}
