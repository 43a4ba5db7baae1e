import type { OrderRepository } from '../repositories/types';
import type { SellerSubOrder } from '../types/order.types';
import { canTransitionOrder } from '../domain/status-transitions';
import { createChildLogger } from '../utils/logger';

/**
 * Marks the parent order REFUNDED once its last non-refunded sub-order is
 * refunded. `subOrder` is the one just moved to REFUNDED; it counts as
 * refunded whatever state its persisted copy is in.
 */
export class ParentRefundCascade {
     private log = createChildLogger({ component: 'parent-refund-cascade' });

     constructor(private readonly orders: OrderRepository) {}

     async apply(subOrder: SellerSubOrder, now: Date): Promise<boolean> {
          const order = await this.orders.getById(subOrder.orderId);
          if (!order) {
               this.log.warn(
                    { subOrderId: subOrder.id, orderId: subOrder.orderId },
                    'Parent order not found for refunded sub-order'
               );
               return false;
          }

          const othersRefunded = order.subOrders
               .filter((sibling) => sibling.id !== subOrder.id)
               .every((sibling) => sibling.status === 'REFUNDED');

          if (!othersRefunded || !canTransitionOrder(order.status, 'REFUNDED')) {
               return false;
          }

          order.status = 'REFUNDED';
          order.refundedAt = now;
          order.lastUpdatedAt = now;
          await this.orders.updateHeader(order);

          this.log.info(
               { orderId: order.id, orderNumber: order.orderNumber },
               'All sub-orders refunded, order marked refunded'
          );
          return true;
     }
}
