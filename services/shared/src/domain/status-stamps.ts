import type {
     ItemStatus,
     SellerSubOrder,
     SellerSubOrderItem,
     SubOrderStatus,
} from '../types/order.types';

// Set a status together with the timestamp that records reaching it

export function stampSubOrderStatus(
     subOrder: SellerSubOrder,
     status: SubOrderStatus,
     now: Date
): void {
     subOrder.status = status;
     subOrder.lastUpdatedAt = now;

     switch (status) {
          case 'PAID':
               subOrder.confirmedAt = now;
               break;
          case 'FAILED':
               subOrder.failedAt = now;
               break;
          case 'SHIPPED':
               subOrder.shippedAt = now;
               break;
          case 'DELIVERED':
               subOrder.deliveredAt = now;
               break;
          case 'CANCELLED':
               subOrder.cancelledAt = now;
               break;
          case 'REFUNDED':
               subOrder.refundedAt = now;
               break;
     }
}

export function stampItemStatus(item: SellerSubOrderItem, status: ItemStatus, now: Date): void {
     item.status = status;
     item.lastUpdatedAt = now;

     switch (status) {
          case 'PREPARING':
               item.preparingAt = now;
               break;
          case 'SHIPPED':
               item.shippedAt = now;
               break;
          case 'DELIVERED':
               item.deliveredAt = now;
               break;
          case 'CANCELLED':
               item.cancelledAt = now;
               break;
     }
}
