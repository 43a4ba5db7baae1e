import type { ItemStatus, SubOrderStatus } from '../types/order.types';

/**
 * Derive a sub-order status from the full set of its item statuses.
 *
 * Precedence, first match wins:
 *  1. every item CANCELLED                       -> CANCELLED
 *  2. every non-cancelled item DELIVERED          -> DELIVERED
 *  3. any non-cancelled item SHIPPED or DELIVERED -> SHIPPED
 *  4. any item PREPARING                          -> PREPARING
 *
 * Returns undefined when the items carry no signal (all NEW, or NEW mixed
 * with CANCELLED), leaving the sub-order status as it is.
 */
export function deriveSubOrderStatus(
     itemStatuses: readonly ItemStatus[]
): SubOrderStatus | undefined {
     if (itemStatuses.length === 0) {
          return undefined;
     }

     if (itemStatuses.every((status) => status === 'CANCELLED')) {
          return 'CANCELLED';
     }

     const active = itemStatuses.filter((status) => status !== 'CANCELLED');

     if (active.every((status) => status === 'DELIVERED')) {
          return 'DELIVERED';
     }

     if (active.some((status) => status === 'SHIPPED' || status === 'DELIVERED')) {
          return 'SHIPPED';
     }

     if (active.some((status) => status === 'PREPARING')) {
          return 'PREPARING';
     }

     return undefined;
}

/**
 * Item statuses implied by an explicit sub-order transition, so that the
 * derived status of the items agrees with the sub-order afterwards.
 * Returns undefined when the item keeps its status.
 */
export function itemStatusForSubOrderTransition(
     subOrderStatus: SubOrderStatus,
     itemStatus: ItemStatus
): ItemStatus | undefined {
     switch (subOrderStatus) {
          case 'PREPARING':
               return itemStatus === 'NEW' ? 'PREPARING' : undefined;
          case 'SHIPPED':
               return itemStatus === 'NEW' || itemStatus === 'PREPARING' ? 'SHIPPED' : undefined;
          case 'DELIVERED':
               return itemStatus === 'SHIPPED' ? 'DELIVERED' : undefined;
          case 'CANCELLED':
               return itemStatus === 'NEW' || itemStatus === 'PREPARING' ? 'CANCELLED' : undefined;
          default:
               return undefined;
     }
}
