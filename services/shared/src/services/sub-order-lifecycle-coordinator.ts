import type { OrderRepository, SubOrderRepository } from '../repositories/types';
import type {
     CancelledItemsRefund,
     ItemStatusUpdatesCommand,
     SellerSubOrder,
     SubOrderStatus,
     SubOrderTransitionCommand,
     TrackingInfoCommand,
} from '../types/order.types';
import { lineTotal, sumMoney } from '../domain/money';
import {
     deriveSubOrderStatus,
     itemStatusForSubOrderTransition,
} from '../domain/status-derivation';
import { stampItemStatus, stampSubOrderStatus } from '../domain/status-stamps';
import { canTransitionItem, canTransitionSubOrder } from '../domain/status-transitions';
import type { Clock } from '../utils/clock';
import {
     BusinessRuleError,
     InvalidStateTransitionError,
     NotAuthorizedError,
     NotFoundError,
     ValidationError,
} from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import { fail, ok, OperationResult, runOperation } from '../utils/result';
import type { AuditTrailRecorder } from './audit-trail-recorder';
import type { NotificationService } from './notification-service';
import type { ParentRefundCascade } from './parent-refund-cascade';

export interface SubOrderLifecycleDependencies {
     subOrders: SubOrderRepository;
     orders: OrderRepository;
     audit: AuditTrailRecorder;
     notifications: NotificationService;
     refundCascade: ParentRefundCascade;
     clock: Clock;
     generateId: () => string;
}

const ITEM_UPDATABLE_STATUSES: readonly SubOrderStatus[] = ['PAID', 'PREPARING'];

function isBlank(value: string | undefined): boolean {
     return value === undefined || value.trim() === '';
}

export class SubOrderLifecycleCoordinator {
     private log = createChildLogger({ component: 'sub-order-lifecycle' });

     constructor(private readonly deps: SubOrderLifecycleDependencies) {}

     /**
      * Seller-driven transition of a whole sub-order. Item statuses follow the
      * sub-order so that deriving from the items afterwards yields the same
      * status.
      */
     async applySubOrderTransition(
          subOrderId: string,
          storeId: string,
          command: SubOrderTransitionCommand
     ): Promise<OperationResult<SellerSubOrder>> {
          return runOperation<SellerSubOrder>(
               this.log,
               { subOrderId, storeId, newStatus: command.newStatus },
               'Failed to update sub-order status',
               async () => {
                    const errors: string[] = [];
                    if (isBlank(storeId)) errors.push('Store ID is required.');
                    if (command.newStatus === 'SHIPPED') {
                         if (isBlank(command.trackingNumber)) {
                              errors.push('Tracking number is required when marking a sub-order as shipped.');
                         }
                         if (isBlank(command.shippingCarrier)) {
                              errors.push('Shipping carrier is required when marking a sub-order as shipped.');
                         }
                    }
                    if (errors.length > 0) {
                         return fail(new ValidationError(errors));
                    }

                    const loaded = await this.loadOwnedSubOrder(subOrderId, storeId);
                    if (!loaded.succeeded) {
                         return loaded;
                    }
                    const subOrder = loaded.value;

                    const previousStatus = subOrder.status;
                    if (!canTransitionSubOrder(previousStatus, command.newStatus)) {
                         return fail(
                              new InvalidStateTransitionError(
                                   `Cannot transition from ${previousStatus} to ${command.newStatus}.`,
                                   previousStatus,
                                   command.newStatus
                              )
                         );
                    }

                    const now = this.deps.clock.now();
                    stampSubOrderStatus(subOrder, command.newStatus, now);
                    if (command.newStatus === 'SHIPPED') {
                         subOrder.trackingNumber = command.trackingNumber;
                         subOrder.shippingCarrier = command.shippingCarrier;
                    }

                    for (const item of subOrder.items) {
                         const itemStatus = itemStatusForSubOrderTransition(command.newStatus, item.status);
                         if (itemStatus) {
                              stampItemStatus(item, itemStatus, now);
                         }
                    }

                    await this.deps.subOrders.update(subOrder);

                    if (command.newStatus === 'REFUNDED') {
                         await this.deps.refundCascade.apply(subOrder, now);
                    }

                    await this.deps.audit.record({
                         id: this.deps.generateId(),
                         subOrderId: subOrder.id,
                         previousStatus,
                         newStatus: command.newStatus,
                         changedAt: now,
                         trackingNumber: command.trackingNumber,
                         shippingCarrier: command.shippingCarrier,
                    });

                    if (command.newStatus === 'SHIPPED') {
                         await this.notifyShipped(subOrder);
                    }

                    this.log.info(
                         {
                              subOrderNumber: subOrder.subOrderNumber,
                              previousStatus,
                              status: subOrder.status,
                         },
                         'Sub-order status updated'
                    );

                    return ok(subOrder);
               }
          );
     }

     /**
      * Applies item transitions in order, then re-derives the sub-order status
      * from the complete item set.
      */
     async applyItemStatusUpdates(
          subOrderId: string,
          storeId: string,
          command: ItemStatusUpdatesCommand
     ): Promise<OperationResult<SellerSubOrder>> {
          return runOperation<SellerSubOrder>(
               this.log,
               { subOrderId, storeId, updateCount: command.updates.length },
               'Failed to update item statuses',
               async () => {
                    const errors: string[] = [];
                    if (isBlank(storeId)) errors.push('Store ID is required.');
                    if (command.updates.length === 0) {
                         errors.push('At least one item update is required.');
                    }
                    if (command.updates.some((update) => isBlank(update.itemId))) {
                         errors.push('Item ID is required for each update.');
                    }
                    if (errors.length > 0) {
                         return fail(new ValidationError(errors));
                    }

                    const loaded = await this.loadOwnedSubOrder(subOrderId, storeId);
                    if (!loaded.succeeded) {
                         return loaded;
                    }
                    const subOrder = loaded.value;

                    if (!ITEM_UPDATABLE_STATUSES.includes(subOrder.status)) {
                         return fail(
                              new BusinessRuleError(
                                   'Item statuses can only be updated when sub-order is in PAID or PREPARING status.',
                                   'INVALID_SUB_ORDER_STATUS'
                              )
                         );
                    }

                    const now = this.deps.clock.now();
                    const itemsById = new Map(subOrder.items.map((item) => [item.id, item]));

                    for (const update of command.updates) {
                         const item = itemsById.get(update.itemId);
                         if (!item) {
                              return fail(
                                   new ValidationError([`Item ${update.itemId} not found in sub-order.`])
                              );
                         }

                         if (!canTransitionItem(item.status, update.newStatus)) {
                              return fail(
                                   new InvalidStateTransitionError(
                                        `Cannot transition item from ${item.status} to ${update.newStatus}.`,
                                        item.status,
                                        update.newStatus
                                   )
                              );
                         }

                         stampItemStatus(item, update.newStatus, now);
                    }

                    const previousStatus = subOrder.status;
                    const derived = deriveSubOrderStatus(subOrder.items.map((item) => item.status));
                    const changedTo = derived !== previousStatus ? derived : undefined;

                    if (changedTo) {
                         stampSubOrderStatus(subOrder, changedTo, now);
                         if (changedTo === 'SHIPPED') {
                              subOrder.trackingNumber = command.trackingNumber;
                              subOrder.shippingCarrier = command.shippingCarrier;
                         }
                    } else {
                         subOrder.lastUpdatedAt = now;
                    }

                    await this.deps.subOrders.update(subOrder);

                    if (changedTo) {
                         await this.deps.audit.record({
                              id: this.deps.generateId(),
                              subOrderId: subOrder.id,
                              previousStatus,
                              newStatus: changedTo,
                              changedAt: now,
                              trackingNumber: subOrder.trackingNumber,
                              shippingCarrier: subOrder.shippingCarrier,
                              notes: 'Derived from item status updates',
                         });

                         if (changedTo === 'SHIPPED') {
                              await this.notifyShipped(subOrder);
                         }
                    }

                    this.log.info(
                         {
                              subOrderNumber: subOrder.subOrderNumber,
                              itemCount: command.updates.length,
                              previousStatus,
                              status: subOrder.status,
                         },
                         'Sub-order item statuses updated'
                    );

                    return ok(subOrder);
               }
          );
     }

     async updateTrackingInfo(
          subOrderId: string,
          storeId: string,
          command: TrackingInfoCommand
     ): Promise<OperationResult<SellerSubOrder>> {
          return runOperation<SellerSubOrder>(
               this.log,
               { subOrderId, storeId },
               'Failed to update tracking information',
               async () => {
                    const errors: string[] = [];
                    if (isBlank(storeId)) errors.push('Store ID is required.');
                    if (isBlank(command.trackingNumber)) errors.push('Tracking number is required.');
                    if (isBlank(command.shippingCarrier)) errors.push('Shipping carrier is required.');
                    if (errors.length > 0) {
                         return fail(new ValidationError(errors));
                    }

                    const loaded = await this.loadOwnedSubOrder(subOrderId, storeId);
                    if (!loaded.succeeded) {
                         return loaded;
                    }
                    const subOrder = loaded.value;

                    if (subOrder.status !== 'SHIPPED') {
                         return fail(
                              new BusinessRuleError(
                                   'Tracking information can only be updated for shipped orders.',
                                   'INVALID_SUB_ORDER_STATUS'
                              )
                         );
                    }

                    subOrder.trackingNumber = command.trackingNumber;
                    subOrder.shippingCarrier = command.shippingCarrier;
                    subOrder.lastUpdatedAt = this.deps.clock.now();

                    await this.deps.subOrders.update(subOrder);

                    this.log.info(
                         {
                              subOrderNumber: subOrder.subOrderNumber,
                              shippingCarrier: command.shippingCarrier,
                              trackingNumber: command.trackingNumber,
                         },
                         'Tracking information updated'
                    );

                    return ok(subOrder);
               }
          );
     }

     async calculateCancelledItemsRefund(
          subOrderId: string,
          storeId: string
     ): Promise<OperationResult<CancelledItemsRefund>> {
          return runOperation<CancelledItemsRefund>(
               this.log,
               { subOrderId, storeId },
               'Failed to calculate cancelled items refund',
               async () => {
                    if (isBlank(storeId)) {
                         return fail(new ValidationError(['Store ID is required.']));
                    }

                    const loaded = await this.loadOwnedSubOrder(subOrderId, storeId);
                    if (!loaded.succeeded) {
                         return loaded;
                    }

                    const items = loaded.value.items
                         .filter((item) => item.status === 'CANCELLED')
                         .map((item) => ({
                              itemId: item.id,
                              productTitle: item.productTitle,
                              quantity: item.quantity,
                              unitPrice: item.unitPrice,
                              refundAmount: lineTotal(item.unitPrice, item.quantity),
                              cancelledAt: item.cancelledAt,
                         }));

                    return ok({
                         totalRefundAmount: sumMoney(items.map((item) => item.refundAmount)),
                         items,
                    });
               }
          );
     }

     private async loadOwnedSubOrder(
          subOrderId: string,
          storeId: string
     ): Promise<OperationResult<SellerSubOrder>> {
          const subOrder = await this.deps.subOrders.getById(subOrderId);
          if (!subOrder) {
               return fail(new NotFoundError('SubOrder', subOrderId));
          }
          if (subOrder.storeId !== storeId) {
               return fail(new NotAuthorizedError('You are not authorized to manage this sub-order.'));
          }
          return ok(subOrder);
     }

     // Notification failures never fail the transition that triggered them
     private async notifyShipped(subOrder: SellerSubOrder): Promise<void> {
          try {
               const order = await this.deps.orders.getById(subOrder.orderId);
               if (!order) {
                    this.log.warn(
                         { subOrderId: subOrder.id, orderId: subOrder.orderId },
                         'Parent order not found, shipping notification skipped'
                    );
                    return;
               }

               const result = await this.deps.notifications.sendShippingNotification(subOrder, order);
               if (!result.succeeded) {
                    this.log.warn(
                         { subOrderNumber: subOrder.subOrderNumber, errors: result.errors },
                         'Failed to send shipping notification'
                    );
               }
          } catch (err) {
               this.log.warn(
                    { err, subOrderNumber: subOrder.subOrderNumber },
                    'Failed to send shipping notification'
               );
          }
     }
}
