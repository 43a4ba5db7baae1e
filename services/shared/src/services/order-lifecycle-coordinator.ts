import type { OrderRepository } from '../repositories/types';
import type { Order, PlacedOrder, PlaceOrderCommand } from '../types/order.types';
import { canTransitionOrder } from '../domain/status-transitions';
import type { Clock } from '../utils/clock';
import {
     CollaboratorError,
     InvalidStateTransitionError,
     NotFoundError,
     ValidationError,
} from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import { fail, ok, OperationResult, runOperation } from '../utils/result';
import type { NotificationService } from './notification-service';
import { OrderAggregateBuilder } from './order-aggregate-builder';

export interface OrderLifecycleDependencies {
     orders: OrderRepository;
     notifications: NotificationService;
     builder: OrderAggregateBuilder;
     clock: Clock;
}

export class OrderLifecycleCoordinator {
     private log = createChildLogger({ component: 'order-lifecycle' });

     constructor(private readonly deps: OrderLifecycleDependencies) {}

     /**
      * Build the order aggregate from a checkout and persist it in one write
      */
     async placeOrder(command: PlaceOrderCommand): Promise<OperationResult<PlacedOrder>> {
          return runOperation<PlacedOrder>(
               this.log,
               { buyerId: command.buyerId, paymentTransactionId: command.paymentTransactionId },
               'Failed to place order',
               async () => {
                    const built = this.deps.builder.build(command);
                    if (!built.succeeded) {
                         return built;
                    }

                    const order = built.value;
                    await this.deps.orders.add(order);

                    this.log.info(
                         {
                              orderId: order.id,
                              orderNumber: order.orderNumber,
                              subOrderCount: order.subOrders.length,
                              totalAmount: order.totalAmount,
                         },
                         'Order placed'
                    );

                    return ok({ orderId: order.id, orderNumber: order.orderNumber });
               }
          );
     }

     /**
      * Apply the payment outcome to a NEW order and all of its sub-orders.
      * Either every status changes or nothing is persisted.
      */
     async applyPaymentOutcome(orderId: string, succeeded: boolean): Promise<OperationResult<Order>> {
          return runOperation<Order>(
               this.log,
               { orderId, paymentSucceeded: succeeded },
               'Failed to apply payment outcome',
               async () => {
                    const order = await this.deps.orders.getById(orderId);
                    if (!order) {
                         return fail(new NotFoundError('Order', orderId));
                    }

                    const target = succeeded ? 'PAID' : 'FAILED';

                    if (order.status !== 'NEW' || !canTransitionOrder(order.status, target)) {
                         return fail(
                              new InvalidStateTransitionError(
                                   `Cannot process payment for order in status '${order.status}'. Order must be in 'NEW' status.`,
                                   order.status,
                                   target
                              )
                         );
                    }

                    // Payment moves children directly; the seller transition table does not apply
                    const blocked = order.subOrders.find((subOrder) => subOrder.status !== 'NEW');
                    if (blocked) {
                         return fail(
                              new InvalidStateTransitionError(
                                   `Cannot transition sub-order ${blocked.subOrderNumber} from ${blocked.status} to ${target}.`,
                                   blocked.status,
                                   target
                              )
                         );
                    }

                    const now = this.deps.clock.now();

                    order.status = target;
                    order.lastUpdatedAt = now;
                    if (succeeded) {
                         order.confirmedAt = now;
                    } else {
                         order.failedAt = now;
                    }

                    for (const subOrder of order.subOrders) {
                         subOrder.status = target;
                         subOrder.lastUpdatedAt = now;
                         if (succeeded) {
                              subOrder.confirmedAt = now;
                         } else {
                              subOrder.failedAt = now;
                         }
                    }

                    await this.deps.orders.update(order);

                    this.log.info(
                         { orderId, status: order.status, subOrderCount: order.subOrders.length },
                         'Payment outcome applied'
                    );

                    return ok(order);
               }
          );
     }

     async sendOrderConfirmation(
          orderId: string,
          buyerEmail: string | undefined
     ): Promise<OperationResult<void>> {
          return runOperation<void>(
               this.log,
               { orderId },
               'Failed to send order confirmation',
               async () => {
                    if (!buyerEmail || buyerEmail.trim() === '') {
                         return fail(new ValidationError(['Buyer email is required.']));
                    }

                    const order = await this.deps.orders.getById(orderId);
                    if (!order) {
                         return fail(new NotFoundError('Order', orderId));
                    }

                    const result = await this.deps.notifications.sendOrderConfirmation(
                         order,
                         buyerEmail
                    );
                    if (!result.succeeded) {
                         return fail(new CollaboratorError('notifications', result.errors));
                    }

                    return ok(undefined);
               }
          );
     }
}
