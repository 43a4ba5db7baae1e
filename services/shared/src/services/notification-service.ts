import type { Order, SellerSubOrder } from '../types/order.types';
import { ORDER_NOTIFICATIONS_EXCHANGE, publishEvent } from '../messaging/client';
import { createChildLogger } from '../utils/logger';

export type NotificationResult = { succeeded: true } | { succeeded: false; errors: string[] };

export interface NotificationService {
     sendOrderConfirmation(order: Order, buyerEmail: string): Promise<NotificationResult>;
     sendShippingNotification(subOrder: SellerSubOrder, order: Order): Promise<NotificationResult>;
}

export type PublishFn = (
     exchange: string,
     routingKey: string,
     payload: Record<string, unknown>
) => Promise<void>;

export const ORDER_CONFIRMATION_ROUTING_KEY = 'notification.order.confirmation';
export const SHIPPING_NOTIFICATION_ROUTING_KEY = 'notification.sub-order.shipped';

/**
 * Publishes notification requests to the orders.notifications exchange; the
 * email worker renders and delivers them.
 */
export class AmqpNotificationService implements NotificationService {
     private log = createChildLogger({ component: 'notification-service' });

     constructor(private readonly publish: PublishFn = publishEvent) {}

     async sendOrderConfirmation(order: Order, buyerEmail: string): Promise<NotificationResult> {
          return this.send(ORDER_CONFIRMATION_ROUTING_KEY, {
               type: 'OrderConfirmation',
               recipient: buyerEmail,
               orderId: order.id,
               orderNumber: order.orderNumber,
               totalAmount: order.totalAmount,
               subOrders: order.subOrders.map((subOrder) => ({
                    subOrderNumber: subOrder.subOrderNumber,
                    storeName: subOrder.storeName,
                    totalAmount: subOrder.totalAmount,
               })),
          });
     }

     async sendShippingNotification(
          subOrder: SellerSubOrder,
          order: Order
     ): Promise<NotificationResult> {
          if (!order.buyerEmail) {
               return { succeeded: false, errors: ['Buyer email is not available.'] };
          }

          return this.send(SHIPPING_NOTIFICATION_ROUTING_KEY, {
               type: 'ShippingNotification',
               recipient: order.buyerEmail,
               orderId: order.id,
               orderNumber: order.orderNumber,
               subOrderId: subOrder.id,
               subOrderNumber: subOrder.subOrderNumber,
               storeName: subOrder.storeName,
               trackingNumber: subOrder.trackingNumber,
               shippingCarrier: subOrder.shippingCarrier,
          });
     }

     private async send(
          routingKey: string,
          payload: Record<string, unknown>
     ): Promise<NotificationResult> {
          try {
               await this.publish(ORDER_NOTIFICATIONS_EXCHANGE, routingKey, {
                    ...payload,
                    requestedAt: new Date().toISOString(),
               });
               this.log.info({ routingKey, orderId: payload.orderId }, 'Notification published');
               return { succeeded: true };
          } catch (err) {
               this.log.error({ err, routingKey }, 'Failed to publish notification');
               const message = err instanceof Error ? err.message : 'Unknown error';
               return { succeeded: false, errors: [`Failed to publish notification: ${message}`] };
          }
     }
}
