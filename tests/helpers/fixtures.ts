import { RefundMockClient } from '@fulfillment/shared/src/clients/refund-client';
import { createOrderServices, OrderServices } from '@fulfillment/shared/src/services/container';
import type {
     NotificationResult,
     NotificationService,
} from '@fulfillment/shared/src/services/notification-service';
import type { Repositories } from '@fulfillment/shared/src/repositories/types';
import type {
     CheckoutLineItem,
     DeliveryAddress,
     Order,
     PlaceOrderCommand,
     SellerSubOrder,
} from '@fulfillment/shared/src/types/order.types';
import type { Clock } from '@fulfillment/shared/src/utils/clock';
import type { OperationResult } from '@fulfillment/shared/src/utils/result';
import { createInMemoryRepositories, InMemoryStore } from './inMemoryRepositories';

export const BUYER_ID = 'buyer-1';
export const STORE_A = 'store-a';
export const STORE_B = 'store-b';
export const T0 = new Date('2026-03-02T09:00:00.000Z');
export const DAY_MS = 24 * 60 * 60 * 1000;

/** Deterministic uuid-shaped ids: ...-000000000001, ...-000000000002, ... */
export function sequentialIds(): () => string {
     let next = 0;
     return () => {
          next += 1;
          return `00000000-0000-4000-8000-${next.toString().padStart(12, '0')}`;
     };
}

export class TestClock implements Clock {
     constructor(private current: Date = T0) {}

     now(): Date {
          return new Date(this.current.getTime());
     }

     set(instant: Date): void {
          this.current = instant;
     }

     advanceDays(days: number): void {
          this.current = new Date(this.current.getTime() + days * DAY_MS);
     }
}

export class RecordingNotificationService implements NotificationService {
     confirmations: Array<{ orderId: string; buyerEmail: string }> = [];
     shipped: string[] = [];
     failure?: string;

     async sendOrderConfirmation(order: Order, buyerEmail: string): Promise<NotificationResult> {
          if (this.failure) return { succeeded: false, errors: [this.failure] };
          this.confirmations.push({ orderId: order.id, buyerEmail });
          return { succeeded: true };
     }

     async sendShippingNotification(subOrder: SellerSubOrder): Promise<NotificationResult> {
          if (this.failure) return { succeeded: false, errors: [this.failure] };
          this.shipped.push(subOrder.id);
          return { succeeded: true };
     }
}

export function deliveryAddress(): DeliveryAddress {
     return {
          fullName: 'Dana Buyer',
          addressLine1: '1 Market Street',
          city: 'Springfield',
          postalCode: '12345',
          country: 'US',
     };
}

export function line(overrides: Partial<CheckoutLineItem> = {}): CheckoutLineItem {
     return {
          productId: 'product-1',
          productTitle: 'Ceramic Mug',
          storeId: STORE_A,
          storeName: 'Store A',
          unitPrice: 10,
          quantity: 1,
          ...overrides,
     };
}

/** Two lines from store A (10 x 2, 5 x 1) and one from store B (20 x 1). */
export function checkout(overrides: Partial<PlaceOrderCommand> = {}): PlaceOrderCommand {
     return {
          buyerId: BUYER_ID,
          buyerEmail: 'buyer@example.com',
          paymentTransactionId: 'txn-1',
          paymentMethodName: 'Card',
          shippingTotal: 30,
          deliveryAddress: deliveryAddress(),
          items: [
               line({ productId: 'mug', productTitle: 'Ceramic Mug', unitPrice: 10, quantity: 2 }),
               line({ productId: 'coaster', productTitle: 'Coaster', unitPrice: 5, quantity: 1 }),
               line({
                    productId: 'lamp',
                    productTitle: 'Desk Lamp',
                    storeId: STORE_B,
                    storeName: 'Store B',
                    unitPrice: 20,
                    quantity: 1,
               }),
          ],
          ...overrides,
     };
}

export function expectOk<T>(result: OperationResult<T>): T {
     if (!result.succeeded) {
          throw new Error(`Expected success, got ${result.error.code}: ${result.error.message}`);
     }
     return result.value;
}

export interface Harness {
     store: InMemoryStore;
     repositories: Repositories;
     refundClient: RefundMockClient;
     notifications: RecordingNotificationService;
     clock: TestClock;
     services: OrderServices;
     returnWindowDays: number;
}

export function createHarness(options: { returnWindowDays?: number } = {}): Harness {
     const store = new InMemoryStore();
     const repositories = createInMemoryRepositories(store);
     const refundClient = new RefundMockClient();
     const notifications = new RecordingNotificationService();
     const clock = new TestClock();
     const returnWindowDays = options.returnWindowDays ?? 30;

     const services = createOrderServices({
          repositories,
          refundClient,
          notifications,
          returnWindowDays,
          clock,
          generateId: sequentialIds(),
     });

     return { store, repositories, refundClient, notifications, clock, services, returnWindowDays };
}

/** Places the default checkout and returns the persisted order. */
export async function placeOrder(
     harness: Harness,
     command: PlaceOrderCommand = checkout()
): Promise<Order> {
     const placed = expectOk(await harness.services.orders.placeOrder(command));
     const order = await harness.repositories.orders.getById(placed.orderId);
     if (!order) {
          throw new Error(`Order ${placed.orderId} was not persisted`);
     }
     return order;
}

export async function placePaidOrder(harness: Harness, command?: PlaceOrderCommand): Promise<Order> {
     const order = await placeOrder(harness, command);
     return expectOk(await harness.services.orders.applyPaymentOutcome(order.id, true));
}

export function subOrderFor(order: Order, storeId: string): SellerSubOrder {
     const subOrder = order.subOrders.find((candidate) => candidate.storeId === storeId);
     if (!subOrder) {
          throw new Error(`No sub-order for ${storeId}`);
     }
     return subOrder;
}

/** Walks a paid sub-order through PREPARING, SHIPPED and DELIVERED. */
export async function deliverSubOrder(harness: Harness, subOrder: SellerSubOrder): Promise<SellerSubOrder> {
     const { subOrders } = harness.services;
     expectOk(await subOrders.applySubOrderTransition(subOrder.id, subOrder.storeId, { newStatus: 'PREPARING' }));
     expectOk(
          await subOrders.applySubOrderTransition(subOrder.id, subOrder.storeId, {
               newStatus: 'SHIPPED',
               trackingNumber: 'TRACK-1',
               shippingCarrier: 'UPS',
          })
     );
     return expectOk(
          await subOrders.applySubOrderTransition(subOrder.id, subOrder.storeId, { newStatus: 'DELIVERED' })
     );
}
