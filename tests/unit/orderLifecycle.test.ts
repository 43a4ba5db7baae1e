import {
     BUYER_ID,
     checkout,
     createHarness,
     expectOk,
     Harness,
     placeOrder,
     T0,
} from '../helpers/fixtures';

describe('OrderLifecycleCoordinator (Unit)', () => {
     let harness: Harness;

     beforeEach(() => {
          harness = createHarness();
     });

     describe('placeOrder', () => {
          it('should persist the order with its sub-orders', async () => {
               const placed = expectOk(await harness.services.orders.placeOrder(checkout()));

               expect(placed).toEqual({
                    orderId: '00000000-0000-4000-8000-000000000001',
                    orderNumber: 'ORD-00000000',
               });
               const stored = await harness.repositories.orders.getById(placed.orderId);
               expect(stored?.buyerId).toBe(BUYER_ID);
               expect(stored?.subOrders).toHaveLength(2);
          });

          it('should persist nothing when the checkout is invalid', async () => {
               const result = await harness.services.orders.placeOrder(checkout({ items: [] }));

               expect(result.succeeded).toBe(false);
               expect(harness.store.orders.size).toBe(0);
          });
     });

     describe('applyPaymentOutcome', () => {
          it('should mark the order and every sub-order paid', async () => {
               const order = await placeOrder(harness);
               harness.clock.advanceDays(1);

               const paid = expectOk(await harness.services.orders.applyPaymentOutcome(order.id, true));

               const paidAt = new Date(T0.getTime() + 24 * 60 * 60 * 1000);
               expect(paid.status).toBe('PAID');
               expect(paid.confirmedAt).toEqual(paidAt);
               expect(paid.subOrders.map((subOrder) => subOrder.status)).toEqual(['PAID', 'PAID']);
               expect(paid.subOrders.map((subOrder) => subOrder.confirmedAt)).toEqual([paidAt, paidAt]);

               const stored = await harness.repositories.orders.getById(order.id);
               expect(stored?.status).toBe('PAID');
               expect(stored?.version).toBe(2);
               expect(stored?.subOrders.map((subOrder) => subOrder.status)).toEqual(['PAID', 'PAID']);
          });

          it('should mark the order and every sub-order failed', async () => {
               const order = await placeOrder(harness);

               const failed = expectOk(await harness.services.orders.applyPaymentOutcome(order.id, false));

               expect(failed.status).toBe('FAILED');
               expect(failed.failedAt).toEqual(T0);
               expect(failed.subOrders.every((subOrder) => subOrder.status === 'FAILED')).toBe(true);

               const stored = await harness.repositories.orders.getById(order.id);
               expect(stored?.subOrders.map((subOrder) => subOrder.status)).toEqual(['FAILED', 'FAILED']);
               expect(stored?.subOrders.map((subOrder) => subOrder.failedAt)).toEqual([T0, T0]);
          });

          it('should reject payment once a sub-order has left NEW', async () => {
               const order = await placeOrder(harness);
               const cancelled = order.subOrders[0];
               expectOk(
                    await harness.services.subOrders.applySubOrderTransition(
                         cancelled.id,
                         cancelled.storeId,
                         { newStatus: 'CANCELLED' }
                    )
               );

               const result = await harness.services.orders.applyPaymentOutcome(order.id, false);

               expect(result.succeeded).toBe(false);
               if (!result.succeeded) {
                    expect(result.error.code).toBe('INVALID_STATE_TRANSITION');
                    expect(result.error.message).toBe(
                         `Cannot transition sub-order ${cancelled.subOrderNumber} from CANCELLED to FAILED.`
                    );
               }
               const stored = await harness.repositories.orders.getById(order.id);
               expect(stored?.status).toBe('NEW');
          });

          it('should keep item statuses untouched', async () => {
               const order = await placeOrder(harness);

               await harness.services.orders.applyPaymentOutcome(order.id, true);

               const stored = await harness.repositories.orders.getById(order.id);
               const itemStatuses = stored?.subOrders.flatMap((subOrder) =>
                    subOrder.items.map((item) => item.status)
               );
               expect(itemStatuses).toEqual(['NEW', 'NEW', 'NEW']);
          });

          it('should reject a second payment outcome', async () => {
               const order = await placeOrder(harness);
               await harness.services.orders.applyPaymentOutcome(order.id, true);

               const result = await harness.services.orders.applyPaymentOutcome(order.id, false);

               expect(result.succeeded).toBe(false);
               if (!result.succeeded) {
                    expect(result.error.code).toBe('INVALID_STATE_TRANSITION');
                    expect(result.error.message).toBe(
                         "Cannot process payment for order in status 'PAID'. Order must be in 'NEW' status."
                    );
               }
          });

          it('should change nothing when one sub-order cannot follow', async () => {
               const order = await placeOrder(harness);
               const stored = harness.store.orders.get(order.id);
               if (!stored) throw new Error('order missing');
               stored.subOrders[1].status = 'CANCELLED';

               const result = await harness.services.orders.applyPaymentOutcome(order.id, true);

               expect(result.succeeded).toBe(false);
               if (!result.succeeded) {
                    expect(result.error.message).toBe(
                         'Cannot transition sub-order ORD-00000000-S2 from CANCELLED to PAID.'
                    );
               }
               const after = await harness.repositories.orders.getById(order.id);
               expect(after?.status).toBe('NEW');
               expect(after?.subOrders[0].status).toBe('NEW');
          });

          it('should report an unknown order', async () => {
               const result = await harness.services.orders.applyPaymentOutcome('missing-order', true);

               expect(result.succeeded).toBe(false);
               if (!result.succeeded) {
                    expect(result.error.code).toBe('NOT_FOUND');
                    expect(result.error.message).toBe('Order missing-order not found');
               }
          });

          it('should turn a stale write into a concurrency conflict', async () => {
               const order = await placeOrder(harness);
               jest.spyOn(harness.repositories.orders, 'getById').mockResolvedValueOnce({
                    ...order,
                    version: 0,
               });

               const result = await harness.services.orders.applyPaymentOutcome(order.id, true);

               expect(result.succeeded).toBe(false);
               if (!result.succeeded) {
                    expect(result.error.code).toBe('CONCURRENCY_CONFLICT');
                    expect(result.error.statusCode).toBe(409);
               }
          });
     });

     describe('sendOrderConfirmation', () => {
          it('should hand the order to the notification service', async () => {
               const order = await placeOrder(harness);

               const result = await harness.services.orders.sendOrderConfirmation(
                    order.id,
                    'buyer@example.com'
               );

               expect(result.succeeded).toBe(true);
               expect(harness.notifications.confirmations).toEqual([
                    { orderId: order.id, buyerEmail: 'buyer@example.com' },
               ]);
          });

          it('should require an email address', async () => {
               const order = await placeOrder(harness);

               const result = await harness.services.orders.sendOrderConfirmation(order.id, '  ');

               expect(result.succeeded).toBe(false);
               if (!result.succeeded) {
                    expect(result.error.errors).toEqual(['Buyer email is required.']);
               }
          });

          it('should surface notification failures', async () => {
               const order = await placeOrder(harness);
               harness.notifications.failure = 'Broker unavailable';

               const result = await harness.services.orders.sendOrderConfirmation(
                    order.id,
                    'buyer@example.com'
               );

               expect(result.succeeded).toBe(false);
               if (!result.succeeded) {
                    expect(result.error.code).toBe('COLLABORATOR_FAILURE');
                    expect(result.error.errors).toEqual(['Broker unavailable']);
               }
          });
     });
});
