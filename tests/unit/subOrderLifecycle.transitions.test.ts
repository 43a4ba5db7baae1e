import {
     createHarness,
     deliverSubOrder,
     expectOk,
     Harness,
     placeOrder,
     placePaidOrder,
     STORE_A,
     STORE_B,
     subOrderFor,
     T0,
} from '../helpers/fixtures';
import type { SellerSubOrder } from '@fulfillment/shared/src/types/order.types';

describe('SubOrderLifecycleCoordinator - Sub-order transitions (Unit)', () => {
     let harness: Harness;
     let subOrder: SellerSubOrder;

     beforeEach(async () => {
          harness = createHarness();
          const order = await placePaidOrder(harness);
          subOrder = subOrderFor(order, STORE_A);
     });

     describe('Validation and ownership', () => {
          it('should require tracking details to ship', async () => {
               const result = await harness.services.subOrders.applySubOrderTransition(
                    subOrder.id,
                    STORE_A,
                    { newStatus: 'SHIPPED' }
               );

               expect(result.succeeded).toBe(false);
               if (!result.succeeded) {
                    expect(result.error.errors).toEqual([
                         'Tracking number is required when marking a sub-order as shipped.',
                         'Shipping carrier is required when marking a sub-order as shipped.',
                    ]);
               }
          });

          it('should refuse another store', async () => {
               const result = await harness.services.subOrders.applySubOrderTransition(
                    subOrder.id,
                    STORE_B,
                    { newStatus: 'PREPARING' }
               );

               expect(result.succeeded).toBe(false);
               if (!result.succeeded) {
                    expect(result.error.code).toBe('NOT_AUTHORIZED');
                    expect(result.error.message).toBe('You are not authorized to manage this sub-order.');
               }
          });

          it('should report an unknown sub-order', async () => {
               const result = await harness.services.subOrders.applySubOrderTransition(
                    'missing-sub-order',
                    STORE_A,
                    { newStatus: 'PREPARING' }
               );

               expect(result.succeeded).toBe(false);
               if (!result.succeeded) {
                    expect(result.error.code).toBe('NOT_FOUND');
               }
          });

          it('should reject transitions outside the table', async () => {
               const result = await harness.services.subOrders.applySubOrderTransition(
                    subOrder.id,
                    STORE_A,
                    { newStatus: 'DELIVERED' }
               );

               expect(result.succeeded).toBe(false);
               if (!result.succeeded) {
                    expect(result.error.code).toBe('INVALID_STATE_TRANSITION');
                    expect(result.error.message).toBe('Cannot transition from PAID to DELIVERED.');
               }
          });
     });

     describe('Fulfillment path', () => {
          it('should move items into preparation with the sub-order', async () => {
               const preparing = expectOk(
                    await harness.services.subOrders.applySubOrderTransition(subOrder.id, STORE_A, {
                         newStatus: 'PREPARING',
                    })
               );

               expect(preparing.status).toBe('PREPARING');
               expect(preparing.items.map((item) => item.status)).toEqual(['PREPARING', 'PREPARING']);
               expect(preparing.items.every((item) => item.preparingAt?.getTime() === T0.getTime())).toBe(
                    true
               );
          });

          it('should record tracking and notify the buyer on shipping', async () => {
               await harness.services.subOrders.applySubOrderTransition(subOrder.id, STORE_A, {
                    newStatus: 'PREPARING',
               });

               const shipped = expectOk(
                    await harness.services.subOrders.applySubOrderTransition(subOrder.id, STORE_A, {
                         newStatus: 'SHIPPED',
                         trackingNumber: 'TRACK-1',
                         shippingCarrier: 'UPS',
                    })
               );

               expect(shipped).toMatchObject({
                    status: 'SHIPPED',
                    trackingNumber: 'TRACK-1',
                    shippingCarrier: 'UPS',
                    shippedAt: T0,
               });
               expect(shipped.items.map((item) => item.status)).toEqual(['SHIPPED', 'SHIPPED']);
               expect(harness.notifications.shipped).toEqual([subOrder.id]);
          });

          it('should write one history entry per transition, oldest first', async () => {
               await deliverSubOrder(harness, subOrder);

               const history = await harness.repositories.shippingHistory.getBySubOrderId(subOrder.id);
               expect(
                    history.map((entry) => [entry.previousStatus, entry.newStatus, entry.trackingNumber])
               ).toEqual([
                    ['PAID', 'PREPARING', undefined],
                    ['PREPARING', 'SHIPPED', 'TRACK-1'],
                    ['SHIPPED', 'DELIVERED', undefined],
               ]);
          });

          it('should deliver shipped items with the sub-order', async () => {
               const delivered = await deliverSubOrder(harness, subOrder);

               expect(delivered.status).toBe('DELIVERED');
               expect(delivered.deliveredAt).toEqual(T0);
               expect(delivered.items.map((item) => item.status)).toEqual(['DELIVERED', 'DELIVERED']);
          });

          it('should cancel every unshipped item with the sub-order', async () => {
               const cancelled = expectOk(
                    await harness.services.subOrders.applySubOrderTransition(subOrder.id, STORE_A, {
                         newStatus: 'CANCELLED',
                    })
               );

               expect(cancelled.cancelledAt).toEqual(T0);
               expect(cancelled.items.map((item) => item.status)).toEqual(['CANCELLED', 'CANCELLED']);
          });
     });

     describe('Side effects that never fail the transition', () => {
          it('should still succeed when the history write fails', async () => {
               jest.spyOn(harness.repositories.shippingHistory, 'add').mockRejectedValueOnce(
                    new Error('history table locked')
               );

               const result = await harness.services.subOrders.applySubOrderTransition(
                    subOrder.id,
                    STORE_A,
                    { newStatus: 'PREPARING' }
               );

               expect(result.succeeded).toBe(true);
               const stored = await harness.repositories.subOrders.getById(subOrder.id);
               expect(stored?.status).toBe('PREPARING');
               expect(harness.store.shippingHistory).toHaveLength(0);
          });

          it('should still succeed when the shipping notification fails', async () => {
               harness.notifications.failure = 'Broker unavailable';
               await harness.services.subOrders.applySubOrderTransition(subOrder.id, STORE_A, {
                    newStatus: 'PREPARING',
               });

               const result = await harness.services.subOrders.applySubOrderTransition(
                    subOrder.id,
                    STORE_A,
                    { newStatus: 'SHIPPED', trackingNumber: 'TRACK-1', shippingCarrier: 'UPS' }
               );

               expect(result.succeeded).toBe(true);
               expect(harness.notifications.shipped).toEqual([]);
          });
     });

     describe('Refund cascade', () => {
          it('should refund the parent order with its last sub-order', async () => {
               const order = await harness.repositories.orders.getById(subOrder.orderId);
               if (!order) throw new Error('order missing');
               const other = subOrderFor(order, STORE_B);

               expectOk(
                    await harness.services.subOrders.applySubOrderTransition(subOrder.id, STORE_A, {
                         newStatus: 'REFUNDED',
                    })
               );
               const halfway = await harness.repositories.orders.getById(order.id);
               expect(halfway?.status).toBe('PAID');

               expectOk(
                    await harness.services.subOrders.applySubOrderTransition(other.id, STORE_B, {
                         newStatus: 'REFUNDED',
                    })
               );
               const refunded = await harness.repositories.orders.getById(order.id);
               expect(refunded?.status).toBe('REFUNDED');
               expect(refunded?.refundedAt).toEqual(T0);
          });

          it('should refund an unpaid order once every sub-order is cancelled and refunded', async () => {
               const fresh = createHarness();
               const order = await placeOrder(fresh);

               for (const candidate of order.subOrders) {
                    for (const newStatus of ['CANCELLED', 'REFUNDED'] as const) {
                         expectOk(
                              await fresh.services.subOrders.applySubOrderTransition(
                                   candidate.id,
                                   candidate.storeId,
                                   { newStatus }
                              )
                         );
                    }
               }

               const after = await fresh.repositories.orders.getById(order.id);
               expect(after?.subOrders.map((candidate) => candidate.status)).toEqual([
                    'REFUNDED',
                    'REFUNDED',
               ]);
               expect(after?.status).toBe('REFUNDED');
               expect(after?.refundedAt).toEqual(T0);
          });

          it('should leave a failed order alone', async () => {
               const fresh = createHarness();
               const order = await placeOrder(fresh);
               const stored = fresh.store.orders.get(order.id);
               if (!stored) throw new Error('order missing');
               stored.status = 'FAILED';
               for (const candidate of stored.subOrders) {
                    candidate.status = 'PAID';
               }

               for (const candidate of stored.subOrders) {
                    expectOk(
                         await fresh.services.subOrders.applySubOrderTransition(
                              candidate.id,
                              candidate.storeId,
                              { newStatus: 'REFUNDED' }
                         )
                    );
               }

               const after = await fresh.repositories.orders.getById(order.id);
               expect(after?.status).toBe('FAILED');
          });
     });

     describe('calculateCancelledItemsRefund', () => {
          it('should total the cancelled items only', async () => {
               await harness.services.subOrders.applyItemStatusUpdates(subOrder.id, STORE_A, {
                    updates: [{ itemId: subOrder.items[0].id, newStatus: 'CANCELLED' }],
               });

               const refund = expectOk(
                    await harness.services.subOrders.calculateCancelledItemsRefund(subOrder.id, STORE_A)
               );

               expect(refund).toEqual({
                    totalRefundAmount: 20,
                    items: [
                         {
                              itemId: subOrder.items[0].id,
                              productTitle: 'Ceramic Mug',
                              quantity: 2,
                              unitPrice: 10,
                              refundAmount: 20,
                              cancelledAt: T0,
                         },
                    ],
               });
          });
     });
});
