import {
     generateCaseNumber,
     generateOrderNumber,
     generateSubOrderNumber,
} from '@fulfillment/shared/src/domain/numbering';
import { stampItemStatus, stampSubOrderStatus } from '@fulfillment/shared/src/domain/status-stamps';
import type { SellerSubOrder, SellerSubOrderItem } from '@fulfillment/shared/src/types/order.types';

describe('Numbering', () => {
     it('should derive the order number from the id', () => {
          expect(generateOrderNumber('3f2a9c1d-77aa-4b1e-9c0d-123456789abc')).toBe('ORD-3F2A9C1D');
     });

     it('should suffix sub-orders with their sequence', () => {
          expect(generateSubOrderNumber('ORD-3F2A9C1D', 2)).toBe('ORD-3F2A9C1D-S2');
     });

     it('should skip dashes when the id starts with a short group', () => {
          expect(generateCaseNumber('ab-cdef12-3456')).toBe('CASE-ABCDEF12');
     });
});

describe('Status stamps', () => {
     const created = new Date('2026-01-01T00:00:00.000Z');
     const now = new Date('2026-01-05T10:00:00.000Z');

     function subOrder(): SellerSubOrder {
          return {
               id: 'sub-1',
               orderId: 'order-1',
               storeId: 'store-a',
               storeName: 'Store A',
               sequence: 1,
               subOrderNumber: 'ORD-1-S1',
               status: 'PREPARING',
               itemsSubtotal: 10,
               shippingCost: 0,
               totalAmount: 10,
               createdAt: created,
               lastUpdatedAt: created,
               version: 1,
               items: [],
          };
     }

     function item(): SellerSubOrderItem {
          return {
               id: 'item-1',
               subOrderId: 'sub-1',
               productId: 'mug',
               productTitle: 'Ceramic Mug',
               unitPrice: 10,
               quantity: 1,
               status: 'NEW',
               createdAt: created,
               lastUpdatedAt: created,
          };
     }

     it('should set the shipped timestamp of a sub-order', () => {
          const target = subOrder();
          stampSubOrderStatus(target, 'SHIPPED', now);
          expect(target.status).toBe('SHIPPED');
          expect(target.shippedAt).toEqual(now);
          expect(target.lastUpdatedAt).toEqual(now);
          expect(target.deliveredAt).toBeUndefined();
     });

     it('should set the refunded timestamp of a sub-order', () => {
          const target = subOrder();
          stampSubOrderStatus(target, 'REFUNDED', now);
          expect(target.refundedAt).toEqual(now);
     });

     it('should set the preparing timestamp of an item', () => {
          const target = item();
          stampItemStatus(target, 'PREPARING', now);
          expect(target.status).toBe('PREPARING');
          expect(target.preparingAt).toEqual(now);
          expect(target.lastUpdatedAt).toEqual(now);
     });

     it('should set the cancelled timestamp of an item', () => {
          const target = item();
          stampItemStatus(target, 'CANCELLED', now);
          expect(target.cancelledAt).toEqual(now);
          expect(target.shippedAt).toBeUndefined();
     });
});
