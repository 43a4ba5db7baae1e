import type { PoolClient } from 'pg';
import { PgOrderRepository } from '@fulfillment/shared/src/repositories/pg/order-repository';
import { PgSubOrderRepository } from '@fulfillment/shared/src/repositories/pg/sub-order-repository';
import { PgReturnRequestRepository } from '@fulfillment/shared/src/repositories/pg/return-request-repository';
import type { OrderRow, SubOrderRow } from '@fulfillment/shared/src/repositories/pg/rows';
import { ConcurrencyConflictError } from '@fulfillment/shared/src/utils/errors';
import { BUYER_ID, createHarness, placeOrder, STORE_A, subOrderFor, T0 } from '../helpers/fixtures';

const ORDER_ID = '00000000-0000-4000-8000-0000000000aa';
const SUB_ORDER_ID = '00000000-0000-4000-8000-0000000000bb';

function orderRow(): OrderRow {
     return {
          id: ORDER_ID,
          buyer_id: BUYER_ID,
          buyer_email: null,
          order_number: 'ORD-20260302-0001',
          status: 'PAID',
          payment_transaction_id: 'txn-1',
          payment_method_name: 'Card',
          items_subtotal: '45.00',
          shipping_total: '30.00',
          total_amount: '75.00',
          delivery_address: {
               fullName: 'Dana Buyer',
               addressLine1: '1 Market Street',
               city: 'Springfield',
               postalCode: '12345',
               country: 'US',
          },
          created_at: T0,
          last_updated_at: T0,
          confirmed_at: T0,
          failed_at: null,
          refunded_at: null,
          version: 2,
     };
}

function subOrderRow(): SubOrderRow {
     return {
          id: SUB_ORDER_ID,
          order_id: ORDER_ID,
          store_id: STORE_A,
          store_name: 'Store A',
          sequence: 1,
          sub_order_number: 'ORD-20260302-0001-S1',
          status: 'SHIPPED',
          items_subtotal: '25.00',
          shipping_cost: '15.00',
          total_amount: '40.00',
          shipping_method_name: null,
          tracking_number: 'TRACK-1',
          shipping_carrier: 'UPS',
          created_at: T0,
          last_updated_at: T0,
          confirmed_at: T0,
          failed_at: null,
          shipped_at: T0,
          delivered_at: null,
          cancelled_at: null,
          refunded_at: null,
          version: 3,
     };
}

describe('PostgreSQL repositories', () => {
     let mockClient: jest.Mocked<PoolClient>;

     beforeEach(() => {
          mockClient = {
               query: jest.fn(),
          } as unknown as jest.Mocked<PoolClient>;
     });

     describe('PgOrderRepository', () => {
          it('should return undefined without loading children when the order does not exist', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [] } as never);
               const repository = new PgOrderRepository(mockClient);

               await expect(repository.getById(ORDER_ID)).resolves.toBeUndefined();
               expect(mockClient.query).toHaveBeenCalledTimes(1);
          });

          it('should hydrate an order with its sub-orders and parse numeric columns', async () => {
               mockClient.query
                    .mockResolvedValueOnce({ rows: [orderRow()] } as never)
                    .mockResolvedValueOnce({ rows: [] } as never)
                    .mockResolvedValueOnce({ rows: [subOrderRow()] } as never)
                    .mockResolvedValueOnce({ rows: [] } as never);
               const repository = new PgOrderRepository(mockClient);

               const order = await repository.getById(ORDER_ID);

               expect(order).toMatchObject({
                    id: ORDER_ID,
                    buyerId: BUYER_ID,
                    itemsSubtotal: 45,
                    shippingTotal: 30,
                    totalAmount: 75,
                    version: 2,
               });
               expect(order?.buyerEmail).toBeUndefined();
               expect(order?.failedAt).toBeUndefined();
               expect(order?.subOrders).toHaveLength(1);
               expect(order?.subOrders[0]).toMatchObject({
                    id: SUB_ORDER_ID,
                    totalAmount: 40,
                    trackingNumber: 'TRACK-1',
                    shippingMethodName: undefined,
                    items: [],
               });
          });

          it('should build the buyer filter from the given criteria', async () => {
               mockClient.query
                    .mockResolvedValueOnce({ rows: [{ total: '0' }] } as never)
                    .mockResolvedValueOnce({ rows: [] } as never);
               const repository = new PgOrderRepository(mockClient);

               const page = await repository.findForBuyer({
                    buyerId: BUYER_ID,
                    statuses: ['PAID', 'REFUNDED'],
                    storeId: STORE_A,
                    page: 3,
                    pageSize: 10,
               });

               expect(page).toEqual({ items: [], totalCount: 0, page: 3, pageSize: 10 });
               const [countSql, countParams] = mockClient.query.mock.calls[0];
               expect(countSql).toContain('o.status = ANY($2::text[])');
               expect(countSql).toContain('s.store_id = $3');
               expect(countParams).toEqual([BUYER_ID, ['PAID', 'REFUNDED'], STORE_A]);
               expect(mockClient.query.mock.calls[1][1]).toEqual([
                    BUYER_ID,
                    ['PAID', 'REFUNDED'],
                    STORE_A,
                    10,
                    20,
               ]);
          });

          it('should bump the version after a successful header update', async () => {
               const order = await placeOrder(createHarness());
               const startingVersion = order.version;
               mockClient.query.mockResolvedValueOnce({ rowCount: 1 } as never);
               const repository = new PgOrderRepository(mockClient);

               await repository.updateHeader(order);

               expect(order.version).toBe(startingVersion + 1);
               expect(mockClient.query.mock.calls[0][1]).toEqual(
                    expect.arrayContaining([order.id, startingVersion, order.status])
               );
          });

          it('should raise a concurrency conflict when the version is stale', async () => {
               const order = await placeOrder(createHarness());
               const startingVersion = order.version;
               mockClient.query.mockResolvedValueOnce({ rowCount: 0 } as never);
               const repository = new PgOrderRepository(mockClient);

               await expect(repository.updateHeader(order)).rejects.toBeInstanceOf(
                    ConcurrencyConflictError
               );
               expect(order.version).toBe(startingVersion);
          });
     });

     describe('PgSubOrderRepository', () => {
          it('should not touch items when the sub-order version is stale', async () => {
               const subOrder = subOrderFor(await placeOrder(createHarness()), STORE_A);
               mockClient.query.mockResolvedValueOnce({ rowCount: 0 } as never);
               const repository = new PgSubOrderRepository(mockClient);

               await expect(repository.update(subOrder)).rejects.toThrow(
                    `SubOrder ${subOrder.id} was modified by another operation; reload and retry`
               );
               expect(mockClient.query).toHaveBeenCalledTimes(1);
          });

          it('should write every item after the header', async () => {
               const subOrder = subOrderFor(await placeOrder(createHarness()), STORE_A);
               mockClient.query.mockResolvedValue({ rowCount: 1 } as never);
               const repository = new PgSubOrderRepository(mockClient);

               await repository.update(subOrder);

               expect(mockClient.query).toHaveBeenCalledTimes(1 + subOrder.items.length);
          });
     });

     describe('PgReturnRequestRepository', () => {
          it('should skip the query when no items are given', async () => {
               const repository = new PgReturnRequestRepository(mockClient);

               await expect(repository.findOpenCasesForItems([])).resolves.toEqual([]);
               expect(mockClient.query).not.toHaveBeenCalled();
          });
     });
});
