import type { Repositories } from '../repositories/types';
import type {
     BuyerOrderFilter,
     Order,
     Page,
     ReturnRequest,
     SellerSubOrder,
     SellerSubOrderFilter,
     ShippingStatusHistory,
} from '../types/order.types';
import {
     NotAuthorizedError,
     NotFoundError,
     ValidationError,
} from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import { fail, ok, OperationResult, runOperation } from '../utils/result';

export const MAX_PAGE_SIZE = 100;

function isBlank(value: string | undefined): boolean {
     return value === undefined || value.trim() === '';
}

function validatePaging(filter: {
     page: number;
     pageSize: number;
     fromDate?: Date;
     toDate?: Date;
}): string[] {
     const errors: string[] = [];
     if (!Number.isInteger(filter.page) || filter.page < 1) {
          errors.push('Page number must be at least 1.');
     }
     if (!Number.isInteger(filter.pageSize) || filter.pageSize < 1 || filter.pageSize > MAX_PAGE_SIZE) {
          errors.push(`Page size must be between 1 and ${MAX_PAGE_SIZE}.`);
     }
     if (filter.fromDate && filter.toDate && filter.fromDate > filter.toDate) {
          errors.push('From date cannot be after to date.');
     }
     return errors;
}

/**
 * Read side for buyers and sellers. Records owned by someone else are
 * reported as not found to buyers and as not authorized to sellers.
 */
export class OrderQueryService {
     private log = createChildLogger({ component: 'order-query' });

     constructor(private readonly repositories: Repositories) {}

     async getOrder(orderId: string, buyerId: string): Promise<OperationResult<Order>> {
          return runOperation<Order>(this.log, { orderId, buyerId }, 'Failed to get order', async () => {
               if (isBlank(buyerId)) {
                    return fail(new ValidationError(['Buyer ID is required.']));
               }

               const order = await this.repositories.orders.getById(orderId);
               if (!order || order.buyerId !== buyerId) {
                    return fail(new NotFoundError('Order', orderId));
               }
               return ok(order);
          });
     }

     async getOrderByTransaction(
          paymentTransactionId: string,
          buyerId: string
     ): Promise<OperationResult<Order>> {
          return runOperation<Order>(
               this.log,
               { paymentTransactionId, buyerId },
               'Failed to get order by transaction',
               async () => {
                    if (isBlank(buyerId)) {
                         return fail(new ValidationError(['Buyer ID is required.']));
                    }

                    const order =
                         await this.repositories.orders.getByPaymentTransactionId(paymentTransactionId);
                    if (!order || order.buyerId !== buyerId) {
                         return fail(new NotFoundError('Order for transaction', paymentTransactionId));
                    }
                    return ok(order);
               }
          );
     }

     async getOrdersForBuyer(buyerId: string): Promise<OperationResult<Order[]>> {
          return runOperation<Order[]>(this.log, { buyerId }, 'Failed to get orders', async () => {
               if (isBlank(buyerId)) {
                    return fail(new ValidationError(['Buyer ID is required.']));
               }
               return ok(await this.repositories.orders.getByBuyerId(buyerId));
          });
     }

     async getFilteredOrdersForBuyer(filter: BuyerOrderFilter): Promise<OperationResult<Page<Order>>> {
          return runOperation<Page<Order>>(
               this.log,
               { buyerId: filter.buyerId, page: filter.page },
               'Failed to get filtered orders',
               async () => {
                    const errors = [
                         ...(isBlank(filter.buyerId) ? ['Buyer ID is required.'] : []),
                         ...validatePaging(filter),
                    ];
                    if (errors.length > 0) {
                         return fail(new ValidationError(errors));
                    }
                    return ok(await this.repositories.orders.findForBuyer(filter));
               }
          );
     }

     async getSellerSubOrders(storeId: string): Promise<OperationResult<SellerSubOrder[]>> {
          return runOperation<SellerSubOrder[]>(
               this.log,
               { storeId },
               'Failed to get sub-orders',
               async () => {
                    if (isBlank(storeId)) {
                         return fail(new ValidationError(['Store ID is required.']));
                    }
                    return ok(await this.repositories.subOrders.getByStoreId(storeId));
               }
          );
     }

     async getSellerSubOrder(
          subOrderId: string,
          storeId: string
     ): Promise<OperationResult<SellerSubOrder>> {
          return runOperation<SellerSubOrder>(
               this.log,
               { subOrderId, storeId },
               'Failed to get sub-order',
               async () => this.loadStoreSubOrder(subOrderId, storeId)
          );
     }

     async getFilteredSellerSubOrders(
          filter: SellerSubOrderFilter
     ): Promise<OperationResult<Page<SellerSubOrder>>> {
          return runOperation<Page<SellerSubOrder>>(
               this.log,
               { storeId: filter.storeId, page: filter.page },
               'Failed to get filtered sub-orders',
               async () => {
                    const errors = [
                         ...(isBlank(filter.storeId) ? ['Store ID is required.'] : []),
                         ...validatePaging(filter),
                    ];
                    if (errors.length > 0) {
                         return fail(new ValidationError(errors));
                    }
                    return ok(await this.repositories.subOrders.findForStore(filter));
               }
          );
     }

     async getShippingStatusHistory(
          subOrderId: string,
          storeId: string
     ): Promise<OperationResult<ShippingStatusHistory[]>> {
          return runOperation<ShippingStatusHistory[]>(
               this.log,
               { subOrderId, storeId },
               'Failed to get shipping status history',
               async () => {
                    const loaded = await this.loadStoreSubOrder(subOrderId, storeId);
                    if (!loaded.succeeded) {
                         return loaded;
                    }
                    return ok(await this.repositories.shippingHistory.getBySubOrderId(subOrderId));
               }
          );
     }

     async getCase(caseId: string, buyerId: string): Promise<OperationResult<ReturnRequest>> {
          return runOperation<ReturnRequest>(
               this.log,
               { caseId, buyerId },
               'Failed to get case',
               async () => {
                    if (isBlank(buyerId)) {
                         return fail(new ValidationError(['Buyer ID is required.']));
                    }

                    const returnRequest = await this.repositories.returnRequests.getById(caseId);
                    if (!returnRequest || returnRequest.buyerId !== buyerId) {
                         return fail(new NotFoundError('ReturnRequest', caseId));
                    }
                    return ok(returnRequest);
               }
          );
     }

     async getCasesForBuyer(buyerId: string): Promise<OperationResult<ReturnRequest[]>> {
          return runOperation<ReturnRequest[]>(
               this.log,
               { buyerId },
               'Failed to get cases',
               async () => {
                    if (isBlank(buyerId)) {
                         return fail(new ValidationError(['Buyer ID is required.']));
                    }
                    return ok(await this.repositories.returnRequests.getByBuyerId(buyerId));
               }
          );
     }

     /** Most recent case opened against the sub-order. */
     async getCaseForSubOrder(
          subOrderId: string,
          storeId: string
     ): Promise<OperationResult<ReturnRequest>> {
          return runOperation<ReturnRequest>(
               this.log,
               { subOrderId, storeId },
               'Failed to get case for sub-order',
               async () => {
                    const loaded = await this.loadStoreSubOrder(subOrderId, storeId);
                    if (!loaded.succeeded) {
                         return loaded;
                    }

                    const [latest] = await this.repositories.returnRequests.getBySubOrderId(subOrderId);
                    if (!latest) {
                         return fail(new NotFoundError('ReturnRequest for sub-order', subOrderId));
                    }
                    return ok(latest);
               }
          );
     }

     private async loadStoreSubOrder(
          subOrderId: string,
          storeId: string
     ): Promise<OperationResult<SellerSubOrder>> {
          if (isBlank(storeId)) {
               return fail(new ValidationError(['Store ID is required.']));
          }

          const subOrder = await this.repositories.subOrders.getById(subOrderId);
          if (!subOrder) {
               return fail(new NotFoundError('SubOrder', subOrderId));
          }
          if (subOrder.storeId !== storeId) {
               return fail(new NotAuthorizedError('You are not authorized to view this sub-order.'));
          }
          return ok(subOrder);
     }
}
