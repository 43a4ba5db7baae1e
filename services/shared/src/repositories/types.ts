import type {
     BuyerOrderFilter,
     Order,
     Page,
     ReturnRequest,
     SellerSubOrder,
     SellerSubOrderFilter,
     ShippingStatusHistory,
} from '../types/order.types';

// Reads resolve to undefined when the record does not exist. Updates on
// aggregate roots are conditional on `version` and bump it on success; a
// stale version rejects with ConcurrencyConflictError.

export interface OrderRepository {
     getById(orderId: string): Promise<Order | undefined>;
     getByPaymentTransactionId(paymentTransactionId: string): Promise<Order | undefined>;
     getByBuyerId(buyerId: string): Promise<Order[]>;
     findForBuyer(filter: BuyerOrderFilter): Promise<Page<Order>>;
     /** Persists the order with its items, sub-orders and sub-order items at once. */
     add(order: Order): Promise<void>;
     /** Writes the order header and every sub-order header. */
     update(order: Order): Promise<void>;
     /** Writes the order header only. */
     updateHeader(order: Order): Promise<void>;
}

export interface SubOrderRepository {
     getById(subOrderId: string): Promise<SellerSubOrder | undefined>;
     getByStoreId(storeId: string): Promise<SellerSubOrder[]>;
     findForStore(filter: SellerSubOrderFilter): Promise<Page<SellerSubOrder>>;
     /** Writes the sub-order header and all of its items. */
     update(subOrder: SellerSubOrder): Promise<void>;
}

export interface ReturnRequestRepository {
     getById(caseId: string): Promise<ReturnRequest | undefined>;
     getBySubOrderId(subOrderId: string): Promise<ReturnRequest[]>;
     getByBuyerId(buyerId: string): Promise<ReturnRequest[]>;
     /** Non-terminal cases (not REJECTED or COMPLETED) covering any of the items. */
     findOpenCasesForItems(subOrderItemIds: readonly string[]): Promise<ReturnRequest[]>;
     add(returnRequest: ReturnRequest): Promise<void>;
     update(returnRequest: ReturnRequest): Promise<void>;
}

export interface ShippingStatusHistoryRepository {
     add(entry: ShippingStatusHistory): Promise<void>;
     getBySubOrderId(subOrderId: string): Promise<ShippingStatusHistory[]>;
}

export interface Repositories {
     orders: OrderRepository;
     subOrders: SubOrderRepository;
     returnRequests: ReturnRequestRepository;
     shippingHistory: ShippingStatusHistoryRepository;
}
