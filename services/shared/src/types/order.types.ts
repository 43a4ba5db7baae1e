// Type definitions for the order, sub-order and case aggregates

export const ORDER_STATUSES = ['NEW', 'PAID', 'FAILED', 'REFUNDED'] as const;
export type OrderStatus = (typeof ORDER_STATUSES)[number];

export const SUB_ORDER_STATUSES = [
     'NEW',
     'PAID',
     'PREPARING',
     'SHIPPED',
     'DELIVERED',
     'CANCELLED',
     'REFUNDED',
     'FAILED',
] as const;
export type SubOrderStatus = (typeof SUB_ORDER_STATUSES)[number];

export const ITEM_STATUSES = ['NEW', 'PREPARING', 'SHIPPED', 'DELIVERED', 'CANCELLED'] as const;
export type ItemStatus = (typeof ITEM_STATUSES)[number];

export const RETURN_STATUSES = [
     'REQUESTED',
     'UNDER_REVIEW',
     'APPROVED',
     'REJECTED',
     'COMPLETED',
] as const;
export type ReturnStatus = (typeof RETURN_STATUSES)[number];

export const CASE_TYPES = ['RETURN', 'COMPLAINT'] as const;
export type CaseType = (typeof CASE_TYPES)[number];

export const RESOLUTION_TYPES = ['NO_REFUND', 'FULL_REFUND', 'PARTIAL_REFUND'] as const;
export type ResolutionType = (typeof RESOLUTION_TYPES)[number];

/**
 * Delivery address as captured at checkout. Never re-read from the buyer's
 * address book afterwards.
 */
export interface DeliveryAddress {
     fullName: string;
     addressLine1: string;
     addressLine2?: string;
     city: string;
     state?: string;
     postalCode: string;
     country: string;
     phoneNumber?: string;
     deliveryInstructions?: string;
}

export interface OrderItem {
     id: string;
     orderId: string;
     productId: string;
     productTitle: string;
     storeId: string;
     storeName: string;
     unitPrice: number;
     quantity: number;
     createdAt: Date;
}

export interface SellerSubOrderItem {
     id: string;
     subOrderId: string;
     productId: string;
     productTitle: string;
     unitPrice: number;
     quantity: number;
     status: ItemStatus;
     createdAt: Date;
     lastUpdatedAt: Date;
     preparingAt?: Date;
     shippedAt?: Date;
     deliveredAt?: Date;
     cancelledAt?: Date;
}

export interface SellerSubOrder {
     id: string;
     orderId: string;
     storeId: string;
     storeName: string;
     sequence: number;
     subOrderNumber: string;
     status: SubOrderStatus;
     itemsSubtotal: number;
     shippingCost: number;
     totalAmount: number;
     shippingMethodName?: string;
     trackingNumber?: string;
     shippingCarrier?: string;
     createdAt: Date;
     lastUpdatedAt: Date;
     confirmedAt?: Date;
     failedAt?: Date;
     shippedAt?: Date;
     deliveredAt?: Date;
     cancelledAt?: Date;
     refundedAt?: Date;
     version: number;
     items: SellerSubOrderItem[];
}

export interface Order {
     id: string;
     buyerId: string;
     buyerEmail?: string;
     orderNumber: string;
     status: OrderStatus;
     paymentTransactionId: string;
     paymentMethodName?: string;
     itemsSubtotal: number;
     shippingTotal: number;
     totalAmount: number;
     deliveryAddress: DeliveryAddress;
     createdAt: Date;
     lastUpdatedAt: Date;
     confirmedAt?: Date;
     failedAt?: Date;
     refundedAt?: Date;
     version: number;
     items: OrderItem[];
     subOrders: SellerSubOrder[];
}

export interface CaseItem {
     id: string;
     caseId: string;
     subOrderItemId: string;
     quantity: number;
     createdAt: Date;
}

export interface ReturnRequest {
     id: string;
     caseNumber: string;
     caseType: CaseType;
     subOrderId: string;
     buyerId: string;
     status: ReturnStatus;
     reason: string;
     sellerNotes?: string;
     resolutionType?: ResolutionType;
     resolutionReason?: string;
     linkedRefundId?: string;
     refundAmount?: number;
     createdAt: Date;
     lastUpdatedAt: Date;
     resolvedAt?: Date;
     version: number;
     items: CaseItem[];
}

export interface ShippingStatusHistory {
     id: string;
     subOrderId: string;
     previousStatus?: SubOrderStatus;
     newStatus: SubOrderStatus;
     changedAt: Date;
     trackingNumber?: string;
     shippingCarrier?: string;
     notes?: string;
}

// Commands

export interface CheckoutLineItem {
     productId: string;
     productTitle: string;
     storeId: string;
     storeName: string;
     unitPrice: number;
     quantity: number;
     shippingMethodName?: string;
}

export interface PlaceOrderCommand {
     buyerId: string;
     buyerEmail?: string;
     paymentTransactionId: string;
     paymentMethodName?: string;
     shippingTotal: number;
     deliveryAddress?: DeliveryAddress;
     items: CheckoutLineItem[];
}

export interface SubOrderTransitionCommand {
     newStatus: SubOrderStatus;
     trackingNumber?: string;
     shippingCarrier?: string;
}

export interface ItemStatusUpdate {
     itemId: string;
     newStatus: ItemStatus;
}

export interface ItemStatusUpdatesCommand {
     updates: ItemStatusUpdate[];
     trackingNumber?: string;
     shippingCarrier?: string;
}

export interface TrackingInfoCommand {
     trackingNumber: string;
     shippingCarrier: string;
}

export interface SelectedCaseItem {
     itemId: string;
     quantity: number;
}

export interface CreateCaseCommand {
     subOrderId: string;
     buyerId: string;
     reason: string;
     caseType: CaseType;
     selectedItems?: SelectedCaseItem[];
}

/** Identity of whoever reads a case: the buyer who opened it or the seller it concerns. */
export interface CaseCaller {
     buyerId?: string;
     storeId?: string;
}

export interface ResolveCaseCommand {
     resolutionType: ResolutionType;
     resolutionReason?: string;
     existingRefundId?: string;
     initiateNewRefund?: boolean;
     paymentTransactionId?: string;
     refundAmount?: number;
     initiatedBy: string;
}

// Operation outcomes

export interface PlacedOrder {
     orderId: string;
     orderNumber: string;
}

export interface CreatedCase {
     caseId: string;
     caseNumber: string;
}

export type CaseEligibility = { eligible: true } | { eligible: false; reason: string };

export interface CaseResolution {
     caseId: string;
     linkedRefundId?: string;
     refundInitiated: boolean;
     subOrderRefunded: boolean;
     orderRefunded: boolean;
}

export interface CancelledItemRefund {
     itemId: string;
     productTitle: string;
     quantity: number;
     unitPrice: number;
     refundAmount: number;
     cancelledAt?: Date;
}

export interface CancelledItemsRefund {
     totalRefundAmount: number;
     items: CancelledItemRefund[];
}

export interface LinkedRefundInfo {
     refundId: string;
     amount: number;
     status: string;
     externalReference?: string;
     completedAt?: Date;
}

// Listings

export interface Page<T> {
     items: T[];
     totalCount: number;
     page: number;
     pageSize: number;
}

export interface BuyerOrderFilter {
     buyerId: string;
     statuses?: OrderStatus[];
     fromDate?: Date;
     toDate?: Date;
     storeId?: string;
     page: number;
     pageSize: number;
}

export interface SellerSubOrderFilter {
     storeId: string;
     statuses?: SubOrderStatus[];
     fromDate?: Date;
     toDate?: Date;
     buyerSearchTerm?: string;
     page: number;
     pageSize: number;
}
