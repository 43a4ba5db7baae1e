import type { PoolClient } from 'pg';
import type {
     CaseItem,
     CaseType,
     DeliveryAddress,
     ItemStatus,
     Order,
     OrderItem,
     OrderStatus,
     ResolutionType,
     ReturnRequest,
     ReturnStatus,
     SellerSubOrder,
     SellerSubOrderItem,
     ShippingStatusHistory,
     SubOrderStatus,
} from '../../types/order.types';

// PostgreSQL returns NUMERIC as string and NULL for absent columns

export function toNumber(value: string | number): number {
     return typeof value === 'number' ? value : parseFloat(value);
}

export function optionalNumber(value: string | number | null): number | undefined {
     return value === null ? undefined : toNumber(value);
}

export function optional<T>(value: T | null): T | undefined {
     return value === null ? undefined : value;
}

export function nullable<T>(value: T | undefined): T | null {
     return value === undefined ? null : value;
}

export interface OrderRow {
     id: string;
     buyer_id: string;
     buyer_email: string | null;
     order_number: string;
     status: OrderStatus;
     payment_transaction_id: string;
     payment_method_name: string | null;
     items_subtotal: string;
     shipping_total: string;
     total_amount: string;
     delivery_address: DeliveryAddress;
     created_at: Date;
     last_updated_at: Date;
     confirmed_at: Date | null;
     failed_at: Date | null;
     refunded_at: Date | null;
     version: number;
}

export interface OrderItemRow {
     id: string;
     order_id: string;
     product_id: string;
     product_title: string;
     store_id: string;
     store_name: string;
     unit_price: string;
     quantity: number;
     created_at: Date;
}

export interface SubOrderRow {
     id: string;
     order_id: string;
     store_id: string;
     store_name: string;
     sequence: number;
     sub_order_number: string;
     status: SubOrderStatus;
     items_subtotal: string;
     shipping_cost: string;
     total_amount: string;
     shipping_method_name: string | null;
     tracking_number: string | null;
     shipping_carrier: string | null;
     created_at: Date;
     last_updated_at: Date;
     confirmed_at: Date | null;
     failed_at: Date | null;
     shipped_at: Date | null;
     delivered_at: Date | null;
     cancelled_at: Date | null;
     refunded_at: Date | null;
     version: number;
}

export interface SubOrderItemRow {
     id: string;
     sub_order_id: string;
     product_id: string;
     product_title: string;
     unit_price: string;
     quantity: number;
     status: ItemStatus;
     created_at: Date;
     last_updated_at: Date;
     preparing_at: Date | null;
     shipped_at: Date | null;
     delivered_at: Date | null;
     cancelled_at: Date | null;
}

export interface ReturnRequestRow {
     id: string;
     case_number: string;
     case_type: CaseType;
     sub_order_id: string;
     buyer_id: string;
     status: ReturnStatus;
     reason: string;
     seller_notes: string | null;
     resolution_type: ResolutionType | null;
     resolution_reason: string | null;
     linked_refund_id: string | null;
     refund_amount: string | null;
     created_at: Date;
     last_updated_at: Date;
     resolved_at: Date | null;
     version: number;
}

export interface CaseItemRow {
     id: string;
     case_id: string;
     sub_order_item_id: string;
     quantity: number;
     created_at: Date;
}

export interface ShippingHistoryRow {
     id: string;
     sub_order_id: string;
     previous_status: SubOrderStatus | null;
     new_status: SubOrderStatus;
     changed_at: Date;
     tracking_number: string | null;
     shipping_carrier: string | null;
     notes: string | null;
}

export function mapOrderItem(row: OrderItemRow): OrderItem {
     return {
          id: row.id,
          orderId: row.order_id,
          productId: row.product_id,
          productTitle: row.product_title,
          storeId: row.store_id,
          storeName: row.store_name,
          unitPrice: toNumber(row.unit_price),
          quantity: row.quantity,
          createdAt: row.created_at,
     };
}

export function mapSubOrderItem(row: SubOrderItemRow): SellerSubOrderItem {
     return {
          id: row.id,
          subOrderId: row.sub_order_id,
          productId: row.product_id,
          productTitle: row.product_title,
          unitPrice: toNumber(row.unit_price),
          quantity: row.quantity,
          status: row.status,
          createdAt: row.created_at,
          lastUpdatedAt: row.last_updated_at,
          preparingAt: optional(row.preparing_at),
          shippedAt: optional(row.shipped_at),
          deliveredAt: optional(row.delivered_at),
          cancelledAt: optional(row.cancelled_at),
     };
}

export function mapSubOrder(row: SubOrderRow, items: SellerSubOrderItem[]): SellerSubOrder {
     return {
          id: row.id,
          orderId: row.order_id,
          storeId: row.store_id,
          storeName: row.store_name,
          sequence: row.sequence,
          subOrderNumber: row.sub_order_number,
          status: row.status,
          itemsSubtotal: toNumber(row.items_subtotal),
          shippingCost: toNumber(row.shipping_cost),
          totalAmount: toNumber(row.total_amount),
          shippingMethodName: optional(row.shipping_method_name),
          trackingNumber: optional(row.tracking_number),
          shippingCarrier: optional(row.shipping_carrier),
          createdAt: row.created_at,
          lastUpdatedAt: row.last_updated_at,
          confirmedAt: optional(row.confirmed_at),
          failedAt: optional(row.failed_at),
          shippedAt: optional(row.shipped_at),
          deliveredAt: optional(row.delivered_at),
          cancelledAt: optional(row.cancelled_at),
          refundedAt: optional(row.refunded_at),
          version: row.version,
          items,
     };
}

export function mapOrder(
     row: OrderRow,
     items: OrderItem[],
     subOrders: SellerSubOrder[]
): Order {
     return {
          id: row.id,
          buyerId: row.buyer_id,
          buyerEmail: optional(row.buyer_email),
          orderNumber: row.order_number,
          status: row.status,
          paymentTransactionId: row.payment_transaction_id,
          paymentMethodName: optional(row.payment_method_name),
          itemsSubtotal: toNumber(row.items_subtotal),
          shippingTotal: toNumber(row.shipping_total),
          totalAmount: toNumber(row.total_amount),
          deliveryAddress: row.delivery_address,
          createdAt: row.created_at,
          lastUpdatedAt: row.last_updated_at,
          confirmedAt: optional(row.confirmed_at),
          failedAt: optional(row.failed_at),
          refundedAt: optional(row.refunded_at),
          version: row.version,
          items,
          subOrders,
     };
}

export function mapCaseItem(row: CaseItemRow): CaseItem {
     return {
          id: row.id,
          caseId: row.case_id,
          subOrderItemId: row.sub_order_item_id,
          quantity: row.quantity,
          createdAt: row.created_at,
     };
}

export function mapReturnRequest(row: ReturnRequestRow, items: CaseItem[]): ReturnRequest {
     return {
          id: row.id,
          caseNumber: row.case_number,
          caseType: row.case_type,
          subOrderId: row.sub_order_id,
          buyerId: row.buyer_id,
          status: row.status,
          reason: row.reason,
          sellerNotes: optional(row.seller_notes),
          resolutionType: optional(row.resolution_type),
          resolutionReason: optional(row.resolution_reason),
          linkedRefundId: optional(row.linked_refund_id),
          refundAmount: optionalNumber(row.refund_amount),
          createdAt: row.created_at,
          lastUpdatedAt: row.last_updated_at,
          resolvedAt: optional(row.resolved_at),
          version: row.version,
          items,
     };
}

export function mapShippingHistory(row: ShippingHistoryRow): ShippingStatusHistory {
     return {
          id: row.id,
          subOrderId: row.sub_order_id,
          previousStatus: optional(row.previous_status),
          newStatus: row.new_status,
          changedAt: row.changed_at,
          trackingNumber: optional(row.tracking_number),
          shippingCarrier: optional(row.shipping_carrier),
          notes: optional(row.notes),
     };
}

function groupBy<T>(rows: readonly T[], key: (row: T) => string): Map<string, T[]> {
     const groups = new Map<string, T[]>();
     for (const row of rows) {
          const group = groups.get(key(row));
          if (group) {
               group.push(row);
          } else {
               groups.set(key(row), [row]);
          }
     }
     return groups;
}

/** Loads the items of the given sub-order rows and assembles the aggregates. */
export async function hydrateSubOrders(
     client: PoolClient,
     rows: readonly SubOrderRow[]
): Promise<SellerSubOrder[]> {
     if (rows.length === 0) {
          return [];
     }

     const { rows: itemRows } = await client.query<SubOrderItemRow>(
          `
      SELECT *
      FROM seller_sub_order_items
      WHERE sub_order_id = ANY($1::uuid[])
      ORDER BY sub_order_id, position
    `,
          [rows.map((row) => row.id)]
     );

     const itemsBySubOrder = groupBy(itemRows, (item) => item.sub_order_id);

     return rows.map((row) =>
          mapSubOrder(row, (itemsBySubOrder.get(row.id) ?? []).map(mapSubOrderItem))
     );
}

/** Loads items and sub-orders of the given order rows and assembles the aggregates. */
export async function hydrateOrders(
     client: PoolClient,
     rows: readonly OrderRow[]
): Promise<Order[]> {
     if (rows.length === 0) {
          return [];
     }

     const orderIds = rows.map((row) => row.id);

     const { rows: itemRows } = await client.query<OrderItemRow>(
          `
      SELECT *
      FROM order_items
      WHERE order_id = ANY($1::uuid[])
      ORDER BY order_id, position
    `,
          [orderIds]
     );

     const { rows: subOrderRows } = await client.query<SubOrderRow>(
          `
      SELECT *
      FROM seller_sub_orders
      WHERE order_id = ANY($1::uuid[])
      ORDER BY order_id, sequence
    `,
          [orderIds]
     );

     const subOrders = await hydrateSubOrders(client, subOrderRows);
     const itemsByOrder = groupBy(itemRows, (item) => item.order_id);
     const subOrdersByOrder = groupBy(subOrders, (subOrder) => subOrder.orderId);

     return rows.map((row) =>
          mapOrder(
               row,
               (itemsByOrder.get(row.id) ?? []).map(mapOrderItem),
               subOrdersByOrder.get(row.id) ?? []
          )
     );
}

/** Loads case items of the given case rows and assembles the aggregates. */
export async function hydrateReturnRequests(
     client: PoolClient,
     rows: readonly ReturnRequestRow[]
): Promise<ReturnRequest[]> {
     if (rows.length === 0) {
          return [];
     }

     const { rows: itemRows } = await client.query<CaseItemRow>(
          `
      SELECT *
      FROM case_items
      WHERE case_id = ANY($1::uuid[])
      ORDER BY case_id, created_at
    `,
          [rows.map((row) => row.id)]
     );

     const itemsByCase = groupBy(itemRows, (item) => item.case_id);

     return rows.map((row) =>
          mapReturnRequest(row, (itemsByCase.get(row.id) ?? []).map(mapCaseItem))
     );
}
