import type {
     ItemStatus,
     OrderStatus,
     ReturnStatus,
     SubOrderStatus,
} from '../types/order.types';

export type TransitionTable<TStatus extends string> = Readonly<
     Record<TStatus, readonly TStatus[]>
>;

function freezeTable<TStatus extends string>(
     table: Record<TStatus, readonly TStatus[]>
): TransitionTable<TStatus> {
     return Object.freeze(table);
}

/**
 * Order-level transitions. Payment decides NEW; REFUNDED is only reached
 * through the sub-order refund cascade, which can fire before payment when
 * every sub-order was cancelled and refunded.
 */
export const ORDER_TRANSITIONS: TransitionTable<OrderStatus> = freezeTable<OrderStatus>({
     NEW: ['PAID', 'FAILED', 'REFUNDED'],
     PAID: ['REFUNDED'],
     FAILED: [],
     REFUNDED: [],
});

export const SUB_ORDER_TRANSITIONS: TransitionTable<SubOrderStatus> = freezeTable<SubOrderStatus>({
     NEW: ['PAID', 'CANCELLED'],
     PAID: ['PREPARING', 'CANCELLED', 'REFUNDED'],
     PREPARING: ['SHIPPED', 'CANCELLED'],
     SHIPPED: ['DELIVERED'],
     DELIVERED: ['REFUNDED'],
     CANCELLED: ['REFUNDED'],
     REFUNDED: [],
     FAILED: [],
});

export const ITEM_TRANSITIONS: TransitionTable<ItemStatus> = freezeTable<ItemStatus>({
     NEW: ['PREPARING', 'SHIPPED', 'CANCELLED'],
     PREPARING: ['SHIPPED', 'CANCELLED'],
     SHIPPED: ['DELIVERED'],
     DELIVERED: [],
     CANCELLED: [],
});

export const RETURN_TRANSITIONS: TransitionTable<ReturnStatus> = freezeTable<ReturnStatus>({
     REQUESTED: ['UNDER_REVIEW', 'APPROVED', 'REJECTED'],
     UNDER_REVIEW: ['APPROVED', 'REJECTED'],
     APPROVED: ['COMPLETED'],
     REJECTED: [],
     COMPLETED: [],
});

export function canTransition<TStatus extends string>(
     table: TransitionTable<TStatus>,
     from: TStatus,
     to: TStatus
): boolean {
     return table[from].includes(to);
}

export function isTerminal<TStatus extends string>(
     table: TransitionTable<TStatus>,
     status: TStatus
): boolean {
     return table[status].length === 0;
}

export function canTransitionOrder(from: OrderStatus, to: OrderStatus): boolean {
     return canTransition(ORDER_TRANSITIONS, from, to);
}

export function canTransitionSubOrder(from: SubOrderStatus, to: SubOrderStatus): boolean {
     return canTransition(SUB_ORDER_TRANSITIONS, from, to);
}

export function canTransitionItem(from: ItemStatus, to: ItemStatus): boolean {
     return canTransition(ITEM_TRANSITIONS, from, to);
}

export function canTransitionCase(from: ReturnStatus, to: ReturnStatus): boolean {
     return canTransition(RETURN_TRANSITIONS, from, to);
}

/** A case is open while it can still move; REJECTED and COMPLETED close it. */
export function isOpenCaseStatus(status: ReturnStatus): boolean {
     return !isTerminal(RETURN_TRANSITIONS, status);
}
