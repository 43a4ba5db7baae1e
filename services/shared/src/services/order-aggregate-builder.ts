import type {
     CheckoutLineItem,
     DeliveryAddress,
     Order,
     OrderItem,
     PlaceOrderCommand,
     SellerSubOrder,
     SellerSubOrderItem,
} from '../types/order.types';
import { lineTotal, roundMoney, splitEvenly, sumMoney } from '../domain/money';
import { generateOrderNumber, generateSubOrderNumber } from '../domain/numbering';
import type { Clock } from '../utils/clock';
import { ValidationError } from '../utils/errors';
import { fail, ok, OperationResult } from '../utils/result';

export interface OrderAggregateBuilderDependencies {
     clock: Clock;
     generateId: () => string;
}

function isBlank(value: string | undefined): boolean {
     return value === undefined || value.trim() === '';
}

function validateDeliveryAddress(address: DeliveryAddress | undefined): string[] {
     if (!address) {
          return ['Delivery address is required.'];
     }

     const errors: string[] = [];
     if (isBlank(address.fullName)) errors.push('Delivery full name is required.');
     if (isBlank(address.addressLine1)) errors.push('Delivery address line 1 is required.');
     if (isBlank(address.city)) errors.push('Delivery city is required.');
     if (isBlank(address.postalCode)) errors.push('Delivery postal code is required.');
     if (isBlank(address.country)) errors.push('Delivery country is required.');
     return errors;
}

function validate(command: PlaceOrderCommand): string[] {
     const errors: string[] = [];

     if (isBlank(command.buyerId)) errors.push('Buyer ID is required.');
     if (isBlank(command.paymentTransactionId)) errors.push('Payment transaction ID is required.');
     if (command.shippingTotal < 0) errors.push('Shipping total cannot be negative.');

     if (command.items.length === 0) {
          errors.push('Order must contain at least one item.');
     }
     if (command.items.some((item) => !Number.isInteger(item.quantity) || item.quantity <= 0)) {
          errors.push('Item quantity must be greater than zero.');
     }
     if (command.items.some((item) => item.unitPrice < 0)) {
          errors.push('Item unit price cannot be negative.');
     }

     return [...errors, ...validateDeliveryAddress(command.deliveryAddress)];
}

interface StoreGroup {
     storeId: string;
     storeName: string;
     lines: CheckoutLineItem[];
}

/** Groups lines by seller, keeping the order in which sellers first appear. */
function groupByStore(items: readonly CheckoutLineItem[]): StoreGroup[] {
     const groups = new Map<string, StoreGroup>();

     for (const item of items) {
          const key = JSON.stringify([item.storeId, item.storeName]);
          const group = groups.get(key);
          if (group) {
               group.lines.push(item);
          } else {
               groups.set(key, { storeId: item.storeId, storeName: item.storeName, lines: [item] });
          }
     }

     return [...groups.values()];
}

/**
 * Turns a checkout into a parent order plus one sub-order per seller. The
 * shipping total is split evenly across sellers, leftover cents going to the
 * first sub-order.
 */
export class OrderAggregateBuilder {
     constructor(private readonly deps: OrderAggregateBuilderDependencies) {}

     build(command: PlaceOrderCommand): OperationResult<Order> {
          const errors = validate(command);
          if (errors.length > 0 || !command.deliveryAddress) {
               return fail(new ValidationError(errors));
          }

          const now = this.deps.clock.now();
          const orderId = this.deps.generateId();
          const orderNumber = generateOrderNumber(orderId);

          const orderItems: OrderItem[] = command.items.map((line) => ({
               id: this.deps.generateId(),
               orderId,
               productId: line.productId,
               productTitle: line.productTitle,
               storeId: line.storeId,
               storeName: line.storeName,
               unitPrice: roundMoney(line.unitPrice),
               quantity: line.quantity,
               createdAt: now,
          }));

          const groups = groupByStore(command.items);
          const shippingShares = splitEvenly(command.shippingTotal, groups.length);

          const subOrders = groups.map((group, index): SellerSubOrder => {
               const subOrderId = this.deps.generateId();
               const sequence = index + 1;
               const itemsSubtotal = sumMoney(
                    group.lines.map((line) => lineTotal(line.unitPrice, line.quantity))
               );
               const shippingCost = shippingShares[index] ?? 0;

               return {
                    id: subOrderId,
                    orderId,
                    storeId: group.storeId,
                    storeName: group.storeName,
                    sequence,
                    subOrderNumber: generateSubOrderNumber(orderNumber, sequence),
                    status: 'NEW',
                    itemsSubtotal,
                    shippingCost,
                    totalAmount: sumMoney([itemsSubtotal, shippingCost]),
                    shippingMethodName: group.lines[0]?.shippingMethodName,
                    createdAt: now,
                    lastUpdatedAt: now,
                    version: 1,
                    items: group.lines.map(
                         (line): SellerSubOrderItem => ({
                              id: this.deps.generateId(),
                              subOrderId,
                              productId: line.productId,
                              productTitle: line.productTitle,
                              unitPrice: roundMoney(line.unitPrice),
                              quantity: line.quantity,
                              status: 'NEW',
                              createdAt: now,
                              lastUpdatedAt: now,
                         })
                    ),
               };
          });

          const itemsSubtotal = sumMoney(
               orderItems.map((item) => lineTotal(item.unitPrice, item.quantity))
          );
          const shippingTotal = roundMoney(command.shippingTotal);

          const order: Order = {
               id: orderId,
               buyerId: command.buyerId,
               buyerEmail: command.buyerEmail,
               orderNumber,
               status: 'NEW',
               paymentTransactionId: command.paymentTransactionId,
               paymentMethodName: command.paymentMethodName,
               itemsSubtotal,
               shippingTotal,
               totalAmount: sumMoney([itemsSubtotal, shippingTotal]),
               deliveryAddress: { ...command.deliveryAddress },
               createdAt: now,
               lastUpdatedAt: now,
               version: 1,
               items: orderItems,
               subOrders,
          };

          return ok(order);
     }
}
