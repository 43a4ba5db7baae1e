import { FastifyInstance } from 'fastify';
import {
     ORDER_STATUSES,
     CheckoutLineItem,
     DeliveryAddress,
} from '@fulfillment/shared/src/types/order.types';
import {
     getOrderByTransactionSchema,
     getOrderSchema,
     listOrdersSchema,
     paymentOutcomeSchema,
     placeOrderSchema,
     searchOrdersSchema,
     sendConfirmationSchema,
} from '../schemas/orders.schemas';
import { identity, parseDate, parseStatuses, respond, RouteDependencies, sendError } from './respond';

export async function registerOrderRoutes(app: FastifyInstance, options: RouteDependencies) {
     const { unitOfWork } = options;

     // Place an order for the calling buyer
     app.post<{
          Body: {
               buyerEmail?: string;
               paymentTransactionId: string;
               paymentMethodName?: string;
               shippingTotal: number;
               deliveryAddress?: DeliveryAddress;
               items: CheckoutLineItem[];
          };
     }>('/', { schema: placeOrderSchema }, async (request, reply) => {
          const buyerId = identity(request, 'x-buyer-id');
          return respond(
               reply,
               () => unitOfWork((services) => services.orders.placeOrder({ ...request.body, buyerId })),
               { failureMessage: 'Failed to place order', statusCode: 201 }
          );
     });

     app.get('/', { schema: listOrdersSchema }, async (request, reply) => {
          const buyerId = identity(request, 'x-buyer-id');
          return respond(
               reply,
               () => unitOfWork((services) => services.queries.getOrdersForBuyer(buyerId)),
               { failureMessage: 'Failed to list orders' }
          );
     });

     app.get<{
          Querystring: {
               page: number;
               pageSize: number;
               fromDate?: string;
               toDate?: string;
               status?: string;
               storeId?: string;
          };
     }>('/search', { schema: searchOrdersSchema }, async (request, reply) => {
          const query = request.query;
          const statuses = parseStatuses(ORDER_STATUSES, query.status);
          if (!statuses.succeeded) {
               return sendError(reply, statuses.error);
          }

          const filter = {
               buyerId: identity(request, 'x-buyer-id'),
               statuses: statuses.value,
               fromDate: parseDate(query.fromDate),
               toDate: parseDate(query.toDate),
               storeId: query.storeId,
               page: query.page,
               pageSize: query.pageSize,
          };
          return respond(
               reply,
               () => unitOfWork((services) => services.queries.getFilteredOrdersForBuyer(filter)),
               { failureMessage: 'Failed to search orders' }
          );
     });

     app.get<{ Params: { paymentTransactionId: string } }>(
          '/by-transaction/:paymentTransactionId',
          { schema: getOrderByTransactionSchema },
          async (request, reply) => {
               const buyerId = identity(request, 'x-buyer-id');
               const { paymentTransactionId } = request.params;
               return respond(
                    reply,
                    () =>
                         unitOfWork((services) =>
                              services.queries.getOrderByTransaction(paymentTransactionId, buyerId)
                         ),
                    { failureMessage: 'Failed to get order by transaction' }
               );
          }
     );

     app.get<{ Params: { orderId: string } }>(
          '/:orderId',
          { schema: getOrderSchema },
          async (request, reply) => {
               const buyerId = identity(request, 'x-buyer-id');
               const { orderId } = request.params;
               return respond(
                    reply,
                    () => unitOfWork((services) => services.queries.getOrder(orderId, buyerId)),
                    { failureMessage: 'Failed to get order' }
               );
          }
     );

     // Payment callback: the order and every sub-order move together
     app.post<{ Params: { orderId: string }; Body: { succeeded: boolean } }>(
          '/:orderId/payment',
          { schema: paymentOutcomeSchema },
          async (request, reply) => {
               const { orderId } = request.params;
               const { succeeded } = request.body;
               return respond(
                    reply,
                    () =>
                         unitOfWork((services) =>
                              services.orders.applyPaymentOutcome(orderId, succeeded)
                         ),
                    { failureMessage: 'Failed to apply payment outcome' }
               );
          }
     );

     app.post<{ Params: { orderId: string }; Body: { buyerEmail?: string } }>(
          '/:orderId/confirmation-email',
          { schema: sendConfirmationSchema },
          async (request, reply) => {
               const { orderId } = request.params;
               const buyerEmail = request.body?.buyerEmail;
               return respond(
                    reply,
                    () =>
                         unitOfWork((services) =>
                              services.orders.sendOrderConfirmation(orderId, buyerEmail)
                         ),
                    {
                         failureMessage: 'Failed to send order confirmation',
                         statusCode: 202,
                         present: () => ({ status: 'queued' }),
                    }
               );
          }
     );
}
