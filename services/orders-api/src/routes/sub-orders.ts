import { FastifyInstance } from 'fastify';
import {
     SUB_ORDER_STATUSES,
     ItemStatusUpdatesCommand,
     SubOrderTransitionCommand,
     TrackingInfoCommand,
} from '@fulfillment/shared/src/types/order.types';
import {
     cancelledItemsRefundSchema,
     caseEligibilitySchema,
     getSubOrderSchema,
     itemStatusUpdatesSchema,
     listSubOrdersSchema,
     searchSubOrdersSchema,
     shippingHistorySchema,
     subOrderCaseSchema,
     subOrderTransitionSchema,
     trackingInfoSchema,
} from '../schemas/sub-orders.schemas';
import { identity, parseDate, parseStatuses, respond, RouteDependencies, sendError } from './respond';

interface SubOrderParams {
     subOrderId: string;
}

export async function registerSubOrderRoutes(app: FastifyInstance, options: RouteDependencies) {
     const { unitOfWork } = options;

     app.get('/', { schema: listSubOrdersSchema }, async (request, reply) => {
          const storeId = identity(request, 'x-store-id');
          return respond(
               reply,
               () => unitOfWork((services) => services.queries.getSellerSubOrders(storeId)),
               { failureMessage: 'Failed to list sub-orders' }
          );
     });

     app.get<{
          Querystring: {
               page: number;
               pageSize: number;
               fromDate?: string;
               toDate?: string;
               status?: string;
               buyerSearchTerm?: string;
          };
     }>('/search', { schema: searchSubOrdersSchema }, async (request, reply) => {
          const query = request.query;
          const statuses = parseStatuses(SUB_ORDER_STATUSES, query.status);
          if (!statuses.succeeded) {
               return sendError(reply, statuses.error);
          }

          const filter = {
               storeId: identity(request, 'x-store-id'),
               statuses: statuses.value,
               fromDate: parseDate(query.fromDate),
               toDate: parseDate(query.toDate),
               buyerSearchTerm: query.buyerSearchTerm,
               page: query.page,
               pageSize: query.pageSize,
          };
          return respond(
               reply,
               () => unitOfWork((services) => services.queries.getFilteredSellerSubOrders(filter)),
               { failureMessage: 'Failed to search sub-orders' }
          );
     });

     app.get<{ Params: SubOrderParams }>(
          '/:subOrderId',
          { schema: getSubOrderSchema },
          async (request, reply) => {
               const storeId = identity(request, 'x-store-id');
               const { subOrderId } = request.params;
               return respond(
                    reply,
                    () =>
                         unitOfWork((services) =>
                              services.queries.getSellerSubOrder(subOrderId, storeId)
                         ),
                    { failureMessage: 'Failed to get sub-order' }
               );
          }
     );

     // Seller-driven transition; items follow the sub-order
     app.post<{ Params: SubOrderParams; Body: SubOrderTransitionCommand }>(
          '/:subOrderId/status',
          { schema: subOrderTransitionSchema },
          async (request, reply) => {
               const storeId = identity(request, 'x-store-id');
               const { subOrderId } = request.params;
               return respond(
                    reply,
                    () =>
                         unitOfWork((services) =>
                              services.subOrders.applySubOrderTransition(
                                   subOrderId,
                                   storeId,
                                   request.body
                              )
                         ),
                    { failureMessage: 'Failed to update sub-order status' }
               );
          }
     );

     // Item-driven updates; the sub-order status is derived afterwards
     app.post<{ Params: SubOrderParams; Body: ItemStatusUpdatesCommand }>(
          '/:subOrderId/items/status',
          { schema: itemStatusUpdatesSchema },
          async (request, reply) => {
               const storeId = identity(request, 'x-store-id');
               const { subOrderId } = request.params;
               return respond(
                    reply,
                    () =>
                         unitOfWork((services) =>
                              services.subOrders.applyItemStatusUpdates(
                                   subOrderId,
                                   storeId,
                                   request.body
                              )
                         ),
                    { failureMessage: 'Failed to update item statuses' }
               );
          }
     );

     app.put<{ Params: SubOrderParams; Body: TrackingInfoCommand }>(
          '/:subOrderId/tracking',
          { schema: trackingInfoSchema },
          async (request, reply) => {
               const storeId = identity(request, 'x-store-id');
               const { subOrderId } = request.params;
               return respond(
                    reply,
                    () =>
                         unitOfWork((services) =>
                              services.subOrders.updateTrackingInfo(subOrderId, storeId, request.body)
                         ),
                    { failureMessage: 'Failed to update tracking info' }
               );
          }
     );

     app.get<{ Params: SubOrderParams }>(
          '/:subOrderId/history',
          { schema: shippingHistorySchema },
          async (request, reply) => {
               const storeId = identity(request, 'x-store-id');
               const { subOrderId } = request.params;
               return respond(
                    reply,
                    () =>
                         unitOfWork((services) =>
                              services.queries.getShippingStatusHistory(subOrderId, storeId)
                         ),
                    { failureMessage: 'Failed to get shipping status history' }
               );
          }
     );

     app.get<{ Params: SubOrderParams }>(
          '/:subOrderId/cancelled-items-refund',
          { schema: cancelledItemsRefundSchema },
          async (request, reply) => {
               const storeId = identity(request, 'x-store-id');
               const { subOrderId } = request.params;
               return respond(
                    reply,
                    () =>
                         unitOfWork((services) =>
                              services.subOrders.calculateCancelledItemsRefund(subOrderId, storeId)
                         ),
                    { failureMessage: 'Failed to calculate cancelled items refund' }
               );
          }
     );

     app.get<{ Params: SubOrderParams }>(
          '/:subOrderId/case',
          { schema: subOrderCaseSchema },
          async (request, reply) => {
               const storeId = identity(request, 'x-store-id');
               const { subOrderId } = request.params;
               return respond(
                    reply,
                    () =>
                         unitOfWork((services) =>
                              services.queries.getCaseForSubOrder(subOrderId, storeId)
                         ),
                    { failureMessage: 'Failed to get case for sub-order' }
               );
          }
     );

     app.get<{ Params: SubOrderParams }>(
          '/:subOrderId/case-eligibility',
          { schema: caseEligibilitySchema },
          async (request, reply) => {
               const buyerId = identity(request, 'x-buyer-id');
               const { subOrderId } = request.params;
               return respond(
                    reply,
                    () => unitOfWork((services) => services.cases.checkEligibility(subOrderId, buyerId)),
                    { failureMessage: 'Failed to check case eligibility' }
               );
          }
     );
}
