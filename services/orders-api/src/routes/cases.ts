import { FastifyInstance } from 'fastify';
import type {
     CaseType,
     ResolutionType,
     ReturnStatus,
     SelectedCaseItem,
} from '@fulfillment/shared/src/types/order.types';
import {
     createCaseSchema,
     getCaseSchema,
     linkedRefundSchema,
     listCasesSchema,
     resolveCaseSchema,
     updateCaseStatusSchema,
} from '../schemas/cases.schemas';
import { identity, respond, RouteDependencies } from './respond';

interface CaseParams {
     caseId: string;
}

export async function registerCaseRoutes(app: FastifyInstance, options: RouteDependencies) {
     const { unitOfWork } = options;

     app.post<{
          Body: {
               subOrderId: string;
               reason: string;
               caseType: CaseType;
               selectedItems?: SelectedCaseItem[];
          };
     }>('/', { schema: createCaseSchema }, async (request, reply) => {
          const buyerId = identity(request, 'x-buyer-id');
          return respond(
               reply,
               () => unitOfWork((services) => services.cases.createCase({ ...request.body, buyerId })),
               { failureMessage: 'Failed to create case', statusCode: 201 }
          );
     });

     app.get('/', { schema: listCasesSchema }, async (request, reply) => {
          const buyerId = identity(request, 'x-buyer-id');
          return respond(
               reply,
               () => unitOfWork((services) => services.queries.getCasesForBuyer(buyerId)),
               { failureMessage: 'Failed to list cases' }
          );
     });

     app.get<{ Params: CaseParams }>('/:caseId', { schema: getCaseSchema }, async (request, reply) => {
          const buyerId = identity(request, 'x-buyer-id');
          const { caseId } = request.params;
          return respond(
               reply,
               () => unitOfWork((services) => services.queries.getCase(caseId, buyerId)),
               { failureMessage: 'Failed to get case' }
          );
     });

     app.post<{ Params: CaseParams; Body: { newStatus: ReturnStatus; sellerNotes?: string } }>(
          '/:caseId/status',
          { schema: updateCaseStatusSchema },
          async (request, reply) => {
               const storeId = identity(request, 'x-store-id');
               const { caseId } = request.params;
               const { newStatus, sellerNotes } = request.body;
               return respond(
                    reply,
                    () =>
                         unitOfWork((services) =>
                              services.cases.updateStatus(caseId, storeId, newStatus, sellerNotes)
                         ),
                    { failureMessage: 'Failed to update case status' }
               );
          }
     );

     // Refund call happens before any local write; a failed refund leaves the case untouched
     app.post<{
          Params: CaseParams;
          Body: {
               resolutionType: ResolutionType;
               resolutionReason?: string;
               existingRefundId?: string;
               initiateNewRefund?: boolean;
               paymentTransactionId?: string;
               refundAmount?: number;
          };
     }>('/:caseId/resolution', { schema: resolveCaseSchema }, async (request, reply) => {
          const storeId = identity(request, 'x-store-id');
          const initiatedBy = identity(request, 'x-user-id') || storeId;
          const { caseId } = request.params;
          return respond(
               reply,
               () =>
                    unitOfWork((services) =>
                         services.cases.resolveCase(caseId, storeId, { ...request.body, initiatedBy })
                    ),
               { failureMessage: 'Failed to resolve case' }
          );
     });

     app.get<{ Params: CaseParams }>(
          '/:caseId/refund',
          { schema: linkedRefundSchema },
          async (request, reply) => {
               const { caseId } = request.params;
               const caller = {
                    buyerId: identity(request, 'x-buyer-id'),
                    storeId: identity(request, 'x-store-id'),
               };
               return respond(
                    reply,
                    () => unitOfWork((services) => services.cases.getLinkedRefundInfo(caseId, caller)),
                    {
                         failureMessage: 'Failed to get linked refund',
                         present: (refund) => ({ linked: refund !== undefined, refund: refund ?? null }),
                    }
               );
          }
     );
}
