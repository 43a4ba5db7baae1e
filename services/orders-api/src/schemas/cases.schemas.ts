import {
     CASE_TYPES,
     RESOLUTION_TYPES,
     RETURN_STATUSES,
} from '@fulfillment/shared/src/types/order.types';
import { errorResponseSchema, idParams } from './common.schemas';

const caseIdParams = idParams('caseId', 'Return case ID');

export const createCaseSchema = {
     tags: ['cases'],
     summary: 'Open a return or complaint case',
     description:
          'Buyer opens a case against a delivered sub-order inside the return window. Without selected items the case covers every item.',
     body: {
          type: 'object',
          required: ['subOrderId', 'reason', 'caseType'],
          properties: {
               subOrderId: { type: 'string' },
               reason: { type: 'string' },
               caseType: { type: 'string', enum: [...CASE_TYPES] },
               selectedItems: {
                    type: 'array',
                    items: {
                         type: 'object',
                         required: ['itemId', 'quantity'],
                         properties: {
                              itemId: { type: 'string' },
                              quantity: { type: 'integer' },
                         },
                    },
               },
          },
     },
     response: {
          400: errorResponseSchema,
          403: errorResponseSchema,
          404: errorResponseSchema,
          422: errorResponseSchema,
     },
};

export const listCasesSchema = {
     tags: ['cases'],
     summary: "List the buyer's cases",
};

export const getCaseSchema = {
     tags: ['cases'],
     summary: 'Get a case',
     params: caseIdParams,
     response: {
          404: errorResponseSchema,
     },
};

export const updateCaseStatusSchema = {
     tags: ['cases'],
     summary: 'Move a case through review',
     params: caseIdParams,
     body: {
          type: 'object',
          required: ['newStatus'],
          properties: {
               newStatus: { type: 'string', enum: [...RETURN_STATUSES] },
               sellerNotes: { type: 'string' },
          },
     },
     response: {
          400: errorResponseSchema,
          403: errorResponseSchema,
          404: errorResponseSchema,
          409: errorResponseSchema,
     },
};

export const resolveCaseSchema = {
     tags: ['cases'],
     summary: 'Resolve a case',
     description:
          'Completes the case, linking an existing refund or initiating a new one. A full refund moves the sub-order to REFUNDED and may cascade to the parent order.',
     params: caseIdParams,
     body: {
          type: 'object',
          required: ['resolutionType'],
          properties: {
               resolutionType: { type: 'string', enum: [...RESOLUTION_TYPES] },
               resolutionReason: { type: 'string' },
               existingRefundId: { type: 'string' },
               initiateNewRefund: { type: 'boolean' },
               paymentTransactionId: { type: 'string' },
               refundAmount: { type: 'number' },
          },
     },
     response: {
          400: errorResponseSchema,
          403: errorResponseSchema,
          404: errorResponseSchema,
          422: errorResponseSchema,
          502: errorResponseSchema,
     },
};

export const linkedRefundSchema = {
     tags: ['cases'],
     summary: 'Refund linked to a resolved case',
     description:
          'Readable by the buyer who opened the case (x-buyer-id) or the seller of its sub-order (x-store-id).',
     params: caseIdParams,
     response: {
          400: errorResponseSchema,
          403: errorResponseSchema,
          404: errorResponseSchema,
          502: errorResponseSchema,
     },
};
