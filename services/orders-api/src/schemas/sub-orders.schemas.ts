import { ITEM_STATUSES, SUB_ORDER_STATUSES } from '@fulfillment/shared/src/types/order.types';
import { errorResponseSchema, idParams, pagingQuerystring } from './common.schemas';

const subOrderIdParams = idParams('subOrderId', 'Seller sub-order ID');

export const listSubOrdersSchema = {
     tags: ['sub-orders'],
     summary: "List the store's sub-orders",
};

export const searchSubOrdersSchema = {
     tags: ['sub-orders'],
     summary: "Search the store's sub-orders",
     description:
          'Paged listing filtered by status (comma separated), creation date and a buyer search term matched against buyer id, email and delivery name.',
     querystring: {
          type: 'object',
          properties: {
               ...pagingQuerystring,
               status: { type: 'string', example: 'PAID,PREPARING' },
               buyerSearchTerm: { type: 'string' },
          },
     },
};

export const getSubOrderSchema = {
     tags: ['sub-orders'],
     summary: 'Get a sub-order with its items',
     params: subOrderIdParams,
     response: {
          403: errorResponseSchema,
          404: errorResponseSchema,
     },
};

export const subOrderTransitionSchema = {
     tags: ['sub-orders'],
     summary: 'Transition a sub-order',
     description:
          'Applies a seller transition. Items follow the sub-order; SHIPPED requires tracking number and carrier.',
     params: subOrderIdParams,
     body: {
          type: 'object',
          required: ['newStatus'],
          properties: {
               newStatus: { type: 'string', enum: [...SUB_ORDER_STATUSES] },
               trackingNumber: { type: 'string' },
               shippingCarrier: { type: 'string' },
          },
     },
     response: {
          400: errorResponseSchema,
          403: errorResponseSchema,
          404: errorResponseSchema,
          409: errorResponseSchema,
     },
};

export const itemStatusUpdatesSchema = {
     tags: ['sub-orders'],
     summary: 'Update item statuses',
     description: 'Applies per-item transitions and derives the sub-order status from the full item set.',
     params: subOrderIdParams,
     body: {
          type: 'object',
          required: ['updates'],
          properties: {
               updates: {
                    type: 'array',
                    items: {
                         type: 'object',
                         required: ['itemId', 'newStatus'],
                         properties: {
                              itemId: { type: 'string' },
                              newStatus: { type: 'string', enum: [...ITEM_STATUSES] },
                         },
                    },
               },
               trackingNumber: { type: 'string' },
               shippingCarrier: { type: 'string' },
          },
     },
     response: {
          400: errorResponseSchema,
          403: errorResponseSchema,
          404: errorResponseSchema,
          409: errorResponseSchema,
          422: errorResponseSchema,
     },
};

export const trackingInfoSchema = {
     tags: ['sub-orders'],
     summary: 'Correct tracking information of a shipped sub-order',
     params: subOrderIdParams,
     body: {
          type: 'object',
          required: ['trackingNumber', 'shippingCarrier'],
          properties: {
               trackingNumber: { type: 'string' },
               shippingCarrier: { type: 'string' },
          },
     },
     response: {
          400: errorResponseSchema,
          422: errorResponseSchema,
     },
};

export const shippingHistorySchema = {
     tags: ['sub-orders'],
     summary: 'Shipping status history, oldest first',
     params: subOrderIdParams,
};

export const cancelledItemsRefundSchema = {
     tags: ['sub-orders'],
     summary: 'Refund owed for cancelled items',
     params: subOrderIdParams,
};

export const subOrderCaseSchema = {
     tags: ['sub-orders'],
     summary: 'Most recent case opened against the sub-order',
     params: subOrderIdParams,
};

export const caseEligibilitySchema = {
     tags: ['sub-orders'],
     summary: 'Whether the buyer can open a case for the sub-order',
     params: subOrderIdParams,
};
