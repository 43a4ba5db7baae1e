import { errorResponseSchema, idParams, pagingQuerystring } from './common.schemas';

const orderIdParams = idParams('orderId', 'Parent order ID');

export const placeOrderSchema = {
     tags: ['orders'],
     summary: 'Place an order',
     description:
          'Creates the parent order from a checkout and splits it into one sub-order per seller. The buyer is taken from the x-buyer-id header.',
     body: {
          type: 'object',
          required: ['paymentTransactionId', 'shippingTotal', 'items'],
          properties: {
               buyerEmail: { type: 'string', example: 'buyer@example.com' },
               paymentTransactionId: { type: 'string', example: 'txn-1001' },
               paymentMethodName: { type: 'string', example: 'Card' },
               shippingTotal: { type: 'number', example: 30 },
               deliveryAddress: {
                    type: 'object',
                    required: ['fullName', 'addressLine1', 'city', 'postalCode', 'country'],
                    properties: {
                         fullName: { type: 'string' },
                         addressLine1: { type: 'string' },
                         addressLine2: { type: 'string' },
                         city: { type: 'string' },
                         state: { type: 'string' },
                         postalCode: { type: 'string' },
                         country: { type: 'string' },
                         phoneNumber: { type: 'string' },
                         deliveryInstructions: { type: 'string' },
                    },
               },
               items: {
                    type: 'array',
                    items: {
                         type: 'object',
                         required: [
                              'productId',
                              'productTitle',
                              'storeId',
                              'storeName',
                              'unitPrice',
                              'quantity',
                         ],
                         properties: {
                              productId: { type: 'string' },
                              productTitle: { type: 'string' },
                              storeId: { type: 'string' },
                              storeName: { type: 'string' },
                              unitPrice: { type: 'number', example: 12.5 },
                              quantity: { type: 'integer', example: 2 },
                              shippingMethodName: { type: 'string' },
                         },
                    },
               },
          },
     },
     response: {
          400: errorResponseSchema,
     },
};

export const listOrdersSchema = {
     tags: ['orders'],
     summary: "List the buyer's orders",
};

export const searchOrdersSchema = {
     tags: ['orders'],
     summary: "Search the buyer's orders",
     description: 'Paged listing filtered by status (comma separated), creation date and store.',
     querystring: {
          type: 'object',
          properties: {
               ...pagingQuerystring,
               status: { type: 'string', example: 'PAID,REFUNDED' },
               storeId: { type: 'string' },
          },
     },
};

export const getOrderSchema = {
     tags: ['orders'],
     summary: 'Get an order with its sub-orders',
     params: orderIdParams,
     response: {
          404: errorResponseSchema,
     },
};

export const getOrderByTransactionSchema = {
     tags: ['orders'],
     summary: 'Get an order by its payment transaction',
     params: {
          type: 'object',
          required: ['paymentTransactionId'],
          properties: {
               paymentTransactionId: { type: 'string' },
          },
     },
     response: {
          404: errorResponseSchema,
     },
};

export const paymentOutcomeSchema = {
     tags: ['orders'],
     summary: 'Apply the payment outcome',
     description:
          'Moves a NEW order and all of its sub-orders to PAID or FAILED. Only valid while the order is NEW.',
     params: orderIdParams,
     body: {
          type: 'object',
          required: ['succeeded'],
          properties: {
               succeeded: { type: 'boolean' },
          },
     },
     response: {
          404: errorResponseSchema,
          409: errorResponseSchema,
     },
};

export const sendConfirmationSchema = {
     tags: ['orders'],
     summary: 'Send the order confirmation email',
     params: orderIdParams,
     body: {
          type: 'object',
          properties: {
               buyerEmail: { type: 'string' },
          },
     },
     response: {
          202: {
               type: 'object',
               properties: {
                    status: { type: 'string', example: 'queued' },
               },
          },
          400: errorResponseSchema,
          502: errorResponseSchema,
     },
};
