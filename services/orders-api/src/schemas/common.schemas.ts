export const errorResponseSchema = {
     type: 'object',
     properties: {
          error: { type: 'string', example: 'VALIDATION_FAILED' },
          message: { type: 'string', example: 'Buyer ID is required.' },
          errors: { type: 'array', items: { type: 'string' } },
     },
};

export const pagingQuerystring = {
     page: {
          type: 'integer',
          description: 'One-based page number',
          default: 1,
          example: 1,
     },
     pageSize: {
          type: 'integer',
          description: 'Page size (1-100)',
          default: 20,
          example: 20,
     },
     fromDate: {
          type: 'string',
          format: 'date-time',
          description: 'Only include records created at or after this instant',
     },
     toDate: {
          type: 'string',
          format: 'date-time',
          description: 'Only include records created at or before this instant',
     },
};

export function idParams(name: string, description: string) {
     return {
          type: 'object',
          required: [name],
          properties: {
               [name]: { type: 'string', format: 'uuid', description },
          },
     };
}
