import * as dotenv from 'dotenv';

// Load environment variables
dotenv.config();

export interface FulfillmentConfig {
     returnWindowDays: number;
     ordersApi: {
          port: number;
          host: string;
     };
     refundClient: {
          type: 'mock' | 'http';
          baseUrl?: string;
          apiKey?: string;
     };
}

export const DEFAULT_RETURN_WINDOW_DAYS = 30;

function parseReturnWindowDays(raw: string | undefined): number {
     if (raw === undefined || raw.trim() === '') {
          return DEFAULT_RETURN_WINDOW_DAYS;
     }

     const days = Number(raw);
     if (!Number.isInteger(days) || days < 0) {
          throw new Error(`RETURN_WINDOW_DAYS must be a non-negative integer, got '${raw}'`);
     }

     return days;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): FulfillmentConfig {
     const refundClientType = env.REFUND_CLIENT_TYPE || 'mock';
     if (refundClientType !== 'mock' && refundClientType !== 'http') {
          throw new Error(`REFUND_CLIENT_TYPE must be 'mock' or 'http', got '${refundClientType}'`);
     }

     return {
          returnWindowDays: parseReturnWindowDays(env.RETURN_WINDOW_DAYS),
          ordersApi: {
               port: parseInt(env.ORDERS_API_PORT || '3000', 10),
               host: env.ORDERS_API_HOST || '0.0.0.0',
          },
          refundClient: {
               type: refundClientType,
               baseUrl: env.REFUND_API_URL || undefined,
               apiKey: env.REFUND_API_KEY || undefined,
          },
     };
}
