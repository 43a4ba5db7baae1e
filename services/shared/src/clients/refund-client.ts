import { randomUUID } from 'crypto';
import { RefundApiError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface RefundRecord {
     id: string;
     orderId: string;
     subOrderId?: string;
     amount: number;
     status: string;
     externalReference?: string;
     completedAt?: Date;
}

export type RefundResult =
     | { succeeded: true; refund: RefundRecord }
     | { succeeded: false; errors: string[] };

/** `amount` is the sub-order total for full refunds and the agreed amount for partial ones. */
export interface RefundRequest {
     orderId: string;
     subOrderId: string;
     storeId: string;
     paymentTransactionId: string;
     reason: string;
     initiatedBy: string;
     initiatedByRole: string;
     amount: number;
     auditNote?: string;
}

export interface RefundClient {
     getRefund(refundId: string): Promise<RefundRecord | undefined>;
     processFullRefund(request: RefundRequest): Promise<RefundResult>;
     processPartialRefund(request: RefundRequest): Promise<RefundResult>;
}

interface RefundResponseBody {
     id: string;
     orderId: string;
     subOrderId?: string;
     amount: number | string;
     status: string;
     externalReference?: string;
     completedAt?: string;
}

function toRefundRecord(body: RefundResponseBody): RefundRecord {
     return {
          id: body.id,
          orderId: body.orderId,
          subOrderId: body.subOrderId,
          amount: typeof body.amount === 'number' ? body.amount : parseFloat(body.amount),
          status: body.status,
          externalReference: body.externalReference,
          completedAt: body.completedAt ? new Date(body.completedAt) : undefined,
     };
}

// Statuses for which the refund service reports a rejected request rather than a fault
const REJECTION_STATUSES = [400, 409, 422];

export class RefundHttpClient implements RefundClient {
     constructor(
          private baseUrl: string,
          private apiKey: string
     ) {}

     async getRefund(refundId: string): Promise<RefundRecord | undefined> {
          logger.info({ refundId }, 'Refund lookup call');

          const response = await fetch(`${this.baseUrl}/refunds/${encodeURIComponent(refundId)}`, {
               headers: {
                    Authorization: `Bearer ${this.apiKey}`,
               },
          });

          if (response.status === 404) {
               return undefined;
          }

          if (!response.ok) {
               throw new RefundApiError(response.status, await response.text());
          }

          return toRefundRecord((await response.json()) as RefundResponseBody);
     }

     async processFullRefund(request: RefundRequest): Promise<RefundResult> {
          return this.submit('/refunds/full', request);
     }

     async processPartialRefund(request: RefundRequest): Promise<RefundResult> {
          return this.submit('/refunds/partial', request);
     }

     private async submit(
          path: string,
          request: RefundRequest
     ): Promise<RefundResult> {
          logger.info(
               { orderId: request.orderId, subOrderId: request.subOrderId, path },
               'Refund request call'
          );

          const response = await fetch(`${this.baseUrl}${path}`, {
               method: 'POST',
               headers: {
                    Authorization: `Bearer ${this.apiKey}`,
                    'Content-Type': 'application/json',
               },
               body: JSON.stringify(request),
          });

          if (REJECTION_STATUSES.includes(response.status)) {
               const body = (await response.json()) as { errors?: string[]; message?: string };
               const errors = body.errors ?? [body.message ?? 'Refund request was rejected.'];
               logger.warn({ orderId: request.orderId, errors }, 'Refund request rejected');
               return { succeeded: false, errors };
          }

          if (!response.ok) {
               throw new RefundApiError(response.status, await response.text());
          }

          const refund = toRefundRecord((await response.json()) as RefundResponseBody);
          logger.info({ orderId: request.orderId, refundId: refund.id }, 'Refund request accepted');

          return { succeeded: true, refund };
     }
}

export class RefundMockClient implements RefundClient {
     private refunds = new Map<string, RefundRecord>();

     async getRefund(refundId: string): Promise<RefundRecord | undefined> {
          logger.debug({ refundId }, 'Mock refund lookup');
          return this.refunds.get(refundId);
     }

     async processFullRefund(request: RefundRequest): Promise<RefundResult> {
          logger.debug({ request }, 'Mock full refund');
          await this.simulateLatency();

          return { succeeded: true, refund: this.record(request) };
     }

     async processPartialRefund(request: RefundRequest): Promise<RefundResult> {
          logger.debug({ request }, 'Mock partial refund');
          await this.simulateLatency();

          if (request.amount <= 0) {
               return { succeeded: false, errors: ['Refund amount must be greater than zero.'] };
          }

          return { succeeded: true, refund: this.record(request) };
     }

     /** Registers a refund created outside this client, e.g. by a payment provider. */
     seed(refund: RefundRecord): void {
          this.refunds.set(refund.id, refund);
     }

     private record(request: RefundRequest): RefundRecord {
          const refund: RefundRecord = {
               id: randomUUID(),
               orderId: request.orderId,
               subOrderId: request.subOrderId,
               amount: request.amount,
               status: 'COMPLETED',
               externalReference: `MOCK-${request.paymentTransactionId}`,
               completedAt: new Date(),
          };
          this.refunds.set(refund.id, refund);
          return refund;
     }

     private async simulateLatency(): Promise<void> {
          if (process.env.NODE_ENV === 'test') return;
          await new Promise((resolve) => setTimeout(resolve, 50 + Math.random() * 100));
     }
}

export function createRefundClient(env: NodeJS.ProcessEnv = process.env): RefundClient {
     const clientType = env.REFUND_CLIENT_TYPE || 'mock';

     if (clientType === 'mock') {
          logger.info('Using mock refund client');
          return new RefundMockClient();
     }

     const baseUrl = env.REFUND_API_URL;
     const apiKey = env.REFUND_API_KEY;

     if (!baseUrl || !apiKey) {
          throw new Error('REFUND_API_URL and REFUND_API_KEY must be set for HTTP client');
     }

     logger.info({ baseUrl }, 'Using HTTP refund client');
     return new RefundHttpClient(baseUrl, apiKey);
}
