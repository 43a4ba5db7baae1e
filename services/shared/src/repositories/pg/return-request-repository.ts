import type { PoolClient } from 'pg';
import type { ReturnRequest } from '../../types/order.types';
import type { ReturnRequestRepository } from '../types';
import { ConcurrencyConflictError } from '../../utils/errors';
import { hydrateReturnRequests, nullable, ReturnRequestRow } from './rows';

export class PgReturnRequestRepository implements ReturnRequestRepository {
     constructor(private readonly client: PoolClient) {}

     async getById(caseId: string): Promise<ReturnRequest | undefined> {
          const { rows } = await this.client.query<ReturnRequestRow>(
               'SELECT * FROM return_requests WHERE id = $1',
               [caseId]
          );
          const [returnRequest] = await hydrateReturnRequests(this.client, rows);
          return returnRequest;
     }

     async getBySubOrderId(subOrderId: string): Promise<ReturnRequest[]> {
          const { rows } = await this.client.query<ReturnRequestRow>(
               'SELECT * FROM return_requests WHERE sub_order_id = $1 ORDER BY created_at DESC',
               [subOrderId]
          );
          return hydrateReturnRequests(this.client, rows);
     }

     async getByBuyerId(buyerId: string): Promise<ReturnRequest[]> {
          const { rows } = await this.client.query<ReturnRequestRow>(
               'SELECT * FROM return_requests WHERE buyer_id = $1 ORDER BY created_at DESC',
               [buyerId]
          );
          return hydrateReturnRequests(this.client, rows);
     }

     async findOpenCasesForItems(subOrderItemIds: readonly string[]): Promise<ReturnRequest[]> {
          if (subOrderItemIds.length === 0) {
               return [];
          }

          const { rows } = await this.client.query<ReturnRequestRow>(
               `
        SELECT DISTINCT r.*
        FROM return_requests r
        JOIN case_items ci ON ci.case_id = r.id
        WHERE ci.sub_order_item_id = ANY($1::uuid[])
          AND r.status NOT IN ('REJECTED', 'COMPLETED')
      `,
               [subOrderItemIds]
          );
          return hydrateReturnRequests(this.client, rows);
     }

     async add(returnRequest: ReturnRequest): Promise<void> {
          await this.client.query(
               `
        INSERT INTO return_requests (
          id, case_number, case_type, sub_order_id, buyer_id, status, reason,
          created_at, last_updated_at, version
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
      `,
               [
                    returnRequest.id,
                    returnRequest.caseNumber,
                    returnRequest.caseType,
                    returnRequest.subOrderId,
                    returnRequest.buyerId,
                    returnRequest.status,
                    returnRequest.reason,
                    returnRequest.createdAt,
                    returnRequest.lastUpdatedAt,
                    returnRequest.version,
               ]
          );

          for (const item of returnRequest.items) {
               await this.client.query(
                    `
          INSERT INTO case_items (id, case_id, sub_order_item_id, quantity, created_at)
          VALUES ($1, $2, $3, $4, $5)
        `,
                    [item.id, returnRequest.id, item.subOrderItemId, item.quantity, item.createdAt]
               );
          }
     }

     async update(returnRequest: ReturnRequest): Promise<void> {
          const result = await this.client.query(
               `
        UPDATE return_requests
        SET status = $3,
            seller_notes = $4,
            resolution_type = $5,
            resolution_reason = $6,
            linked_refund_id = $7,
            refund_amount = $8,
            resolved_at = $9,
            last_updated_at = $10,
            version = version + 1
        WHERE id = $1 AND version = $2
      `,
               [
                    returnRequest.id,
                    returnRequest.version,
                    returnRequest.status,
                    nullable(returnRequest.sellerNotes),
                    nullable(returnRequest.resolutionType),
                    nullable(returnRequest.resolutionReason),
                    nullable(returnRequest.linkedRefundId),
                    nullable(returnRequest.refundAmount),
                    nullable(returnRequest.resolvedAt),
                    returnRequest.lastUpdatedAt,
               ]
          );

          if (result.rowCount === 0) {
               throw new ConcurrencyConflictError('ReturnRequest', returnRequest.id);
          }
          returnRequest.version += 1;
     }
}
