import type { ShippingStatusHistoryRepository } from '../repositories/types';
import type { ShippingStatusHistory } from '../types/order.types';
import { createChildLogger } from '../utils/logger';

/**
 * Best-effort shipping history writer. A failed insert is logged and never
 * fails or rolls back the transition that produced it.
 */
export class AuditTrailRecorder {
     private log = createChildLogger({ component: 'audit-trail' });

     constructor(private readonly history: ShippingStatusHistoryRepository) {}

     async record(entry: ShippingStatusHistory): Promise<void> {
          try {
               await this.history.add(entry);
          } catch (err) {
               this.log.warn(
                    {
                         err,
                         subOrderId: entry.subOrderId,
                         previousStatus: entry.previousStatus,
                         newStatus: entry.newStatus,
                    },
                    'Failed to record shipping status history'
               );
          }
     }
}
