import { randomUUID } from 'crypto';
import type { RefundClient } from '../clients/refund-client';
import type { Repositories } from '../repositories/types';
import { Clock, systemClock } from '../utils/clock';
import { AuditTrailRecorder } from './audit-trail-recorder';
import type { NotificationService } from './notification-service';
import { OrderAggregateBuilder } from './order-aggregate-builder';
import { OrderLifecycleCoordinator } from './order-lifecycle-coordinator';
import { OrderQueryService } from './order-query-service';
import { ParentRefundCascade } from './parent-refund-cascade';
import { ReturnCaseWorkflow } from './return-case-workflow';
import { SubOrderLifecycleCoordinator } from './sub-order-lifecycle-coordinator';

export interface ServiceContext {
     repositories: Repositories;
     refundClient: RefundClient;
     notifications: NotificationService;
     returnWindowDays: number;
     clock?: Clock;
     generateId?: () => string;
}

export interface OrderServices {
     orders: OrderLifecycleCoordinator;
     subOrders: SubOrderLifecycleCoordinator;
     cases: ReturnCaseWorkflow;
     queries: OrderQueryService;
}

export function createOrderServices(context: ServiceContext): OrderServices {
     const { repositories, refundClient, notifications, returnWindowDays } = context;
     const clock = context.clock ?? systemClock;
     const generateId = context.generateId ?? randomUUID;

     const audit = new AuditTrailRecorder(repositories.shippingHistory);
     const refundCascade = new ParentRefundCascade(repositories.orders);

     return {
          orders: new OrderLifecycleCoordinator({
               orders: repositories.orders,
               notifications,
               builder: new OrderAggregateBuilder({ clock, generateId }),
               clock,
          }),
          subOrders: new SubOrderLifecycleCoordinator({
               subOrders: repositories.subOrders,
               orders: repositories.orders,
               audit,
               notifications,
               refundCascade,
               clock,
               generateId,
          }),
          cases: new ReturnCaseWorkflow({
               returnRequests: repositories.returnRequests,
               subOrders: repositories.subOrders,
               orders: repositories.orders,
               refundClient,
               refundCascade,
               audit,
               clock,
               generateId,
               returnWindowDays,
          }),
          queries: new OrderQueryService(repositories),
     };
}
