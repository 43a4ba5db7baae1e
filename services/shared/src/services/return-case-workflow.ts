import type { RefundClient, RefundRecord, RefundResult } from '../clients/refund-client';
import type {
     OrderRepository,
     ReturnRequestRepository,
     SubOrderRepository,
} from '../repositories/types';
import type {
     CaseCaller,
     CaseEligibility,
     CaseItem,
     CaseResolution,
     CreateCaseCommand,
     CreatedCase,
     LinkedRefundInfo,
     ResolveCaseCommand,
     ReturnRequest,
     ReturnStatus,
     SelectedCaseItem,
     SellerSubOrder,
} from '../types/order.types';
import { generateCaseNumber } from '../domain/numbering';
import { stampSubOrderStatus } from '../domain/status-stamps';
import { canTransitionCase, canTransitionSubOrder } from '../domain/status-transitions';
import type { Clock } from '../utils/clock';
import {
     BusinessRuleError,
     CollaboratorError,
     DomainError,
     InvalidStateTransitionError,
     NotAuthorizedError,
     NotFoundError,
     ValidationError,
} from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import { fail, ok, OperationResult, runOperation } from '../utils/result';
import type { AuditTrailRecorder } from './audit-trail-recorder';
import type { ParentRefundCascade } from './parent-refund-cascade';

export interface ReturnCaseWorkflowDependencies {
     returnRequests: ReturnRequestRepository;
     subOrders: SubOrderRepository;
     orders: OrderRepository;
     refundClient: RefundClient;
     refundCascade: ParentRefundCascade;
     audit: AuditTrailRecorder;
     clock: Clock;
     generateId: () => string;
     returnWindowDays: number;
}

export const MAX_TEXT_LENGTH = 2000;
const DAY_MS = 24 * 60 * 60 * 1000;

function isBlank(value: string | undefined): boolean {
     return value === undefined || value.trim() === '';
}

function validateCreateCase(command: CreateCaseCommand): string[] {
     const errors: string[] = [];

     if (isBlank(command.subOrderId)) errors.push('Seller sub-order ID is required.');
     if (isBlank(command.buyerId)) errors.push('Buyer ID is required.');
     if (isBlank(command.reason)) {
          errors.push('Reason is required.');
     } else if (command.reason.length > MAX_TEXT_LENGTH) {
          errors.push(`Reason must not exceed ${MAX_TEXT_LENGTH} characters.`);
     }

     const selected = command.selectedItems ?? [];
     if (selected.some((item) => isBlank(item.itemId))) {
          errors.push('Selected item ID is required.');
     }
     if (selected.some((item) => !Number.isInteger(item.quantity) || item.quantity <= 0)) {
          errors.push('Selected item quantity must be greater than zero.');
     }
     if (new Set(selected.map((item) => item.itemId)).size !== selected.length) {
          errors.push('Duplicate items selected.');
     }

     return errors;
}

function validateResolveCase(storeId: string, command: ResolveCaseCommand): string[] {
     const errors: string[] = [];
     const refunds =
          command.resolutionType === 'FULL_REFUND' || command.resolutionType === 'PARTIAL_REFUND';

     if (isBlank(storeId)) errors.push('Store ID is required.');

     if (command.resolutionType === 'NO_REFUND' && isBlank(command.resolutionReason)) {
          errors.push("Resolution reason is required when choosing 'No Refund'.");
     }

     if (
          command.resolutionType === 'PARTIAL_REFUND' &&
          command.initiateNewRefund &&
          (command.refundAmount === undefined || command.refundAmount <= 0)
     ) {
          errors.push('Refund amount is required for partial refund.');
     }

     if (refunds && command.initiateNewRefund && isBlank(command.paymentTransactionId)) {
          errors.push('Payment transaction ID is required to initiate a refund.');
     }

     if (command.resolutionReason && command.resolutionReason.length > MAX_TEXT_LENGTH) {
          errors.push(`Resolution reason must not exceed ${MAX_TEXT_LENGTH} characters.`);
     }

     return errors;
}

export class ReturnCaseWorkflow {
     private log = createChildLogger({ component: 'return-case-workflow' });

     constructor(private readonly deps: ReturnCaseWorkflowDependencies) {}

     async createCase(command: CreateCaseCommand): Promise<OperationResult<CreatedCase>> {
          return runOperation<CreatedCase>(
               this.log,
               { subOrderId: command.subOrderId, buyerId: command.buyerId },
               'Failed to create case',
               async () => {
                    const errors = validateCreateCase(command);
                    if (errors.length > 0) {
                         return fail(new ValidationError(errors));
                    }

                    const loaded = await this.loadBuyerSubOrder(command.subOrderId, command.buyerId);
                    if (!loaded.succeeded) {
                         return loaded;
                    }
                    const subOrder = loaded.value;

                    const ineligible = this.checkDeliveryWindow(subOrder);
                    if (ineligible) {
                         return fail(ineligible);
                    }

                    const itemsById = new Map(subOrder.items.map((item) => [item.id, item]));
                    const targets: SelectedCaseItem[] = command.selectedItems?.length
                         ? command.selectedItems
                         : subOrder.items.map((item) => ({ itemId: item.id, quantity: item.quantity }));

                    if (targets.some((target) => !itemsById.has(target.itemId))) {
                         return fail(
                              new ValidationError([
                                   'One or more selected items do not belong to this sub-order.',
                              ])
                         );
                    }
                    if (
                         targets.some(
                              (target) => target.quantity > (itemsById.get(target.itemId)?.quantity ?? 0)
                         )
                    ) {
                         return fail(
                              new ValidationError([
                                   'Selected quantity cannot exceed the ordered quantity.',
                              ])
                         );
                    }

                    const openCases = await this.deps.returnRequests.findOpenCasesForItems(
                         targets.map((target) => target.itemId)
                    );
                    if (openCases.length > 0) {
                         return fail(
                              new BusinessRuleError(
                                   'One or more selected items already have an open case. Please resolve existing cases before creating a new one.',
                                   'DUPLICATE_OPEN_CASE'
                              )
                         );
                    }

                    const now = this.deps.clock.now();
                    const caseId = this.deps.generateId();
                    const items = targets.map(
                         (target): CaseItem => ({
                              id: this.deps.generateId(),
                              caseId,
                              subOrderItemId: target.itemId,
                              quantity: target.quantity,
                              createdAt: now,
                         })
                    );

                    const returnRequest: ReturnRequest = {
                         id: caseId,
                         caseNumber: generateCaseNumber(caseId),
                         caseType: command.caseType,
                         subOrderId: subOrder.id,
                         buyerId: command.buyerId,
                         status: 'REQUESTED',
                         reason: command.reason,
                         createdAt: now,
                         lastUpdatedAt: now,
                         version: 1,
                         items,
                    };

                    await this.deps.returnRequests.add(returnRequest);

                    this.log.info(
                         {
                              caseNumber: returnRequest.caseNumber,
                              caseType: returnRequest.caseType,
                              subOrderNumber: subOrder.subOrderNumber,
                              itemCount: items.length,
                         },
                         'Case created'
                    );

                    return ok({ caseId, caseNumber: returnRequest.caseNumber });
               }
          );
     }

     /** Read-only version of the gates `createCase` applies to a whole sub-order. */
     async checkEligibility(
          subOrderId: string,
          buyerId: string
     ): Promise<OperationResult<CaseEligibility>> {
          return runOperation<CaseEligibility>(
               this.log,
               { subOrderId, buyerId },
               'Failed to check case eligibility',
               async () => {
                    if (isBlank(buyerId)) {
                         return fail(new ValidationError(['Buyer ID is required.']));
                    }

                    const loaded = await this.loadBuyerSubOrder(subOrderId, buyerId);
                    if (!loaded.succeeded) {
                         return loaded;
                    }
                    const subOrder = loaded.value;

                    const ineligible = this.checkDeliveryWindow(subOrder);
                    if (ineligible) {
                         return ok<CaseEligibility>({ eligible: false, reason: ineligible.message });
                    }

                    const itemIds = subOrder.items.map((item) => item.id);
                    const openCases = await this.deps.returnRequests.findOpenCasesForItems(itemIds);
                    const covered = new Set(
                         openCases.flatMap((openCase) => openCase.items.map((item) => item.subOrderItemId))
                    );

                    if (itemIds.every((itemId) => covered.has(itemId))) {
                         return ok<CaseEligibility>({
                              eligible: false,
                              reason: 'All items in this sub-order already have open cases.',
                         });
                    }

                    return ok<CaseEligibility>({ eligible: true });
               }
          );
     }

     async updateStatus(
          caseId: string,
          storeId: string,
          newStatus: ReturnStatus,
          sellerNotes?: string
     ): Promise<OperationResult<ReturnRequest>> {
          return runOperation<ReturnRequest>(
               this.log,
               { caseId, storeId, newStatus },
               'Failed to update case status',
               async () => {
                    const errors: string[] = [];
                    if (isBlank(storeId)) errors.push('Store ID is required.');
                    if (sellerNotes && sellerNotes.length > MAX_TEXT_LENGTH) {
                         errors.push(`Seller notes must not exceed ${MAX_TEXT_LENGTH} characters.`);
                    }
                    if (errors.length > 0) {
                         return fail(new ValidationError(errors));
                    }

                    const loaded = await this.loadStoreCase(caseId, storeId);
                    if (!loaded.succeeded) {
                         return loaded;
                    }
                    const { returnRequest } = loaded.value;

                    const previousStatus = returnRequest.status;
                    if (!canTransitionCase(previousStatus, newStatus)) {
                         return fail(
                              new InvalidStateTransitionError(
                                   `Cannot transition from ${previousStatus} to ${newStatus}.`,
                                   previousStatus,
                                   newStatus
                              )
                         );
                    }

                    const now = this.deps.clock.now();
                    returnRequest.status = newStatus;
                    returnRequest.lastUpdatedAt = now;
                    if (sellerNotes !== undefined) {
                         returnRequest.sellerNotes = sellerNotes;
                    }
                    if (newStatus === 'REJECTED' || newStatus === 'COMPLETED') {
                         returnRequest.resolvedAt = now;
                    }

                    await this.deps.returnRequests.update(returnRequest);

                    this.log.info(
                         { caseNumber: returnRequest.caseNumber, previousStatus, status: newStatus },
                         'Case status updated'
                    );

                    return ok(returnRequest);
               }
          );
     }

     /**
      * Closes a case with a resolution. Refund linking or creation happens
      * before any local write, so a refund failure leaves everything as it
      * was. A full refund also refunds the sub-order and, when it was the last
      * one, the parent order.
      */
     async resolveCase(
          caseId: string,
          storeId: string,
          command: ResolveCaseCommand
     ): Promise<OperationResult<CaseResolution>> {
          return runOperation<CaseResolution>(
               this.log,
               { caseId, storeId, resolutionType: command.resolutionType },
               'Failed to resolve case',
               async () => {
                    const errors = validateResolveCase(storeId, command);
                    if (errors.length > 0) {
                         return fail(new ValidationError(errors));
                    }

                    const loaded = await this.loadStoreCase(caseId, storeId);
                    if (!loaded.succeeded) {
                         return loaded;
                    }
                    const { returnRequest, subOrder } = loaded.value;

                    if (returnRequest.status === 'COMPLETED') {
                         return fail(
                              new BusinessRuleError(
                                   'This case has already been resolved.',
                                   'CASE_ALREADY_RESOLVED'
                              )
                         );
                    }

                    let refund: RefundRecord | undefined;
                    let refundInitiated = false;

                    if (command.resolutionType !== 'NO_REFUND') {
                         if (command.existingRefundId) {
                              const linked = await this.lookupRefund(command.existingRefundId);
                              if (!linked.succeeded) {
                                   return linked;
                              }
                              refund = linked.value;
                         } else if (command.initiateNewRefund) {
                              const created = await this.initiateRefund(
                                   returnRequest,
                                   subOrder,
                                   storeId,
                                   command
                              );
                              if (!created.succeeded) {
                                   return created;
                              }
                              refund = created.value;
                              refundInitiated = true;
                         }
                    }

                    const now = this.deps.clock.now();

                    returnRequest.resolutionType = command.resolutionType;
                    returnRequest.resolutionReason = command.resolutionReason;
                    returnRequest.linkedRefundId = refund?.id;
                    if (refund) {
                         returnRequest.refundAmount =
                              refundInitiated && command.resolutionType === 'PARTIAL_REFUND'
                                   ? command.refundAmount
                                   : refund.amount;
                    }
                    returnRequest.status = 'COMPLETED';
                    returnRequest.resolvedAt = now;
                    returnRequest.lastUpdatedAt = now;

                    await this.deps.returnRequests.update(returnRequest);

                    let subOrderRefunded = false;
                    let orderRefunded = false;

                    if (
                         command.resolutionType === 'FULL_REFUND' &&
                         refund &&
                         canTransitionSubOrder(subOrder.status, 'REFUNDED')
                    ) {
                         const previousStatus = subOrder.status;
                         stampSubOrderStatus(subOrder, 'REFUNDED', now);
                         await this.deps.subOrders.update(subOrder);
                         subOrderRefunded = true;

                         await this.deps.audit.record({
                              id: this.deps.generateId(),
                              subOrderId: subOrder.id,
                              previousStatus,
                              newStatus: 'REFUNDED',
                              changedAt: now,
                              notes: `Case resolution: ${returnRequest.caseNumber}`,
                         });

                         orderRefunded = await this.deps.refundCascade.apply(subOrder, now);
                    }

                    this.log.info(
                         {
                              caseNumber: returnRequest.caseNumber,
                              resolutionType: command.resolutionType,
                              linkedRefundId: returnRequest.linkedRefundId,
                              subOrderRefunded,
                              orderRefunded,
                         },
                         'Case resolved'
                    );

                    return ok({
                         caseId: returnRequest.id,
                         linkedRefundId: returnRequest.linkedRefundId,
                         refundInitiated,
                         subOrderRefunded,
                         orderRefunded,
                    });
               }
          );
     }

     /**
      * Refund linked to a case, readable by the seller of the case's sub-order
      * or by the buyer who opened it. The seller identity wins when both are given.
      */
     async getLinkedRefundInfo(
          caseId: string,
          caller: CaseCaller
     ): Promise<OperationResult<LinkedRefundInfo | undefined>> {
          return runOperation<LinkedRefundInfo | undefined>(
               this.log,
               { caseId, buyerId: caller.buyerId, storeId: caller.storeId },
               'Failed to load linked refund',
               async () => {
                    const loaded = await this.loadCaseForCaller(caseId, caller);
                    if (!loaded.succeeded) {
                         return loaded;
                    }
                    const refundId = loaded.value.linkedRefundId;
                    if (!refundId) {
                         return ok(undefined);
                    }

                    const refund = await this.callRefundClient(() =>
                         this.deps.refundClient.getRefund(refundId)
                    );
                    if (!refund.succeeded) {
                         return refund;
                    }
                    if (!refund.value) {
                         return ok(undefined);
                    }

                    return ok({
                         refundId: refund.value.id,
                         amount: refund.value.amount,
                         status: refund.value.status,
                         externalReference: refund.value.externalReference,
                         completedAt: refund.value.completedAt,
                    });
               }
          );
     }

     private checkDeliveryWindow(subOrder: SellerSubOrder): BusinessRuleError | undefined {
          if (subOrder.status !== 'DELIVERED') {
               return new BusinessRuleError(
                    'Cases can only be created for delivered orders.',
                    'INVALID_SUB_ORDER_STATUS'
               );
          }

          const windowDays = this.deps.returnWindowDays;
          if (
               !subOrder.deliveredAt ||
               this.deps.clock.now().getTime() > subOrder.deliveredAt.getTime() + windowDays * DAY_MS
          ) {
               return new BusinessRuleError(
                    `Return window has expired. Cases must be created within ${windowDays} days of delivery.`,
                    'RETURN_WINDOW_EXPIRED'
               );
          }

          return undefined;
     }

     private async loadBuyerSubOrder(
          subOrderId: string,
          buyerId: string
     ): Promise<OperationResult<SellerSubOrder>> {
          const subOrder = await this.deps.subOrders.getById(subOrderId);
          if (!subOrder) {
               return fail(new NotFoundError('SubOrder', subOrderId));
          }

          const order = await this.deps.orders.getById(subOrder.orderId);
          if (!order || order.buyerId !== buyerId) {
               return fail(new NotAuthorizedError('You are not authorized to open a case for this order.'));
          }

          return ok(subOrder);
     }

     private async loadCaseForCaller(
          caseId: string,
          caller: CaseCaller
     ): Promise<OperationResult<ReturnRequest>> {
          const storeId = caller.storeId?.trim();
          if (storeId) {
               const loaded = await this.loadStoreCase(caseId, storeId);
               return loaded.succeeded ? ok(loaded.value.returnRequest) : loaded;
          }

          const buyerId = caller.buyerId?.trim();
          if (!buyerId) {
               return fail(new ValidationError(['Buyer ID or Store ID is required.']));
          }

          const returnRequest = await this.deps.returnRequests.getById(caseId);
          if (!returnRequest || returnRequest.buyerId !== buyerId) {
               return fail(new NotFoundError('ReturnRequest', caseId));
          }
          return ok(returnRequest);
     }

     private async loadStoreCase(
          caseId: string,
          storeId: string
     ): Promise<OperationResult<{ returnRequest: ReturnRequest; subOrder: SellerSubOrder }>> {
          const returnRequest = await this.deps.returnRequests.getById(caseId);
          if (!returnRequest) {
               return fail(new NotFoundError('ReturnRequest', caseId));
          }

          const subOrder = await this.deps.subOrders.getById(returnRequest.subOrderId);
          if (!subOrder || subOrder.storeId !== storeId) {
               return fail(new NotAuthorizedError('You are not authorized to manage this case.'));
          }

          return ok({ returnRequest, subOrder });
     }

     private async lookupRefund(refundId: string): Promise<OperationResult<RefundRecord>> {
          const found = await this.callRefundClient(() => this.deps.refundClient.getRefund(refundId));
          if (!found.succeeded) {
               return found;
          }
          if (!found.value) {
               return fail(
                    new DomainError('The specified refund was not found.', 'REFUND_NOT_FOUND', 404, 'NOT_FOUND')
               );
          }
          return ok(found.value);
     }

     private async initiateRefund(
          returnRequest: ReturnRequest,
          subOrder: SellerSubOrder,
          storeId: string,
          command: ResolveCaseCommand
     ): Promise<OperationResult<RefundRecord>> {
          const order = await this.deps.orders.getById(subOrder.orderId);
          if (!order) {
               return fail(
                    new BusinessRuleError(
                         'Order information is not available to process refund.',
                         'ORDER_INFORMATION_UNAVAILABLE'
                    )
               );
          }

          const full = command.resolutionType === 'FULL_REFUND';
          const request = {
               orderId: order.id,
               subOrderId: subOrder.id,
               storeId,
               paymentTransactionId: command.paymentTransactionId ?? '',
               amount: full ? subOrder.totalAmount : (command.refundAmount ?? 0),
               reason:
                    command.resolutionReason ??
                    (full ? 'Full refund for return case' : 'Partial refund for return case'),
               initiatedBy: command.initiatedBy,
               initiatedByRole: 'Seller',
               auditNote: `Case resolution: ${returnRequest.caseNumber}`,
          };

          const submitted = await this.callRefundClient<RefundResult>(() =>
               full
                    ? this.deps.refundClient.processFullRefund(request)
                    : this.deps.refundClient.processPartialRefund(request)
          );
          if (!submitted.succeeded) {
               return submitted;
          }
          if (!submitted.value.succeeded) {
               return fail(new CollaboratorError('refunds', submitted.value.errors));
          }

          return ok(submitted.value.refund);
     }

     // Refund subsystem faults surface as collaborator failures carrying its error text
     private async callRefundClient<T>(call: () => Promise<T>): Promise<OperationResult<T>> {
          try {
               return ok(await call());
          } catch (err) {
               this.log.error({ err }, 'Refund subsystem call failed');
               const message = err instanceof Error ? err.message : 'Refund subsystem call failed.';
               return fail(new CollaboratorError('refunds', [message]));
          }
     }
}
