// Typed failures reported by every order, sub-order and case operation

export type ErrorKind =
     | 'VALIDATION'
     | 'NOT_FOUND'
     | 'NOT_AUTHORIZED'
     | 'INVALID_STATE_TRANSITION'
     | 'BUSINESS_RULE'
     | 'COLLABORATOR'
     | 'CONCURRENCY'
     | 'UNEXPECTED';

export class DomainError extends Error {
     public readonly errors: readonly string[];

     constructor(
          message: string,
          public readonly code: string,
          public readonly statusCode: number = 400,
          public readonly kind: ErrorKind = 'BUSINESS_RULE',
          errors?: readonly string[]
     ) {
          super(message);
          this.name = this.constructor.name;
          this.errors = errors ?? [message];
          Error.captureStackTrace(this, this.constructor);
     }
}

export class ValidationError extends DomainError {
     constructor(errors: readonly string[]) {
          super(errors.join(' '), 'VALIDATION_FAILED', 400, 'VALIDATION', errors);
     }
}

export class NotFoundError extends DomainError {
     constructor(
          public readonly resource: string,
          public readonly resourceId: string
     ) {
          super(`${resource} ${resourceId} not found`, 'NOT_FOUND', 404, 'NOT_FOUND');
     }
}

export class NotAuthorizedError extends DomainError {
     constructor(message: string = 'Not authorized.') {
          super(message, 'NOT_AUTHORIZED', 403, 'NOT_AUTHORIZED');
     }
}

export class InvalidStateTransitionError extends DomainError {
     constructor(
          message: string,
          public readonly from: string,
          public readonly to: string
     ) {
          super(message, 'INVALID_STATE_TRANSITION', 409, 'INVALID_STATE_TRANSITION');
     }
}

export type BusinessRuleCode =
     | 'RETURN_WINDOW_EXPIRED'
     | 'DUPLICATE_OPEN_CASE'
     | 'INVALID_SUB_ORDER_STATUS'
     | 'CASE_ALREADY_RESOLVED'
     | 'ORDER_INFORMATION_UNAVAILABLE';

export class BusinessRuleError extends DomainError {
     constructor(message: string, code: BusinessRuleCode) {
          super(message, code, 422, 'BUSINESS_RULE');
     }
}

export class CollaboratorError extends DomainError {
     constructor(
          public readonly collaborator: string,
          errors: readonly string[]
     ) {
          super(errors.join(' '), 'COLLABORATOR_FAILURE', 502, 'COLLABORATOR', errors);
     }
}

export class ConcurrencyConflictError extends DomainError {
     constructor(
          public readonly resource: string,
          public readonly resourceId: string
     ) {
          super(
               `${resource} ${resourceId} was modified by another operation; reload and retry`,
               'CONCURRENCY_CONFLICT',
               409,
               'CONCURRENCY'
          );
     }
}

export class UnexpectedError extends DomainError {
     constructor() {
          super('An unexpected error occurred', 'INTERNAL_ERROR', 500, 'UNEXPECTED');
     }
}

export class RefundApiError extends Error {
     constructor(
          public readonly statusCode: number,
          message: string,
          public readonly retriable: boolean = false
     ) {
          super(message);
          this.name = 'RefundApiError';

          // 429, 503, 504 are retriable
          if ([429, 503, 504].includes(statusCode)) {
               this.retriable = true;
          }
     }
}
