// Base class for domain errors - code is stable for callers to switch on
export abstract class DomainError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class DuplicateEntityError extends DomainError {
  constructor(resource: string, identifier: string) {
    super(
      `${resource} '${identifier}' is already recorded.`,
      'DUPLICATE_ENTITY'
    );
  }
}

export class EntityNotFoundError extends DomainError {
  constructor(resource: string, identifier: string) {
    super(
      `${resource} with identifier '${identifier}' not found.`,
      'ENTITY_NOT_FOUND'
    );
  }
}

// bulk stock on an inventory that can't take it, or a nonsense quantity
export class InvalidStockRequestError extends DomainError {
  constructor(message: string) {
    super(message, 'INVALID_STOCK_REQUEST');
  }
}

export class FailedTransactionError extends DomainError {
  constructor(message: string = 'Transaction could not be completed.') {
    super(message, 'FAILED_TRANSACTION');
  }
}

export class ValidationError extends DomainError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
  }
}
