/**
 * Error types and codes
 */
import type { InvoiceAction, InvoiceStatus } from './invoice.types';

// Standard error codes
export enum ErrorCode {
  // Validation errors (400)
  VALIDATION_ERROR = 'VALIDATION_ERROR',

  // Authentication / authorization (401, 403)
  UNAUTHORIZED = 'UNAUTHORIZED',
  FORBIDDEN = 'FORBIDDEN',

  // Not found errors (404)
  INVOICE_NOT_FOUND = 'INVOICE_NOT_FOUND',
  PRODUCT_NOT_FOUND = 'PRODUCT_NOT_FOUND',
  CUSTOMER_NOT_FOUND = 'CUSTOMER_NOT_FOUND',
  NOT_FOUND = 'NOT_FOUND',

  // Conflict errors (409)
  INVALID_TRANSITION = 'INVALID_TRANSITION',
  INSUFFICIENT_STOCK = 'INSUFFICIENT_STOCK',
  CONFLICT = 'CONFLICT',

  // Server errors (500)
  LEDGER_INCONSISTENT = 'LEDGER_INCONSISTENT',
  DATABASE_ERROR = 'DATABASE_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

// Custom application error class
export class AppError extends Error {
  constructor(
    public code: ErrorCode | string,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.VALIDATION_ERROR, message, 400, details);
    this.name = 'ValidationError';
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Authentication required') {
    super(ErrorCode.UNAUTHORIZED, message, 401);
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.FORBIDDEN, message, 403, details);
    this.name = 'ForbiddenError';
  }
}

export class NotFoundError extends AppError {
  constructor(
    code: ErrorCode.INVOICE_NOT_FOUND | ErrorCode.PRODUCT_NOT_FOUND | ErrorCode.CUSTOMER_NOT_FOUND,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(code, message, 404, details);
    this.name = 'NotFoundError';
  }
}

export class InvalidTransitionError extends AppError {
  constructor(
    public readonly action: InvoiceAction,
    public readonly currentStatus: InvoiceStatus,
    allowedFrom: readonly InvoiceStatus[]
  ) {
    super(
      ErrorCode.INVALID_TRANSITION,
      `Cannot ${action} an invoice in status ${currentStatus}; requires ${allowedFrom.join(' or ')}`,
      409,
      { action, currentStatus, allowedFrom: [...allowedFrom] }
    );
    this.name = 'InvalidTransitionError';
  }
}

export interface StockShortfall {
  productId: string;
  requested: number;
  available: number;
  shortfall: number;
}

export class InsufficientStockError extends AppError {
  constructor(public readonly shortfalls: StockShortfall[]) {
    super(
      ErrorCode.INSUFFICIENT_STOCK,
      `Insufficient stock for ${shortfalls.length} product(s): ${shortfalls
        .map((s) => `${s.productId} short by ${s.shortfall}`)
        .join(', ')}`,
      409,
      { shortfalls }
    );
    this.name = 'InsufficientStockError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.CONFLICT, message, 409, details);
    this.name = 'ConflictError';
  }
}

export class LedgerInconsistentError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.LEDGER_INCONSISTENT, message, 500, details);
    this.name = 'LedgerInconsistentError';
  }
}
