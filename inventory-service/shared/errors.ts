export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'INSUFFICIENT_STOCK'
  | 'INTERNAL_ERROR';

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Base class for every failure the service reports to its callers.
 * `status` is the HTTP status the transport maps the error to.
 */
export abstract class AppError extends Error {
  abstract readonly status: number;
  abstract readonly code: ErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  /** Extra fields included in the response body next to code and message. */
  details(): Record<string, unknown> {
    return {};
  }
}

export class ValidationError extends AppError {
  readonly status = 400;
  readonly code = 'VALIDATION_ERROR';

  constructor(message: string, public readonly issues: ValidationIssue[] = []) {
    super(message);
  }

  override details(): Record<string, unknown> {
    return this.issues.length > 0 ? { issues: this.issues } : {};
  }
}

export class NotFoundError extends AppError {
  readonly status = 404;
  readonly code = 'NOT_FOUND';
}

export class ConflictError extends AppError {
  readonly status = 409;
  readonly code: ErrorCode = 'CONFLICT';
}

export class InsufficientStockError extends ConflictError {
  override readonly code = 'INSUFFICIENT_STOCK';

  constructor(
    public readonly productId: number,
    productName: string,
    public readonly available: number,
    public readonly requested: number,
  ) {
    super(
      `Insufficient stock for product ${productName}. Available: ${available}, requested: ${requested}`,
    );
  }

  override details(): Record<string, unknown> {
    return { productId: this.productId, available: this.available, requested: this.requested };
  }
}

export class InternalError extends AppError {
  readonly status = 500;
  readonly code = 'INTERNAL_ERROR';

  constructor(message = 'Internal Server Error') {
    super(message);
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}
