import { describe, expect, it } from 'vitest';
import {
  ConflictError,
  InsufficientStockError,
  InternalError,
  NotFoundError,
  ValidationError,
  isAppError,
} from './errors';

describe('errors', () => {
  it('should carry status and code per kind', () => {
    expect([
      new ValidationError('bad'),
      new NotFoundError('missing'),
      new ConflictError('taken'),
      new InternalError(),
    ].map((err) => [err.status, err.code])).toEqual([
      [400, 'VALIDATION_ERROR'],
      [404, 'NOT_FOUND'],
      [409, 'CONFLICT'],
      [500, 'INTERNAL_ERROR'],
    ]);
  });

  it('should name errors after their class', () => {
    expect(new NotFoundError('missing').name).toBe('NotFoundError');
    expect(new InsufficientStockError(1, 'Widget', 2, 3).name).toBe('InsufficientStockError');
  });

  it('should describe insufficient stock as a conflict with details', () => {
    const err = new InsufficientStockError(7, 'Widget', 2, 3);

    expect(err).toBeInstanceOf(ConflictError);
    expect(err.status).toBe(409);
    expect(err.code).toBe('INSUFFICIENT_STOCK');
    expect(err.message).toBe('Insufficient stock for product Widget. Available: 2, requested: 3');
    expect(err.details()).toEqual({ productId: 7, available: 2, requested: 3 });
  });

  it('should include validation issues only when present', () => {
    expect(new ValidationError('bad').details()).toEqual({});
    expect(new ValidationError('bad', [{ path: 'price', message: 'too low' }]).details()).toEqual({
      issues: [{ path: 'price', message: 'too low' }],
    });
  });

  it('should not leak detail from internal errors by default', () => {
    expect(new InternalError().message).toBe('Internal Server Error');
  });

  it('should recognise app errors', () => {
    expect(isAppError(new NotFoundError('x'))).toBe(true);
    expect(isAppError(new Error('x'))).toBe(false);
    expect(isAppError('x')).toBe(false);
  });
});
