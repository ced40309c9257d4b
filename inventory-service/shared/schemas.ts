import { z } from 'zod';
import { ValidationError } from './errors';
import { MAX_INTEGER, hasWholeCents } from './normalize';

const MoneySchema = z
  .number()
  .positive('Price must be greater than zero')
  .finite('Price must be a finite number')
  .refine(hasWholeCents, 'Price must be a whole number of cents');

export const ProductBodySchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(100),
  description: z.string().max(500).nullable().optional(),
  price: MoneySchema,
  stock: z.number().int().min(0, 'Stock cannot be negative').max(MAX_INTEGER),
});

export const OrderLineSchema = z.object({
  productId: z.number().int().positive().max(MAX_INTEGER),
  quantity: z.number().int().positive('Quantity must be greater than zero').max(MAX_INTEGER),
});

export const OrderBodySchema = z.object({
  customer: z.string().trim().min(1, 'Customer is required').max(100),
  items: z
    .array(OrderLineSchema)
    .min(1, 'Order must contain at least one item')
    .refine(
      (items) => new Set(items.map((item) => item.productId)).size === items.length,
      'An order cannot contain the same product twice',
    ),
});

export const PageQuerySchema = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export const ProductQuerySchema = PageQuerySchema.extend({
  name: z.string().trim().min(1).optional(),
  minPrice: z.coerce.number().min(0).finite().optional(),
  maxPrice: z.coerce.number().min(0).finite().optional(),
  minStock: z.coerce.number().int().min(0).max(MAX_INTEGER).optional(),
});

export const IdParamSchema = z.coerce.number().int().positive().max(MAX_INTEGER);

export const ThresholdParamSchema = z.coerce.number().int().min(0).max(MAX_INTEGER);

/** Parses `value` or throws a `ValidationError` listing every issue. */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(
      `Invalid ${what}`,
      result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    );
  }
  return result.data;
}
