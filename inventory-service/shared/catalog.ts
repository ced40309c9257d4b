import { ConflictError, NotFoundError, ValidationError } from './errors';
import { createServiceLogger } from './logger';
import { MAX_INTEGER, hasWholeCents, normalizeDescription, normalizeName } from './normalize';
import type { Store, StoreSession } from './store';
import { runScoped } from './transaction';
import type { Page, Product, ProductFields, ProductFilter, ProductInput } from './types';

const log = createServiceLogger('catalog');

function toProductFields(input: ProductInput): ProductFields {
  if (!(input.price > 0)) {
    throw new ValidationError('Price must be greater than zero');
  }
  if (!Number.isFinite(input.price)) {
    throw new ValidationError('Price must be a finite number');
  }
  if (!hasWholeCents(input.price)) {
    throw new ValidationError('Price must be a whole number of cents');
  }
  if (!Number.isInteger(input.stock) || input.stock < 0) {
    throw new ValidationError('Stock must be a non-negative integer');
  }
  if (input.stock > MAX_INTEGER) {
    throw new ValidationError('Stock is too large');
  }
  const name = normalizeName(input.name);
  if (name.length === 0) {
    throw new ValidationError('Product name is required');
  }
  return {
    name,
    description: normalizeDescription(input.description),
    price: input.price,
    stock: input.stock,
  };
}

async function requireProduct(session: StoreSession, id: number): Promise<Product> {
  const product = await session.findProductById(id, { forUpdate: true });
  if (!product) {
    throw new NotFoundError('Product not found');
  }
  return product;
}

export async function createProduct(store: Store, input: ProductInput): Promise<Product> {
  const fields = toProductFields(input);
  const product = await runScoped(store, 'createProduct', { name: fields.name }, async (session) => {
    if (await session.findProductByName(fields.name)) {
      throw new ConflictError('Product with this name already exists');
    }
    return session.insertProduct(fields);
  });

  log.info('Product created', { productId: product.id, name: product.name });
  return product;
}

export async function getProduct(store: Store, id: number): Promise<Product> {
  return runScoped(
    store,
    'getProduct',
    { productId: id },
    async (session) => {
      const product = await session.findProductById(id);
      if (!product) {
        throw new NotFoundError('Product not found');
      }
      return product;
    },
    { readOnly: true },
  );
}

export async function listProducts(store: Store, filter: ProductFilter, page: Page): Promise<Product[]> {
  return runScoped(store, 'listProducts', {}, (session) => session.listProducts(filter, page), { readOnly: true });
}

/**
 * Replaces a product's fields. Order items keep the name and price they were
 * sold with.
 */
export async function updateProduct(store: Store, id: number, input: ProductInput): Promise<Product> {
  const product = await runScoped(store, 'updateProduct', { productId: id }, async (session) => {
    await requireProduct(session, id);
    const fields = toProductFields(input);

    const sameName = await session.findProductByName(fields.name);
    if (sameName && sameName.id !== id) {
      throw new ConflictError('Product with this name already exists');
    }
    return session.updateProduct(id, fields);
  });

  log.info('Product updated', { productId: product.id, name: product.name });
  return product;
}

export async function deleteProduct(store: Store, id: number): Promise<void> {
  const name = await runScoped(store, 'deleteProduct', { productId: id }, async (session) => {
    const product = await requireProduct(session, id);
    if (await session.isProductReferenced(id)) {
      throw new ConflictError('Cannot delete a product that belongs to existing orders');
    }
    await session.deleteProduct(id);
    return product.name;
  });

  log.info('Product deleted', { productId: id, name });
}
