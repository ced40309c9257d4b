import { beforeEach, describe, expect, it, vi } from 'vitest';
import { InternalError, NotFoundError } from './errors';
import { MemoryStore } from './testing/memory-store';
import { runScoped } from './transaction';

describe('runScoped', () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = new MemoryStore();
  });

  it('should commit the work when it resolves', async () => {
    const product = await runScoped(store, 'seed', {}, (session) =>
      session.insertProduct({ name: 'Lamp', description: null, price: 10, stock: 1 }),
    );

    expect(product.id).toBe(1);
    expect(store.snapshot().products.map((p) => p.name)).toEqual(['Lamp']);
  });

  it('should roll back and rethrow business errors unchanged', async () => {
    const notFound = new NotFoundError('Order not found');

    const attempt = runScoped(store, 'seed', {}, async (session) => {
      await session.insertProduct({ name: 'Lamp', description: null, price: 10, stock: 1 });
      throw notFound;
    });

    await expect(attempt).rejects.toBe(notFound);
    expect(store.snapshot().products).toEqual([]);
  });

  it('should hide unexpected failures behind an internal error', async () => {
    const attempt = runScoped(store, 'seed', { orderId: 4 }, async () => {
      throw new Error('relation "orders" does not exist');
    });

    await expect(attempt).rejects.toThrow(new InternalError('Internal Server Error'));
  });

  it('should use a plain session for read-only work', async () => {
    const transaction = vi.spyOn(store, 'transaction');
    const read = vi.spyOn(store, 'read');

    const count = await runScoped(store, 'count', {}, (session) => session.countProducts(), { readOnly: true });

    expect(count).toBe(0);
    expect(read).toHaveBeenCalledTimes(1);
    expect(transaction).not.toHaveBeenCalled();
  });
});
