import { beforeEach, describe, expect, it } from 'vitest';
import { createProduct, updateProduct } from './catalog';
import { createOrder } from './orders';
import { getStatistics, listLowStockProducts } from './reports';
import { MemoryStore } from './testing/memory-store';
import type { Product } from './types';

describe('reports', () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = new MemoryStore();
  });

  describe('listLowStockProducts', () => {
    it('should return products at or below the threshold in id order', async () => {
      await createProduct(store, { name: 'apple', price: 1.5, stock: 10 });
      await createProduct(store, { name: 'banana', price: 0.75, stock: 0 });
      await createProduct(store, { name: 'cherry', price: 12, stock: 4 });

      const low = await listLowStockProducts(store, 4);

      expect(low.map((p) => [p.name, p.stock])).toEqual([
        ['Banana', 0],
        ['Cherry', 4],
      ]);
    });
  });

  describe('getStatistics', () => {
    it('should report zeros and no best seller for an empty store', async () => {
      expect(await getStatistics(store)).toEqual({
        totalProducts: 0,
        totalOrders: 0,
        totalRevenue: 0,
        averageOrderValue: 0,
        bestSeller: null,
      });
    });

    describe('with orders', () => {
      let a: Product;
      let b: Product;
      let c: Product;

      beforeEach(async () => {
        a = await createProduct(store, { name: 'alpha', price: 10, stock: 50 });
        b = await createProduct(store, { name: 'beta', price: 2.5, stock: 50 });
        c = await createProduct(store, { name: 'gamma', price: 4, stock: 50 });
      });

      it('should total orders and pick the product sold in the greatest quantity', async () => {
        await createOrder(store, {
          customer: 'ana',
          items: [
            { productId: a.id, quantity: 2 },
            { productId: b.id, quantity: 3 },
          ],
        });
        await createOrder(store, {
          customer: 'bia',
          items: [
            { productId: b.id, quantity: 1 },
            { productId: c.id, quantity: 5 },
          ],
        });

        expect(await getStatistics(store)).toEqual({
          totalProducts: 3,
          totalOrders: 2,
          totalRevenue: 50,
          averageOrderValue: 25,
          bestSeller: { productId: c.id, productName: 'Gamma', quantitySold: 5 },
        });
      });

      it('should break best-seller ties by lowest product id', async () => {
        await createOrder(store, { customer: 'ana', items: [{ productId: b.id, quantity: 3 }] });
        await createOrder(store, { customer: 'bia', items: [{ productId: a.id, quantity: 3 }] });

        const stats = await getStatistics(store);

        expect(stats.bestSeller).toEqual({ productId: a.id, productName: 'Alpha', quantitySold: 3 });
      });

      it('should name the best seller by its current catalog name', async () => {
        await createOrder(store, { customer: 'ana', items: [{ productId: c.id, quantity: 2 }] });
        await updateProduct(store, c.id, { name: 'gamma plus', price: 4, stock: 48 });

        const stats = await getStatistics(store);

        expect(stats.bestSeller?.productName).toBe('Gamma Plus');
      });
    });
  });
});
