import { roundMoney } from './normalize';
import type { Store } from './store';
import { runScoped } from './transaction';
import type { Product, Statistics } from './types';

export async function listLowStockProducts(store: Store, threshold: number): Promise<Product[]> {
  return runScoped(
    store,
    'listLowStockProducts',
    { threshold },
    (session) => session.listLowStockProducts(threshold),
    { readOnly: true },
  );
}

export async function getStatistics(store: Store): Promise<Statistics> {
  return runScoped(
    store,
    'getStatistics',
    {},
    async (session) => {
      const totalProducts = await session.countProducts();
      const totalOrders = await session.countOrders();
      const totalRevenue = roundMoney(await session.sumOrderTotals());
      const bestSeller = await session.findBestSeller();

      return {
        totalProducts,
        totalOrders,
        totalRevenue,
        averageOrderValue: totalOrders > 0 ? roundMoney(totalRevenue / totalOrders) : 0,
        bestSeller,
      };
    },
    { readOnly: true },
  );
}
