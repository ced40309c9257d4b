import axios from 'axios';
import { getConfig } from '../shared/config';
import type { Product } from '../shared/types';

const API_URL = getConfig().apiUrl;
const READ_API_URL = process.env.READ_API_URL || 'http://localhost:3001';

type Outcome = 'accepted' | 'out-of-stock' | 'failed';

async function sendOrder(orderId: number, productId: number): Promise<Outcome> {
  const response = await axios.post(
    `${API_URL}/orders`,
    { customer: `customer ${orderId}`, items: [{ productId, quantity: 1 }] },
    { validateStatus: () => true },
  );
  if (response.status === 201) return 'accepted';
  if (response.status === 409) return 'out-of-stock';
  console.error(`Order ${orderId} Error:`, response.status, response.data);
  return 'failed';
}

/**
 * Fires `numOrders` concurrent single-unit orders at a product holding
 * `initialStock` units and checks that exactly the accepted orders were taken
 * out of stock.
 */
async function runLoadTest(numOrders: number = 100, initialStock: number = 40) {
  const { data: product } = await axios.post<Product>(`${API_URL}/products`, {
    name: `load test product ${Date.now()}`,
    price: 1,
    stock: initialStock,
  });

  console.log(`Starting load test with ${numOrders} orders against ${initialStock} units...`);
  const startTime = Date.now();

  const promises: Promise<Outcome>[] = [];
  for (let i = 0; i < numOrders; i++) {
    promises.push(sendOrder(i, product.id));
  }
  const outcomes = await Promise.all(promises);

  const endTime = Date.now();
  const count = (outcome: Outcome) => outcomes.filter((o) => o === outcome).length;
  const accepted = count('accepted');

  const { data: after } = await axios.get<Product>(`${READ_API_URL}/products/${product.id}`);
  console.log(`Finished load test in ${endTime - startTime}ms`);
  console.log(`Accepted: ${accepted}, out of stock: ${count('out-of-stock')}, failed: ${count('failed')}`);
  console.log(`Final stock: ${after.stock} (expected ${initialStock - accepted})`);

  if (after.stock !== initialStock - accepted) {
    process.exitCode = 1;
  }
}

runLoadTest(50).catch((err: unknown) => {
  console.error('Load test failed:', err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
