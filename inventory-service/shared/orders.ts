import { InsufficientStockError, NotFoundError, ValidationError } from './errors';
import { createServiceLogger } from './logger';
import { MAX_INTEGER, normalizeName, roundMoney } from './normalize';
import type { Store, StoreSession } from './store';
import { runScoped } from './transaction';
import type { Order, OrderInput, OrderItem, OrderLine, OrderRecord, Page, Product } from './types';

const log = createServiceLogger('orders');

/** A requested line together with the locked product it draws from. */
interface CheckedLine {
  product: Product;
  quantity: number;
  lineTotal: number;
}

function assertLineShape(lines: OrderLine[]): void {
  if (lines.length === 0) {
    throw new ValidationError('Order must contain at least one item');
  }
  const seen = new Set<number>();
  for (const line of lines) {
    if (seen.has(line.productId)) {
      throw new ValidationError('An order cannot contain the same product twice');
    }
    seen.add(line.productId);
    if (!Number.isInteger(line.quantity) || line.quantity <= 0) {
      throw new ValidationError('Quantity must be greater than zero');
    }
    if (line.quantity > MAX_INTEGER) {
      throw new ValidationError('Quantity is too large');
    }
  }
}

function normalizeCustomer(customer: string): string {
  const name = normalizeName(customer);
  if (name.length === 0) {
    throw new ValidationError('Customer name is required');
  }
  return name;
}

/**
 * Locks and checks every line against current stock, in caller order. Nothing
 * is written until every line has passed.
 */
async function checkLines(session: StoreSession, lines: OrderLine[]): Promise<CheckedLine[]> {
  const checked: CheckedLine[] = [];
  for (const line of lines) {
    const product = await session.findProductById(line.productId, { forUpdate: true });
    if (!product) {
      throw new NotFoundError(`Product ${line.productId} not found`);
    }
    if (product.stock < line.quantity) {
      throw new InsufficientStockError(product.id, product.name, product.stock, line.quantity);
    }
    checked.push({ product, quantity: line.quantity, lineTotal: roundMoney(line.quantity * product.price) });
  }
  return checked;
}

function orderTotal(lines: CheckedLine[]): number {
  return roundMoney(lines.reduce((sum, line) => sum + line.lineTotal, 0));
}

/** Takes the stock out and writes one item per line with the product's current name and price. */
async function applyLines(session: StoreSession, orderId: number, lines: CheckedLine[]): Promise<OrderItem[]> {
  const items: OrderItem[] = [];
  for (const line of lines) {
    await session.adjustProductStock(line.product.id, -line.quantity);
    items.push(
      await session.insertOrderItem({
        orderId,
        productId: line.product.id,
        productName: line.product.name,
        quantity: line.quantity,
        unitPrice: line.product.price,
        lineTotal: line.lineTotal,
      }),
    );
  }
  return items;
}

/** Gives every item's quantity back to its product. */
async function releaseItems(session: StoreSession, items: OrderItem[]): Promise<void> {
  for (const item of items) {
    await session.adjustProductStock(item.productId, item.quantity);
  }
}

async function requireOrder(session: StoreSession, id: number): Promise<OrderRecord> {
  const order = await session.findOrderById(id, { forUpdate: true });
  if (!order) {
    throw new NotFoundError('Order not found');
  }
  return order;
}

function attachItems(orders: OrderRecord[], items: OrderItem[]): Order[] {
  const byOrder = new Map<number, OrderItem[]>();
  for (const item of items) {
    const list = byOrder.get(item.orderId);
    if (list) {
      list.push(item);
    } else {
      byOrder.set(item.orderId, [item]);
    }
  }
  return orders.map((order) => ({ ...order, items: byOrder.get(order.id) ?? [] }));
}

export async function createOrder(store: Store, input: OrderInput): Promise<Order> {
  assertLineShape(input.items);
  const customer = normalizeCustomer(input.customer);

  const order = await runScoped(store, 'createOrder', { customer }, async (session) => {
    const lines = await checkLines(session, input.items);
    const header = await session.insertOrder({ customer, total: orderTotal(lines) });
    const items = await applyLines(session, header.id, lines);
    return { ...header, items };
  });

  log.info('Order created', { orderId: order.id, customer: order.customer, total: order.total });
  return order;
}

/**
 * Replaces an order's customer and items. The old items' stock is given back
 * before the new lines are checked, so a line may re-request what the order
 * already held. Reversal and re-application commit or roll back together.
 */
export async function updateOrder(store: Store, id: number, input: OrderInput): Promise<Order> {
  const order = await runScoped(store, 'updateOrder', { orderId: id }, async (session) => {
    await requireOrder(session, id);
    assertLineShape(input.items);
    const customer = normalizeCustomer(input.customer);

    const previous = await session.listOrderItems([id]);
    await releaseItems(session, previous);
    await session.deleteOrderItems(id);

    const lines = await checkLines(session, input.items);
    const header = await session.updateOrder(id, { customer, total: orderTotal(lines) });
    const items = await applyLines(session, id, lines);
    return { ...header, items };
  });

  log.info('Order updated', { orderId: order.id, customer: order.customer, total: order.total });
  return order;
}

export async function deleteOrder(store: Store, id: number): Promise<void> {
  const customer = await runScoped(store, 'deleteOrder', { orderId: id }, async (session) => {
    const order = await requireOrder(session, id);
    const items = await session.listOrderItems([id]);
    await releaseItems(session, items);
    await session.deleteOrderItems(id);
    await session.deleteOrder(id);
    return order.customer;
  });

  log.info('Order deleted', { orderId: id, customer });
}

export async function getOrder(store: Store, id: number): Promise<Order> {
  return runScoped(
    store,
    'getOrder',
    { orderId: id },
    async (session) => {
      const order = await session.findOrderById(id);
      if (!order) {
        throw new NotFoundError('Order not found');
      }
      return { ...order, items: await session.listOrderItems([id]) };
    },
    { readOnly: true },
  );
}

export async function listOrders(store: Store, page: Page): Promise<Order[]> {
  return runScoped(
    store,
    'listOrders',
    {},
    async (session) => {
      const orders = await session.listOrders(page);
      const items = await session.listOrderItems(orders.map((order) => order.id));
      return attachItems(orders, items);
    },
    { readOnly: true },
  );
}
