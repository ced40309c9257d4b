import type { Pool, PoolClient } from 'pg';
import { AppError, ConflictError, InternalError, NotFoundError, ValidationError } from './errors';
import { createServiceLogger } from './logger';
import type { LockOptions, OrderHeader, Store, StoreSession } from './store';
import type {
  BestSeller,
  NewOrderItem,
  OrderItem,
  OrderRecord,
  Page,
  Product,
  ProductFields,
  ProductFilter,
} from './types';

const log = createServiceLogger('pg-store');

type ProductRow = {
  id: number;
  name: string;
  description: string | null;
  price: number;
  stock: number;
  created_at: Date;
  updated_at: Date;
};

type OrderRow = {
  id: number;
  customer: string;
  total: number;
  ordered_at: Date;
  created_at: Date;
  updated_at: Date;
};

type OrderItemRow = {
  id: number;
  order_id: number;
  product_id: number;
  product_name: string;
  quantity: number;
  unit_price: number;
  line_total: number;
};

const PRODUCT_COLUMNS = 'id, name, description, price, stock, created_at, updated_at';
const ORDER_COLUMNS = 'id, customer, total, ordered_at, created_at, updated_at';
const ITEM_COLUMNS = 'id, order_id, product_id, product_name, quantity, unit_price, line_total';

const CONSTRAINT_MESSAGES: Record<string, string> = {
  products_name_key: 'Product with this name already exists',
  products_price_check: 'Price must be greater than zero',
  products_stock_check: 'Stock cannot be negative',
  order_items_order_product_key: 'An order cannot contain the same product twice',
  order_items_product_id_fkey: 'Product is referenced by existing orders',
  order_items_quantity_check: 'Quantity must be greater than zero',
};

function toProduct(row: ProductRow): Product {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    price: row.price,
    stock: row.stock,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toOrder(row: OrderRow): OrderRecord {
  return {
    id: row.id,
    customer: row.customer,
    total: row.total,
    orderedAt: row.ordered_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toOrderItem(row: OrderItemRow): OrderItem {
  return {
    id: row.id,
    orderId: row.order_id,
    productId: row.product_id,
    productName: row.product_name,
    quantity: row.quantity,
    unitPrice: row.unit_price,
    lineTotal: row.line_total,
  };
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

interface PgErrorLike {
  code: string;
  constraint?: string;
}

function isPgError(err: unknown): err is PgErrorLike {
  return typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string';
}

/**
 * Maps PostgreSQL SQLSTATE codes onto the service's error taxonomy. Errors
 * that are not attributable to caller input are returned unchanged.
 */
export function translatePgError(err: unknown): unknown {
  if (err instanceof AppError || !isPgError(err)) return err;

  const known = err.constraint ? CONSTRAINT_MESSAGES[err.constraint] : undefined;
  switch (err.code) {
    case '23505':
      return new ConflictError(known ?? 'The change conflicts with existing data');
    case '23503':
      return new ConflictError(known ?? 'The change references missing or in-use data');
    case '23514':
      return new ConflictError(known ?? 'The change violates a data constraint');
    case '22003':
      return new ValidationError('A numeric value is out of range');
    case '40001':
    case '40P01':
      return new InternalError('The operation conflicted with a concurrent change; resubmit it');
    default:
      return err;
  }
}

class PgSession implements StoreSession {
  constructor(private readonly client: PoolClient) {}

  async findProductById(id: number, options: LockOptions = {}): Promise<Product | null> {
    const lock = options.forUpdate ? ' FOR UPDATE' : '';
    const result = await this.client.query<ProductRow>(
      `SELECT ${PRODUCT_COLUMNS} FROM products WHERE id = $1${lock}`,
      [id],
    );
    const row = result.rows[0];
    return row ? toProduct(row) : null;
  }

  async findProductByName(name: string): Promise<Product | null> {
    const result = await this.client.query<ProductRow>(
      `SELECT ${PRODUCT_COLUMNS} FROM products WHERE name = $1`,
      [name],
    );
    const row = result.rows[0];
    return row ? toProduct(row) : null;
  }

  async listProducts(filter: ProductFilter, page: Page): Promise<Product[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filter.name !== undefined) {
      params.push(`%${escapeLike(filter.name)}%`);
      conditions.push(`name ILIKE $${params.length}`);
    }
    if (filter.minPrice !== undefined) {
      params.push(filter.minPrice);
      conditions.push(`price >= $${params.length}`);
    }
    if (filter.maxPrice !== undefined) {
      params.push(filter.maxPrice);
      conditions.push(`price <= $${params.length}`);
    }
    if (filter.minStock !== undefined) {
      params.push(filter.minStock);
      conditions.push(`stock >= $${params.length}`);
    }

    const where = conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '';
    params.push(page.limit, page.skip);
    const result = await this.client.query<ProductRow>(
      `SELECT ${PRODUCT_COLUMNS} FROM products${where} ORDER BY id LIMIT $${params.length - 1} OFFSET $${params.length}`,
      params,
    );
    return result.rows.map(toProduct);
  }

  async listLowStockProducts(threshold: number): Promise<Product[]> {
    const result = await this.client.query<ProductRow>(
      `SELECT ${PRODUCT_COLUMNS} FROM products WHERE stock <= $1 ORDER BY id`,
      [threshold],
    );
    return result.rows.map(toProduct);
  }

  async insertProduct(fields: ProductFields): Promise<Product> {
    const result = await this.client.query<ProductRow>(
      `INSERT INTO products (name, description, price, stock) VALUES ($1, $2, $3, $4) RETURNING ${PRODUCT_COLUMNS}`,
      [fields.name, fields.description, fields.price, fields.stock],
    );
    return toProduct(result.rows[0]);
  }

  async updateProduct(id: number, fields: ProductFields): Promise<Product> {
    const result = await this.client.query<ProductRow>(
      `UPDATE products SET name = $2, description = $3, price = $4, stock = $5, updated_at = now()
       WHERE id = $1 RETURNING ${PRODUCT_COLUMNS}`,
      [id, fields.name, fields.description, fields.price, fields.stock],
    );
    const row = result.rows[0];
    if (!row) throw new NotFoundError('Product not found');
    return toProduct(row);
  }

  async adjustProductStock(id: number, delta: number): Promise<void> {
    await this.client.query('UPDATE products SET stock = stock + $2, updated_at = now() WHERE id = $1', [id, delta]);
  }

  async deleteProduct(id: number): Promise<void> {
    await this.client.query('DELETE FROM products WHERE id = $1', [id]);
  }

  async isProductReferenced(id: number): Promise<boolean> {
    const result = await this.client.query('SELECT 1 FROM order_items WHERE product_id = $1 LIMIT 1', [id]);
    return result.rows.length > 0;
  }

  async findOrderById(id: number, options: LockOptions = {}): Promise<OrderRecord | null> {
    const lock = options.forUpdate ? ' FOR UPDATE' : '';
    const result = await this.client.query<OrderRow>(`SELECT ${ORDER_COLUMNS} FROM orders WHERE id = $1${lock}`, [id]);
    const row = result.rows[0];
    return row ? toOrder(row) : null;
  }

  async listOrders(page: Page): Promise<OrderRecord[]> {
    const result = await this.client.query<OrderRow>(
      `SELECT ${ORDER_COLUMNS} FROM orders ORDER BY id LIMIT $1 OFFSET $2`,
      [page.limit, page.skip],
    );
    return result.rows.map(toOrder);
  }

  async insertOrder(header: OrderHeader): Promise<OrderRecord> {
    const result = await this.client.query<OrderRow>(
      `INSERT INTO orders (customer, total) VALUES ($1, $2) RETURNING ${ORDER_COLUMNS}`,
      [header.customer, header.total],
    );
    return toOrder(result.rows[0]);
  }

  async updateOrder(id: number, header: OrderHeader): Promise<OrderRecord> {
    const result = await this.client.query<OrderRow>(
      `UPDATE orders SET customer = $2, total = $3, updated_at = now() WHERE id = $1 RETURNING ${ORDER_COLUMNS}`,
      [id, header.customer, header.total],
    );
    const row = result.rows[0];
    if (!row) throw new NotFoundError('Order not found');
    return toOrder(row);
  }

  async deleteOrder(id: number): Promise<void> {
    await this.client.query('DELETE FROM orders WHERE id = $1', [id]);
  }

  async listOrderItems(orderIds: number[]): Promise<OrderItem[]> {
    if (orderIds.length === 0) return [];
    const result = await this.client.query<OrderItemRow>(
      `SELECT ${ITEM_COLUMNS} FROM order_items WHERE order_id = ANY($1::int[]) ORDER BY order_id, id`,
      [orderIds],
    );
    return result.rows.map(toOrderItem);
  }

  async insertOrderItem(item: NewOrderItem): Promise<OrderItem> {
    const result = await this.client.query<OrderItemRow>(
      `INSERT INTO order_items (order_id, product_id, product_name, quantity, unit_price, line_total)
       VALUES ($1, $2, $3, $4, $5, $6) RETURNING ${ITEM_COLUMNS}`,
      [item.orderId, item.productId, item.productName, item.quantity, item.unitPrice, item.lineTotal],
    );
    return toOrderItem(result.rows[0]);
  }

  async deleteOrderItems(orderId: number): Promise<void> {
    await this.client.query('DELETE FROM order_items WHERE order_id = $1', [orderId]);
  }

  async countProducts(): Promise<number> {
    const result = await this.client.query<{ count: number }>('SELECT COUNT(*)::int AS count FROM products');
    return result.rows[0].count;
  }

  async countOrders(): Promise<number> {
    const result = await this.client.query<{ count: number }>('SELECT COUNT(*)::int AS count FROM orders');
    return result.rows[0].count;
  }

  async sumOrderTotals(): Promise<number> {
    const result = await this.client.query<{ sum: number }>(
      'SELECT COALESCE(SUM(total), 0)::float8 AS sum FROM orders',
    );
    return result.rows[0].sum;
  }

  async findBestSeller(): Promise<BestSeller | null> {
    const result = await this.client.query<{ product_id: number; name: string; quantity_sold: number }>(
      `SELECT i.product_id, p.name, SUM(i.quantity)::int AS quantity_sold
       FROM order_items i JOIN products p ON p.id = i.product_id
       GROUP BY i.product_id, p.name
       ORDER BY quantity_sold DESC, i.product_id ASC
       LIMIT 1`,
    );
    const row = result.rows[0];
    return row ? { productId: row.product_id, productName: row.name, quantitySold: row.quantity_sold } : null;
  }
}

export class PgStore implements Store {
  constructor(private readonly pool: Pool) {}

  async transaction<T>(work: (session: StoreSession) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await work(new PgSession(client));
      await client.query('COMMIT');
      return result;
    } catch (err) {
      await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
        log.warn('Rollback failed', { error: rollbackErr });
      });
      throw translatePgError(err);
    } finally {
      client.release();
    }
  }

  async read<T>(work: (session: StoreSession) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      return await work(new PgSession(client));
    } catch (err) {
      throw translatePgError(err);
    } finally {
      client.release();
    }
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }
}
