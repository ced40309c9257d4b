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

export interface LockOptions {
  /** Lock the row until the enclosing transaction ends (`SELECT ... FOR UPDATE`). */
  forUpdate?: boolean;
}

export interface OrderHeader {
  customer: string;
  total: number;
}

/**
 * Data-access primitives over products, orders and order items. A session is
 * bound to one connection; inside `Store.transaction` every call shares the
 * same transaction.
 */
export interface StoreSession {
  findProductById(id: number, options?: LockOptions): Promise<Product | null>;
  findProductByName(name: string): Promise<Product | null>;
  listProducts(filter: ProductFilter, page: Page): Promise<Product[]>;
  listLowStockProducts(threshold: number): Promise<Product[]>;
  insertProduct(fields: ProductFields): Promise<Product>;
  updateProduct(id: number, fields: ProductFields): Promise<Product>;
  /** Adds `delta` (negative to take stock out) to the product's stock. */
  adjustProductStock(id: number, delta: number): Promise<void>;
  deleteProduct(id: number): Promise<void>;
  isProductReferenced(id: number): Promise<boolean>;

  findOrderById(id: number, options?: LockOptions): Promise<OrderRecord | null>;
  listOrders(page: Page): Promise<OrderRecord[]>;
  /** Writes the order header and returns it with its new id, before any item is written. */
  insertOrder(header: OrderHeader): Promise<OrderRecord>;
  updateOrder(id: number, header: OrderHeader): Promise<OrderRecord>;
  deleteOrder(id: number): Promise<void>;

  listOrderItems(orderIds: number[]): Promise<OrderItem[]>;
  insertOrderItem(item: NewOrderItem): Promise<OrderItem>;
  deleteOrderItems(orderId: number): Promise<void>;

  countProducts(): Promise<number>;
  countOrders(): Promise<number>;
  sumOrderTotals(): Promise<number>;
  /** Product with the greatest summed item quantity; ties go to the lowest product id. */
  findBestSeller(): Promise<BestSeller | null>;
}

export interface Store {
  /** Runs `work` in one transaction: committed when it resolves, rolled back when it throws. */
  transaction<T>(work: (session: StoreSession) => Promise<T>): Promise<T>;
  read<T>(work: (session: StoreSession) => Promise<T>): Promise<T>;
  ping(): Promise<void>;
}
