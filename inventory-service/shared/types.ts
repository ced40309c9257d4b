export interface Product {
  id: number;
  name: string;
  description: string | null;
  price: number;
  stock: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface ProductInput {
  name: string;
  description?: string | null;
  price: number;
  stock: number;
}

/** Product fields after normalization, as written to the store. */
export interface ProductFields {
  name: string;
  description: string | null;
  price: number;
  stock: number;
}

export interface ProductFilter {
  name?: string;
  minPrice?: number;
  maxPrice?: number;
  minStock?: number;
}

export interface Page {
  skip: number;
  limit: number;
}

export interface OrderItem {
  id: number;
  orderId: number;
  productId: number;
  productName: string;
  quantity: number;
  unitPrice: number;
  lineTotal: number;
}

export type NewOrderItem = Omit<OrderItem, 'id'>;

/** Order header without its items. */
export interface OrderRecord {
  id: number;
  customer: string;
  total: number;
  orderedAt: Date;
  createdAt: Date;
  updatedAt: Date;
}

export interface Order extends OrderRecord {
  items: OrderItem[];
}

export interface OrderLine {
  productId: number;
  quantity: number;
}

export interface OrderInput {
  customer: string;
  items: OrderLine[];
}

export interface BestSeller {
  productId: number;
  productName: string;
  quantitySold: number;
}

export interface Statistics {
  totalProducts: number;
  totalOrders: number;
  totalRevenue: number;
  averageOrderValue: number;
  bestSeller: BestSeller | null;
}
