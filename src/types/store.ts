import type { ClientSession } from 'mongoose';

export interface ProductRecord {
  id: string;
  name: string;
  description: string;
  price: number;
  stock: number;
  imageUrl: string;
  category: string;
}

export type NewProduct = Omit<ProductRecord, 'id'>;

export interface ProductFilter {
  category?: string;
  search?: string;
  price?: { gte?: number; lte?: number };
}

/** Línea del carrito: nombre, precio, imagen y categoría copiados al añadir */
export interface CartLineItem {
  productId: string;
  name: string;
  price: number;
  imageUrl: string;
  category: string;
  quantity: number;
}

export interface CartRecord {
  id: string;
  // null para carritos anónimos
  userId: string | null;
  items: CartLineItem[];
  createdAt: Date;
  updatedAt: Date;
}

export interface UserRecord {
  id: string;
  username: string;
  email: string;
  passwordHash: string;
  isAdmin: boolean;
  createdAt: Date;
}

export type NewUser = Omit<UserRecord, 'id' | 'createdAt'>;

export const ORDER_STATUSES = ['Pending', 'Processing', 'Shipped', 'Delivered', 'Cancelled'] as const;
export type OrderStatus = (typeof ORDER_STATUSES)[number];

export interface OrderRecord {
  id: string;
  userId: string;
  orderItems: CartLineItem[];
  totalAmount: number;
  orderDate: Date;
  status: OrderStatus;
  shippingAddress: string;
  paymentInfo: string;
}

export type NewOrder = Omit<OrderRecord, 'id'>;

/** Sesión de MongoDB cuando la operación corre dentro de una transacción */
export type StoreSession = ClientSession | undefined;

export interface ProductStore {
  find(filter: ProductFilter): Promise<ProductRecord[]>;
  findById(id: string): Promise<ProductRecord | null>;
  findByName(name: string): Promise<ProductRecord | null>;
  create(data: NewProduct): Promise<ProductRecord>;
  upsertByName(data: NewProduct): Promise<void>;
  incrementStock(id: string, delta: number, session?: StoreSession): Promise<void>;
  distinctCategories(): Promise<string[]>;
}

export interface CartStore {
  findByUser(userId: string): Promise<CartRecord | null>;
  findAnonymous(id: string): Promise<CartRecord | null>;
  create(userId: string | null): Promise<CartRecord>;
  replaceItems(id: string, items: CartLineItem[], session?: StoreSession): Promise<CartRecord>;
  delete(id: string): Promise<void>;
}

export interface UserStore {
  findById(id: string): Promise<UserRecord | null>;
  findByUsername(username: string): Promise<UserRecord | null>;
  findByEmail(email: string): Promise<UserRecord | null>;
  create(data: NewUser): Promise<UserRecord>;
}

export interface OrderStore {
  create(data: NewOrder, session?: StoreSession): Promise<OrderRecord>;
  findByUser(userId: string): Promise<OrderRecord[]>;
}

export interface Stores {
  products: ProductStore;
  carts: CartStore;
  users: UserStore;
  orders: OrderStore;
  withTransaction<T>(work: (session: StoreSession) => Promise<T>): Promise<T>;
}
