import mongoose, { FilterQuery, Types } from 'mongoose';
import { Product, IProduct } from '../models/Product';
import { Cart, ICart, ICartItem } from '../models/Cart';
import { User, IUser } from '../models/User';
import { Order, IOrder } from '../models/Order';
import { config } from '../config/env';
import { logger } from '../config/logger';
import { AppError, NotFoundError, StoreFailureError } from '../lib/errors';
import {
  CartLineItem,
  CartRecord,
  CartStore,
  NewOrder,
  OrderRecord,
  OrderStore,
  ProductFilter,
  ProductRecord,
  ProductStore,
  Stores,
  StoreSession,
  UserRecord,
  UserStore,
} from '../types/store';

type WithId<T> = T & { _id: Types.ObjectId };

const isObjectId = (id: string) => Types.ObjectId.isValid(id);

const escapeRegex = (text: string) => text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

// Cualquier fallo del driver se convierte en StoreFailureError
const run = async <T>(operation: string, work: () => Promise<T>): Promise<T> => {
  try {
    return await work();
  } catch (error) {
    if (error instanceof AppError) throw error;
    logger.error(`MongoDB ${operation} failed: ${error instanceof Error ? error.message : String(error)}`);
    throw new StoreFailureError(operation, error);
  }
};

const toProduct = (doc: WithId<IProduct>): ProductRecord => ({
  id: doc._id.toString(),
  name: doc.name,
  description: doc.description,
  price: doc.price,
  stock: doc.stock,
  imageUrl: doc.imageUrl,
  category: doc.category,
});

const toLineItem = (item: ICartItem): CartLineItem => ({
  productId: item.product.toString(),
  name: item.name,
  price: item.price,
  imageUrl: item.imageUrl,
  category: item.category,
  quantity: item.quantity,
});

const fromLineItem = (item: CartLineItem): ICartItem => ({
  product: new Types.ObjectId(item.productId),
  name: item.name,
  price: item.price,
  imageUrl: item.imageUrl,
  category: item.category,
  quantity: item.quantity,
});

const toCart = (doc: WithId<ICart>): CartRecord => ({
  id: doc._id.toString(),
  userId: doc.user ? doc.user.toString() : null,
  items: doc.items.map(toLineItem),
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

const toUser = (doc: WithId<IUser>): UserRecord => ({
  id: doc._id.toString(),
  username: doc.username,
  email: doc.email,
  passwordHash: doc.password,
  isAdmin: doc.isAdmin,
  createdAt: doc.createdAt,
});

const toOrder = (doc: WithId<IOrder>): OrderRecord => ({
  id: doc._id.toString(),
  userId: doc.user.toString(),
  orderItems: doc.orderItems.map(toLineItem),
  totalAmount: doc.totalAmount,
  orderDate: doc.orderDate,
  status: doc.status,
  shippingAddress: doc.shippingAddress,
  paymentInfo: doc.paymentInfo,
});

const buildProductQuery = (filter: ProductFilter): FilterQuery<IProduct> => {
  const query: FilterQuery<IProduct> = {};

  if (filter.category) {
    query.category = filter.category;
  }

  if (filter.search) {
    const pattern = new RegExp(escapeRegex(filter.search), 'i');
    query.$or = [{ name: { $regex: pattern } }, { description: { $regex: pattern } }];
  }

  if (filter.price) {
    const range: { $gte?: number; $lte?: number } = {};
    if (filter.price.gte !== undefined) range.$gte = filter.price.gte;
    if (filter.price.lte !== undefined) range.$lte = filter.price.lte;
    query.price = range;
  }

  return query;
};

export const productStore: ProductStore = {
  find: (filter) =>
    run('products.find', async () => {
      const docs = await Product.find(buildProductQuery(filter)).lean<WithId<IProduct>[]>();
      return docs.map(toProduct);
    }),

  findById: (id) =>
    run('products.findById', async () => {
      if (!isObjectId(id)) return null;
      const doc = await Product.findById(id).lean<WithId<IProduct> | null>();
      return doc ? toProduct(doc) : null;
    }),

  findByName: (name) =>
    run('products.findByName', async () => {
      const doc = await Product.findOne({ name }).lean<WithId<IProduct> | null>();
      return doc ? toProduct(doc) : null;
    }),

  create: (data) =>
    run('products.create', async () => {
      const created = await new Product(data).save();
      return { id: created._id.toString(), ...data };
    }),

  upsertByName: (data) =>
    run('products.upsertByName', async () => {
      await Product.updateOne({ name: data.name }, { $set: data }, { upsert: true });
    }),

  incrementStock: (id, delta, session) =>
    run('products.incrementStock', async () => {
      await Product.updateOne({ _id: id }, { $inc: { stock: delta } }, { session });
    }),

  distinctCategories: () =>
    run('products.distinctCategories', async () => {
      const categories: unknown[] = await Product.distinct('category');
      return categories.filter((category): category is string => typeof category === 'string');
    }),
};

export const cartStore: CartStore = {
  findByUser: (userId) =>
    run('carts.findByUser', async () => {
      if (!isObjectId(userId)) return null;
      const doc = await Cart.findOne({ user: userId }).lean<WithId<ICart> | null>();
      return doc ? toCart(doc) : null;
    }),

  findAnonymous: (id) =>
    run('carts.findAnonymous', async () => {
      if (!isObjectId(id)) return null;
      const doc = await Cart.findOne({ _id: id, user: null }).lean<WithId<ICart> | null>();
      return doc ? toCart(doc) : null;
    }),

  create: (userId) =>
    run('carts.create', async () => {
      const created = await Cart.create({ user: userId ? new Types.ObjectId(userId) : null, items: [] });
      return toCart(created.toObject<WithId<ICart>>());
    }),

  replaceItems: (id, items, session) =>
    run('carts.replaceItems', async () => {
      const doc = await Cart.findByIdAndUpdate(
        id,
        { $set: { items: items.map(fromLineItem) } },
        { new: true, session }
      ).lean<WithId<ICart> | null>();

      if (!doc) throw new NotFoundError('Carrito no encontrado');
      return toCart(doc);
    }),

  delete: (id) =>
    run('carts.delete', async () => {
      await Cart.deleteOne({ _id: id });
    }),
};

export const userStore: UserStore = {
  findById: (id) =>
    run('users.findById', async () => {
      if (!isObjectId(id)) return null;
      const doc = await User.findById(id).lean<WithId<IUser> | null>();
      return doc ? toUser(doc) : null;
    }),

  findByUsername: (username) =>
    run('users.findByUsername', async () => {
      const doc = await User.findOne({ username }).lean<WithId<IUser> | null>();
      return doc ? toUser(doc) : null;
    }),

  findByEmail: (email) =>
    run('users.findByEmail', async () => {
      const doc = await User.findOne({ email: email.toLowerCase() }).lean<WithId<IUser> | null>();
      return doc ? toUser(doc) : null;
    }),

  create: (data) =>
    run('users.create', async () => {
      const created = await new User({
        username: data.username,
        email: data.email,
        password: data.passwordHash,
        isAdmin: data.isAdmin,
      }).save();
      return toUser(created.toObject<WithId<IUser>>());
    }),
};

export const orderStore: OrderStore = {
  create: (data: NewOrder, session?: StoreSession) =>
    run('orders.create', async () => {
      const [created] = await Order.create(
        [{
          user: new Types.ObjectId(data.userId),
          orderItems: data.orderItems.map(fromLineItem),
          totalAmount: data.totalAmount,
          orderDate: data.orderDate,
          status: data.status,
          shippingAddress: data.shippingAddress,
          paymentInfo: data.paymentInfo,
        }],
        { session }
      );
      return toOrder(created.toObject<WithId<IOrder>>());
    }),

  findByUser: (userId) =>
    run('orders.findByUser', async () => {
      if (!isObjectId(userId)) return [];
      const docs = await Order.find({ user: userId }).sort({ orderDate: -1 }).lean<WithId<IOrder>[]>();
      return docs.map(toOrder);
    }),
};

/** Parte de `ClientSession` que usa la transacción */
export interface TransactionControl {
  startTransaction(): void;
  commitTransaction(): Promise<unknown>;
  abortTransaction(): Promise<unknown>;
  endSession(): Promise<void>;
}

/**
 * Ejecuta `work` en una transacción ya abierta sobre `session`.
 * Solo se aborta si el commit no llegó a intentarse: el driver rechaza abortar después.
 */
export const runInTransaction = async <S extends TransactionControl, T>(
  session: S,
  work: (session: S) => Promise<T>
): Promise<T> => {
  session.startTransaction();
  let committing = false;

  try {
    const result = await work(session);
    committing = true;
    await run('session.commit', () => session.commitTransaction());
    return result;
  } catch (error) {
    if (!committing) {
      await session.abortTransaction().catch((abortError: unknown) => {
        logger.error(`MongoDB session.abort failed: ${abortError instanceof Error ? abortError.message : String(abortError)}`);
      });
    }
    throw error;
  } finally {
    await session.endSession();
  }
};

/**
 * Ejecuta `work` dentro de una transacción de MongoDB.
 * Con MONGO_TRANSACTIONS=false los pasos se ejecutan en secuencia sin sesión.
 */
const withTransaction = async <T>(work: (session: StoreSession) => Promise<T>): Promise<T> => {
  if (!config.useTransactions) {
    return work(undefined);
  }

  const session = await run('session.start', () => mongoose.startSession());
  return runInTransaction(session, work);
};

export const mongoStores: Stores = {
  products: productStore,
  carts: cartStore,
  users: userStore,
  orders: orderStore,
  withTransaction,
};
