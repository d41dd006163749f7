import { logger } from '../config/logger';
import { NotFoundError, StoreFailureError, ValidationError } from '../lib/errors';
import { Notice, notice } from '../types/notice';
import { CartLineItem, CartRecord, ProductRecord, Stores } from '../types/store';
import { mongoStores } from '../stores/mongo.store';

/** Identidad de la petición: usuario autenticado o token de carrito anónimo */
export interface ShoppingContext {
  userId: string | null;
  cartToken: string | null;
}

/** Estructura vacía que se devuelve cuando no se pudo obtener ni crear el carrito */
export interface EmptyCartFallback {
  items: readonly [];
}

export type ResolvedCart =
  | { status: 'ok'; cart: CartRecord; context: ShoppingContext; notices: Notice[] }
  | { status: 'fallback'; cart: EmptyCartFallback; context: ShoppingContext; notices: Notice[] };

export type QuantityAction =
  | { type: 'increase' }
  | { type: 'decrease' }
  | { type: 'set'; quantity: number };

export interface CartMutationResult {
  cart: CartRecord;
  // false cuando la operación se rechazó sin escribir
  changed: boolean;
  notices: Notice[];
}

export interface MergeResult {
  context: ShoppingContext;
  mergedCart: CartRecord | null;
  notices: Notice[];
}

export const cartTotal = (items: readonly CartLineItem[]) =>
  items.reduce((total, item) => total + item.price * item.quantity, 0);

/**
 * Acepta enteros o cadenas con un entero; cualquier otra cosa es error de validación.
 */
export const parseQuantity = (raw: unknown, message = 'Cantidad inválida'): number => {
  if (typeof raw === 'number' && Number.isInteger(raw)) return raw;
  if (typeof raw === 'string' && /^[+-]?\d+$/.test(raw.trim())) return Number.parseInt(raw.trim(), 10);
  throw new ValidationError(message);
};

/**
 * Traduce el formulario de cantidad (`action` + `quantity`) a una QuantityAction.
 */
export const parseQuantityAction = (action: unknown, quantity: unknown): QuantityAction => {
  if (action === 'increase') return { type: 'increase' };
  if (action === 'decrease') return { type: 'decrease' };
  return {
    type: 'set',
    quantity: parseQuantity(quantity, 'Cantidad inválida. Introduce un número válido.'),
  };
};

const snapshotItem = (product: ProductRecord, quantity: number): CartLineItem => ({
  productId: product.id,
  name: product.name,
  price: product.price,
  imageUrl: product.imageUrl,
  category: product.category,
  quantity,
});

/**
 * Fusiona las líneas de un carrito anónimo en las del usuario.
 * Si el producto ya existe se suman las cantidades; no se vuelve a comprobar el stock.
 */
export const mergeCartItems = (
  userItems: readonly CartLineItem[],
  anonymousItems: readonly CartLineItem[]
): CartLineItem[] => {
  const byProduct = new Map<string, CartLineItem>();

  for (const item of userItems) {
    byProduct.set(item.productId, { ...item });
  }

  for (const item of anonymousItems) {
    const existing = byProduct.get(item.productId);
    if (existing) {
      existing.quantity += item.quantity;
    } else {
      byProduct.set(item.productId, { ...item });
    }
  }

  return [...byProduct.values()];
};

export const createCartService = (stores: Stores) => {
  const findProduct = async (productId: string) => {
    const product = await stores.products.findById(productId);
    if (!product) {
      throw new NotFoundError('Producto no encontrado');
    }
    return product;
  };

  const resolveUserCart = async (context: ShoppingContext & { userId: string }): Promise<ResolvedCart> => {
    try {
      const existing = await stores.carts.findByUser(context.userId);
      if (existing) {
        return { status: 'ok', cart: existing, context, notices: [] };
      }

      const created = await stores.carts.create(context.userId);
      logger.info(`Nuevo carrito ${created.id} creado para el usuario ${context.userId}`);
      return { status: 'ok', cart: created, context, notices: [] };
    } catch (error) {
      if (!(error instanceof StoreFailureError)) throw error;
      return {
        status: 'fallback',
        cart: { items: [] },
        context,
        notices: [notice('error', 'No se pudo inicializar tu carrito. Inténtalo de nuevo.')],
      };
    }
  };

  const resolveAnonymousCart = async (context: ShoppingContext): Promise<ResolvedCart> => {
    const notices: Notice[] = [];

    if (context.cartToken) {
      try {
        const existing = await stores.carts.findAnonymous(context.cartToken);
        if (existing) {
          return { status: 'ok', cart: existing, context, notices };
        }
        logger.info(`Token de carrito anónimo ${context.cartToken} inválido; se crea uno nuevo`);
      } catch (error) {
        if (!(error instanceof StoreFailureError)) throw error;
        notices.push(notice('error', 'Hubo un problema recuperando tu carrito anterior. Se ha creado uno nuevo.'));
      }
    }

    try {
      const created = await stores.carts.create(null);
      logger.info(`Nuevo carrito anónimo creado con ID: ${created.id}`);
      return {
        status: 'ok',
        cart: created,
        context: { ...context, cartToken: created.id },
        notices,
      };
    } catch (error) {
      if (!(error instanceof StoreFailureError)) throw error;
      notices.push(notice('error', 'No se pudo inicializar tu carrito. Inténtalo de nuevo.'));
      return {
        status: 'fallback',
        cart: { items: [] },
        context: { ...context, cartToken: null },
        notices,
      };
    }
  };

  const persist = (cart: CartRecord, items: CartLineItem[]) => stores.carts.replaceItems(cart.id, items);

  return {
    /**
     * Devuelve el carrito activo de la identidad, creándolo si no existe.
     * El contexto devuelto lleva el token de carrito anónimo vigente.
     */
    resolve(context: ShoppingContext): Promise<ResolvedCart> {
      const { userId } = context;
      if (userId) {
        return resolveUserCart({ ...context, userId });
      }
      return resolveAnonymousCart(context);
    },

    async addItem(cart: CartRecord, productId: string, rawQuantity: unknown = 1): Promise<CartMutationResult> {
      const quantity = parseQuantity(rawQuantity, 'Cantidad inválida');
      if (quantity <= 0) {
        throw new ValidationError('La cantidad debe ser positiva');
      }

      const product = await findProduct(productId);
      const items = cart.items.map((item) => ({ ...item }));
      const existing = items.find((item) => item.productId === productId);

      if (existing) {
        if (existing.quantity + quantity > product.stock) {
          const available = Math.max(product.stock - existing.quantity, 0);
          logger.warn(`Stock insuficiente para ${product.name}: en carrito ${existing.quantity}, pedido ${quantity}, stock ${product.stock}`);
          return {
            cart,
            changed: false,
            notices: [notice('warning', `No se pueden añadir ${quantity} más de '${product.name}'. Solo quedan ${available} disponibles.`)],
          };
        }
        existing.quantity += quantity;
      } else {
        if (quantity > product.stock) {
          logger.warn(`Stock insuficiente para ${product.name}: pedido ${quantity}, stock ${product.stock}`);
          return {
            cart,
            changed: false,
            notices: [notice('warning', `No se puede añadir '${product.name}'. Solo hay ${product.stock} en stock.`)],
          };
        }
        items.push(snapshotItem(product, quantity));
      }

      const updated = await persist(cart, items);
      return {
        cart: updated,
        changed: true,
        notices: [notice('success', `${quantity}x '${product.name}' añadido al carrito`)],
      };
    },

    async setQuantity(cart: CartRecord, productId: string, action: QuantityAction): Promise<CartMutationResult> {
      if (cart.items.length === 0) {
        throw new NotFoundError('El carrito no existe o está vacío');
      }

      const product = await findProduct(productId);
      const items = cart.items.map((item) => ({ ...item }));
      const index = items.findIndex((item) => item.productId === productId);

      if (index === -1) {
        return {
          cart,
          changed: false,
          notices: [notice('warning', 'El producto no está en tu carrito')],
        };
      }

      const item = items[index];
      const requested = action.type === 'increase'
        ? item.quantity + 1
        : action.type === 'decrease'
          ? item.quantity - 1
          : action.quantity;

      const notices: Notice[] = [];
      let finalQuantity = requested;

      if (requested > product.stock) {
        finalQuantity = product.stock;
        logger.warn(`Cantidad de ${product.name} limitada a ${product.stock} (pedido ${requested})`);
        notices.push(notice('warning', `Solo hay ${product.stock} de '${item.name}' disponibles. Cantidad ajustada al máximo.`));
      }

      if (finalQuantity <= 0) {
        items.splice(index, 1);
        notices.push(notice('info', `'${item.name}' eliminado del carrito`));
      } else {
        item.quantity = finalQuantity;
        notices.push(notice('success', `Cantidad de '${product.name}' actualizada a ${finalQuantity}`));
      }

      const updated = await persist(cart, items);
      return { cart: updated, changed: true, notices };
    },

    async removeAll(cart: CartRecord, productId: string): Promise<CartMutationResult> {
      const target = cart.items.find((item) => item.productId === productId);
      if (!target) {
        return {
          cart,
          changed: false,
          notices: [notice('info', 'El producto no estaba en tu carrito')],
        };
      }

      const updated = await persist(cart, cart.items.filter((item) => item.productId !== productId).map((item) => ({ ...item })));
      return {
        cart: updated,
        changed: true,
        notices: [notice('warning', `Todas las unidades de '${target.name}' eliminadas del carrito`)],
      };
    },

    async reset(cart: CartRecord): Promise<CartMutationResult> {
      const updated = await persist(cart, []);
      return {
        cart: updated,
        changed: true,
        notices: [notice('success', 'Tu carrito se ha vaciado')],
      };
    },

    /**
     * Tras el login vuelca el carrito anónimo del token en el carrito del usuario
     * y borra el anónimo. El token se descarta siempre.
     */
    async mergeAnonymousCart(userId: string, cartToken: string | null): Promise<MergeResult> {
      const context: ShoppingContext = { userId, cartToken: null };
      if (!cartToken) {
        return { context, mergedCart: null, notices: [] };
      }

      const anonymousCart = await stores.carts.findAnonymous(cartToken);
      if (!anonymousCart || anonymousCart.items.length === 0) {
        return { context, mergedCart: null, notices: [] };
      }

      const resolved = await resolveUserCart({ userId, cartToken: null });
      if (resolved.status === 'fallback') {
        throw new StoreFailureError('carts.merge');
      }

      const mergedItems = mergeCartItems(resolved.cart.items, anonymousCart.items);
      const mergedCart = await stores.carts.replaceItems(resolved.cart.id, mergedItems);
      await stores.carts.delete(anonymousCart.id);
      logger.info(`Carrito anónimo ${anonymousCart.id} fusionado en el carrito ${mergedCart.id} del usuario ${userId}`);

      return {
        context,
        mergedCart,
        notices: [notice('info', 'Los productos de tu carrito anónimo se han añadido a tu cuenta')],
      };
    },
  };
};

export type CartService = ReturnType<typeof createCartService>;

export const cartService = createCartService(mongoStores);
