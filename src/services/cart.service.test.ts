import { beforeEach, describe, expect, it } from 'vitest';
import { NotFoundError, ValidationError } from '../lib/errors';
import { createMemoryStores, MemoryStores } from '../test/memoryStore';
import {
  CartService,
  ResolvedCart,
  ShoppingContext,
  createCartService,
  mergeCartItems,
  parseQuantityAction,
} from './cart.service';
import { CartLineItem, CartRecord } from '../types/store';

const anonymous = (cartToken: string | null = null): ShoppingContext => ({ userId: null, cartToken });

const okCart = (resolved: ResolvedCart): CartRecord => {
  if (resolved.status !== 'ok') throw new Error('se esperaba un carrito');
  return resolved.cart;
};

const line = (productId: string, quantity: number, price = 10): CartLineItem => ({
  productId,
  name: `Producto ${productId}`,
  price,
  imageUrl: '',
  category: 'Pruebas',
  quantity,
});

describe('cartService', () => {
  let stores: MemoryStores;
  let service: CartService;

  beforeEach(() => {
    stores = createMemoryStores();
    service = createCartService(stores);
  });

  describe('resolve', () => {
    it('creates an empty anonymous cart and issues a token for a new visitor', async () => {
      const resolved = await service.resolve(anonymous());

      expect(resolved.status).toBe('ok');
      expect(resolved.cart.items).toEqual([]);
      expect(resolved.context.cartToken).toBe(okCart(resolved).id);
      expect(stores.data.carts.size).toBe(1);
    });

    it('issues a different token for every new anonymous visitor', async () => {
      const first = await service.resolve(anonymous());
      const second = await service.resolve(anonymous());

      expect(second.context.cartToken).not.toBe(first.context.cartToken);
    });

    it('returns the same anonymous cart while the token is valid', async () => {
      const first = await service.resolve(anonymous());
      const again = await service.resolve(first.context);

      expect(okCart(again).id).toBe(okCart(first).id);
      expect(again.context.cartToken).toBe(first.context.cartToken);
      expect(stores.data.carts.size).toBe(1);
    });

    it('replaces a token that does not point to an anonymous cart', async () => {
      const userCart = okCart(await service.resolve({ userId: 'user-1', cartToken: null }));

      const resolved = await service.resolve(anonymous(userCart.id));

      expect(okCart(resolved).id).not.toBe(userCart.id);
      expect(okCart(resolved).userId).toBeNull();
      expect(resolved.context.cartToken).toBe(okCart(resolved).id);
    });

    it('replaces an unknown token with a fresh cart', async () => {
      const resolved = await service.resolve(anonymous('no-existe'));

      expect(resolved.status).toBe('ok');
      expect(resolved.context.cartToken).not.toBe('no-existe');
    });

    it('creates the user cart once and reuses it', async () => {
      const context: ShoppingContext = { userId: 'user-1', cartToken: 'token-anonimo' };

      const first = await service.resolve(context);
      const second = await service.resolve(context);

      expect(okCart(first).userId).toBe('user-1');
      expect(okCart(second).id).toBe(okCart(first).id);
      expect(second.context).toEqual(context);
    });

    it('falls back to an empty structure when the cart cannot be created', async () => {
      stores.failOn('carts.create');

      const resolved = await service.resolve(anonymous());

      expect(resolved.status).toBe('fallback');
      expect(resolved.cart.items).toEqual([]);
      expect(resolved.context.cartToken).toBeNull();
      expect(resolved.notices).toEqual([
        { level: 'error', message: 'No se pudo inicializar tu carrito. Inténtalo de nuevo.' },
      ]);
    });

    it('creates a new anonymous cart when the previous one cannot be read', async () => {
      stores.failOn('carts.findAnonymous');

      const resolved = await service.resolve(anonymous('000000000000000000000001'));

      expect(resolved.status).toBe('ok');
      expect(resolved.notices).toEqual([
        { level: 'error', message: 'Hubo un problema recuperando tu carrito anterior. Se ha creado uno nuevo.' },
      ]);
    });
  });

  describe('addItem', () => {
    let cart: CartRecord;

    beforeEach(async () => {
      cart = okCart(await service.resolve(anonymous()));
    });

    it('appends a line item with a snapshot of the product', async () => {
      const product = stores.addProduct({ name: 'Lámpara', price: 25, stock: 5, category: 'Hogar', imageUrl: '/img/lampara.jpg' });

      const result = await service.addItem(cart, product.id, 2);

      expect(result.changed).toBe(true);
      expect(result.cart.items).toEqual([
        { productId: product.id, name: 'Lámpara', price: 25, imageUrl: '/img/lampara.jpg', category: 'Hogar', quantity: 2 },
      ]);
      expect(result.notices).toEqual([{ level: 'success', message: "2x 'Lámpara' añadido al carrito" }]);
      expect(stores.data.carts.get(cart.id)?.items[0].quantity).toBe(2);
    });

    it('increments an existing line item', async () => {
      const product = stores.addProduct({ name: 'Lámpara', stock: 5 });
      const first = await service.addItem(cart, product.id, 2);

      const second = await service.addItem(first.cart, product.id, '3');

      expect(second.cart.items).toHaveLength(1);
      expect(second.cart.items[0].quantity).toBe(5);
    });

    it('rejects an increment that would exceed the stock without writing', async () => {
      const product = stores.addProduct({ name: 'Lámpara', stock: 5 });
      const first = await service.addItem(cart, product.id, 2);

      const result = await service.addItem(first.cart, product.id, 4);

      expect(result.changed).toBe(false);
      expect(result.notices).toEqual([
        { level: 'warning', message: "No se pueden añadir 4 más de 'Lámpara'. Solo quedan 3 disponibles." },
      ]);
      expect(stores.data.carts.get(cart.id)?.items[0].quantity).toBe(2);
    });

    it('rejects a new line item above the stock', async () => {
      const product = stores.addProduct({ name: 'Lámpara', stock: 1 });

      const result = await service.addItem(cart, product.id, 2);

      expect(result.changed).toBe(false);
      expect(result.notices).toEqual([
        { level: 'warning', message: "No se puede añadir 'Lámpara'. Solo hay 1 en stock." },
      ]);
      expect(stores.data.carts.get(cart.id)?.items).toEqual([]);
    });

    it.each([0, -1, 'abc', '2.5', 1.5])('rejects the quantity %s', async (quantity) => {
      const product = stores.addProduct({ name: 'Lámpara' });

      await expect(service.addItem(cart, product.id, quantity)).rejects.toBeInstanceOf(ValidationError);
      expect(stores.data.carts.get(cart.id)?.items).toEqual([]);
    });

    it('fails with NotFound for an unknown product', async () => {
      await expect(service.addItem(cart, 'desconocido', 1)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('keeps the price captured when the item was added', async () => {
      const product = stores.addProduct({ name: 'Lámpara', price: 25 });
      const result = await service.addItem(cart, product.id, 1);

      const stored = stores.data.products.get(product.id);
      if (stored) stored.price = 40;

      const reloaded = okCart(await service.resolve(anonymous(result.cart.id)));
      expect(reloaded.items[0].price).toBe(25);
    });

    it('never persists a quantity above the stock across repeated adds', async () => {
      const product = stores.addProduct({ name: 'Lámpara', stock: 4 });
      let current = cart;

      for (const quantity of [1, 2, 3, 1, 1]) {
        current = (await service.addItem(current, product.id, quantity)).cart;
        expect(stores.data.carts.get(cart.id)?.items[0].quantity ?? 0).toBeLessThanOrEqual(4);
      }

      expect(current.items[0].quantity).toBe(4);
    });
  });

  describe('setQuantity', () => {
    let cart: CartRecord;
    let productId: string;

    beforeEach(async () => {
      const product = stores.addProduct({ name: 'Taza', stock: 5 });
      productId = product.id;
      const resolved = okCart(await service.resolve(anonymous()));
      cart = (await service.addItem(resolved, productId, 2)).cart;
    });

    it('increases by one', async () => {
      const result = await service.setQuantity(cart, productId, { type: 'increase' });

      expect(result.cart.items[0].quantity).toBe(3);
      expect(result.notices).toEqual([{ level: 'success', message: "Cantidad de 'Taza' actualizada a 3" }]);
    });

    it('decreases by one', async () => {
      const result = await service.setQuantity(cart, productId, { type: 'decrease' });

      expect(result.cart.items[0].quantity).toBe(1);
    });

    it('removes the line item when the quantity is set to zero', async () => {
      const other = stores.addProduct({ name: 'Plato' });
      const withTwo = (await service.addItem(cart, other.id, 1)).cart;

      const result = await service.setQuantity(withTwo, productId, { type: 'set', quantity: 0 });

      expect(result.cart.items).toHaveLength(withTwo.items.length - 1);
      expect(result.cart.items.map((item) => item.productId)).toEqual([other.id]);
      expect(result.notices).toEqual([{ level: 'info', message: "'Taza' eliminado del carrito" }]);
    });

    it('removes the line item when decreasing from one', async () => {
      const one = (await service.setQuantity(cart, productId, { type: 'set', quantity: 1 })).cart;

      const result = await service.setQuantity(one, productId, { type: 'decrease' });

      expect(result.cart.items).toEqual([]);
    });

    it('clamps the quantity to the current stock', async () => {
      const result = await service.setQuantity(cart, productId, { type: 'set', quantity: 9 });

      expect(result.changed).toBe(true);
      expect(result.cart.items[0].quantity).toBe(5);
      expect(result.notices).toEqual([
        { level: 'warning', message: "Solo hay 5 de 'Taza' disponibles. Cantidad ajustada al máximo." },
        { level: 'success', message: "Cantidad de 'Taza' actualizada a 5" },
      ]);
    });

    it('removes the line item when the product ran out of stock', async () => {
      const stored = stores.data.products.get(productId);
      if (stored) stored.stock = 0;

      const result = await service.setQuantity(cart, productId, { type: 'increase' });

      expect(result.cart.items).toEqual([]);
    });

    it('leaves the cart untouched when the product is not in it', async () => {
      const other = stores.addProduct({ name: 'Plato' });

      const result = await service.setQuantity(cart, other.id, { type: 'increase' });

      expect(result.changed).toBe(false);
      expect(result.notices).toEqual([{ level: 'warning', message: 'El producto no está en tu carrito' }]);
    });

    it('fails with NotFound on an empty cart', async () => {
      const empty = okCart(await service.resolve(anonymous()));

      await expect(service.setQuantity(empty, productId, { type: 'increase' })).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('parseQuantityAction', () => {
    it('maps the form fields to an action', () => {
      expect(parseQuantityAction('increase', undefined)).toEqual({ type: 'increase' });
      expect(parseQuantityAction('decrease', '7')).toEqual({ type: 'decrease' });
      expect(parseQuantityAction(undefined, ' 4 ')).toEqual({ type: 'set', quantity: 4 });
    });

    it('rejects a direct quantity that is not an integer', () => {
      expect(() => parseQuantityAction('update', 'x')).toThrow('Cantidad inválida. Introduce un número válido.');
    });
  });

  describe('removeAll and reset', () => {
    it('removes every unit of a product', async () => {
      const product = stores.addProduct({ name: 'Vaso', stock: 9 });
      const cart = (await service.addItem(okCart(await service.resolve(anonymous())), product.id, 4)).cart;

      const result = await service.removeAll(cart, product.id);

      expect(result.cart.items).toEqual([]);
      expect(result.notices).toEqual([{ level: 'warning', message: "Todas las unidades de 'Vaso' eliminadas del carrito" }]);
    });

    it('does nothing when the product is not in the cart', async () => {
      const cart = okCart(await service.resolve(anonymous()));
      const before = stores.data.carts.get(cart.id)?.updatedAt;

      const result = await service.removeAll(cart, 'otro');

      expect(result.changed).toBe(false);
      expect(stores.data.carts.get(cart.id)?.updatedAt).toBe(before);
    });

    it('empties the cart', async () => {
      const product = stores.addProduct({ name: 'Vaso' });
      const cart = (await service.addItem(okCart(await service.resolve(anonymous())), product.id, 1)).cart;

      const result = await service.reset(cart);

      expect(result.cart.items).toEqual([]);
      expect(stores.data.carts.get(cart.id)?.items).toEqual([]);
    });
  });

  describe('mergeCartItems', () => {
    it('sums quantities for shared products and appends the rest', () => {
      const user = [line('a', 2), line('b', 1)];
      const anon = [line('a', 3), line('c', 4)];

      const merged = mergeCartItems(user, anon);

      expect(merged.map((item) => [item.productId, item.quantity])).toEqual([
        ['a', 5],
        ['b', 1],
        ['c', 4],
      ]);
      expect(user[0].quantity).toBe(2);
      expect(anon[0].quantity).toBe(3);
    });
  });

  describe('mergeAnonymousCart', () => {
    it('folds the anonymous cart into the user cart and deletes it', async () => {
      const shared = stores.addProduct({ name: 'Funda', stock: 3 });
      const extra = stores.addProduct({ name: 'Cable', stock: 10 });

      const anonCart = okCart(await service.resolve(anonymous()));
      await service.addItem(anonCart, shared.id, 2);
      await service.addItem(okCart(await service.resolve(anonymous(anonCart.id))), extra.id, 1);

      const userCart = okCart(await service.resolve({ userId: 'user-1', cartToken: null }));
      await service.addItem(userCart, shared.id, 2);

      const result = await service.mergeAnonymousCart('user-1', anonCart.id);

      expect(result.context).toEqual({ userId: 'user-1', cartToken: null });
      // Sin comprobación de stock en la fusión: 2 + 2 supera el stock de 3
      expect(result.mergedCart?.items.map((item) => [item.name, item.quantity])).toEqual([
        ['Funda', 4],
        ['Cable', 1],
      ]);
      expect(stores.data.carts.has(anonCart.id)).toBe(false);
      expect(result.notices).toEqual([
        { level: 'info', message: 'Los productos de tu carrito anónimo se han añadido a tu cuenta' },
      ]);
    });

    it('clears the token without merging when the anonymous cart is empty', async () => {
      const anonCart = okCart(await service.resolve(anonymous()));

      const result = await service.mergeAnonymousCart('user-1', anonCart.id);

      expect(result.mergedCart).toBeNull();
      expect(result.context.cartToken).toBeNull();
      expect(stores.data.carts.has(anonCart.id)).toBe(true);
    });

    it('does nothing without a token', async () => {
      const result = await service.mergeAnonymousCart('user-1', null);

      expect(result).toEqual({ context: { userId: 'user-1', cartToken: null }, mergedCart: null, notices: [] });
    });
  });
});
