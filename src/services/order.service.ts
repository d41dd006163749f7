import { logger } from '../config/logger';
import { ORDER_PLACEHOLDERS } from '../lib/constant';
import { ValidationError } from '../lib/errors';
import { CartLineItem, CartRecord, OrderRecord, Stores } from '../types/store';
import { formatOrderTime } from '../utils/dateUtils';
import { mongoStores } from '../stores/mongo.store';
import { cartTotal } from './cart.service';

export interface CheckoutLine extends CartLineItem {
  subtotal: number;
}

export interface CheckoutSummary {
  items: CheckoutLine[];
  overallTotal: number;
  generatedAt: string;
}

export interface PlacedOrder {
  order: OrderRecord;
  orderTime: string;
  confirmationSuffix: number;
}

// Número aleatorio de 4 dígitos que acompaña al ID en la confirmación
export const generateConfirmationSuffix = () => Math.floor(1000 + Math.random() * 9000);

export const createOrderService = (stores: Stores, now: () => Date = () => new Date()) => ({
  checkoutSummary(cart: CartRecord | { items: readonly CartLineItem[] }): CheckoutSummary {
    if (cart.items.length === 0) {
      throw new ValidationError('Tu carrito está vacío o no se pudo cargar para el pago');
    }

    const items = cart.items.map((item) => ({ ...item, subtotal: item.price * item.quantity }));
    return {
      items,
      overallTotal: items.reduce((total, item) => total + item.subtotal, 0),
      generatedAt: formatOrderTime(now()),
    };
  },

  /**
   * Registra el pedido con una copia de las líneas, descuenta el stock de cada
   * producto y vacía el carrito. Los tres pasos comparten transacción.
   * El stock no se vuelve a comprobar y puede quedar en negativo.
   */
  async placeOrder(cart: CartRecord, user: { id: string }): Promise<PlacedOrder> {
    if (cart.items.length === 0) {
      throw new ValidationError('Tu carrito está vacío. No hay nada que pedir.');
    }

    const orderItems = cart.items.map((item) => ({ ...item }));
    const orderDate = now();

    const order = await stores.withTransaction(async (session) => {
      const created = await stores.orders.create({
        userId: user.id,
        orderItems,
        totalAmount: cartTotal(orderItems),
        orderDate,
        status: 'Pending',
        shippingAddress: ORDER_PLACEHOLDERS.shippingAddress,
        paymentInfo: ORDER_PLACEHOLDERS.paymentInfo,
      }, session);

      for (const item of orderItems) {
        await stores.products.incrementStock(item.productId, -item.quantity, session);
      }

      await stores.carts.replaceItems(cart.id, [], session);
      return created;
    });

    logger.info(`Pedido ${order.id} registrado para el usuario ${user.id} por ${order.totalAmount}`);

    return {
      order,
      orderTime: formatOrderTime(order.orderDate),
      confirmationSuffix: generateConfirmationSuffix(),
    };
  },

  listUserOrders(userId: string): Promise<OrderRecord[]> {
    return stores.orders.findByUser(userId);
  },
});

export type OrderService = ReturnType<typeof createOrderService>;

export const orderService = createOrderService(mongoStores);
