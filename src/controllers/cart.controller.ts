import { Response } from 'express';
import { CART_TOKEN_HEADER, httpStatusCode } from '../lib/constant';
import { StoreFailureError, formatErrorResponse } from '../lib/errors';
import { shoppingContext } from '../middleware/auth.middleware';
import {
  CartMutationResult,
  ResolvedCart,
  ShoppingContext,
  cartService,
  cartTotal,
  parseQuantityAction,
} from '../services/cart.service';
import { Notice, notice } from '../types/notice';
import { AuthRequest } from '../types/request';
import { CartRecord } from '../types/store';

type ResolvedOk = Extract<ResolvedCart, { status: 'ok' }>;

// Un usuario autenticado nunca lleva token anónimo en la respuesta
const exposeCartToken = (res: Response, context: ShoppingContext) => {
  const cartToken = context.userId ? null : context.cartToken;
  res.setHeader(CART_TOKEN_HEADER, cartToken ?? '');
  return cartToken;
};

/**
 * Devuelve el token de carrito anónimo vigente en la cabecera y en el cuerpo.
 */
export const sendWithContext = (
  res: Response,
  context: ShoppingContext,
  body: Record<string, unknown>,
  status: number = httpStatusCode.OK
) => {
  const cartToken = exposeCartToken(res, context);
  return res.status(status).json({ success: true, cartToken, ...body });
};

const cartBody = (cart: CartRecord | { items: readonly [] }, notices: Notice[]) => ({
  cart: { id: 'id' in cart ? cart.id : null, items: cart.items },
  totalPrice: cartTotal(cart.items),
  notices,
});

const mutate = (
  operation: (resolved: ResolvedOk, req: AuthRequest) => Promise<CartMutationResult>
) => async (req: AuthRequest, res: Response) => {
  let context: ShoppingContext | null = null;
  let notices: Notice[] = [];
  try {
    const resolved = await cartService.resolve(shoppingContext(req));
    context = resolved.context;
    notices = resolved.notices;

    if (resolved.status === 'fallback') {
      throw new StoreFailureError('carts.resolve');
    }

    const result = await operation(resolved, req);
    return sendWithContext(res, resolved.context, cartBody(result.cart, [...notices, ...result.notices]));
  } catch (error) {
    // El carrito pudo crearse antes del fallo: el cliente recibe su token igualmente
    const extra = context ? { cartToken: exposeCartToken(res, context) } : {};
    return formatErrorResponse(res, error, notices, extra);
  }
};

// Ver carrito
export const getCart = async (req: AuthRequest, res: Response) => {
  try {
    const resolved = await cartService.resolve(shoppingContext(req));
    const notices = [...resolved.notices];

    if (resolved.cart.items.length === 0) {
      notices.push(notice('info', 'Tu carrito está vacío. ¡Empieza a añadir productos!'));
    }

    return sendWithContext(res, resolved.context, cartBody(resolved.cart, notices));
  } catch (error) {
    return formatErrorResponse(res, error);
  }
};

// Agregar al carrito
export const addToCart = mutate(({ cart }, req) =>
  cartService.addItem(cart, req.params.productId, req.body?.quantity ?? 1)
);

// Actualizar cantidad: action = increase | decrease | cualquier otro valor con quantity
export const updateCartQuantity = mutate(({ cart }, req) =>
  cartService.setQuantity(cart, req.params.productId, parseQuantityAction(req.body?.action, req.body?.quantity))
);

// Eliminar todas las unidades de un producto
export const removeFromCart = mutate(({ cart }, req) =>
  cartService.removeAll(cart, req.params.productId)
);

// Vaciar carrito
export const resetCart = mutate(({ cart }) => cartService.reset(cart));
