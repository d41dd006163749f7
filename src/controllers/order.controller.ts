import { Response } from 'express';
import { httpStatusCode } from '../lib/constant';
import { AuthError, StoreFailureError, formatErrorResponse } from '../lib/errors';
import { shoppingContext } from '../middleware/auth.middleware';
import { cartService } from '../services/cart.service';
import { orderService } from '../services/order.service';
import { notice } from '../types/notice';
import { AuthRequest } from '../types/request';

const requireUser = (req: AuthRequest) => {
  if (!req.user) {
    throw new AuthError('Necesitas iniciar sesión para realizar un pedido');
  }
  return req.user;
};

// Resumen previo al pago con subtotales por línea
export const getCheckout = async (req: AuthRequest, res: Response) => {
  try {
    requireUser(req);
    const resolved = await cartService.resolve(shoppingContext(req));
    const summary = orderService.checkoutSummary(resolved.cart);

    res.status(httpStatusCode.OK).json({ success: true, ...summary, notices: resolved.notices });
  } catch (error) {
    formatErrorResponse(res, error);
  }
};

// Confirmación del pedido
export const confirmOrder = async (req: AuthRequest, res: Response) => {
  try {
    const user = requireUser(req);
    const resolved = await cartService.resolve(shoppingContext(req));
    if (resolved.status === 'fallback') {
      throw new StoreFailureError('carts.resolve');
    }

    const { order, orderTime, confirmationSuffix } = await orderService.placeOrder(resolved.cart, user);

    res.status(httpStatusCode.CREATED).json({
      success: true,
      orderId: order.id,
      order,
      orderTime,
      confirmationSuffix,
      notices: [notice('success', '¡Tu pedido se ha realizado correctamente!')],
    });
  } catch (error) {
    formatErrorResponse(res, error);
  }
};
