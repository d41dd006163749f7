import { Response } from 'express';
import { httpStatusCode } from '../lib/constant';
import { AuthError, NotFoundError, formatErrorResponse } from '../lib/errors';
import { authService, toPublicUser } from '../services/auth.service';
import { orderService } from '../services/order.service';
import { AuthRequest } from '../types/request';

// Perfil del usuario actual con su historial de pedidos (más recientes primero)
export const getProfile = async (req: AuthRequest, res: Response) => {
  try {
    if (!req.user) {
      throw new AuthError('Necesitas iniciar sesión para acceder a esta página');
    }

    const user = await authService.getUser(req.user.id);
    if (!user) {
      throw new NotFoundError('Usuario no encontrado');
    }

    const orders = await orderService.listUserOrders(user.id);
    res.status(httpStatusCode.OK).json({ success: true, user: toPublicUser(user), orders });
  } catch (error) {
    formatErrorResponse(res, error);
  }
};
