import { Response } from 'express';
import { httpStatusCode } from '../lib/constant';
import { formatErrorResponse } from '../lib/errors';
import { shoppingContext } from '../middleware/auth.middleware';
import { authService } from '../services/auth.service';
import { notice } from '../types/notice';
import { AuthRequest } from '../types/request';
import { sendWithContext } from './cart.controller';

// Función para registrar un nuevo usuario
export const register = async (req: AuthRequest, res: Response) => {
  try {
    const user = await authService.register(req.body ?? {});
    res.status(httpStatusCode.CREATED).json({
      success: true,
      user,
      notices: [notice('success', '¡Registro completado! Ya puedes iniciar sesión.')],
    });
  } catch (error) {
    formatErrorResponse(res, error);
  }
};

// Función para iniciar sesión; fusiona el carrito anónimo del token X-Cart-Token
export const login = async (req: AuthRequest, res: Response) => {
  try {
    if (req.user) {
      return res.status(httpStatusCode.OK).json({
        success: true,
        user: req.user,
        notices: [notice('info', 'Ya has iniciado sesión')],
      });
    }

    const result = await authService.login(req.body ?? {}, shoppingContext(req));
    return sendWithContext(res, result.context, {
      user: result.user,
      token: result.token,
      notices: result.notices,
    });
  } catch (error) {
    return formatErrorResponse(res, error);
  }
};

// El token JWT lo descarta el cliente; el token de carrito anónimo se conserva
export const logout = (_req: AuthRequest, res: Response) => {
  res.status(httpStatusCode.OK).json({
    success: true,
    notices: [notice('info', 'Has cerrado sesión')],
  });
};
