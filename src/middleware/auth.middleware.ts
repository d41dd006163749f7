import { Response, NextFunction } from 'express';
import NodeCache from 'node-cache';
import { logger } from '../config/logger';
import { CART_TOKEN_HEADER, httpStatusCode } from '../lib/constant';
import { AuthError, formatErrorResponse } from '../lib/errors';
import { authService, verifyToken } from '../services/auth.service';
import { ShoppingContext } from '../services/cart.service';
import { AuthRequest, AuthUser } from '../types/request';

// Caché para usuarios autenticados
const userCache = new NodeCache({
  stdTTL: 300, // 5 minutos de caché
  checkperiod: 320,
});

export const clearUserCache = () => userCache.flushAll();

const bearerToken = (req: AuthRequest) => {
  const header = req.headers.authorization;
  return header?.startsWith('Bearer ') ? header.slice('Bearer '.length).trim() : '';
};

const loadUser = async (userId: string): Promise<AuthUser> => {
  const cached = userCache.get<AuthUser>(userId);
  if (cached) return cached;

  const user = await authService.getUser(userId);
  if (!user) {
    throw new AuthError('Usuario no encontrado');
  }

  const authUser = { id: user.id, username: user.username, isAdmin: user.isAdmin };
  userCache.set(userId, authUser);
  return authUser;
};

const authenticate = async (req: AuthRequest, res: Response, next: NextFunction, required: boolean) => {
  try {
    const token = bearerToken(req);

    if (!token) {
      if (!required) return next();
      logger.warn(`Intento de acceso sin token desde IP: ${req.ip || 'unknown'}`);
      throw new AuthError('Necesitas iniciar sesión para acceder a esta página');
    }

    const { userId } = verifyToken(token);
    req.user = await loadUser(userId);
    next();
  } catch (error) {
    formatErrorResponse(res, error);
  }
};

export const authMiddleware = (req: AuthRequest, res: Response, next: NextFunction) =>
  authenticate(req, res, next, true);

// Para rutas abiertas a visitantes: identifica al usuario si envía token
export const optionalAuthMiddleware = (req: AuthRequest, res: Response, next: NextFunction) =>
  authenticate(req, res, next, false);

export const adminMiddleware = (req: AuthRequest, res: Response, next: NextFunction) => {
  if (!req.user?.isAdmin) {
    return res.status(httpStatusCode.FORBIDDEN).json({
      success: false,
      message: 'Acceso denegado: no tienes privilegios de administrador',
    });
  }
  next();
};

/**
 * Contexto de compra explícito de la petición: usuario autenticado y token de carrito anónimo.
 */
export const shoppingContext = (req: AuthRequest): ShoppingContext => {
  const token = req.header(CART_TOKEN_HEADER);
  return {
    userId: req.user?.id ?? null,
    cartToken: token && token.trim() ? token.trim() : null,
  };
};
