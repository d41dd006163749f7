import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import { config } from '../config/env';
import { logger } from '../config/logger';
import { MIN_PASSWORD_LENGTH } from '../lib/constant';
import { AuthError, ConflictError, ValidationError } from '../lib/errors';
import { Notice, notice } from '../types/notice';
import { Stores, UserRecord } from '../types/store';
import { mongoStores } from '../stores/mongo.store';
import { CartService, ShoppingContext, cartService } from './cart.service';

export interface RegisterForm {
  username?: unknown;
  email?: unknown;
  password?: unknown;
  confirmPassword?: unknown;
}

export interface LoginForm {
  username?: unknown;
  password?: unknown;
}

export type PublicUser = Omit<UserRecord, 'passwordHash'>;

export interface LoginResult {
  user: PublicUser;
  token: string;
  context: ShoppingContext;
  notices: Notice[];
}

export interface TokenPayload {
  userId: string;
}

const text = (value: unknown) => (typeof value === 'string' ? value.trim() : '');
const secret = (value: unknown) => (typeof value === 'string' ? value : '');

export const toPublicUser = ({ passwordHash: _passwordHash, ...user }: UserRecord): PublicUser => user;

export const hashPassword = (password: string) => bcrypt.hash(password, 10);

export const signToken = (userId: string) =>
  jwt.sign({ userId }, config.jwtSecret, { expiresIn: config.jwtExpiresIn });

/**
 * Verifica el JWT y devuelve su payload; lanza AuthError si es inválido o expiró.
 */
export const verifyToken = (token: string): TokenPayload => {
  try {
    const decoded = jwt.verify(token, config.jwtSecret);
    if (typeof decoded === 'object' && typeof decoded.userId === 'string' && decoded.userId) {
      return { userId: decoded.userId };
    }
    throw new AuthError('Token inválido: falta información de usuario');
  } catch (error) {
    if (error instanceof AuthError) throw error;
    if (error instanceof jwt.TokenExpiredError) {
      throw new AuthError('Token expirado. Inicia sesión nuevamente.');
    }
    if (error instanceof jwt.JsonWebTokenError) {
      throw new AuthError('Token inválido o malformado');
    }
    throw error;
  }
};

export const createAuthService = (stores: Stores, carts: CartService) => ({
  async register(form: RegisterForm): Promise<PublicUser> {
    const username = text(form.username);
    const email = text(form.email);
    const password = secret(form.password);
    const confirmPassword = secret(form.confirmPassword);
    // Nunca se devuelven las contraseñas en el formulario
    const formData = { username, email };

    if (!username || !email || !password || !confirmPassword) {
      throw new ValidationError('Todos los campos son obligatorios', formData);
    }
    if (password !== confirmPassword) {
      throw new ValidationError('Las contraseñas no coinciden', formData);
    }
    if (password.length < MIN_PASSWORD_LENGTH) {
      throw new ValidationError(`La contraseña debe tener al menos ${MIN_PASSWORD_LENGTH} caracteres`, formData);
    }

    if (await stores.users.findByUsername(username)) {
      throw new ConflictError('El nombre de usuario ya está en uso. Elige otro.', formData);
    }
    if (await stores.users.findByEmail(email)) {
      throw new ConflictError('Este email ya está registrado. Usa otro o inicia sesión.', formData);
    }

    const user = await stores.users.create({
      username,
      email,
      passwordHash: await hashPassword(password),
      isAdmin: false,
    });

    logger.info(`Usuario registrado: ${user.username}`);
    return toPublicUser(user);
  },

  /**
   * Valida las credenciales, emite el token y fusiona el carrito anónimo del contexto.
   */
  async login(form: LoginForm, context: ShoppingContext): Promise<LoginResult> {
    const username = text(form.username);
    const password = secret(form.password);

    if (!username || !password) {
      throw new ValidationError('Introduce usuario y contraseña', { username });
    }

    const user = await stores.users.findByUsername(username);
    const validPassword = user ? await bcrypt.compare(password, user.passwordHash) : false;
    if (!user || !validPassword) {
      throw new AuthError('Usuario o contraseña incorrectos');
    }

    const merge = await carts.mergeAnonymousCart(user.id, context.cartToken);

    return {
      user: toPublicUser(user),
      token: signToken(user.id),
      context: merge.context,
      notices: [...merge.notices, notice('success', `¡Bienvenido, ${user.username}!`)],
    };
  },

  async getUser(userId: string): Promise<UserRecord | null> {
    return stores.users.findById(userId);
  },
});

export type AuthService = ReturnType<typeof createAuthService>;

export const authService = createAuthService(mongoStores, cartService);
