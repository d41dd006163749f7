import { Response } from 'express';
import { httpStatusCode } from './constant';
import { Notice } from '../types/notice';
import { logger } from '../config/logger';

export type FormData = Record<string, unknown>;

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: number = httpStatusCode.INTERNAL_SERVER_ERROR
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Entrada de formulario inválida; el cliente recibe lo que envió para corregirlo */
export class ValidationError extends AppError {
  constructor(message: string, public readonly formData?: FormData) {
    super(message, httpStatusCode.BAD_REQUEST);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, public readonly formData?: FormData) {
    super(message, httpStatusCode.CONFLICT);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, httpStatusCode.NOT_FOUND);
  }
}

export class AuthError extends AppError {
  constructor(message: string, code: number = httpStatusCode.UNAUTHORIZED) {
    super(message, code);
  }
}

export class StoreFailureError extends AppError {
  constructor(public readonly operation: string, public readonly reason?: unknown) {
    super('Error interno del servidor. Inténtalo de nuevo más tarde.');
  }
}

/**
 * Respuesta de error uniforme para los controladores.
 * Los errores que no son AppError se registran y se ocultan tras un 500 genérico.
 * `extra` añade campos al cuerpo, como el token de carrito vigente.
 */
export const formatErrorResponse = (
  res: Response,
  error: unknown,
  notices: Notice[] = [],
  extra: Record<string, unknown> = {}
) => {
  if (error instanceof AppError) {
    const formData = error instanceof ValidationError || error instanceof ConflictError
      ? error.formData
      : undefined;

    return res.status(error.code).json({
      success: false,
      message: error.message,
      notices,
      ...extra,
      ...(formData ? { formData } : {}),
    });
  }

  logger.error(`Error no controlado: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
  return res.status(httpStatusCode.INTERNAL_SERVER_ERROR).json({
    success: false,
    message: 'Error interno del servidor',
    notices,
    ...extra,
  });
};
