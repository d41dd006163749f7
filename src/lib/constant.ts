export const httpStatusCode = {
  OK: 200,
  CREATED: 201,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  INTERNAL_SERVER_ERROR: 500,
};

export const ALL_CATEGORIES = 'All';
export const DEFAULT_CATEGORY = 'Uncategorized';
export const MIN_PASSWORD_LENGTH = 6;
export const CART_TOKEN_HEADER = 'x-cart-token';

export const ORDER_PLACEHOLDERS = {
  shippingAddress: 'Dirección simulada',
  paymentInfo: 'Pago simulado correcto',
};
