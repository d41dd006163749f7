import express from 'express';
import {
  addToCart,
  getCart,
  removeFromCart,
  resetCart,
  updateCartQuantity,
} from '../controllers/cart.controller';
import { optionalAuthMiddleware } from '../middleware/auth.middleware';

const router = express.Router();

// Visitantes y usuarios: la identidad sale del JWT o de la cabecera X-Cart-Token
router.use(optionalAuthMiddleware);

router.get('/', getCart);
router.post('/items/:productId', addToCart);
router.put('/items/:productId', updateCartQuantity);
router.delete('/items/:productId', removeFromCart);
router.post('/reset', resetCart);

export default router;
