import express from 'express';
import { confirmOrder, getCheckout } from '../controllers/order.controller';
import { authMiddleware } from '../middleware/auth.middleware';

const router = express.Router();

router.get('/checkout', authMiddleware, getCheckout);
router.post('/orders', authMiddleware, confirmOrder);

export default router;
