import express from 'express';
import {
  createProduct,
  getCategories,
  getProduct,
  getProducts,
} from '../controllers/product.controller';
import { adminMiddleware, authMiddleware } from '../middleware/auth.middleware';

const router = express.Router();

// Rutas específicas primero
router.get('/products', getProducts);
router.get('/products/categories', getCategories);
router.post('/admin/products', authMiddleware, adminMiddleware, createProduct);
router.get('/products/:id', getProduct);

export default router;
