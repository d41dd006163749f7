import express from 'express';
import { authMiddleware } from '../middleware/auth.middleware';
import { getProfile } from '../controllers/user.controller';

const router = express.Router();

router.get('/users/me', authMiddleware, getProfile);

export default router;
