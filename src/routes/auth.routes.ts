import express from 'express';
import { login, logout, register } from '../controllers/auth.controller';
import { optionalAuthMiddleware } from '../middleware/auth.middleware';

const router = express.Router();

router.post('/auth/register', register);
router.post('/auth/login', optionalAuthMiddleware, login);
router.post('/auth/logout', logout);

export default router;
