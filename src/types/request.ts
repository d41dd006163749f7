import { Request } from 'express';

export interface AuthUser {
  id: string;
  username: string;
  isAdmin: boolean;
}

export interface AuthRequest extends Request {
  user?: AuthUser;
}
