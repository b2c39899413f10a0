import { Request } from 'express';

/**
 * Caller identity, resolved once by the authenticate middleware and passed
 * explicitly into every service call.
 */
export interface ActingUser {
  id: number;
  username: string;
  roles: string[];
}

/**
 * Auth Request - Request carrying the authenticated user
 */
export interface AuthRequest extends Request {
  user?: ActingUser;
}

