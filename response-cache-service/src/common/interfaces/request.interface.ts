/**
 * Authenticated Request Interface
 * Express request carrying the user context injected by the API gateway
 * (X-User-Id, X-User-Email, X-User-Role, X-Gateway-Auth headers)
 */

import type { Request } from 'express';
import type { UserRoleType } from '../constants/roles.constant';

export interface GatewayUser {
  userId: number;
  email: string;
  role: UserRoleType;
}

export interface AuthenticatedRequest extends Request {
  user?: GatewayUser;
  requestId?: string;
}
