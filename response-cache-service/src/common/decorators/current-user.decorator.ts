/**
 * Current User Decorator
 * User attached by GatewayAuthGuard; the id is a string across services
 */

import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { AuthenticatedRequest } from '../interfaces/request.interface';
import type { UserRoleType } from '../constants/roles.constant';

export interface CurrentUserData {
  userId: string;
  email: string;
  role: UserRoleType;
}

export function currentUserFromRequest(
  request: AuthenticatedRequest,
): CurrentUserData {
  if (!request.user) {
    throw new Error('User not found in request. GatewayAuthGuard required.');
  }

  return {
    userId: request.user.userId.toString(),
    email: request.user.email,
    role: request.user.role,
  };
}

export const CurrentUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): CurrentUserData =>
    currentUserFromRequest(
      ctx.switchToHttp().getRequest<AuthenticatedRequest>(),
    ),
);
