/**
 * Gateway Authentication Guard
 * The API gateway is the trust boundary: it authenticates users and forwards
 * X-Gateway-Auth: verified plus the user headers. Anything else is rejected.
 */

import {
  Injectable,
  CanActivate,
  ExecutionContext,
  UnauthorizedException,
} from '@nestjs/common';
import type { IncomingHttpHeaders } from 'http';
import type { AuthenticatedRequest } from '../interfaces/request.interface';
import { isUserRole } from '../constants/roles.constant';

function header(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

@Injectable()
export class GatewayAuthGuard implements CanActivate {
  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();

    if (header(request.headers, 'x-gateway-auth') !== 'verified') {
      throw new UnauthorizedException(
        'Invalid gateway authentication. Requests must come from API Gateway.',
      );
    }

    const userId = header(request.headers, 'x-user-id');
    const email = header(request.headers, 'x-user-email');
    const role = header(request.headers, 'x-user-role');

    if (!userId || !email || !role) {
      throw new UnauthorizedException(
        'Missing user context headers from gateway.',
      );
    }

    const userIdNum = parseInt(userId, 10);
    if (isNaN(userIdNum)) {
      throw new UnauthorizedException('Invalid user ID format.');
    }

    if (!isUserRole(role)) {
      throw new UnauthorizedException(`Unknown user role: ${role}`);
    }

    request.user = { userId: userIdNum, email, role };
    return true;
  }
}
