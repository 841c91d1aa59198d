/**
 * Roles Decorator
 *
 * @Roles(UserRole.SUPER_ADMIN, UserRole.ADMIN)
 * @UseGuards(GatewayAuthGuard, RolesGuard)
 */

import { SetMetadata } from '@nestjs/common';
import type { UserRoleType } from '../constants/roles.constant';

export const ROLES_KEY = 'roles';
export const Roles = (...roles: UserRoleType[]) => SetMetadata(ROLES_KEY, roles);
