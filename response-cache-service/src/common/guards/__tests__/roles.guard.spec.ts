import { Reflector } from '@nestjs/core';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { RolesGuard } from '../roles.guard';
import { Roles } from '../../decorators/roles.decorator';
import { UserRole, UserRoleType } from '../../constants/roles.constant';

@Roles(UserRole.SUPER_ADMIN, UserRole.ADMIN)
class AdminHandlers {
  purge(): void {}

  @Roles(UserRole.USER)
  lookup(): void {}
}

class OpenHandlers {
  health(): void {}
}

describe('RolesGuard', () => {
  let guard: RolesGuard;

  const requestAs = (role?: UserRoleType) =>
    role ? { user: { userId: 1, email: 'user@example.com', role } } : {};

  beforeEach(() => {
    guard = new RolesGuard(new Reflector());
  });

  it('allows handlers without @Roles', () => {
    const context = new ExecutionContextHost(
      [requestAs()],
      OpenHandlers,
      OpenHandlers.prototype.health,
    );

    expect(guard.canActivate(context)).toBe(true);
  });

  it('allows a role listed on the controller', () => {
    const context = new ExecutionContextHost(
      [requestAs(UserRole.ADMIN)],
      AdminHandlers,
      AdminHandlers.prototype.purge,
    );

    expect(guard.canActivate(context)).toBe(true);
  });

  it('denies a role not listed on the controller', () => {
    const context = new ExecutionContextHost(
      [requestAs(UserRole.USER)],
      AdminHandlers,
      AdminHandlers.prototype.purge,
    );

    expect(guard.canActivate(context)).toBe(false);
  });

  it('lets handler roles override controller roles', () => {
    const context = new ExecutionContextHost(
      [requestAs(UserRole.USER)],
      AdminHandlers,
      AdminHandlers.prototype.lookup,
    );

    expect(guard.canActivate(context)).toBe(true);
  });

  it('denies requests without a user', () => {
    const context = new ExecutionContextHost(
      [requestAs()],
      AdminHandlers,
      AdminHandlers.prototype.purge,
    );

    expect(guard.canActivate(context)).toBe(false);
  });
});
