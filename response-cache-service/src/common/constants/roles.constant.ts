/**
 * User Role Constants
 */

export const UserRole = {
  SUPER_ADMIN: 'SUPER_ADMIN',
  ADMIN: 'ADMIN',
  USER: 'USER',
} as const;

export type UserRoleType = (typeof UserRole)[keyof typeof UserRole];

export function isUserRole(value: string): value is UserRoleType {
  return Object.values<string>(UserRole).includes(value);
}
