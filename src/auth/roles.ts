export type UserRole = 'admin' | 'teacher' | 'student';

export const USER_ROLES: readonly UserRole[] = ['admin', 'teacher', 'student'];

export const ROLE_WEIGHT: Record<UserRole, number> = {
  admin: 2, teacher: 1, student: 0,
};

export function hasAtLeast(role: UserRole, required: UserRole) {
  return ROLE_WEIGHT[role] >= ROLE_WEIGHT[required];
}

export function isStaff(role: UserRole) {
  return hasAtLeast(role, 'teacher');
}
