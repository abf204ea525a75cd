import { UserRole } from '../roles';

export interface JwtPayload {
  sub: string;
  tenantId: string;
  role: UserRole;
  email: string;
}

// Lo que el guard deja en req.user
export interface AuthUser {
  userId: string;
  tenantId: string;
  role: UserRole;
  email: string;
}
