import { SetMetadata } from '@nestjs/common';
import { UserRole } from '../roles';

export const REQUIRED_ROLE_KEY = 'REQUIRED_ROLE_KEY';
export const RequireRole = (role: UserRole) => SetMetadata(REQUIRED_ROLE_KEY, role);
