import { applyDecorators, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiUnauthorizedResponse } from '@nestjs/swagger';
import { JwtAuthGuard } from '../guards/jwt-auth.guard';
import { RolesGuard } from '../guards/roles.guard';
import { UserRole } from '../roles';
import { RequireRole } from './require-role.decorator';

/**
 * Protege un handler o controller con JWT y, opcionalmente, un rol mínimo.
 *   @Auth()          cualquier usuario autenticado
 *   @Auth('teacher') teacher o admin
 */
export function Auth(role?: UserRole) {
  const decorators = [
    UseGuards(JwtAuthGuard, RolesGuard),
    ApiBearerAuth(),
    ApiUnauthorizedResponse({ description: 'Token ausente o inválido' }),
  ];
  if (role) decorators.unshift(RequireRole(role));
  return applyDecorators(...decorators);
}
