import { CanActivate, ExecutionContext, ForbiddenException, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { REQUIRED_ROLE_KEY } from '../decorators/require-role.decorator';
import { hasAtLeast, UserRole } from '../roles';
import { AuthenticatedRequest } from './jwt-auth.guard';

// Corre después de JwtAuthGuard: req.user ya está resuelto.
@Injectable()
export class RolesGuard implements CanActivate {
  constructor(private readonly reflector: Reflector) {}

  canActivate(ctx: ExecutionContext): boolean {
    const required = this.reflector.getAllAndOverride<UserRole | undefined>(REQUIRED_ROLE_KEY, [
      ctx.getHandler(),
      ctx.getClass(),
    ]);
    if (!required) return true;

    const req = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
    if (!req.user) throw new ForbiddenException('Usuario no autenticado');
    if (hasAtLeast(req.user.role, required)) return true;

    throw new ForbiddenException('Rol insuficiente');
  }
}
