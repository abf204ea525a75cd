import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { Request } from 'express';
import { Types } from 'mongoose';
import { AuthUser, JwtPayload } from '../interfaces/auth-user.interface';
import { USER_ROLES } from '../roles';

export type AuthenticatedRequest = Request & { user?: AuthUser };

@Injectable()
export class JwtAuthGuard implements CanActivate {
  constructor(private readonly jwt: JwtService) {}

  async canActivate(ctx: ExecutionContext): Promise<boolean> {
    const req = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = extractBearer(req.headers.authorization);
    if (!token) throw new UnauthorizedException('Token requerido');

    let payload: JwtPayload;
    try {
      payload = await this.jwt.verifyAsync<JwtPayload>(token);
    } catch {
      throw new UnauthorizedException('Token inválido o expirado');
    }

    if (
      !Types.ObjectId.isValid(payload.sub) ||
      !Types.ObjectId.isValid(payload.tenantId) ||
      !USER_ROLES.includes(payload.role)
    ) {
      throw new UnauthorizedException('Token inválido');
    }

    req.user = {
      userId: payload.sub,
      tenantId: payload.tenantId,
      role: payload.role,
      email: payload.email,
    };
    return true;
  }
}

function extractBearer(header?: string) {
  if (!header) return undefined;
  const [type, token] = header.split(' ');
  return type === 'Bearer' && token ? token : undefined;
}
