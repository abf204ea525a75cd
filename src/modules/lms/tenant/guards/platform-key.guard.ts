import { CanActivate, ExecutionContext, ForbiddenException, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { timingSafeEqual } from 'crypto';
import { Request } from 'express';
import { PLATFORM_API_KEY } from '../../../../config/config.env';

// Alta de tenants: solo con la llave de plataforma (header x-platform-key)
@Injectable()
export class PlatformKeyGuard implements CanActivate {
  constructor(private readonly config: ConfigService) {}

  canActivate(ctx: ExecutionContext): boolean {
    const req = ctx.switchToHttp().getRequest<Request>();
    const expected = this.config.get<string>(PLATFORM_API_KEY) ?? '';
    const given = req.header('x-platform-key') ?? '';

    const a = Buffer.from(given);
    const b = Buffer.from(expected);
    if (expected && a.length === b.length && timingSafeEqual(a, b)) return true;
    throw new ForbiddenException('Llave de plataforma inválida');
  }
}
