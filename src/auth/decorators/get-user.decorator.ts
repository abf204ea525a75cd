import { createParamDecorator, ExecutionContext, InternalServerErrorException } from '@nestjs/common';
import { AuthenticatedRequest } from '../guards/jwt-auth.guard';

export const GetUser = createParamDecorator((_data: unknown, ctx: ExecutionContext) => {
  const req = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
  if (!req.user) throw new InternalServerErrorException('Usuario no encontrado en la request (falta @Auth())');
  return req.user;
});
