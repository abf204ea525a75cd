import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import * as bcrypt from 'bcrypt';
import { TenantRepo } from '../modules/lms/tenant/repos/tenant.repo';
import { UserRepo } from '../modules/lms/user/repos/user.repo';
import { LoginDto } from './dto/login.dto';
import { AuthUser, JwtPayload } from './interfaces/auth-user.interface';

@Injectable()
export class AuthService {
  logger: Logger = new Logger(AuthService.name);

  constructor(
    private readonly jwtService: JwtService,
    private readonly tenants: TenantRepo,
    private readonly users: UserRepo,
  ) {}

  async login({ tenant: subdomain, email, password }: LoginDto) {
    const tenant = await this.tenants.findBySubdomain(subdomain);
    if (!tenant || !tenant.isActive) {
      throw new UnauthorizedException('Credenciales incorrectas');
    }

    const usuario = await this.users.findByEmailWithPassword(String(tenant._id), email);
    if (!usuario || !usuario.isActive) {
      throw new UnauthorizedException('Credenciales incorrectas');
    }

    const isPasswordValid = await bcrypt.compare(password, usuario.password);
    if (!isPasswordValid) {
      throw new UnauthorizedException('Credenciales incorrectas');
    }

    const payload: JwtPayload = {
      sub: String(usuario._id),
      tenantId: String(tenant._id),
      role: usuario.role,
      email: usuario.email,
    };
    const accessToken = await this.jwtService.signAsync(payload);
    this.logger.log(`Login ${usuario.email} (${subdomain})`);

    return {
      accessToken,
      user: { id: payload.sub, email: usuario.email, role: usuario.role, tenantId: payload.tenantId },
    };
  }

  renewToken(user: AuthUser) {
    const payload: JwtPayload = {
      sub: user.userId,
      tenantId: user.tenantId,
      role: user.role,
      email: user.email,
    };
    return this.jwtService.signAsync(payload);
  }
}
