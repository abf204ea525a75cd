import { Body, Controller, Get, Post, UseGuards } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { AuthService } from './auth.service';
import { OnboardingService } from './onboarding.service';
import { Auth, GetUser } from './decorators';
import { LoginDto } from './dto/login.dto';
import { AuthUser } from './interfaces/auth-user.interface';
import { CreateTenantDto } from '../modules/lms/tenant/dto/create-tenant.dto';
import { PlatformKeyGuard } from '../modules/lms/tenant/guards/platform-key.guard';

@ApiTags('Auth')
@Controller()
export class AuthController {
  constructor(
    private readonly authService: AuthService,
    private readonly onboarding: OnboardingService,
  ) {}

  @ApiOperation({ summary: 'Autentica al usuario con tenant, email y contraseña' })
  @Post('auth/login')
  login(@Body() body: LoginDto) {
    return this.authService.login(body);
  }

  @Auth()
  @ApiOperation({ summary: 'Renueva el token de autenticación' })
  @Get('auth/refresh-token')
  async refreshToken(@GetUser() user: AuthUser) {
    const token = await this.authService.renewToken(user);
    return { user, token };
  }

  @UseGuards(PlatformKeyGuard)
  @ApiOperation({ summary: 'Crea un tenant y su primer administrador (requiere x-platform-key)' })
  @Post('tenants')
  createTenant(@Body() dto: CreateTenantDto) {
    return this.onboarding.createTenant(dto);
  }
}
