import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtModule } from '@nestjs/jwt';
import { JWT_EXPIRES_IN, JWT_SECRET } from '../config/config.env';
import { TenantModule } from '../modules/lms/tenant/tenant.module';
import { UserModule } from '../modules/lms/user/user.module';
import { AuthController } from './auth.controller';
import { AuthService } from './auth.service';
import { OnboardingService } from './onboarding.service';

@Module({
  imports: [
    // global: los guards de cualquier módulo necesitan JwtService
    JwtModule.registerAsync({
      global: true,
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        secret: config.get<string>(JWT_SECRET),
        signOptions: { expiresIn: config.get<string>(JWT_EXPIRES_IN) ?? '1d' },
      }),
    }),
    TenantModule,
    UserModule,
  ],
  controllers: [AuthController],
  providers: [AuthService, OnboardingService],
})
export class AuthModule {}
