import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { LmsUser, LmsUserSchema } from './schemas/user.schema';
import { UserRepo } from './repos/user.repo';
import { UserService } from './user.service';
import { UserController } from './user.controller';
import { TenantModule } from '../tenant/tenant.module';

@Module({
  imports: [
    MongooseModule.forFeature([{ name: LmsUser.name, schema: LmsUserSchema }]),
    TenantModule,
  ],
  controllers: [UserController],
  providers: [UserRepo, UserService],
  exports: [UserService, UserRepo],
})
export class UserModule {}
