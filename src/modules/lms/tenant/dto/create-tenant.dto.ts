import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsEmail, IsIn, IsInt, IsOptional, IsString, Matches, Min, MinLength, ValidateNested,
} from 'class-validator';
import { TenantPlan } from '../schemas/tenant.schema';

export class TenantAdminDto {
  @IsEmail() email!: string;
  @IsString() @MinLength(8) password!: string;
  @IsString() firstName!: string;
  @IsString() lastName!: string;
}

export class CreateTenantDto {
  @ApiProperty() @IsString() @MinLength(2)
  name!: string;

  @ApiProperty({ example: 'acme' })
  @IsString() @Matches(/^[a-z0-9-]+$/, { message: 'subdomain solo admite a-z, 0-9 y guiones' })
  subdomain!: string;

  @ApiPropertyOptional({ enum: ['basic', 'pro', 'enterprise'] })
  @IsOptional() @IsIn(['basic', 'pro', 'enterprise'])
  planType?: TenantPlan;

  @IsOptional() @IsInt() @Min(1) maxUsers?: number;
  @IsOptional() @IsInt() @Min(1) maxCourses?: number;

  // primer administrador del tenant
  @ApiProperty({ type: TenantAdminDto })
  @ValidateNested() @Type(() => TenantAdminDto)
  admin!: TenantAdminDto;
}
