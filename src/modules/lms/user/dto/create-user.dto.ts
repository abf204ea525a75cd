import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsEmail, IsIn, IsOptional, IsString, MinLength } from 'class-validator';
import { UserRole } from '../../../../auth/roles';

export class CreateUserDto {
  @ApiProperty() @IsEmail()
  email!: string;

  @ApiProperty() @IsString() @MinLength(8)
  password!: string;

  @IsOptional() @IsString() firstName?: string;
  @IsOptional() @IsString() lastName?: string;

  @ApiPropertyOptional({ enum: ['admin', 'teacher', 'student'] })
  @IsOptional() @IsIn(['admin', 'teacher', 'student'])
  role?: UserRole;
}
