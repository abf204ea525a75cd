import { ApiProperty } from '@nestjs/swagger';
import { IsOptional, IsString, MinLength } from 'class-validator';

export class CreateCourseModuleDto {
  @ApiProperty() @IsString() @MinLength(1)
  title!: string;

  @IsOptional() @IsString()
  description?: string;
}
