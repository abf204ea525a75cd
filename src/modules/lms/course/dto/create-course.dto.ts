import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsInt, IsNumber, IsOptional, IsString, Length, Min, MinLength } from 'class-validator';

export class CreateCourseDto {
  @ApiProperty() @IsString() @MinLength(1)
  title!: string;

  @IsOptional() @IsString() category?: string;
  @IsOptional() @IsString() description?: string;

  @ApiPropertyOptional({ description: '0 = curso gratuito' })
  @IsOptional() @IsNumber({ maxDecimalPlaces: 2 }) @Min(0)
  price?: number;

  @IsOptional() @IsString() @Length(3, 3)
  currency?: string;

  @IsOptional() @IsInt() @Min(1)
  maxStudents?: number;
}
