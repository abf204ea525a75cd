import { IsInt, IsNumber, IsOptional, IsString, Length, Min, MinLength } from 'class-validator';

// El estado no se toca aquí: usar publish / archive
export class UpdateCourseDto {
  @IsOptional() @IsString() @MinLength(1)
  title?: string;

  @IsOptional() @IsString() category?: string;
  @IsOptional() @IsString() description?: string;

  @IsOptional() @IsNumber({ maxDecimalPlaces: 2 }) @Min(0)
  price?: number;

  @IsOptional() @IsString() @Length(3, 3)
  currency?: string;

  @IsOptional() @IsInt() @Min(1)
  maxStudents?: number;
}
