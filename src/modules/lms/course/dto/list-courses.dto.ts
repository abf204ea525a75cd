import { Type } from 'class-transformer';
import { IsIn, IsInt, IsOptional, IsString, Max, Min } from 'class-validator';
import { CourseStatus } from '../schemas/course.schema';

export class ListCoursesDto {
  @IsOptional() @IsString()
  q?: string;

  @IsOptional() @IsIn(['draft', 'published', 'archived'])
  status?: CourseStatus;

  @IsOptional() @Type(() => Number) @IsInt() @Min(1) @Max(200)
  limit?: number;

  @IsOptional() @Type(() => Number) @IsInt() @Min(0)
  skip?: number;
}
