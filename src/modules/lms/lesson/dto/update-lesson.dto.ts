import { IsBoolean, IsIn, IsInt, IsOptional, IsString, IsUrl, Min, MinLength } from 'class-validator';
import { LessonStatus, LessonType } from '../schemas/lesson.schema';

export class UpdateLessonDto {
  @IsOptional() @IsString() @MinLength(1)
  title?: string;

  @IsOptional() @IsIn(['video', 'text', 'quiz'])
  type?: LessonType;

  @IsOptional() @IsString()
  content?: string;

  @IsOptional() @IsUrl()
  videoUrl?: string;

  @IsOptional() @IsInt() @Min(0)
  durationSec?: number;

  @IsOptional() @IsBoolean()
  isMandatory?: boolean;

  @IsOptional() @IsIn(['draft', 'published', 'archived'])
  status?: LessonStatus;
}
