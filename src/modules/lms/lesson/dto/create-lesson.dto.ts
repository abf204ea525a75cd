import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsBoolean, IsIn, IsInt, IsOptional, IsString, IsUrl, Min, MinLength } from 'class-validator';
import { LessonStatus, LessonType } from '../schemas/lesson.schema';

export class CreateLessonDto {
  @ApiProperty() @IsString() @MinLength(1)
  title!: string;

  @ApiPropertyOptional({ enum: ['video', 'text', 'quiz'] })
  @IsOptional() @IsIn(['video', 'text', 'quiz'])
  type?: LessonType;

  @IsOptional() @IsString()
  content?: string;

  @IsOptional() @IsUrl()
  videoUrl?: string;

  @ApiPropertyOptional({ description: 'Duración en segundos (videos)' })
  @IsOptional() @IsInt() @Min(0)
  durationSec?: number;

  @IsOptional() @IsBoolean()
  isMandatory?: boolean;

  @IsOptional() @IsIn(['draft', 'published', 'archived'])
  status?: LessonStatus;
}
