import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsInt, IsMongoId, IsOptional, Max, Min } from 'class-validator';

export class ReportProgressDto {
  @ApiProperty({ minimum: 0, maximum: 100 })
  @IsInt() @Min(0) @Max(100)
  completionPercentage!: number;

  @ApiPropertyOptional({ description: 'Segundos vistos' })
  @IsOptional() @IsInt() @Min(0)
  watchTime?: number;

  @ApiPropertyOptional({ description: 'Posición del reproductor en segundos' })
  @IsOptional() @IsInt() @Min(0)
  lastPosition?: number;
}

export class ReportEnrollmentProgressDto extends ReportProgressDto {
  @ApiProperty()
  @IsMongoId()
  lessonId!: string;
}
