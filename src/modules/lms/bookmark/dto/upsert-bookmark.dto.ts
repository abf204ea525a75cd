import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsInt, IsOptional, IsString, MaxLength, Min } from 'class-validator';

export class UpsertBookmarkDto {
  @ApiProperty({ description: 'Segundo del video' })
  @IsInt() @Min(0)
  position!: number;

  @ApiPropertyOptional()
  @IsOptional() @IsString() @MaxLength(1000)
  note?: string;
}
