import { ApiProperty } from '@nestjs/swagger';
import { ArrayNotEmpty, ArrayUnique, IsArray, IsMongoId } from 'class-validator';

// Reutilizado por módulos y lecciones: ids en el nuevo orden (primero = sortIndex 0)
export class ReorderDto {
  @ApiProperty({ type: [String] })
  @IsArray() @ArrayNotEmpty() @ArrayUnique() @IsMongoId({ each: true })
  ids!: string[];
}
