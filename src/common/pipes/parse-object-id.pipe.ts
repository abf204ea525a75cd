import { BadRequestException, Injectable, PipeTransform } from '@nestjs/common';
import { Types } from 'mongoose';

@Injectable()
export class ParseObjectIdPipe implements PipeTransform<string, string> {
  transform(value: string): string {
    if (!Types.ObjectId.isValid(value) || String(new Types.ObjectId(value)) !== value) {
      throw new BadRequestException(`Id inválido: ${value}`);
    }
    return value;
  }
}
