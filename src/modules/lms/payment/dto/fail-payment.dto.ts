import { IsOptional, IsString, MaxLength } from 'class-validator';

export class FailPaymentDto {
  @IsOptional() @IsString() @MaxLength(500)
  reason?: string;
}
