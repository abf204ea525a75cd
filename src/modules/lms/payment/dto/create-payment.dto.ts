import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsIn, IsMongoId, IsOptional, IsString, MaxLength } from 'class-validator';
import { PAYMENT_METHODS, PaymentMethod } from '../schemas/payment.schema';

export class CreatePaymentDto {
  @ApiProperty()
  @IsMongoId()
  enrollmentId!: string;

  @ApiPropertyOptional({ enum: [...PAYMENT_METHODS] })
  @IsOptional() @IsIn([...PAYMENT_METHODS])
  paymentMethod?: PaymentMethod;

  @ApiPropertyOptional()
  @IsOptional() @IsString() @MaxLength(255)
  externalReference?: string;
}
