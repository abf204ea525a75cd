import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';

export type LmsPaymentDocument = HydratedDocument<LmsPayment>;

export type PaymentStatus = 'pending' | 'completed' | 'failed';
export type PaymentMethod = 'stripe' | 'paypal' | 'bank_transfer' | 'cash';
export const PAYMENT_METHODS: readonly PaymentMethod[] = ['stripe', 'paypal', 'bank_transfer', 'cash'];

@Schema({ collection: 'lms_payments', timestamps: true })
export class LmsPayment {
  @Prop({ type: Types.ObjectId, ref: 'Tenant', required: true, index: true })
  tenantId!: Types.ObjectId;

  @Prop({ type: Types.ObjectId, ref: 'LmsEnrollment', required: true, index: true })
  enrollmentId!: Types.ObjectId;

  @Prop({ type: Types.ObjectId, ref: 'LmsCourse', required: true })
  courseId!: Types.ObjectId;

  @Prop({ type: Types.ObjectId, ref: 'LmsUser', required: true, index: true })
  learnerId!: Types.ObjectId;

  @Prop({ type: Number, required: true, min: 0 })
  amount!: number;

  @Prop({ default: 'USD', uppercase: true })
  currency!: string;

  @Prop({ enum: ['pending', 'completed', 'failed'], default: 'pending' })
  status!: PaymentStatus;

  @Prop({ enum: [...PAYMENT_METHODS], default: 'bank_transfer' })
  paymentMethod!: PaymentMethod;

  // id de la pasarela o nro. de transferencia
  @Prop({ trim: true })
  externalReference?: string;

  @Prop() failureReason?: string;
  @Prop({ type: Date }) completedAt?: Date;
  @Prop({ type: Date }) failedAt?: Date;

  createdAt?: Date;
  updatedAt?: Date;
}

export const LmsPaymentSchema = SchemaFactory.createForClass(LmsPayment);
// un solo pago pendiente por matrícula
LmsPaymentSchema.index(
  { tenantId: 1, enrollmentId: 1 },
  { unique: true, partialFilterExpression: { status: 'pending' } },
);
