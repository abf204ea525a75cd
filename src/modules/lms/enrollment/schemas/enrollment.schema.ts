import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';
import { EnrollmentStatus } from '../enrollment-status';

export type LmsEnrollmentDocument = HydratedDocument<LmsEnrollment>;

@Schema({ collection: 'lms_enrollments', timestamps: true })
export class LmsEnrollment {
  @Prop({ type: Types.ObjectId, ref: 'Tenant', required: true, index: true })
  tenantId!: Types.ObjectId;

  @Prop({ type: Types.ObjectId, ref: 'LmsCourse', required: true, index: true })
  courseId!: Types.ObjectId;

  @Prop({ type: Types.ObjectId, ref: 'LmsUser', required: true, index: true })
  learnerId!: Types.ObjectId;

  @Prop({ enum: ['pending', 'active', 'completed', 'withdrawn'], default: 'pending', index: true })
  status!: EnrollmentStatus;

  // true mientras está pending/active; sostiene el índice único parcial
  @Prop({ type: Boolean, default: true })
  open!: boolean;

  // derivado de las lecciones obligatorias completadas
  @Prop({ type: Number, default: 0, min: 0, max: 100 })
  completionPercentage!: number;

  // compare-and-swap del recálculo de progreso
  @Prop({ type: Number, default: 0 })
  revision!: number;

  @Prop({ default: false }) isPaid!: boolean;
  @Prop({ type: Number, default: 0 }) paymentAmount!: number;

  @Prop({ type: Date }) activatedAt?: Date;
  @Prop({ type: Date }) completedAt?: Date;
  @Prop({ type: Date }) withdrawnAt?: Date;
  @Prop({ enum: ['learner', 'admin'] }) withdrawnBy?: 'learner' | 'admin';

  createdAt?: Date;
  updatedAt?: Date;
}

export const LmsEnrollmentSchema = SchemaFactory.createForClass(LmsEnrollment);

// Unicidad: un alumno no puede tener 2 matrículas abiertas al mismo curso
LmsEnrollmentSchema.index(
  { tenantId: 1, courseId: 1, learnerId: 1 },
  { unique: true, partialFilterExpression: { open: true } },
);
LmsEnrollmentSchema.index({ tenantId: 1, learnerId: 1, createdAt: -1 });
