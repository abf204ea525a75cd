import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';

export type LmsCourseDocument = HydratedDocument<LmsCourse>;

export type CourseStatus = 'draft' | 'published' | 'archived';

@Schema({ collection: 'lms_courses', timestamps: true })
export class LmsCourse {
  @Prop({ type: Types.ObjectId, ref: 'Tenant', required: true, index: true })
  tenantId!: Types.ObjectId;

  @Prop({ required: true, trim: true })
  title!: string;

  @Prop({ required: true, lowercase: true, trim: true })
  slug!: string;

  @Prop({ trim: true }) category?: string;
  @Prop({ default: '' }) description?: string;

  // 0 = gratuito; si es > 0 la matrícula queda pendiente de pago
  @Prop({ type: Number, default: 0, min: 0 })
  price!: number;

  @Prop({ default: 'USD', uppercase: true, trim: true })
  currency!: string;

  @Prop({ type: Number, min: 1 })
  maxStudents?: number;

  @Prop({ type: Types.ObjectId, ref: 'LmsUser', required: true, index: true })
  instructorId!: Types.ObjectId;

  @Prop({ enum: ['draft', 'published', 'archived'], default: 'draft', index: true })
  status!: CourseStatus;

  @Prop({ type: Date })
  publishedAt?: Date;
}

export const LmsCourseSchema = SchemaFactory.createForClass(LmsCourse);
LmsCourseSchema.index({ tenantId: 1, slug: 1 }, { unique: true });
LmsCourseSchema.index({ tenantId: 1, status: 1 });
