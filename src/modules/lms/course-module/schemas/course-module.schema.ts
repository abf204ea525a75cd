import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';

export type LmsCourseModuleDocument = HydratedDocument<LmsCourseModule>;

// Módulo = agrupación ordenada de lecciones dentro de un curso
@Schema({ collection: 'lms_course_modules', timestamps: true })
export class LmsCourseModule {
  @Prop({ type: Types.ObjectId, ref: 'Tenant', required: true, index: true })
  tenantId!: Types.ObjectId;

  @Prop({ type: Types.ObjectId, ref: 'LmsCourse', required: true, index: true })
  courseId!: Types.ObjectId;

  @Prop({ required: true, trim: true })
  title!: string;

  @Prop({ trim: true, default: '' })
  description?: string;

  @Prop({ type: Number, default: 0 })
  sortIndex!: number;
}
export const LmsCourseModuleSchema = SchemaFactory.createForClass(LmsCourseModule);
LmsCourseModuleSchema.index({ courseId: 1, sortIndex: 1 }, { unique: true });
