import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';

export type LmsLessonDocument = HydratedDocument<LmsLesson>;

export type LessonType = 'video' | 'text' | 'quiz';
export type LessonStatus = 'draft' | 'published' | 'archived';

@Schema({ collection: 'lms_lessons', timestamps: true })
export class LmsLesson {
  @Prop({ type: Types.ObjectId, ref: 'Tenant', required: true, index: true })
  tenantId!: Types.ObjectId;

  @Prop({ type: Types.ObjectId, ref: 'LmsCourse', required: true, index: true })
  courseId!: Types.ObjectId;

  @Prop({ type: Types.ObjectId, ref: 'LmsCourseModule', required: true, index: true })
  moduleId!: Types.ObjectId;

  @Prop({ required: true, trim: true })
  title!: string;

  @Prop({ enum: ['video', 'text', 'quiz'], default: 'video' })
  type!: LessonType;

  @Prop({ default: '' })
  content?: string;

  @Prop({ trim: true })
  videoUrl?: string;

  // segundos; 0 = desconocida
  @Prop({ type: Number, default: 0, min: 0 })
  durationSec!: number;

  @Prop({ type: Number, default: 0 })
  sortIndex!: number;

  // solo las obligatorias cuentan para el % del curso
  @Prop({ default: true })
  isMandatory!: boolean;

  @Prop({ enum: ['draft', 'published', 'archived'], default: 'draft' })
  status!: LessonStatus;
}
export const LmsLessonSchema = SchemaFactory.createForClass(LmsLesson);
LmsLessonSchema.index({ moduleId: 1, sortIndex: 1 }, { unique: true });
LmsLessonSchema.index({ tenantId: 1, courseId: 1, isMandatory: 1, status: 1 });
