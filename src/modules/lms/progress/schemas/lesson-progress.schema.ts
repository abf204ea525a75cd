import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';

export type LmsLessonProgressDocument = HydratedDocument<LmsLessonProgress>;

@Schema({ collection: 'lms_lesson_progress', timestamps: true })
export class LmsLessonProgress {
  @Prop({ type: Types.ObjectId, ref: 'Tenant', required: true, index: true })
  tenantId!: Types.ObjectId;

  @Prop({ type: Types.ObjectId, ref: 'LmsEnrollment', required: true })
  enrollmentId!: Types.ObjectId;

  @Prop({ type: Types.ObjectId, ref: 'LmsLesson', required: true, index: true })
  lessonId!: Types.ObjectId;

  @Prop({ type: Types.ObjectId, ref: 'LmsCourse', required: true })
  courseId!: Types.ObjectId;

  // nunca baja: se escribe con $max
  @Prop({ type: Number, default: 0, min: 0, max: 100 })
  completionPercentage!: number;

  // una vez true no vuelve a false
  @Prop({ default: false })
  completed!: boolean;

  @Prop({ type: Date })
  completedAt?: Date;

  // segundos vistos (monótono)
  @Prop({ type: Number, default: 0, min: 0 })
  watchTime!: number;

  // segundo donde quedó el reproductor (el último gana)
  @Prop({ type: Number, default: 0, min: 0 })
  lastPosition!: number;

  @Prop({ type: Date })
  lastReportedAt?: Date;
}

export const LmsLessonProgressSchema = SchemaFactory.createForClass(LmsLessonProgress);
LmsLessonProgressSchema.index({ enrollmentId: 1, lessonId: 1 }, { unique: true });
LmsLessonProgressSchema.index({ tenantId: 1, enrollmentId: 1, completed: 1 });
