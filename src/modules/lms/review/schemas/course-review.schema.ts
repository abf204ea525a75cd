import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';

export type LmsCourseReviewDocument = HydratedDocument<LmsCourseReview>;

@Schema({ collection: 'lms_course_reviews', timestamps: true })
export class LmsCourseReview {
  @Prop({ type: Types.ObjectId, ref: 'Tenant', required: true, index: true })
  tenantId!: Types.ObjectId;

  @Prop({ type: Types.ObjectId, ref: 'LmsCourse', required: true })
  courseId!: Types.ObjectId;

  @Prop({ type: Types.ObjectId, ref: 'LmsUser', required: true })
  learnerId!: Types.ObjectId;

  @Prop({ type: Number, required: true, min: 1, max: 5 })
  rating!: number;

  @Prop({ required: true, trim: true, maxlength: 2000 })
  comment!: string;

  @Prop({ default: true })
  isPublic!: boolean;
}

export const LmsCourseReviewSchema = SchemaFactory.createForClass(LmsCourseReview);
// una reseña por alumno y curso
LmsCourseReviewSchema.index({ tenantId: 1, courseId: 1, learnerId: 1 }, { unique: true });
LmsCourseReviewSchema.index({ tenantId: 1, courseId: 1, isPublic: 1, createdAt: -1 });
