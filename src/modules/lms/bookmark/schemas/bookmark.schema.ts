import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';

export type LmsBookmarkDocument = HydratedDocument<LmsBookmark>;

@Schema({ collection: 'lms_bookmarks', timestamps: true })
export class LmsBookmark {
  @Prop({ type: Types.ObjectId, ref: 'Tenant', required: true, index: true })
  tenantId!: Types.ObjectId;

  @Prop({ type: Types.ObjectId, ref: 'LmsUser', required: true })
  learnerId!: Types.ObjectId;

  @Prop({ type: Types.ObjectId, ref: 'LmsLesson', required: true })
  lessonId!: Types.ObjectId;

  @Prop({ type: Types.ObjectId, ref: 'LmsCourse', required: true })
  courseId!: Types.ObjectId;

  // segundos
  @Prop({ type: Number, default: 0, min: 0 })
  position!: number;

  @Prop({ default: '', maxlength: 1000 })
  note!: string;
}

export const LmsBookmarkSchema = SchemaFactory.createForClass(LmsBookmark);
LmsBookmarkSchema.index({ tenantId: 1, learnerId: 1, lessonId: 1 }, { unique: true });
