import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model, Types } from 'mongoose';
import { asObjectId, retryOnDuplicateKey } from '../../../../common/mongo-errors';
import { LmsBookmark, LmsBookmarkDocument } from '../schemas/bookmark.schema';

@Injectable()
export class BookmarkRepo {
  constructor(@InjectModel(LmsBookmark.name) private readonly model: Model<LmsBookmarkDocument>) {}

  upsert(
    tenantId: string,
    learnerId: string,
    lesson: { _id: Types.ObjectId; courseId: Types.ObjectId },
    data: { position: number; note?: string },
  ) {
    return retryOnDuplicateKey(() =>
      this.model
        .findOneAndUpdate(
          { tenantId: asObjectId(tenantId), learnerId: asObjectId(learnerId), lessonId: lesson._id },
          {
            $set: { position: data.position, ...(data.note !== undefined ? { note: data.note } : {}) },
            $setOnInsert: { courseId: lesson.courseId },
          },
          { upsert: true, new: true },
        )
        .lean()
        .exec(),
    );
  }

  findByLearner(tenantId: string, learnerId: string, lessonId?: string) {
    return this.model
      .find({
        tenantId: asObjectId(tenantId),
        learnerId: asObjectId(learnerId),
        ...(lessonId ? { lessonId: asObjectId(lessonId) } : {}),
      })
      .sort({ updatedAt: -1 })
      .lean();
  }

  deleteOwn(tenantId: string, learnerId: string, id: string) {
    return this.model
      .findOneAndDelete({ _id: asObjectId(id), tenantId: asObjectId(tenantId), learnerId: asObjectId(learnerId) })
      .lean();
  }
}
