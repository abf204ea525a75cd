import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { asObjectId } from '../../../../common/mongo-errors';
import { LmsCourseReview, LmsCourseReviewDocument } from '../schemas/course-review.schema';

@Injectable()
export class CourseReviewRepo {
  constructor(@InjectModel(LmsCourseReview.name) private readonly model: Model<LmsCourseReviewDocument>) {}

  async create(data: Partial<LmsCourseReview>) {
    const doc = await this.model.create(data);
    return doc.toObject();
  }

  findPublic(tenantId: string, courseId: string) {
    return this.model
      .find({ tenantId: asObjectId(tenantId), courseId: asObjectId(courseId), isPublic: true })
      .sort({ createdAt: -1 })
      .lean();
  }
}
