import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { FilterQuery, Model, UpdateQuery } from 'mongoose';
import { asObjectId } from '../../../../common/mongo-errors';
import { CourseStatus, LmsCourse, LmsCourseDocument } from '../schemas/course.schema';

@Injectable()
export class CourseRepo {
  constructor(
    @InjectModel(LmsCourse.name) private readonly model: Model<LmsCourseDocument>,
  ) {}

  async create(data: Partial<LmsCourse>) {
    const doc = await this.model.create(data);
    return doc.toObject();
  }

  findById(tenantId: string, id: string) {
    return this.model.findOne({ _id: asObjectId(id), tenantId: asObjectId(tenantId) }).lean();
  }

  slugTaken(tenantId: string, slug: string) {
    return this.model.exists({ tenantId: asObjectId(tenantId), slug });
  }

  countActive(tenantId: string) {
    return this.model.countDocuments({ tenantId: asObjectId(tenantId), status: { $ne: 'archived' } });
  }

  list(tenantId: string, filter: FilterQuery<LmsCourse>, limit = 50, skip = 0) {
    return this.model
      .find({ ...filter, tenantId: asObjectId(tenantId) })
      .sort({ createdAt: -1 })
      .limit(limit)
      .skip(skip)
      .lean();
  }

  updateById(tenantId: string, id: string, update: UpdateQuery<LmsCourse>) {
    return this.model
      .findOneAndUpdate({ _id: asObjectId(id), tenantId: asObjectId(tenantId) }, update, { new: true })
      .lean();
  }

  // Cambio de estado condicionado al estado actual (evita carreras entre publish/archive)
  transition(tenantId: string, id: string, from: CourseStatus[], set: Partial<LmsCourse>) {
    return this.model
      .findOneAndUpdate(
        { _id: asObjectId(id), tenantId: asObjectId(tenantId), status: { $in: from } },
        { $set: set },
        { new: true },
      )
      .lean();
  }
}
