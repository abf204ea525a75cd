import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { asObjectId } from '../../../../common/mongo-errors';
import { LmsCourseModule, LmsCourseModuleDocument } from '../schemas/course-module.schema';

@Injectable()
export class CourseModuleRepo {
  constructor(
    @InjectModel(LmsCourseModule.name)
    private readonly model: Model<LmsCourseModuleDocument>,
  ) {}

  async create(data: Partial<LmsCourseModule>) {
    const doc = await this.model.create(data);
    return doc.toObject();
  }

  findById(tenantId: string, id: string) {
    return this.model.findOne({ _id: asObjectId(id), tenantId: asObjectId(tenantId) }).lean();
  }

  findByCourse(tenantId: string, courseId: string) {
    return this.model
      .find({ tenantId: asObjectId(tenantId), courseId: asObjectId(courseId) })
      .sort({ sortIndex: 1, createdAt: 1 })
      .lean();
  }

  findByIds(tenantId: string, ids: string[]) {
    return this.model
      .find({ tenantId: asObjectId(tenantId), _id: { $in: ids.map((id) => asObjectId(id)) } })
      .lean();
  }

  async lastIndex(tenantId: string, courseId: string) {
    const last = await this.model
      .find({ tenantId: asObjectId(tenantId), courseId: asObjectId(courseId) })
      .sort({ sortIndex: -1 })
      .limit(1)
      .lean();
    return last.length ? (last[0].sortIndex ?? 0) : -1;
  }

  updateById(tenantId: string, id: string, set: Partial<LmsCourseModule>) {
    return this.model
      .findOneAndUpdate({ _id: asObjectId(id), tenantId: asObjectId(tenantId) }, { $set: set }, { new: true })
      .lean();
  }

  deleteById(tenantId: string, id: string) {
    return this.model.deleteOne({ _id: asObjectId(id), tenantId: asObjectId(tenantId) });
  }

  async bulkReorder(tenantId: string, courseId: string, ids: string[]) {
    const tId = asObjectId(tenantId);
    const cId = asObjectId(courseId);
    if (!ids.length) return;
    // dos pasadas: valores negativos primero para no chocar con el índice único
    const phase = (index: (idx: number) => number) =>
      ids.map((id, idx) => ({
        updateOne: {
          filter: { _id: asObjectId(id), tenantId: tId, courseId: cId },
          update: { $set: { sortIndex: index(idx) } },
        },
      }));
    await this.model.bulkWrite(phase((idx) => -(idx + 1)), { ordered: true });
    await this.model.bulkWrite(phase((idx) => idx), { ordered: true });
  }
}
