import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model, Types } from 'mongoose';
import { asObjectId } from '../../../../common/mongo-errors';
import { LmsLesson, LmsLessonDocument } from '../schemas/lesson.schema';

@Injectable()
export class LessonRepo {
  constructor(
    @InjectModel(LmsLesson.name)
    private readonly model: Model<LmsLessonDocument>,
  ) {}

  async create(data: Partial<LmsLesson>) {
    const doc = await this.model.create(data);
    return doc.toObject();
  }

  findById(tenantId: string, id: string) {
    return this.model.findOne({ _id: asObjectId(id), tenantId: asObjectId(tenantId) }).lean();
  }

  findByModule(tenantId: string, moduleId: string, onlyPublished = false) {
    return this.model
      .find({
        tenantId: asObjectId(tenantId),
        moduleId: asObjectId(moduleId),
        ...(onlyPublished ? { status: 'published' } : {}),
      })
      .sort({ sortIndex: 1, createdAt: 1 })
      .lean();
  }

  findByCourse(tenantId: string, courseId: string, onlyPublished = false) {
    return this.model
      .find({
        tenantId: asObjectId(tenantId),
        courseId: asObjectId(courseId),
        ...(onlyPublished ? { status: 'published' } : {}),
      })
      .sort({ sortIndex: 1, createdAt: 1 })
      .lean();
  }

  // Lecciones que cuentan para el % del curso
  async findMandatoryIds(tenantId: string, courseId: string): Promise<Types.ObjectId[]> {
    const rows = await this.model
      .find({
        tenantId: asObjectId(tenantId),
        courseId: asObjectId(courseId),
        isMandatory: true,
        status: 'published',
      })
      .select({ _id: 1 })
      .lean();
    return rows.map((r) => r._id);
  }

  countByModule(tenantId: string, moduleId: string) {
    return this.model.countDocuments({ tenantId: asObjectId(tenantId), moduleId: asObjectId(moduleId) });
  }

  async lastIndex(tenantId: string, moduleId: string) {
    const last = await this.model
      .find({ tenantId: asObjectId(tenantId), moduleId: asObjectId(moduleId) })
      .sort({ sortIndex: -1 })
      .limit(1)
      .lean();
    return last.length ? (last[0].sortIndex ?? 0) : -1;
  }

  updateById(tenantId: string, id: string, set: Partial<LmsLesson>) {
    return this.model
      .findOneAndUpdate({ _id: asObjectId(id), tenantId: asObjectId(tenantId) }, { $set: set }, { new: true })
      .lean();
  }

  deleteById(tenantId: string, id: string) {
    return this.model.deleteOne({ _id: asObjectId(id), tenantId: asObjectId(tenantId) });
  }

  async bulkReorder(tenantId: string, moduleId: string, ids: string[]) {
    const tId = asObjectId(tenantId);
    const mId = asObjectId(moduleId);
    if (!ids.length) return;
    // dos pasadas: valores negativos primero para no chocar con el índice único
    const phase = (index: (idx: number) => number) =>
      ids.map((id, idx) => ({
        updateOne: {
          filter: { _id: asObjectId(id), tenantId: tId, moduleId: mId },
          update: { $set: { sortIndex: index(idx) } },
        },
      }));
    await this.model.bulkWrite(phase((idx) => -(idx + 1)), { ordered: true });
    await this.model.bulkWrite(phase((idx) => idx), { ordered: true });
  }
}
