import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { FilterQuery, Model } from 'mongoose';
import { asObjectId } from '../../../../common/mongo-errors';
import { EnrollmentStatus, OPEN_STATUSES } from '../enrollment-status';
import { LmsEnrollment, LmsEnrollmentDocument } from '../schemas/enrollment.schema';

@Injectable()
export class EnrollmentRepo {
  constructor(
    @InjectModel(LmsEnrollment.name) private readonly model: Model<LmsEnrollmentDocument>,
  ) {}

  async create(data: Partial<LmsEnrollment>) {
    const doc = await this.model.create(data);
    return doc.toObject();
  }

  findById(tenantId: string, id: string) {
    return this.model.findOne({ _id: asObjectId(id), tenantId: asObjectId(tenantId) }).lean();
  }

  findOpen(tenantId: string, learnerId: string, courseId: string) {
    return this.model
      .findOne({
        tenantId: asObjectId(tenantId),
        learnerId: asObjectId(learnerId),
        courseId: asObjectId(courseId),
        status: { $in: OPEN_STATUSES },
      })
      .lean();
  }

  // La más reciente del alumno en el curso (opcionalmente sin retiradas)
  findLatest(tenantId: string, learnerId: string, courseId: string, excludeWithdrawn = false) {
    return this.model
      .findOne({
        tenantId: asObjectId(tenantId),
        learnerId: asObjectId(learnerId),
        courseId: asObjectId(courseId),
        ...(excludeWithdrawn ? { status: { $ne: 'withdrawn' } } : {}),
      })
      .sort({ createdAt: -1 })
      .lean();
  }

  countOpen(tenantId: string, courseId: string) {
    return this.model.countDocuments({
      tenantId: asObjectId(tenantId),
      courseId: asObjectId(courseId),
      status: { $in: OPEN_STATUSES },
    });
  }

  list(tenantId: string, filter: FilterQuery<LmsEnrollment>, limit = 50, skip = 0) {
    return this.model
      .find({ ...filter, tenantId: asObjectId(tenantId) })
      .sort({ createdAt: -1 })
      .limit(limit)
      .skip(skip)
      .lean();
  }

  // Update condicionado al estado actual: si otro request ya lo movió, devuelve null
  transition(tenantId: string, id: string, from: EnrollmentStatus[], set: Partial<LmsEnrollment>) {
    return this.model
      .findOneAndUpdate(
        { _id: asObjectId(id), tenantId: asObjectId(tenantId), status: { $in: from } },
        { $set: set },
        { new: true },
      )
      .lean();
  }

  /**
   * Escribe el % recalculado solo si nadie escribió desde que se leyó `revision`
   * y la matrícula sigue activa. Al llegar a 100 pasa a completed en el mismo update.
   */
  applyCompletion(tenantId: string, id: string, revision: number, percentage: number) {
    const set: Partial<LmsEnrollment> =
      percentage >= 100
        ? { completionPercentage: 100, status: 'completed', open: false, completedAt: new Date() }
        : { completionPercentage: percentage };
    return this.model
      .findOneAndUpdate(
        { _id: asObjectId(id), tenantId: asObjectId(tenantId), status: 'active', revision },
        { $set: set, $inc: { revision: 1 } },
        { new: true },
      )
      .lean();
  }
}
