import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model, Types, UpdateQuery } from 'mongoose';
import { asObjectId, retryOnDuplicateKey } from '../../../../common/mongo-errors';
import { LmsLessonProgress, LmsLessonProgressDocument } from '../schemas/lesson-progress.schema';

export interface ProgressKey {
  enrollmentId: Types.ObjectId;
  lessonId: Types.ObjectId;
  courseId: Types.ObjectId;
}

export interface ProgressReport {
  completionPercentage: number;
  watchTime?: number;
  lastPosition?: number;
}

@Injectable()
export class LessonProgressRepo {
  constructor(
    @InjectModel(LmsLessonProgress.name)
    private readonly model: Model<LmsLessonProgressDocument>,
  ) {}

  /**
   * Upsert atómico del par (matrícula, lección). El % y watchTime solo suben
   * ($max), así que un reporte viejo que llega tarde no pisa uno mayor.
   * Dos primeros reportes simultáneos chocan en el índice único: el que pierde
   * se reintenta y cae en la rama de update.
   */
  applyReport(tenantId: string, key: ProgressKey, report: ProgressReport) {
    const update: UpdateQuery<LmsLessonProgress> = {
      $max: {
        completionPercentage: report.completionPercentage,
        ...(report.watchTime !== undefined ? { watchTime: report.watchTime } : {}),
      },
      $set: {
        lastReportedAt: new Date(),
        ...(report.lastPosition !== undefined ? { lastPosition: report.lastPosition } : {}),
      },
      $setOnInsert: { courseId: key.courseId, completed: false },
    };

    return retryOnDuplicateKey(() =>
      this.model
        .findOneAndUpdate(
          { tenantId: asObjectId(tenantId), enrollmentId: key.enrollmentId, lessonId: key.lessonId },
          update,
          { upsert: true, new: true },
        )
        .lean()
        .exec(),
    );
  }

  // Solo escribe si todavía no estaba completada y ya supera el umbral
  markCompleted(tenantId: string, id: Types.ObjectId, threshold: number) {
    return this.model
      .findOneAndUpdate(
        {
          _id: id,
          tenantId: asObjectId(tenantId),
          completed: false,
          completionPercentage: { $gte: threshold },
        },
        { $set: { completed: true, completedAt: new Date() } },
        { new: true },
      )
      .lean();
  }

  countCompleted(tenantId: string, enrollmentId: Types.ObjectId, lessonIds: Types.ObjectId[]) {
    return this.model.countDocuments({
      tenantId: asObjectId(tenantId),
      enrollmentId,
      lessonId: { $in: lessonIds },
      completed: true,
    });
  }

  findByEnrollment(tenantId: string, enrollmentId: Types.ObjectId) {
    return this.model.find({ tenantId: asObjectId(tenantId), enrollmentId }).lean();
  }

  findOne(tenantId: string, enrollmentId: Types.ObjectId, lessonId: Types.ObjectId) {
    return this.model.findOne({ tenantId: asObjectId(tenantId), enrollmentId, lessonId }).lean();
  }
}
