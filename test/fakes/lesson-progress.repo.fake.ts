import { Types } from 'mongoose';
import { ProgressKey, ProgressReport } from '../../src/modules/lms/progress/repos/lesson-progress.repo';
import { LmsLessonProgress } from '../../src/modules/lms/progress/schemas/lesson-progress.schema';
import { sameId, WithId } from './match';

export type ProgressRow = WithId<LmsLessonProgress>;

export class FakeLessonProgressRepo {
  rows: ProgressRow[] = [];

  // mismo efecto que $max / $set / $setOnInsert del upsert real
  async applyReport(tenantId: string, key: ProgressKey, report: ProgressReport) {
    let row = this.rows.find(
      (r) => sameId(r.tenantId, tenantId) && sameId(r.enrollmentId, key.enrollmentId) && sameId(r.lessonId, key.lessonId),
    );
    if (!row) {
      row = {
        _id: new Types.ObjectId(),
        tenantId: new Types.ObjectId(tenantId),
        enrollmentId: key.enrollmentId,
        lessonId: key.lessonId,
        courseId: key.courseId,
        completionPercentage: 0,
        completed: false,
        watchTime: 0,
        lastPosition: 0,
      };
      this.rows.push(row);
    }
    row.completionPercentage = Math.max(row.completionPercentage, report.completionPercentage);
    if (report.watchTime !== undefined) row.watchTime = Math.max(row.watchTime, report.watchTime);
    if (report.lastPosition !== undefined) row.lastPosition = report.lastPosition;
    row.lastReportedAt = new Date();
    return { ...row };
  }

  async markCompleted(tenantId: string, id: Types.ObjectId, threshold: number) {
    const row = this.rows.find((r) => sameId(r._id, id) && sameId(r.tenantId, tenantId));
    if (!row || row.completed || row.completionPercentage < threshold) return null;
    row.completed = true;
    row.completedAt = new Date();
    return { ...row };
  }

  async countCompleted(tenantId: string, enrollmentId: Types.ObjectId, lessonIds: Types.ObjectId[]) {
    return this.rows.filter(
      (r) =>
        r.completed &&
        sameId(r.tenantId, tenantId) &&
        sameId(r.enrollmentId, enrollmentId) &&
        lessonIds.some((id) => sameId(id, r.lessonId)),
    ).length;
  }

  async findByEnrollment(tenantId: string, enrollmentId: Types.ObjectId) {
    return this.rows
      .filter((r) => sameId(r.tenantId, tenantId) && sameId(r.enrollmentId, enrollmentId))
      .map((r) => ({ ...r }));
  }

  async findOne(tenantId: string, enrollmentId: Types.ObjectId, lessonId: Types.ObjectId) {
    const row = this.rows.find(
      (r) => sameId(r.tenantId, tenantId) && sameId(r.enrollmentId, enrollmentId) && sameId(r.lessonId, lessonId),
    );
    return row ? { ...row } : null;
  }
}
