import { Injectable, Logger } from '@nestjs/common';
import { Types } from 'mongoose';
import { EnrollmentRepo } from '../enrollment/repos/enrollment.repo';
import { LessonRepo } from '../lesson/repos/lesson.repo';
import { computeCompletionPercentage } from './completion';
import { LessonProgressRepo } from './repos/lesson-progress.repo';

const MAX_ATTEMPTS = 5;

@Injectable()
export class CompletionService {
  private readonly logger = new Logger(CompletionService.name);

  constructor(
    private readonly enrollments: EnrollmentRepo,
    private readonly lessons: LessonRepo,
    private readonly progress: LessonProgressRepo,
  ) {}

  /**
   * Recalcula el % de la matrícula desde las lecciones obligatorias completadas.
   * La escritura es compare-and-swap sobre `revision`: si otro recálculo escribió
   * en medio se vuelve a leer y contar. Solo toca matrículas activas, por eso
   * una completada no se revierte.
   */
  async recompute(tenantId: string, enrollmentId: Types.ObjectId) {
    const id = String(enrollmentId);
    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      const current = await this.enrollments.findById(tenantId, id);
      if (!current || current.status !== 'active') return current;

      const mandatory = await this.lessons.findMandatoryIds(tenantId, String(current.courseId));
      const done = mandatory.length
        ? await this.progress.countCompleted(tenantId, current._id, mandatory)
        : 0;
      const percentage = computeCompletionPercentage(done, mandatory.length);

      const updated = await this.enrollments.applyCompletion(tenantId, id, current.revision, percentage);
      if (updated) {
        if (updated.status === 'completed') this.logger.log(`Matrícula ${id} completada`);
        return updated;
      }
    }

    this.logger.warn(`Recálculo de la matrícula ${id} sin converger tras ${MAX_ATTEMPTS} intentos`);
    return this.enrollments.findById(tenantId, id);
  }
}
