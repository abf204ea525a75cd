import { BadRequestException, Injectable, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Types } from 'mongoose';
import { AuthUser } from '../../../auth/interfaces/auth-user.interface';
import { COMPLETION_THRESHOLD, DEFAULT_COMPLETION_THRESHOLD } from '../../../config/config.env';
import { CourseModuleRepo } from '../course-module/repos/course-module.repo';
import { CourseRepo } from '../course/repos/course.repo';
import { assertActive, EnrollmentService } from '../enrollment/enrollment.service';
import { LmsEnrollment } from '../enrollment/schemas/enrollment.schema';
import { LessonService } from '../lesson/lesson.service';
import { LessonRepo } from '../lesson/repos/lesson.repo';
import { LmsLesson } from '../lesson/schemas/lesson.schema';
import { CompletionService } from './completion.service';
import { ReportEnrollmentProgressDto } from './dto/report-progress.dto';
import { LessonProgressRepo, ProgressReport } from './repos/lesson-progress.repo';

type EnrollmentRef = Pick<LmsEnrollment, 'tenantId' | 'courseId' | 'status'> & { _id: Types.ObjectId };
type LessonRef = Pick<LmsLesson, 'courseId' | 'durationSec'> & { _id: Types.ObjectId };

export function validateReport(report: ProgressReport, lesson: Pick<LmsLesson, 'durationSec'>) {
  const { completionPercentage, watchTime, lastPosition } = report;
  if (!Number.isInteger(completionPercentage) || completionPercentage < 0 || completionPercentage > 100) {
    throw new BadRequestException('completionPercentage debe ser un entero entre 0 y 100');
  }
  if (watchTime !== undefined && (!Number.isFinite(watchTime) || watchTime < 0)) {
    throw new BadRequestException('watchTime no puede ser negativo');
  }
  if (lastPosition !== undefined) {
    if (!Number.isFinite(lastPosition) || lastPosition < 0) {
      throw new BadRequestException('lastPosition no puede ser negativo');
    }
    if (lesson.durationSec > 0 && lastPosition > lesson.durationSec) {
      throw new BadRequestException('lastPosition supera la duración de la lección');
    }
  }
}

@Injectable()
export class ProgressService {
  private readonly threshold: number;

  constructor(
    private readonly progress: LessonProgressRepo,
    private readonly completion: CompletionService,
    private readonly enrollments: EnrollmentService,
    private readonly lessons: LessonService,
    private readonly lessonRepo: LessonRepo,
    private readonly modules: CourseModuleRepo,
    private readonly courses: CourseRepo,
    config: ConfigService,
  ) {
    this.threshold = config.get<number>(COMPLETION_THRESHOLD) ?? DEFAULT_COMPLETION_THRESHOLD;
  }

  /**
   * Registra un reporte y recalcula el % del curso. Valida todo antes de
   * escribir: si algo falla no cambia nada.
   */
  async recordProgress(enrollment: EnrollmentRef, lesson: LessonRef, report: ProgressReport) {
    assertActive(enrollment);
    if (String(lesson.courseId) !== String(enrollment.courseId)) {
      throw new BadRequestException('La lección no pertenece al curso de la matrícula');
    }
    validateReport(report, lesson);

    const tenantId = String(enrollment.tenantId);
    let row = await this.progress.applyReport(
      tenantId,
      { enrollmentId: enrollment._id, lessonId: lesson._id, courseId: lesson.courseId },
      report,
    );
    if (!row) throw new NotFoundException('Progreso no encontrado');

    if (!row.completed && row.completionPercentage >= this.threshold) {
      // null = otro request ya la marcó
      row = (await this.progress.markCompleted(tenantId, row._id, this.threshold))
        ?? (await this.progress.findOne(tenantId, enrollment._id, lesson._id))
        ?? row;
    }

    const updated = await this.completion.recompute(tenantId, enrollment._id);
    return {
      progress: row,
      enrollment: {
        id: String(enrollment._id),
        status: updated?.status ?? enrollment.status,
        completionPercentage: updated?.completionPercentage ?? 0,
      },
    };
  }

  // POST /lessons/:id/progress: usa la matrícula del usuario en el curso de la lección
  async reportForLesson(actor: AuthUser, lessonId: string, report: ProgressReport) {
    const lesson = await this.lessons.getPublished(actor.tenantId, lessonId);
    const enrollment = await this.enrollments.findLatestForCourse(actor, String(lesson.courseId));
    if (!enrollment) throw new NotFoundException('No estás matriculado en este curso');
    return this.recordProgress(enrollment, lesson, report);
  }

  async reportForEnrollment(actor: AuthUser, enrollmentId: string, dto: ReportEnrollmentProgressDto) {
    const enrollment = await this.enrollments.getOwned(actor, enrollmentId);
    assertActive(enrollment);
    const lesson = await this.lessons.getPublished(actor.tenantId, dto.lessonId);
    return this.recordProgress(enrollment, lesson, {
      completionPercentage: dto.completionPercentage,
      watchTime: dto.watchTime,
      lastPosition: dto.lastPosition,
    });
  }

  // Marcar como completada = reportar el umbral
  complete(actor: AuthUser, lessonId: string) {
    return this.reportForLesson(actor, lessonId, { completionPercentage: this.threshold });
  }

  async getLessonProgress(actor: AuthUser, lessonId: string) {
    const lesson = await this.lessons.getPublished(actor.tenantId, lessonId);
    const enrollment = await this.enrollments.findLatestForCourse(actor, String(lesson.courseId), true);
    if (!enrollment) throw new NotFoundException('No estás matriculado en este curso');

    const row = await this.progress.findOne(actor.tenantId, enrollment._id, lesson._id);
    return {
      enrollmentId: String(enrollment._id),
      lessonId: String(lesson._id),
      completionPercentage: row?.completionPercentage ?? 0,
      completed: row?.completed ?? false,
      completedAt: row?.completedAt ?? null,
      watchTime: row?.watchTime ?? 0,
      lastPosition: row?.lastPosition ?? 0,
      lastReportedAt: row?.lastReportedAt ?? null,
    };
  }

  /**
   * Vista del alumno: todas las lecciones publicadas (con ceros si no hay
   * reporte) y el conteo de obligatorias completadas.
   */
  async getCourseProgress(actor: AuthUser, courseId: string) {
    // sin filtro de estado: la matrícula da acceso aunque el curso esté archivado
    const course = await this.courses.findById(actor.tenantId, courseId);
    if (!course) throw new NotFoundException('Curso no encontrado');
    const enrollment = await this.enrollments.findLatestForCourse(actor, courseId, true);
    if (!enrollment) throw new NotFoundException('No estás matriculado en este curso');

    const [lessons, modules, rows] = await Promise.all([
      this.lessonRepo.findByCourse(actor.tenantId, courseId, true),
      this.modules.findByCourse(actor.tenantId, courseId),
      this.progress.findByEnrollment(actor.tenantId, enrollment._id),
    ]);

    const moduleById = new Map(modules.map((m) => [String(m._id), m]));
    const rowByLesson = new Map(rows.map((r) => [String(r.lessonId), r]));
    const moduleOrder = (id: Types.ObjectId) => moduleById.get(String(id))?.sortIndex ?? Number.MAX_SAFE_INTEGER;

    const ordered = [...lessons].sort(
      (a, b) => moduleOrder(a.moduleId) - moduleOrder(b.moduleId) || a.sortIndex - b.sortIndex,
    );

    const lessonProgress = ordered.map((l) => {
      const r = rowByLesson.get(String(l._id));
      return {
        lessonId: String(l._id),
        title: l.title,
        moduleId: String(l.moduleId),
        moduleTitle: moduleById.get(String(l.moduleId))?.title ?? null,
        isMandatory: l.isMandatory,
        completionPercentage: r?.completionPercentage ?? 0,
        completed: r?.completed ?? false,
        completedAt: r?.completedAt ?? null,
        watchTime: r?.watchTime ?? 0,
        lastPosition: r?.lastPosition ?? 0,
      };
    });

    const mandatory = lessonProgress.filter((l) => l.isMandatory);
    return {
      enrollmentId: String(enrollment._id),
      status: enrollment.status,
      completionPercentage: enrollment.completionPercentage,
      completedLessons: mandatory.filter((l) => l.completed).length,
      totalLessons: mandatory.length,
      lessonProgress,
    };
  }
}
