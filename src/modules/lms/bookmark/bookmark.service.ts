import { BadRequestException, Injectable, NotFoundException } from '@nestjs/common';
import { AuthUser } from '../../../auth/interfaces/auth-user.interface';
import { EnrollmentService } from '../enrollment/enrollment.service';
import { LessonService } from '../lesson/lesson.service';
import { UpsertBookmarkDto } from './dto/upsert-bookmark.dto';
import { BookmarkRepo } from './repos/bookmark.repo';

@Injectable()
export class BookmarkService {
  constructor(
    private readonly repo: BookmarkRepo,
    private readonly lessons: LessonService,
    private readonly enrollments: EnrollmentService,
  ) {}

  async upsert(actor: AuthUser, lessonId: string, dto: UpsertBookmarkDto) {
    const lesson = await this.lessons.getPublished(actor.tenantId, lessonId);
    const enrollment = await this.enrollments.findLatestForCourse(actor, String(lesson.courseId), true);
    if (!enrollment) throw new NotFoundException('No estás matriculado en este curso');
    if (lesson.durationSec > 0 && dto.position > lesson.durationSec) {
      throw new BadRequestException('La posición supera la duración de la lección');
    }
    return this.repo.upsert(actor.tenantId, actor.userId, lesson, dto);
  }

  async listForLesson(actor: AuthUser, lessonId: string) {
    await this.lessons.getPublished(actor.tenantId, lessonId);
    return this.repo.findByLearner(actor.tenantId, actor.userId, lessonId);
  }

  listMine(actor: AuthUser) {
    return this.repo.findByLearner(actor.tenantId, actor.userId);
  }

  async remove(actor: AuthUser, id: string) {
    const gone = await this.repo.deleteOwn(actor.tenantId, actor.userId, id);
    if (!gone) throw new NotFoundException('Marcador no encontrado');
    return { ok: true };
  }
}
