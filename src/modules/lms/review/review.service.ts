import { ConflictException, ForbiddenException, Injectable, NotFoundException } from '@nestjs/common';
import { Types } from 'mongoose';
import { AuthUser } from '../../../auth/interfaces/auth-user.interface';
import { isDuplicateKeyError } from '../../../common/mongo-errors';
import { CourseRepo } from '../course/repos/course.repo';
import { EnrollmentService } from '../enrollment/enrollment.service';
import { CreateReviewDto } from './dto/create-review.dto';
import { CourseReviewRepo } from './repos/course-review.repo';

@Injectable()
export class ReviewService {
  constructor(
    private readonly repo: CourseReviewRepo,
    private readonly courses: CourseRepo,
    private readonly enrollments: EnrollmentService,
  ) {}

  async listPublic(actor: AuthUser, courseId: string) {
    await this.requireCourse(actor, courseId);
    return this.repo.findPublic(actor.tenantId, courseId);
  }

  /** Solo reseña quien cursa o terminó el curso; una reseña por alumno. */
  async create(actor: AuthUser, courseId: string, dto: CreateReviewDto) {
    await this.requireCourse(actor, courseId);
    const enrollment = await this.enrollments.findLatestForCourse(actor, courseId, true);
    if (!enrollment || (enrollment.status !== 'active' && enrollment.status !== 'completed')) {
      throw new ForbiddenException('Debes estar matriculado para reseñar el curso');
    }

    try {
      return await this.repo.create({
        tenantId: new Types.ObjectId(actor.tenantId),
        courseId: enrollment.courseId,
        learnerId: new Types.ObjectId(actor.userId),
        rating: dto.rating,
        comment: dto.comment.trim(),
        isPublic: dto.isPublic ?? true,
      });
    } catch (err) {
      if (isDuplicateKeyError(err)) throw new ConflictException('Ya reseñaste este curso');
      throw err;
    }
  }

  private async requireCourse(actor: AuthUser, courseId: string) {
    const course = await this.courses.findById(actor.tenantId, courseId);
    if (!course) throw new NotFoundException('Curso no encontrado');
    return course;
  }
}
