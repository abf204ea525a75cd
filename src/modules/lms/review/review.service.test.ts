import { ConflictException, ForbiddenException, NotFoundException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { Types } from 'mongoose';
import { CourseRow, FakeCourseRepo, makeCourse } from '../../../../test/fakes/catalog.fake';
import { FakeCourseReviewRepo } from '../../../../test/fakes/course-review.repo.fake';
import { FakeEnrollmentRepo } from '../../../../test/fakes/enrollment.repo.fake';
import { AuthUser } from '../../../auth/interfaces/auth-user.interface';
import { EnrollmentStatus } from '../enrollment/enrollment-status';
import { CourseRepo } from '../course/repos/course.repo';
import { EnrollmentService } from '../enrollment/enrollment.service';
import { EnrollmentRepo } from '../enrollment/repos/enrollment.repo';
import { CourseReviewRepo } from './repos/course-review.repo';
import { ReviewService } from './review.service';

describe('ReviewService', () => {
  const tenantId = new Types.ObjectId();
  const learner: AuthUser = {
    userId: new Types.ObjectId().toHexString(),
    tenantId: tenantId.toHexString(),
    role: 'student',
    email: 'learner@example.com',
  };

  let service: ReviewService;
  let reviews: FakeCourseReviewRepo;
  let enrollments: FakeEnrollmentRepo;
  let course: CourseRow;

  beforeEach(async () => {
    reviews = new FakeCourseReviewRepo();
    enrollments = new FakeEnrollmentRepo();
    const courses = new FakeCourseRepo();
    course = makeCourse(tenantId);
    courses.rows.push(course);

    const moduleRef = await Test.createTestingModule({
      providers: [
        ReviewService,
        EnrollmentService,
        { provide: CourseReviewRepo, useValue: reviews },
        { provide: EnrollmentRepo, useValue: enrollments },
        { provide: CourseRepo, useValue: courses },
      ],
    }).compile();
    service = moduleRef.get(ReviewService);
  });

  const enroll = (status: EnrollmentStatus) =>
    enrollments.create({ tenantId, courseId: course._id, learnerId: new Types.ObjectId(learner.userId), status });

  const courseId = () => course._id.toHexString();

  it('lets an active learner review the course', async () => {
    await enroll('active');
    const review = await service.create(learner, courseId(), { rating: 5, comment: '  Muy claro  ' });

    expect(review).toMatchObject({ rating: 5, comment: 'Muy claro', isPublic: true });
    expect(review.courseId.equals(course._id)).toBe(true);
  });

  it('accepts reviews after completing the course', async () => {
    await enroll('completed');
    await expect(service.create(learner, courseId(), { rating: 4, comment: 'Bien' })).resolves.toMatchObject({
      rating: 4,
    });
  });

  it('rejects learners without an active enrollment', async () => {
    await expect(service.create(learner, courseId(), { rating: 3, comment: 'Sin matrícula' })).rejects.toBeInstanceOf(
      ForbiddenException,
    );

    await enroll('pending');
    await expect(service.create(learner, courseId(), { rating: 3, comment: 'Sin pagar' })).rejects.toBeInstanceOf(
      ForbiddenException,
    );
    expect(reviews.rows).toHaveLength(0);
  });

  it('allows one review per learner', async () => {
    await enroll('active');
    await service.create(learner, courseId(), { rating: 5, comment: 'Primera' });
    await expect(service.create(learner, courseId(), { rating: 1, comment: 'Segunda' })).rejects.toBeInstanceOf(
      ConflictException,
    );
  });

  it('lists only public reviews, newest first', async () => {
    const other: AuthUser = { ...learner, userId: new Types.ObjectId().toHexString() };
    const third: AuthUser = { ...learner, userId: new Types.ObjectId().toHexString() };
    for (const who of [learner, other, third]) {
      await enrollments.create({ tenantId, courseId: course._id, learnerId: new Types.ObjectId(who.userId), status: 'active' });
    }
    await service.create(learner, courseId(), { rating: 5, comment: 'Uno' });
    await service.create(other, courseId(), { rating: 2, comment: 'Privada', isPublic: false });
    await service.create(third, courseId(), { rating: 4, comment: 'Tres' });

    const list = await service.listPublic(learner, courseId());
    expect(list.map((r) => r.comment)).toEqual(['Tres', 'Uno']);
  });

  it('returns 404 for an unknown course', async () => {
    await expect(service.listPublic(learner, new Types.ObjectId().toHexString())).rejects.toBeInstanceOf(
      NotFoundException,
    );
  });
});
