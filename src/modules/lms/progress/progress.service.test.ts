import { BadRequestException, ConflictException, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { Types } from 'mongoose';
import {
  FakeCourseModuleRepo,
  FakeCourseRepo,
  FakeLessonRepo,
  LessonRow,
  makeCourse,
  makeLesson,
  makeModule,
} from '../../../../test/fakes/catalog.fake';
import { FakeEnrollmentRepo, EnrollmentRow } from '../../../../test/fakes/enrollment.repo.fake';
import { FakeLessonProgressRepo } from '../../../../test/fakes/lesson-progress.repo.fake';
import { AuthUser } from '../../../auth/interfaces/auth-user.interface';
import { CourseModuleRepo } from '../course-module/repos/course-module.repo';
import { CourseRepo } from '../course/repos/course.repo';
import { EnrollmentService } from '../enrollment/enrollment.service';
import { EnrollmentRepo } from '../enrollment/repos/enrollment.repo';
import { LessonService } from '../lesson/lesson.service';
import { LessonRepo } from '../lesson/repos/lesson.repo';
import { CompletionService } from './completion.service';
import { ProgressService } from './progress.service';
import { LessonProgressRepo } from './repos/lesson-progress.repo';

describe('ProgressService', () => {
  const tenantId = new Types.ObjectId();
  const learner: AuthUser = {
    userId: new Types.ObjectId().toHexString(),
    tenantId: tenantId.toHexString(),
    role: 'student',
    email: 'learner@example.com',
  };

  let service: ProgressService;
  let courses: FakeCourseRepo;
  let modules: FakeCourseModuleRepo;
  let lessons: FakeLessonRepo;
  let enrollments: FakeEnrollmentRepo;
  let progress: FakeLessonProgressRepo;

  let lessonA: LessonRow;
  let lessonB: LessonRow;
  let optional: LessonRow;
  let enrollment: EnrollmentRow;

  beforeEach(async () => {
    courses = new FakeCourseRepo();
    modules = new FakeCourseModuleRepo();
    lessons = new FakeLessonRepo();
    enrollments = new FakeEnrollmentRepo();
    progress = new FakeLessonProgressRepo();

    const course = makeCourse(tenantId);
    const mod = makeModule(course, { title: 'Fundamentos' });
    lessonA = makeLesson(mod, { title: 'A', sortIndex: 0 });
    lessonB = makeLesson(mod, { title: 'B', sortIndex: 1 });
    optional = makeLesson(mod, { title: 'Extra', sortIndex: 2, isMandatory: false });
    const draft = makeLesson(mod, { title: 'Borrador', sortIndex: 3, status: 'draft' });
    courses.rows.push(course);
    modules.rows.push(mod);
    lessons.rows.push(lessonA, lessonB, optional, draft);

    await enrollments.create({
      tenantId,
      courseId: course._id,
      learnerId: new Types.ObjectId(learner.userId),
      status: 'active',
    });
    enrollment = enrollments.rows[0];

    const moduleRef = await Test.createTestingModule({
      providers: [
        ProgressService,
        CompletionService,
        EnrollmentService,
        LessonService,
        { provide: ConfigService, useValue: new ConfigService({ COMPLETION_THRESHOLD: 95 }) },
        { provide: LessonProgressRepo, useValue: progress },
        { provide: EnrollmentRepo, useValue: enrollments },
        { provide: LessonRepo, useValue: lessons },
        { provide: CourseRepo, useValue: courses },
        { provide: CourseModuleRepo, useValue: modules },
      ],
    }).compile();

    service = moduleRef.get(ProgressService);
  });

  const report = (lesson: LessonRow, completionPercentage: number, extra: { watchTime?: number; lastPosition?: number } = {}) =>
    service.reportForLesson(learner, lesson._id.toHexString(), { completionPercentage, ...extra });

  it('keeps the highest percentage when a lower report arrives later', async () => {
    await report(lessonA, 60);
    const res = await report(lessonA, 30);

    expect(res.progress.completionPercentage).toBe(60);
    expect(progress.rows).toHaveLength(1);
    expect(progress.rows[0].completionPercentage).toBe(60);
  });

  it('marks the lesson completed at the threshold and never unsets it', async () => {
    const first = await report(lessonA, 95);
    expect(first.progress.completed).toBe(true);
    expect(first.enrollment.completionPercentage).toBe(50);

    const second = await report(lessonA, 10);
    expect(second.progress.completed).toBe(true);
    expect(second.progress.completionPercentage).toBe(95);
  });

  it('does not mark completed below the threshold', async () => {
    const res = await report(lessonA, 94);
    expect(res.progress.completed).toBe(false);
    expect(res.enrollment.completionPercentage).toBe(0);
  });

  it('completes the enrollment once every mandatory lesson is done and rejects later reports', async () => {
    await report(lessonA, 100);
    const res = await report(lessonB, 100);

    expect(res.enrollment).toEqual({
      id: enrollment._id.toHexString(),
      status: 'completed',
      completionPercentage: 100,
    });
    expect(enrollments.rows[0].open).toBe(false);

    await expect(report(lessonA, 40)).rejects.toBeInstanceOf(ConflictException);
    const rowA = progress.rows.find((r) => r.lessonId.equals(lessonA._id));
    expect(rowA?.completionPercentage).toBe(100);
  });

  it('ignores optional lessons in the course percentage', async () => {
    const afterOptional = await report(optional, 100);
    expect(afterOptional.progress.completed).toBe(true);
    expect(afterOptional.enrollment.completionPercentage).toBe(0);

    const afterA = await report(lessonA, 100);
    expect(afterA.enrollment.completionPercentage).toBe(50);
  });

  it('keeps watchTime monotonic and lastPosition as last reported', async () => {
    await report(lessonA, 10, { watchTime: 100, lastPosition: 80 });
    const res = await report(lessonA, 20, { watchTime: 50, lastPosition: 30 });

    expect(res.progress.watchTime).toBe(100);
    expect(res.progress.lastPosition).toBe(30);
  });

  it('rejects out-of-range values without writing', async () => {
    await expect(report(lessonA, 101)).rejects.toBeInstanceOf(BadRequestException);
    await expect(report(lessonA, 50.5)).rejects.toBeInstanceOf(BadRequestException);
    await expect(report(lessonA, 50, { lastPosition: 601 })).rejects.toBeInstanceOf(BadRequestException);
    await expect(report(lessonA, 50, { watchTime: -1 })).rejects.toBeInstanceOf(BadRequestException);
    expect(progress.rows).toHaveLength(0);
  });

  it('rejects a lesson from another course on the enrollment route', async () => {
    const other = makeCourse(tenantId, { slug: 'otro' });
    const otherLesson = makeLesson(makeModule(other), { title: 'Ajena' });
    courses.rows.push(other);
    lessons.rows.push(otherLesson);

    await expect(
      service.reportForEnrollment(learner, enrollment._id.toHexString(), {
        lessonId: otherLesson._id.toHexString(),
        completionPercentage: 50,
      }),
    ).rejects.toBeInstanceOf(BadRequestException);
    expect(progress.rows).toHaveLength(0);
  });

  it('rejects reports on an enrollment of another learner', async () => {
    const stranger: AuthUser = { ...learner, userId: new Types.ObjectId().toHexString() };
    await expect(
      service.reportForEnrollment(stranger, enrollment._id.toHexString(), {
        lessonId: lessonA._id.toHexString(),
        completionPercentage: 50,
      }),
    ).rejects.toBeInstanceOf(NotFoundException);
  });

  it('returns 404 when the learner is not enrolled', async () => {
    const stranger: AuthUser = { ...learner, userId: new Types.ObjectId().toHexString() };
    await expect(
      service.reportForLesson(stranger, lessonA._id.toHexString(), { completionPercentage: 10 }),
    ).rejects.toBeInstanceOf(NotFoundException);
  });

  it('hides draft lessons from learners', async () => {
    const draft = lessons.rows[3];
    await expect(report(draft, 50)).rejects.toBeInstanceOf(NotFoundException);
  });

  it('rejects reports on a pending enrollment', async () => {
    enrollments.rows[0].status = 'pending';
    await expect(report(lessonA, 50)).rejects.toBeInstanceOf(ConflictException);
    expect(progress.rows).toHaveLength(0);
  });

  it('complete() reports the configured threshold', async () => {
    const res = await service.complete(learner, lessonA._id.toHexString());
    expect(res.progress.completionPercentage).toBe(95);
    expect(res.progress.completed).toBe(true);
  });

  it('retries the aggregate write when another writer bumped the revision', async () => {
    let bumped = false;
    enrollments.beforeApplyCompletion = (row) => {
      if (!bumped) {
        bumped = true;
        row.revision += 1;
      }
    };

    const res = await report(lessonA, 100);
    expect(res.enrollment.completionPercentage).toBe(50);
    expect(enrollments.rows[0].revision).toBe(2);
  });

  it('never auto-completes a course without mandatory lessons', async () => {
    lessonA.isMandatory = false;
    lessonB.isMandatory = false;
    await report(lessonA, 100);
    const res = await report(lessonB, 100);

    expect(res.enrollment).toEqual({
      id: enrollment._id.toHexString(),
      status: 'active',
      completionPercentage: 0,
    });
  });

  it('builds the course view with defaults for lessons without reports', async () => {
    await report(lessonA, 100, { watchTime: 300 });
    const view = await service.getCourseProgress(learner, String(enrollment.courseId));

    expect(view.enrollmentId).toBe(enrollment._id.toHexString());
    expect(view.status).toBe('active');
    expect(view.completionPercentage).toBe(50);
    expect(view.completedLessons).toBe(1);
    expect(view.totalLessons).toBe(2);
    expect(view.lessonProgress.map((l) => l.title)).toEqual(['A', 'B', 'Extra']);
    expect(view.lessonProgress[0]).toMatchObject({ moduleTitle: 'Fundamentos', completed: true, watchTime: 300 });
    expect(view.lessonProgress[1]).toMatchObject({ completionPercentage: 0, completed: false, lastPosition: 0 });
  });

  it('keeps an archived course open to its active learners', async () => {
    courses.rows[0].status = 'archived';

    await report(lessonA, 100);
    const res = await service.complete(learner, lessonB._id.toHexString());
    expect(res.enrollment.status).toBe('completed');

    const view = await service.getCourseProgress(learner, String(enrollment.courseId));
    expect(view.status).toBe('completed');
    expect(view.completedLessons).toBe(2);
  });

  it('still hides an archived course from learners without an enrollment', async () => {
    courses.rows[0].status = 'archived';
    const stranger: AuthUser = { ...learner, userId: new Types.ObjectId().toHexString() };
    await expect(service.getCourseProgress(stranger, String(enrollment.courseId))).rejects.toBeInstanceOf(
      NotFoundException,
    );
  });

  it('returns zeros for a lesson without progress', async () => {
    const res = await service.getLessonProgress(learner, lessonB._id.toHexString());
    expect(res).toMatchObject({
      enrollmentId: enrollment._id.toHexString(),
      lessonId: lessonB._id.toHexString(),
      completionPercentage: 0,
      completed: false,
      completedAt: null,
    });
  });
});
