import { BadRequestException, ConflictException, NotFoundException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { Types } from 'mongoose';
import { CourseRow, FakeCourseRepo, makeCourse } from '../../../../test/fakes/catalog.fake';
import { FakeEnrollmentRepo } from '../../../../test/fakes/enrollment.repo.fake';
import { AuthUser } from '../../../auth/interfaces/auth-user.interface';
import { CourseRepo } from '../course/repos/course.repo';
import { EnrollmentService } from './enrollment.service';
import { EnrollmentRepo } from './repos/enrollment.repo';

describe('EnrollmentService', () => {
  const tenantId = new Types.ObjectId().toHexString();
  const user = (role: AuthUser['role'] = 'student'): AuthUser => ({
    userId: new Types.ObjectId().toHexString(),
    tenantId,
    role,
    email: `${role}@example.com`,
  });

  let service: EnrollmentService;
  let repo: FakeEnrollmentRepo;
  let courses: FakeCourseRepo;
  let free: CourseRow;
  let paid: CourseRow;
  let learner: AuthUser;

  beforeEach(async () => {
    repo = new FakeEnrollmentRepo();
    courses = new FakeCourseRepo();
    free = makeCourse(new Types.ObjectId(tenantId), { slug: 'gratis' });
    paid = makeCourse(new Types.ObjectId(tenantId), { slug: 'pago', price: 49 });
    courses.rows.push(free, paid);
    learner = user();

    const moduleRef = await Test.createTestingModule({
      providers: [
        EnrollmentService,
        { provide: EnrollmentRepo, useValue: repo },
        { provide: CourseRepo, useValue: courses },
      ],
    }).compile();
    service = moduleRef.get(EnrollmentService);
  });

  describe('enroll', () => {
    it('activates free courses right away', async () => {
      const e = await service.enroll(learner, free._id.toHexString());
      expect(e.status).toBe('active');
      expect(e.open).toBe(true);
      expect(e.activatedAt).toBeInstanceOf(Date);
    });

    it('leaves paid courses pending', async () => {
      const e = await service.enroll(learner, paid._id.toHexString());
      expect(e.status).toBe('pending');
      expect(e.activatedAt).toBeUndefined();
    });

    it('returns the open enrollment instead of creating another', async () => {
      const first = await service.enroll(learner, free._id.toHexString());
      const second = await service.enroll(learner, free._id.toHexString());
      expect(second._id.equals(first._id)).toBe(true);
      expect(repo.rows).toHaveLength(1);
    });

    it('resolves a concurrent duplicate to the existing enrollment', async () => {
      const first = await service.enroll(learner, free._id.toHexString());
      // el otro request todavía no veía la matrícula al consultar
      jest.spyOn(repo, 'findOpen').mockResolvedValueOnce(null);

      const second = await service.enroll(learner, free._id.toHexString());
      expect(second._id.equals(first._id)).toBe(true);
      expect(repo.rows).toHaveLength(1);
    });

    it('rejects unpublished courses', async () => {
      free.status = 'draft';
      await expect(service.enroll(learner, free._id.toHexString())).rejects.toBeInstanceOf(BadRequestException);
    });

    it('rejects unknown courses', async () => {
      await expect(service.enroll(learner, new Types.ObjectId().toHexString())).rejects.toBeInstanceOf(
        NotFoundException,
      );
    });

    it('enforces maxStudents', async () => {
      free.maxStudents = 1;
      await service.enroll(user(), free._id.toHexString());
      await expect(service.enroll(learner, free._id.toHexString())).rejects.toBeInstanceOf(BadRequestException);
    });
  });

  describe('withdraw', () => {
    it('withdraws an active enrollment and allows a new one afterwards', async () => {
      const e = await service.enroll(learner, free._id.toHexString());
      const withdrawn = await service.withdraw(learner, e._id.toHexString());

      expect(withdrawn.status).toBe('withdrawn');
      expect(withdrawn.open).toBe(false);
      expect(withdrawn.withdrawnBy).toBe('learner');

      const again = await service.enroll(learner, free._id.toHexString());
      expect(again._id.equals(e._id)).toBe(false);
      expect(again.status).toBe('active');
    });

    it('lets a learner cancel a pending enrollment', async () => {
      const e = await service.enroll(learner, paid._id.toHexString());
      const withdrawn = await service.withdraw(learner, e._id.toHexString());
      expect(withdrawn.status).toBe('withdrawn');
    });

    it('is terminal', async () => {
      const e = await service.enroll(learner, free._id.toHexString());
      await service.withdraw(learner, e._id.toHexString());
      await expect(service.withdraw(learner, e._id.toHexString())).rejects.toBeInstanceOf(ConflictException);
    });

    it('records admin withdrawals', async () => {
      const e = await service.enroll(learner, free._id.toHexString());
      const withdrawn = await service.withdraw(user('admin'), e._id.toHexString());
      expect(withdrawn.withdrawnBy).toBe('admin');
    });

    it('hides other learners enrollments', async () => {
      const e = await service.enroll(learner, free._id.toHexString());
      await expect(service.withdraw(user(), e._id.toHexString())).rejects.toBeInstanceOf(NotFoundException);
    });

    it('does not let a teacher withdraw someone else', async () => {
      const e = await service.enroll(learner, free._id.toHexString());
      await expect(service.withdraw(user('teacher'), e._id.toHexString())).rejects.toBeInstanceOf(NotFoundException);
    });
  });

  describe('get', () => {
    it('lets staff read any enrollment of the tenant', async () => {
      const e = await service.enroll(learner, free._id.toHexString());
      const found = await service.get(user('teacher'), e._id.toHexString());
      expect(found._id.equals(e._id)).toBe(true);
    });

    it('returns 404 to another student', async () => {
      const e = await service.enroll(learner, free._id.toHexString());
      await expect(service.get(user(), e._id.toHexString())).rejects.toBeInstanceOf(NotFoundException);
    });
  });

  describe('activate', () => {
    it('moves pending to active with the payment amount', async () => {
      const e = await service.enroll(learner, paid._id.toHexString());
      const active = await service.activate(tenantId, e._id.toHexString(), { amount: 49 });
      expect(active).toMatchObject({ status: 'active', isPaid: true, paymentAmount: 49 });
    });

    it('refuses to activate twice', async () => {
      const e = await service.enroll(learner, free._id.toHexString());
      await expect(service.activate(tenantId, e._id.toHexString(), { amount: 0 })).rejects.toBeInstanceOf(
        ConflictException,
      );
    });
  });

  it('lists only the caller enrollments', async () => {
    await service.enroll(learner, free._id.toHexString());
    await service.enroll(user(), free._id.toHexString());
    const mine = await service.listMine(learner);
    expect(mine).toHaveLength(1);
    expect(String(mine[0].learnerId)).toBe(learner.userId);
  });
});
