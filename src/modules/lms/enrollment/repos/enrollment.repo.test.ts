import { getModelToken } from '@nestjs/mongoose';
import { Test } from '@nestjs/testing';
import { Types } from 'mongoose';
import { LmsEnrollment } from '../schemas/enrollment.schema';
import { EnrollmentRepo } from './enrollment.repo';

describe('EnrollmentRepo', () => {
  const tenantId = new Types.ObjectId();
  const id = new Types.ObjectId();

  const lean = jest.fn();
  const model = {
    findOneAndUpdate: jest.fn(() => ({ lean })),
  };
  let repo: EnrollmentRepo;

  beforeEach(async () => {
    lean.mockReset();
    model.findOneAndUpdate.mockClear();
    const moduleRef = await Test.createTestingModule({
      providers: [EnrollmentRepo, { provide: getModelToken(LmsEnrollment.name), useValue: model }],
    }).compile();
    repo = moduleRef.get(EnrollmentRepo);
  });

  it('writes a partial percentage only on the read revision of an active enrollment', async () => {
    lean.mockResolvedValueOnce(null);

    const res = await repo.applyCompletion(tenantId.toHexString(), id.toHexString(), 3, 66);

    expect(res).toBeNull();
    expect(model.findOneAndUpdate).toHaveBeenCalledWith(
      { _id: id, tenantId, status: 'active', revision: 3 },
      { $set: { completionPercentage: 66 }, $inc: { revision: 1 } },
      { new: true },
    );
  });

  it('closes the enrollment in the same update when it reaches 100', async () => {
    lean.mockResolvedValueOnce({ status: 'completed' });

    const res = await repo.applyCompletion(tenantId.toHexString(), id.toHexString(), 7, 100);

    expect(res).toEqual({ status: 'completed' });
    expect(model.findOneAndUpdate).toHaveBeenCalledWith(
      { _id: id, tenantId, status: 'active', revision: 7 },
      {
        $set: { completionPercentage: 100, status: 'completed', open: false, completedAt: expect.any(Date) },
        $inc: { revision: 1 },
      },
      { new: true },
    );
  });

  it('filters transitions on the allowed source states', async () => {
    lean.mockResolvedValueOnce(null);

    await repo.transition(tenantId.toHexString(), id.toHexString(), ['pending', 'active'], { status: 'withdrawn' });

    expect(model.findOneAndUpdate).toHaveBeenCalledWith(
      { _id: id, tenantId, status: { $in: ['pending', 'active'] } },
      { $set: { status: 'withdrawn' } },
      { new: true },
    );
  });
});
