import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { FilterQuery, Model } from 'mongoose';
import { asObjectId } from '../../../../common/mongo-errors';
import { LmsPayment, LmsPaymentDocument, PaymentStatus } from '../schemas/payment.schema';

@Injectable()
export class PaymentRepo {
  constructor(@InjectModel(LmsPayment.name) private readonly model: Model<LmsPaymentDocument>) {}

  async create(data: Partial<LmsPayment>) {
    const doc = await this.model.create(data);
    return doc.toObject();
  }

  findById(tenantId: string, id: string) {
    return this.model.findOne({ _id: asObjectId(id), tenantId: asObjectId(tenantId) }).lean();
  }

  findPending(tenantId: string, enrollmentId: string) {
    return this.model
      .findOne({ tenantId: asObjectId(tenantId), enrollmentId: asObjectId(enrollmentId), status: 'pending' })
      .lean();
  }

  list(tenantId: string, filter: FilterQuery<LmsPayment>, limit = 50, skip = 0) {
    return this.model
      .find({ ...filter, tenantId: asObjectId(tenantId) })
      .sort({ createdAt: -1 })
      .limit(limit)
      .skip(skip)
      .lean();
  }

  transition(tenantId: string, id: string, from: PaymentStatus, set: Partial<LmsPayment>) {
    return this.model
      .findOneAndUpdate(
        { _id: asObjectId(id), tenantId: asObjectId(tenantId), status: from },
        { $set: set },
        { new: true },
      )
      .lean();
  }

  revertCompleted(tenantId: string, id: string) {
    return this.model
      .findOneAndUpdate(
        { _id: asObjectId(id), tenantId: asObjectId(tenantId), status: 'completed' },
        { $set: { status: 'pending' }, $unset: { completedAt: 1 } },
        { new: true },
      )
      .lean();
  }
}
