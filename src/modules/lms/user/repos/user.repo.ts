import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { asObjectId } from '../../../../common/mongo-errors';
import { LmsUser, LmsUserDocument } from '../schemas/user.schema';

@Injectable()
export class UserRepo {
  constructor(
    @InjectModel(LmsUser.name) private readonly model: Model<LmsUserDocument>,
  ) {}

  async create(data: Partial<LmsUser>) {
    const doc = await this.model.create(data);
    const { password: _password, ...rest } = doc.toObject();
    return rest;
  }

  findById(tenantId: string, id: string) {
    return this.model.findOne({ _id: asObjectId(id), tenantId: asObjectId(tenantId) }).lean();
  }

  // incluye el hash: solo para login
  findByEmailWithPassword(tenantId: string, email: string) {
    return this.model
      .findOne({ tenantId: asObjectId(tenantId), email: email.toLowerCase() })
      .select('+password')
      .lean();
  }

  existsByEmail(tenantId: string, email: string) {
    return this.model.exists({ tenantId: asObjectId(tenantId), email: email.toLowerCase() });
  }

  countByTenant(tenantId: string) {
    return this.model.countDocuments({ tenantId: asObjectId(tenantId) });
  }

  list(tenantId: string, limit = 50, skip = 0) {
    return this.model
      .find({ tenantId: asObjectId(tenantId) })
      .sort({ createdAt: -1 })
      .limit(limit)
      .skip(skip)
      .lean();
  }
}
