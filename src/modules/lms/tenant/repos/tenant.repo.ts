import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { asObjectId } from '../../../../common/mongo-errors';
import { Tenant, TenantDocument } from '../schemas/tenant.schema';

@Injectable()
export class TenantRepo {
  constructor(
    @InjectModel(Tenant.name) private readonly model: Model<TenantDocument>,
  ) {}

  create(data: Partial<Tenant>) {
    return this.model.create(data);
  }

  findById(id: string) {
    return this.model.findById(asObjectId(id)).lean();
  }

  findBySubdomain(subdomain: string) {
    return this.model.findOne({ subdomain: subdomain.toLowerCase() }).lean();
  }

  exists(name: string, subdomain: string) {
    return this.model.exists({ $or: [{ name }, { subdomain: subdomain.toLowerCase() }] });
  }

  deleteById(id: string) {
    return this.model.findByIdAndDelete(asObjectId(id)).lean();
  }
}
