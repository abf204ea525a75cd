import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export type TenantDocument = HydratedDocument<Tenant>;

export type TenantPlan = 'basic' | 'pro' | 'enterprise';

@Schema({ collection: 'tenants', timestamps: true })
export class Tenant {
  @Prop({ required: true, trim: true, unique: true })
  name!: string;

  @Prop({ required: true, lowercase: true, trim: true, unique: true, match: /^[a-z0-9-]+$/ })
  subdomain!: string;

  @Prop({ enum: ['basic', 'pro', 'enterprise'], default: 'basic' })
  planType!: TenantPlan;

  @Prop({ default: 50 }) maxUsers!: number;
  @Prop({ default: 10 }) maxCourses!: number;

  @Prop({ default: true, index: true })
  isActive!: boolean;
}

export const TenantSchema = SchemaFactory.createForClass(Tenant);
