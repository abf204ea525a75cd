import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';
import { UserRole } from '../../../../auth/roles';

export type LmsUserDocument = HydratedDocument<LmsUser>;

@Schema({ collection: 'lms_users', timestamps: true })
export class LmsUser {
  @Prop({ type: Types.ObjectId, ref: 'Tenant', required: true, index: true })
  tenantId!: Types.ObjectId;

  @Prop({ required: true, lowercase: true, trim: true })
  email!: string;

  // hash bcrypt; nunca sale en las consultas por defecto
  @Prop({ required: true, select: false })
  password!: string;

  @Prop({ trim: true, default: '' }) firstName!: string;
  @Prop({ trim: true, default: '' }) lastName!: string;

  @Prop({ enum: ['admin', 'teacher', 'student'], default: 'student', index: true })
  role!: UserRole;

  @Prop({ default: true })
  isActive!: boolean;
}

export const LmsUserSchema = SchemaFactory.createForClass(LmsUser);
LmsUserSchema.index({ tenantId: 1, email: 1 }, { unique: true });
