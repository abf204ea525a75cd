import { BadRequestException, ConflictException, Injectable, NotFoundException } from '@nestjs/common';
import * as bcrypt from 'bcrypt';
import { Types } from 'mongoose';
import { TenantRepo } from '../tenant/repos/tenant.repo';
import { CreateUserDto } from './dto/create-user.dto';
import { UserRepo } from './repos/user.repo';

export const BCRYPT_ROUNDS = 10;

@Injectable()
export class UserService {
  constructor(
    private readonly repo: UserRepo,
    private readonly tenants: TenantRepo,
  ) {}

  async create(tenantId: string, dto: CreateUserDto) {
    const tenant = await this.tenants.findById(tenantId);
    if (!tenant || !tenant.isActive) throw new NotFoundException('Tenant no encontrado');

    const count = await this.repo.countByTenant(tenantId);
    if (count >= tenant.maxUsers) {
      throw new BadRequestException(`El plan del tenant permite como máximo ${tenant.maxUsers} usuarios`);
    }

    const email = dto.email.trim().toLowerCase();
    if (await this.repo.existsByEmail(tenantId, email)) {
      throw new ConflictException('Ya existe un usuario con ese email');
    }

    // Hashear la contraseña antes de guardar
    const password = await bcrypt.hash(dto.password, BCRYPT_ROUNDS);
    return this.repo.create({
      tenantId: new Types.ObjectId(tenantId),
      email,
      password,
      firstName: dto.firstName?.trim() ?? '',
      lastName: dto.lastName?.trim() ?? '',
      role: dto.role ?? 'student',
      isActive: true,
    });
  }

  async get(tenantId: string, id: string) {
    const u = await this.repo.findById(tenantId, id);
    if (!u) throw new NotFoundException('Usuario no encontrado');
    return u;
  }

  list(tenantId: string, limit?: number, skip?: number) {
    return this.repo.list(tenantId, limit ?? 50, skip ?? 0);
  }
}
