import { Injectable, NotFoundException } from '@nestjs/common';
import { TenantRepo } from './repos/tenant.repo';

@Injectable()
export class TenantService {
  constructor(private readonly repo: TenantRepo) {}

  async get(id: string) {
    const t = await this.repo.findById(id);
    if (!t) throw new NotFoundException('Tenant no encontrado');
    return t;
  }
}
