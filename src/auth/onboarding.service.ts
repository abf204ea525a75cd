import { ConflictException, Injectable, Logger } from '@nestjs/common';
import { CreateTenantDto } from '../modules/lms/tenant/dto/create-tenant.dto';
import { TenantRepo } from '../modules/lms/tenant/repos/tenant.repo';
import { UserService } from '../modules/lms/user/user.service';

// Alta de un tenant nuevo + su primer admin
@Injectable()
export class OnboardingService {
  private readonly logger = new Logger(OnboardingService.name);

  constructor(
    private readonly tenants: TenantRepo,
    private readonly users: UserService,
  ) {}

  async createTenant(dto: CreateTenantDto) {
    if (await this.tenants.exists(dto.name.trim(), dto.subdomain)) {
      throw new ConflictException('Ya existe un tenant con ese nombre o subdominio');
    }

    const tenant = await this.tenants.create({
      name: dto.name.trim(),
      subdomain: dto.subdomain,
      planType: dto.planType ?? 'basic',
      ...(dto.maxUsers ? { maxUsers: dto.maxUsers } : {}),
      ...(dto.maxCourses ? { maxCourses: dto.maxCourses } : {}),
      isActive: true,
    });
    const tenantId = String(tenant._id);

    try {
      const admin = await this.users.create(tenantId, { ...dto.admin, role: 'admin' });
      this.logger.log(`Tenant ${dto.subdomain} creado con admin ${admin.email}`);
      return { tenant: tenant.toObject(), admin };
    } catch (err) {
      // sin admin el tenant queda inservible: se revierte
      await this.tenants.deleteById(tenantId);
      throw err;
    }
  }
}
