import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { FilterQuery, Types } from 'mongoose';
import { AuthUser } from '../../../auth/interfaces/auth-user.interface';
import { isStaff } from '../../../auth/roles';
import { TenantRepo } from '../tenant/repos/tenant.repo';
import { CreateCourseDto } from './dto/create-course.dto';
import { ListCoursesDto } from './dto/list-courses.dto';
import { UpdateCourseDto } from './dto/update-course.dto';
import { CourseRepo } from './repos/course.repo';
import { LmsCourse } from './schemas/course.schema';

export function simpleSlug(input: string) {
  return input
    .toLowerCase()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/(^-|-$)+/g, '');
}

const escapeRegex = (v: string) => v.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

export function isFreeCourse(course: Pick<LmsCourse, 'price'>) {
  return !course.price || course.price <= 0;
}

@Injectable()
export class CourseService {
  private readonly logger = new Logger(CourseService.name);

  constructor(
    private readonly repo: CourseRepo,
    private readonly tenants: TenantRepo,
  ) {}

  async create(actor: AuthUser, dto: CreateCourseDto) {
    const tenant = await this.tenants.findById(actor.tenantId);
    if (!tenant) throw new NotFoundException('Tenant no encontrado');
    if ((await this.repo.countActive(actor.tenantId)) >= tenant.maxCourses) {
      throw new BadRequestException(`El plan del tenant permite como máximo ${tenant.maxCourses} cursos`);
    }

    const slugBase = simpleSlug(dto.title);
    if (!slugBase) throw new BadRequestException('Título inválido');

    // slug único dentro del tenant
    let slug = slugBase;
    let i = 1;
    while (await this.repo.slugTaken(actor.tenantId, slug)) slug = `${slugBase}-${i++}`;

    return this.repo.create({
      tenantId: new Types.ObjectId(actor.tenantId),
      instructorId: new Types.ObjectId(actor.userId),
      title: dto.title.trim(),
      slug,
      category: dto.category?.trim(),
      description: dto.description ?? '',
      price: dto.price ?? 0,
      currency: dto.currency ?? 'USD',
      ...(dto.maxStudents ? { maxStudents: dto.maxStudents } : {}),
      status: 'draft',
    });
  }

  async findById(actor: AuthUser, id: string) {
    const course = await this.repo.findById(actor.tenantId, id);
    // los estudiantes solo ven cursos publicados
    if (!course || (!isStaff(actor.role) && course.status !== 'published')) {
      throw new NotFoundException('Curso no encontrado');
    }
    return course;
  }

  list(actor: AuthUser, params: ListCoursesDto) {
    const filter: FilterQuery<LmsCourse> = {};
    if (!isStaff(actor.role)) filter.status = 'published';
    else if (params.status) filter.status = params.status;
    if (params.q) {
      const rx = new RegExp(escapeRegex(params.q), 'i');
      filter.$or = [{ title: rx }, { category: rx }, { description: rx }];
    }
    return this.repo.list(actor.tenantId, filter, params.limit ?? 50, params.skip ?? 0);
  }

  async update(actor: AuthUser, id: string, dto: UpdateCourseDto) {
    const current = await this.repo.findById(actor.tenantId, id);
    if (!current) throw new NotFoundException('Curso no encontrado');
    if (current.status === 'archived') throw new ConflictException('El curso está archivado');

    const upd: Partial<LmsCourse> = {};
    if (dto.title) upd.title = dto.title.trim();
    if (typeof dto.category === 'string') upd.category = dto.category.trim();
    if (typeof dto.description === 'string') upd.description = dto.description;
    if (typeof dto.price === 'number') upd.price = dto.price;
    if (dto.currency) upd.currency = dto.currency.toUpperCase();
    if (typeof dto.maxStudents === 'number') upd.maxStudents = dto.maxStudents;

    const course = await this.repo.updateById(actor.tenantId, id, { $set: upd });
    if (!course) throw new NotFoundException('Curso no encontrado');
    return course;
  }

  async publish(actor: AuthUser, id: string) {
    const course = await this.repo.transition(actor.tenantId, id, ['draft'], {
      status: 'published',
      publishedAt: new Date(),
    });
    if (course) {
      this.logger.log(`Curso ${id} publicado`);
      return course;
    }
    return this.rejectTransition(actor, id, 'publicar');
  }

  async archive(actor: AuthUser, id: string) {
    const course = await this.repo.transition(actor.tenantId, id, ['draft', 'published'], {
      status: 'archived',
    });
    if (course) {
      this.logger.log(`Curso ${id} archivado`);
      return course;
    }
    return this.rejectTransition(actor, id, 'archivar');
  }

  private async rejectTransition(actor: AuthUser, id: string, action: string): Promise<never> {
    const current = await this.repo.findById(actor.tenantId, id);
    if (!current) throw new NotFoundException('Curso no encontrado');
    throw new ConflictException(`No se puede ${action} un curso en estado ${current.status}`);
  }
}
