import { BadRequestException, ConflictException, Injectable, NotFoundException } from '@nestjs/common';
import { Types } from 'mongoose';
import { AuthUser } from '../../../auth/interfaces/auth-user.interface';
import { retryOnDuplicateKey } from '../../../common/mongo-errors';
import { CourseRepo } from '../course/repos/course.repo';
import { CreateCourseModuleDto } from './dto/create-course-module.dto';
import { UpdateCourseModuleDto } from './dto/update-course-module.dto';
import { CourseModuleRepo } from './repos/course-module.repo';
import { LmsCourseModule } from './schemas/course-module.schema';

@Injectable()
export class CourseModuleService {
  constructor(
    private readonly repo: CourseModuleRepo,
    private readonly courses: CourseRepo,
  ) {}

  async create(actor: AuthUser, courseId: string, dto: CreateCourseModuleDto) {
    const course = await this.courses.findById(actor.tenantId, courseId);
    if (!course) throw new NotFoundException('Curso no encontrado');
    if (course.status === 'archived') throw new ConflictException('El curso está archivado');

    return retryOnDuplicateKey(async () => {
      const sortIndex = (await this.repo.lastIndex(actor.tenantId, courseId)) + 1;
      return this.repo.create({
        tenantId: new Types.ObjectId(actor.tenantId),
        courseId: course._id,
        title: dto.title.trim(),
        description: dto.description ?? '',
        sortIndex,
      });
    });
  }

  async get(actor: AuthUser, id: string) {
    const m = await this.repo.findById(actor.tenantId, id);
    if (!m) throw new NotFoundException('Módulo no encontrado');
    return m;
  }

  listByCourse(actor: AuthUser, courseId: string) {
    return this.repo.findByCourse(actor.tenantId, courseId);
  }

  async update(actor: AuthUser, id: string, dto: UpdateCourseModuleDto) {
    const set: Partial<LmsCourseModule> = {};
    if (dto.title !== undefined) set.title = dto.title.trim();
    if (dto.description !== undefined) set.description = dto.description;
    const updated = await this.repo.updateById(actor.tenantId, id, set);
    if (!updated) throw new NotFoundException('Módulo no encontrado');
    return updated;
  }

  async remove(actor: AuthUser, id: string) {
    const found = await this.get(actor, id);
    const course = await this.courses.findById(actor.tenantId, String(found.courseId));
    if (course && course.status !== 'draft') {
      throw new ConflictException('Solo se eliminan módulos de cursos en borrador');
    }
    await this.repo.deleteById(actor.tenantId, id);
    return { ok: true };
  }

  async reorder(actor: AuthUser, courseId: string, ids: string[]) {
    const current = await this.repo.findByCourse(actor.tenantId, courseId);
    const known = new Set(current.map((m) => String(m._id)));
    if (ids.length !== known.size || ids.some((id) => !known.has(id))) {
      throw new BadRequestException('La lista debe contener exactamente los módulos del curso');
    }
    await this.repo.bulkReorder(actor.tenantId, courseId, ids);
    return this.repo.findByCourse(actor.tenantId, courseId);
  }
}
