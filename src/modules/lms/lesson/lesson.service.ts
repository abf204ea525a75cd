import { BadRequestException, ConflictException, Injectable, NotFoundException } from '@nestjs/common';
import { Types } from 'mongoose';
import { AuthUser } from '../../../auth/interfaces/auth-user.interface';
import { isStaff } from '../../../auth/roles';
import { retryOnDuplicateKey } from '../../../common/mongo-errors';
import { CourseRepo } from '../course/repos/course.repo';
import { CreateLessonDto } from './dto/create-lesson.dto';
import { UpdateLessonDto } from './dto/update-lesson.dto';
import { LessonRepo } from './repos/lesson.repo';
import { LmsLesson } from './schemas/lesson.schema';

type ParentModule = { _id: Types.ObjectId; courseId: Types.ObjectId };

@Injectable()
export class LessonService {
  constructor(
    private readonly repo: LessonRepo,
    private readonly courses: CourseRepo,
  ) {}

  async create(actor: AuthUser, parent: ParentModule, dto: CreateLessonDto) {
    const course = await this.courses.findById(actor.tenantId, String(parent.courseId));
    if (!course) throw new NotFoundException('Curso no encontrado');
    if (course.status === 'archived') throw new ConflictException('El curso está archivado');

    // sortIndex al final del módulo; si otro alta gana la carrera se recalcula
    return retryOnDuplicateKey(async () => {
      const sortIndex = (await this.repo.lastIndex(actor.tenantId, String(parent._id))) + 1;
      return this.repo.create({
        tenantId: new Types.ObjectId(actor.tenantId),
        courseId: parent.courseId,
        moduleId: parent._id,
        title: dto.title.trim(),
        type: dto.type ?? 'video',
        content: dto.content ?? '',
        ...(dto.videoUrl ? { videoUrl: dto.videoUrl } : {}),
        durationSec: dto.durationSec ?? 0,
        isMandatory: dto.isMandatory ?? true,
        status: dto.status ?? 'draft',
        sortIndex,
      });
    });
  }

  async get(actor: AuthUser, id: string) {
    const one = await this.repo.findById(actor.tenantId, id);
    if (!one) throw new NotFoundException('Lección no encontrada');
    if (!isStaff(actor.role)) {
      const course = await this.courses.findById(actor.tenantId, String(one.courseId));
      if (one.status !== 'published' || course?.status !== 'published') {
        throw new NotFoundException('Lección no encontrada');
      }
    }
    return one;
  }

  /**
   * Rutas del alumno matriculado (progreso, marcadores). El estado del curso
   * no se mira: un curso archivado sigue abierto para sus matrículas.
   */
  async getPublished(tenantId: string, id: string) {
    const one = await this.repo.findById(tenantId, id);
    if (!one || one.status !== 'published') throw new NotFoundException('Lección no encontrada');
    return one;
  }

  listByModule(actor: AuthUser, moduleId: string) {
    return this.repo.findByModule(actor.tenantId, moduleId, !isStaff(actor.role));
  }

  listByCourse(actor: AuthUser, courseId: string) {
    return this.repo.findByCourse(actor.tenantId, courseId, !isStaff(actor.role));
  }

  countByModule(actor: AuthUser, moduleId: string) {
    return this.repo.countByModule(actor.tenantId, moduleId);
  }

  private buildSafePatch(dto: UpdateLessonDto): Partial<LmsLesson> {
    const patch: Partial<LmsLesson> = {};
    if (dto.title !== undefined) patch.title = dto.title.trim();
    if (dto.type !== undefined) patch.type = dto.type;
    if (dto.content !== undefined) patch.content = dto.content;
    if (dto.videoUrl !== undefined) patch.videoUrl = dto.videoUrl;
    if (dto.durationSec !== undefined) patch.durationSec = dto.durationSec;
    if (dto.isMandatory !== undefined) patch.isMandatory = dto.isMandatory;
    if (dto.status !== undefined) patch.status = dto.status;
    // sortIndex solo cambia vía reorder
    return patch;
  }

  async update(actor: AuthUser, id: string, dto: UpdateLessonDto) {
    const upd = await this.repo.updateById(actor.tenantId, id, this.buildSafePatch(dto));
    if (!upd) throw new NotFoundException('Lección no encontrada');
    return upd;
  }

  // Solo en cursos en borrador; en cursos publicados se archiva la lección
  async remove(actor: AuthUser, id: string) {
    const lesson = await this.repo.findById(actor.tenantId, id);
    if (!lesson) throw new NotFoundException('Lección no encontrada');
    const course = await this.courses.findById(actor.tenantId, String(lesson.courseId));
    if (course && course.status !== 'draft') {
      throw new ConflictException('Solo se eliminan lecciones de cursos en borrador; archive la lección');
    }
    await this.repo.deleteById(actor.tenantId, id);
    return { ok: true };
  }

  async reorder(actor: AuthUser, moduleId: string, ids: string[]) {
    const current = await this.repo.findByModule(actor.tenantId, moduleId);
    const known = new Set(current.map((l) => String(l._id)));
    if (ids.length !== known.size || ids.some((id) => !known.has(id))) {
      throw new BadRequestException('La lista debe contener exactamente las lecciones del módulo');
    }
    await this.repo.bulkReorder(actor.tenantId, moduleId, ids);
    return this.repo.findByModule(actor.tenantId, moduleId);
  }
}
