import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { FilterQuery, Types } from 'mongoose';
import { AuthUser } from '../../../auth/interfaces/auth-user.interface';
import { hasAtLeast, isStaff } from '../../../auth/roles';
import { isDuplicateKeyError } from '../../../common/mongo-errors';
import { isFreeCourse } from '../course/course.service';
import { CourseRepo } from '../course/repos/course.repo';
import { ListEnrollmentsDto } from './dto/list-enrollments.dto';
import { EnrollmentStatus, sourcesOf } from './enrollment-status';
import { EnrollmentRepo } from './repos/enrollment.repo';
import { LmsEnrollment } from './schemas/enrollment.schema';

@Injectable()
export class EnrollmentService {
  private readonly logger = new Logger(EnrollmentService.name);

  constructor(
    private readonly repo: EnrollmentRepo,
    private readonly courses: CourseRepo,
  ) {}

  /**
   * Matricula al usuario actual. Cursos gratis quedan activos,
   * los de pago quedan pendientes hasta confirmar el pago.
   * Si ya tiene una matrícula abierta se devuelve esa.
   */
  async enroll(actor: AuthUser, courseId: string) {
    const course = await this.courses.findById(actor.tenantId, courseId);
    if (!course) throw new NotFoundException('Curso no encontrado');
    if (course.status !== 'published') {
      throw new BadRequestException('El curso no está publicado');
    }

    const existing = await this.repo.findOpen(actor.tenantId, actor.userId, courseId);
    if (existing) return existing;

    if (course.maxStudents && (await this.repo.countOpen(actor.tenantId, courseId)) >= course.maxStudents) {
      throw new BadRequestException('El curso alcanzó el cupo máximo de alumnos');
    }

    const free = isFreeCourse(course);
    try {
      const enrollment = await this.repo.create({
        tenantId: new Types.ObjectId(actor.tenantId),
        courseId: course._id,
        learnerId: new Types.ObjectId(actor.userId),
        status: free ? 'active' : 'pending',
        open: true,
        ...(free ? { activatedAt: new Date() } : {}),
      });
      this.logger.log(`Matrícula ${enrollment._id} creada (${enrollment.status}) en curso ${courseId}`);
      return enrollment;
    } catch (err) {
      // otro request creó la matrícula abierta en paralelo
      if (!isDuplicateKeyError(err)) throw err;
      const winner = await this.repo.findOpen(actor.tenantId, actor.userId, courseId);
      if (!winner) throw err;
      return winner;
    }
  }

  /** Staff ve cualquiera del tenant; el alumno solo las suyas. */
  async get(actor: AuthUser, id: string) {
    const e = await this.repo.findById(actor.tenantId, id);
    if (!e || (!isStaff(actor.role) && String(e.learnerId) !== actor.userId)) {
      throw new NotFoundException('Matrícula no encontrada');
    }
    return e;
  }

  // Para registrar progreso o pagar la matrícula tiene que ser del propio usuario
  async getOwned(actor: AuthUser, id: string) {
    const e = await this.repo.findById(actor.tenantId, id);
    if (!e || String(e.learnerId) !== actor.userId) {
      throw new NotFoundException('Matrícula no encontrada');
    }
    return e;
  }

  findLatestForCourse(actor: AuthUser, courseId: string, excludeWithdrawn = false) {
    return this.repo.findLatest(actor.tenantId, actor.userId, courseId, excludeWithdrawn);
  }

  listMine(actor: AuthUser, status?: EnrollmentStatus) {
    const filter: FilterQuery<LmsEnrollment> = { learnerId: new Types.ObjectId(actor.userId) };
    if (status) filter.status = status;
    return this.repo.list(actor.tenantId, filter, 200, 0);
  }

  list(actor: AuthUser, params: ListEnrollmentsDto) {
    const filter: FilterQuery<LmsEnrollment> = {};
    if (params.courseId) filter.courseId = new Types.ObjectId(params.courseId);
    if (params.learnerId) filter.learnerId = new Types.ObjectId(params.learnerId);
    if (params.status) filter.status = params.status;
    return this.repo.list(actor.tenantId, filter, params.limit ?? 50, params.skip ?? 0);
  }

  async withdraw(actor: AuthUser, id: string) {
    const current = await this.repo.findById(actor.tenantId, id);
    const isAdmin = hasAtLeast(actor.role, 'admin');
    if (!current || (!isAdmin && String(current.learnerId) !== actor.userId)) {
      throw new NotFoundException('Matrícula no encontrada');
    }

    const e = await this.repo.transition(actor.tenantId, id, sourcesOf('withdrawn'), {
      status: 'withdrawn',
      open: false,
      withdrawnAt: new Date(),
      withdrawnBy: String(current.learnerId) === actor.userId ? 'learner' : 'admin',
    });
    if (!e) return this.rejectTransition(actor.tenantId, id, 'withdrawn');
    this.logger.log(`Matrícula ${id} retirada por ${e.withdrawnBy}`);
    return e;
  }

  /** pending → active tras confirmar el pago. */
  async activate(tenantId: string, id: string, payment: { amount: number }) {
    const e = await this.repo.transition(tenantId, id, sourcesOf('active'), {
      status: 'active',
      activatedAt: new Date(),
      isPaid: true,
      paymentAmount: payment.amount,
    });
    if (!e) return this.rejectTransition(tenantId, id, 'active');
    this.logger.log(`Matrícula ${id} activada`);
    return e;
  }

  private async rejectTransition(tenantId: string, id: string, to: EnrollmentStatus): Promise<never> {
    const current = await this.repo.findById(tenantId, id);
    if (!current) throw new NotFoundException('Matrícula no encontrada');
    throw new ConflictException(`No se puede pasar de ${current.status} a ${to}`);
  }
}

export function assertActive(e: Pick<LmsEnrollment, 'status'>) {
  if (e.status !== 'active') {
    throw new ConflictException(`La matrícula está en estado ${e.status}`);
  }
}
