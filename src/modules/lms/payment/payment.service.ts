import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { Types } from 'mongoose';
import { AuthUser } from '../../../auth/interfaces/auth-user.interface';
import { isDuplicateKeyError } from '../../../common/mongo-errors';
import { CourseRepo } from '../course/repos/course.repo';
import { EnrollmentService } from '../enrollment/enrollment.service';
import { CreatePaymentDto } from './dto/create-payment.dto';
import { PaymentRepo } from './repos/payment.repo';
import { PaymentStatus } from './schemas/payment.schema';

@Injectable()
export class PaymentService {
  private readonly logger = new Logger(PaymentService.name);

  constructor(
    private readonly repo: PaymentRepo,
    private readonly enrollments: EnrollmentService,
    private readonly courses: CourseRepo,
  ) {}

  /** El alumno registra el pago de su matrícula pendiente; monto y moneda salen del curso. */
  async create(actor: AuthUser, dto: CreatePaymentDto) {
    const enrollment = await this.enrollments.getOwned(actor, dto.enrollmentId);
    if (enrollment.status !== 'pending') {
      throw new ConflictException('La matrícula no está pendiente de pago');
    }

    const existing = await this.repo.findPending(actor.tenantId, dto.enrollmentId);
    if (existing) return existing;

    const course = await this.courses.findById(actor.tenantId, String(enrollment.courseId));
    if (!course) throw new NotFoundException('Curso no encontrado');
    if (!course.price || course.price <= 0) throw new BadRequestException('El curso es gratuito');

    try {
      return await this.repo.create({
        tenantId: new Types.ObjectId(actor.tenantId),
        enrollmentId: enrollment._id,
        courseId: course._id,
        learnerId: new Types.ObjectId(actor.userId),
        amount: course.price,
        currency: course.currency,
        status: 'pending',
        paymentMethod: dto.paymentMethod ?? 'bank_transfer',
        externalReference: dto.externalReference,
      });
    } catch (err) {
      if (!isDuplicateKeyError(err)) throw err;
      const winner = await this.repo.findPending(actor.tenantId, dto.enrollmentId);
      if (!winner) throw err;
      return winner;
    }
  }

  listMine(actor: AuthUser) {
    return this.repo.list(actor.tenantId, { learnerId: new Types.ObjectId(actor.userId) }, 200, 0);
  }

  /** Admin: pending → completed y activa la matrícula. */
  async confirm(actor: AuthUser, id: string) {
    const payment = await this.repo.findById(actor.tenantId, id);
    if (!payment) throw new NotFoundException('Pago no encontrado');
    if (payment.status !== 'pending') return this.rejectTransition(payment.status, 'completed');

    // se revisa antes de tocar el pago para no dejarlo completado con la matrícula retirada
    const enrollment = await this.enrollments.get(actor, String(payment.enrollmentId));
    if (enrollment.status !== 'pending') {
      throw new ConflictException(`La matrícula está en estado ${enrollment.status}`);
    }

    const done = await this.repo.transition(actor.tenantId, id, 'pending', {
      status: 'completed',
      completedAt: new Date(),
    });
    if (!done) return this.rejectCurrent(actor, id, 'completed');

    try {
      const activated = await this.enrollments.activate(actor.tenantId, String(payment.enrollmentId), {
        amount: done.amount,
      });
      this.logger.log(`Pago ${id} confirmado (${done.amount} ${done.currency})`);
      return { payment: done, enrollment: activated };
    } catch (err) {
      // la matrícula cambió entre la lectura y la activación (p. ej. retiro): el pago vuelve a pending
      await this.repo.revertCompleted(actor.tenantId, id);
      this.logger.warn(`Pago ${id} devuelto a pending: la matrícula no se pudo activar`);
      throw err;
    }
  }

  async fail(actor: AuthUser, id: string, reason?: string) {
    const done = await this.repo.transition(actor.tenantId, id, 'pending', {
      status: 'failed',
      failedAt: new Date(),
      ...(reason ? { failureReason: reason } : {}),
    });
    if (!done) return this.rejectCurrent(actor, id, 'failed');
    this.logger.log(`Pago ${id} marcado como fallido`);
    return done;
  }

  private async rejectCurrent(actor: AuthUser, id: string, to: PaymentStatus): Promise<never> {
    const current = await this.repo.findById(actor.tenantId, id);
    if (!current) throw new NotFoundException('Pago no encontrado');
    return this.rejectTransition(current.status, to);
  }

  private rejectTransition(from: PaymentStatus, to: PaymentStatus): never {
    throw new ConflictException(`No se puede pasar un pago de ${from} a ${to}`);
  }
}
