import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { CourseModule } from '../course/course.module';
import { EnrollmentModule } from '../enrollment/enrollment.module';
import { PaymentController } from './payment.controller';
import { PaymentService } from './payment.service';
import { PaymentRepo } from './repos/payment.repo';
import { LmsPayment, LmsPaymentSchema } from './schemas/payment.schema';

@Module({
  imports: [
    MongooseModule.forFeature([{ name: LmsPayment.name, schema: LmsPaymentSchema }]),
    CourseModule,
    EnrollmentModule,
  ],
  controllers: [PaymentController],
  providers: [PaymentRepo, PaymentService],
})
export class PaymentModule {}
