import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { CourseModule } from '../course/course.module';
import { EnrollmentController } from './enrollment.controller';
import { EnrollmentService } from './enrollment.service';
import { EnrollmentRepo } from './repos/enrollment.repo';
import { LmsEnrollment, LmsEnrollmentSchema } from './schemas/enrollment.schema';

@Module({
  imports: [
    MongooseModule.forFeature([{ name: LmsEnrollment.name, schema: LmsEnrollmentSchema }]),
    CourseModule,
  ],
  controllers: [EnrollmentController],
  providers: [EnrollmentRepo, EnrollmentService],
  exports: [EnrollmentService, EnrollmentRepo],
})
export class EnrollmentModule {}
