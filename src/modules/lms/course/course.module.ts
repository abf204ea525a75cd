import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { LmsCourse, LmsCourseSchema } from './schemas/course.schema';
import { CourseRepo } from './repos/course.repo';
import { CourseService } from './course.service';
import { CourseController } from './course.controller';
import { TenantModule } from '../tenant/tenant.module';

@Module({
  imports: [
    MongooseModule.forFeature([{ name: LmsCourse.name, schema: LmsCourseSchema }]),
    TenantModule,
  ],
  controllers: [CourseController],
  providers: [CourseRepo, CourseService],
  exports: [CourseService, CourseRepo],
})
export class CourseModule {}
