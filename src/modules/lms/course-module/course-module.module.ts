import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { LmsCourseModule, LmsCourseModuleSchema } from './schemas/course-module.schema';
import { CourseModuleService } from './course-module.service';
import { CourseModuleController } from './course-module.controller';
import { CourseModuleRepo } from './repos/course-module.repo';
import { CourseModule } from '../course/course.module';
import { LessonModule } from '../lesson/lesson.module';

@Module({
  imports: [
    MongooseModule.forFeature([{ name: LmsCourseModule.name, schema: LmsCourseModuleSchema }]),
    CourseModule,
    LessonModule,
  ],
  controllers: [CourseModuleController],
  providers: [CourseModuleService, CourseModuleRepo],
  exports: [CourseModuleService, CourseModuleRepo],
})
export class CourseModuleModule {}
