import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { CourseModuleModule } from '../course-module/course-module.module';
import { CourseModule } from '../course/course.module';
import { EnrollmentModule } from '../enrollment/enrollment.module';
import { LessonModule } from '../lesson/lesson.module';
import { CompletionService } from './completion.service';
import { ProgressController } from './progress.controller';
import { ProgressService } from './progress.service';
import { LessonProgressRepo } from './repos/lesson-progress.repo';
import { LmsLessonProgress, LmsLessonProgressSchema } from './schemas/lesson-progress.schema';

@Module({
  imports: [
    MongooseModule.forFeature([{ name: LmsLessonProgress.name, schema: LmsLessonProgressSchema }]),
    CourseModule,
    CourseModuleModule,
    LessonModule,
    EnrollmentModule,
  ],
  controllers: [ProgressController],
  providers: [LessonProgressRepo, CompletionService, ProgressService],
  exports: [ProgressService],
})
export class ProgressModule {}
