import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { LmsLesson, LmsLessonSchema } from './schemas/lesson.schema';
import { LessonService } from './lesson.service';
import { LessonController } from './lesson.controller';
import { LessonRepo } from './repos/lesson.repo';
import { CourseModule } from '../course/course.module';

@Module({
  imports: [
    MongooseModule.forFeature([{ name: LmsLesson.name, schema: LmsLessonSchema }]),
    CourseModule,
  ],
  controllers: [LessonController],
  providers: [LessonService, LessonRepo],
  exports: [LessonService, LessonRepo],
})
export class LessonModule {}
