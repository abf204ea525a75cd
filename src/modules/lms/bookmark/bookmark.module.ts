import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { EnrollmentModule } from '../enrollment/enrollment.module';
import { LessonModule } from '../lesson/lesson.module';
import { BookmarkController } from './bookmark.controller';
import { BookmarkService } from './bookmark.service';
import { BookmarkRepo } from './repos/bookmark.repo';
import { LmsBookmark, LmsBookmarkSchema } from './schemas/bookmark.schema';

@Module({
  imports: [
    MongooseModule.forFeature([{ name: LmsBookmark.name, schema: LmsBookmarkSchema }]),
    LessonModule,
    EnrollmentModule,
  ],
  controllers: [BookmarkController],
  providers: [BookmarkRepo, BookmarkService],
})
export class BookmarkModule {}
