import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { CourseModule } from '../course/course.module';
import { EnrollmentModule } from '../enrollment/enrollment.module';
import { CourseReviewRepo } from './repos/course-review.repo';
import { ReviewController } from './review.controller';
import { ReviewService } from './review.service';
import { LmsCourseReview, LmsCourseReviewSchema } from './schemas/course-review.schema';

@Module({
  imports: [
    MongooseModule.forFeature([{ name: LmsCourseReview.name, schema: LmsCourseReviewSchema }]),
    CourseModule,
    EnrollmentModule,
  ],
  controllers: [ReviewController],
  providers: [CourseReviewRepo, ReviewService],
})
export class ReviewModule {}
