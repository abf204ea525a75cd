import { Module } from '@nestjs/common';
import { TenantModule } from './tenant/tenant.module';
import { UserModule } from './user/user.module';
import { CourseModule } from './course/course.module';
import { CourseModuleModule } from './course-module/course-module.module';
import { LessonModule } from './lesson/lesson.module';
import { EnrollmentModule } from './enrollment/enrollment.module';
import { ProgressModule } from './progress/progress.module';
import { PaymentModule } from './payment/payment.module';
import { BookmarkModule } from './bookmark/bookmark.module';
import { ReviewModule } from './review/review.module';

@Module({
  imports: [
    TenantModule,
    UserModule,
    CourseModule,
    CourseModuleModule,
    LessonModule,
    EnrollmentModule,
    ProgressModule,
    PaymentModule,
    BookmarkModule,
    ReviewModule,
  ],
})
export class LmsModule {}
