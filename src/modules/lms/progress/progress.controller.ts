import { Body, Controller, Get, HttpCode, Param, Post } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { Auth, GetUser } from '../../../auth/decorators';
import { AuthUser } from '../../../auth/interfaces/auth-user.interface';
import { ParseObjectIdPipe } from '../../../common/pipes/parse-object-id.pipe';
import { ReportEnrollmentProgressDto, ReportProgressDto } from './dto/report-progress.dto';
import { ProgressService } from './progress.service';

@ApiTags('Progress')
@Auth()
@Controller()
export class ProgressController {
  constructor(private readonly service: ProgressService) {}

  @ApiOperation({ summary: 'Progreso del usuario en el curso' })
  @Get('courses/:courseId/progress')
  course(@GetUser() user: AuthUser, @Param('courseId', ParseObjectIdPipe) courseId: string) {
    return this.service.getCourseProgress(user, courseId);
  }

  @Get('lessons/:id/progress')
  lesson(@GetUser() user: AuthUser, @Param('id', ParseObjectIdPipe) id: string) {
    return this.service.getLessonProgress(user, id);
  }

  @ApiOperation({ summary: 'Reportar avance en una lección' })
  @HttpCode(200)
  @Post('lessons/:id/progress')
  report(
    @GetUser() user: AuthUser,
    @Param('id', ParseObjectIdPipe) id: string,
    @Body() dto: ReportProgressDto,
  ) {
    return this.service.reportForLesson(user, id, dto);
  }

  @HttpCode(200)
  @Post('lessons/:id/complete')
  complete(@GetUser() user: AuthUser, @Param('id', ParseObjectIdPipe) id: string) {
    return this.service.complete(user, id);
  }

  @HttpCode(200)
  @Post('enrollments/:id/progress')
  reportForEnrollment(
    @GetUser() user: AuthUser,
    @Param('id', ParseObjectIdPipe) id: string,
    @Body() dto: ReportEnrollmentProgressDto,
  ) {
    return this.service.reportForEnrollment(user, id, dto);
  }
}
