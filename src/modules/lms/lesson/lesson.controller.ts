import { Body, Controller, Delete, Get, Param, Patch } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { Auth, GetUser, RequireRole } from '../../../auth/decorators';
import { AuthUser } from '../../../auth/interfaces/auth-user.interface';
import { ParseObjectIdPipe } from '../../../common/pipes/parse-object-id.pipe';
import { ReorderDto } from '../course-module/dto/reorder.dto';
import { UpdateLessonDto } from './dto/update-lesson.dto';
import { LessonService } from './lesson.service';

/**
 * Lecciones. El alta vive en CourseModuleController
 * (POST /modules/:moduleId/lessons) porque necesita el módulo padre.
 */
@ApiTags('Lessons')
@Auth()
@Controller()
export class LessonController {
  constructor(private readonly lessons: LessonService) {}

  @Get('lessons/:id')
  getOne(@GetUser() user: AuthUser, @Param('id', ParseObjectIdPipe) id: string) {
    return this.lessons.get(user, id);
  }

  @RequireRole('teacher')
  @Patch('lessons/:id')
  update(
    @GetUser() user: AuthUser,
    @Param('id', ParseObjectIdPipe) id: string,
    @Body() dto: UpdateLessonDto,
  ) {
    return this.lessons.update(user, id, dto);
  }

  @RequireRole('teacher')
  @Delete('lessons/:id')
  remove(@GetUser() user: AuthUser, @Param('id', ParseObjectIdPipe) id: string) {
    return this.lessons.remove(user, id);
  }

  /**
   * Reordenar las lecciones de un módulo.
   * Body: { ids: string[] } en el nuevo orden 0..n
   */
  @RequireRole('teacher')
  @ApiOperation({ summary: 'Reordena las lecciones de un módulo' })
  @Patch('modules/:moduleId/lessons/reorder')
  reorder(
    @GetUser() user: AuthUser,
    @Param('moduleId', ParseObjectIdPipe) moduleId: string,
    @Body() body: ReorderDto,
  ) {
    return this.lessons.reorder(user, moduleId, body.ids);
  }
}
