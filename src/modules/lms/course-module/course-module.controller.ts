import { Body, ConflictException, Controller, Delete, Get, Param, Patch, Post } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { Auth, GetUser, RequireRole } from '../../../auth/decorators';
import { AuthUser } from '../../../auth/interfaces/auth-user.interface';
import { ParseObjectIdPipe } from '../../../common/pipes/parse-object-id.pipe';
import { CourseService } from '../course/course.service';
import { CreateLessonDto } from '../lesson/dto/create-lesson.dto';
import { LessonService } from '../lesson/lesson.service';
import { CourseModuleService } from './course-module.service';
import { CreateCourseModuleDto } from './dto/create-course-module.dto';
import { ReorderDto } from './dto/reorder.dto';
import { UpdateCourseModuleDto } from './dto/update-course-module.dto';

@ApiTags('Modules')
@Auth()
@Controller()
export class CourseModuleController {
  constructor(
    private readonly modules: CourseModuleService,
    private readonly lessons: LessonService,
    private readonly courses: CourseService,
  ) {}

  @RequireRole('teacher')
  @Post('courses/:courseId/modules')
  create(
    @GetUser() user: AuthUser,
    @Param('courseId', ParseObjectIdPipe) courseId: string,
    @Body() dto: CreateCourseModuleDto,
  ) {
    return this.modules.create(user, courseId, dto);
  }

  @Get('courses/:courseId/modules')
  async list(@GetUser() user: AuthUser, @Param('courseId', ParseObjectIdPipe) courseId: string) {
    await this.courses.findById(user, courseId);
    return this.modules.listByCourse(user, courseId);
  }

  @RequireRole('teacher')
  @Patch('courses/:courseId/modules/reorder')
  reorder(
    @GetUser() user: AuthUser,
    @Param('courseId', ParseObjectIdPipe) courseId: string,
    @Body() body: ReorderDto,
  ) {
    return this.modules.reorder(user, courseId, body.ids);
  }

  @RequireRole('teacher')
  @Patch('modules/:id')
  update(
    @GetUser() user: AuthUser,
    @Param('id', ParseObjectIdPipe) id: string,
    @Body() dto: UpdateCourseModuleDto,
  ) {
    return this.modules.update(user, id, dto);
  }

  // Eliminar (bloquea si tiene lecciones)
  @RequireRole('teacher')
  @Delete('modules/:id')
  async remove(@GetUser() user: AuthUser, @Param('id', ParseObjectIdPipe) id: string) {
    const hasLessons = await this.lessons.countByModule(user, id);
    if (hasLessons > 0) {
      throw new ConflictException('No se puede eliminar: el módulo tiene lecciones');
    }
    return this.modules.remove(user, id);
  }

  @RequireRole('teacher')
  @Post('modules/:moduleId/lessons')
  async createLesson(
    @GetUser() user: AuthUser,
    @Param('moduleId', ParseObjectIdPipe) moduleId: string,
    @Body() dto: CreateLessonDto,
  ) {
    const parent = await this.modules.get(user, moduleId);
    return this.lessons.create(user, parent, dto);
  }

  @Get('modules/:moduleId/lessons')
  async listLessons(@GetUser() user: AuthUser, @Param('moduleId', ParseObjectIdPipe) moduleId: string) {
    const parent = await this.modules.get(user, moduleId);
    await this.courses.findById(user, String(parent.courseId));
    return this.lessons.listByModule(user, moduleId);
  }

  // Curriculum completo: módulos + lecciones
  @ApiOperation({ summary: 'Módulos del curso con sus lecciones y totales' })
  @Get('courses/:courseId/curriculum')
  async curriculum(@GetUser() user: AuthUser, @Param('courseId', ParseObjectIdPipe) courseId: string) {
    const course = await this.courses.findById(user, courseId);
    const modules = await this.modules.listByCourse(user, courseId);
    const lessons = await this.lessons.listByCourse(user, courseId);
    return buildCurriculum(course, modules, lessons);
  }
}

type CurriculumModule = { _id: unknown; sortIndex: number };
type CurriculumLesson = { moduleId: unknown; sortIndex: number };

// totalLessons del curso = suma de totalLessons de sus módulos
export function buildCurriculum<C extends { _id: unknown }, M extends CurriculumModule, L extends CurriculumLesson>(
  course: C,
  modules: M[],
  lessons: L[],
) {
  const byModule = new Map<string, L[]>();
  for (const l of lessons) {
    const key = String(l.moduleId);
    const list = byModule.get(key) ?? [];
    list.push(l);
    byModule.set(key, list);
  }
  const items = [...modules]
    .sort((a, b) => a.sortIndex - b.sortIndex)
    .map((m) => {
      const own = (byModule.get(String(m._id)) ?? []).sort((a, b) => a.sortIndex - b.sortIndex);
      return { ...m, totalLessons: own.length, lessons: own };
    });
  return {
    courseId: String(course._id),
    totalModules: items.length,
    totalLessons: items.reduce((acc, m) => acc + m.totalLessons, 0),
    modules: items,
  };
}
