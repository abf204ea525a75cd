import { Body, Controller, Get, Param, Patch, Post, Query } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { Auth, GetUser, RequireRole } from '../../../auth/decorators';
import { AuthUser } from '../../../auth/interfaces/auth-user.interface';
import { ParseObjectIdPipe } from '../../../common/pipes/parse-object-id.pipe';
import { CourseService } from './course.service';
import { CreateCourseDto } from './dto/create-course.dto';
import { ListCoursesDto } from './dto/list-courses.dto';
import { UpdateCourseDto } from './dto/update-course.dto';

@ApiTags('Courses')
@Auth()
@Controller('courses')
export class CourseController {
  constructor(private readonly service: CourseService) {}

  @RequireRole('teacher')
  @Post()
  create(@GetUser() user: AuthUser, @Body() dto: CreateCourseDto) {
    return this.service.create(user, dto);
  }

  @Get()
  list(@GetUser() user: AuthUser, @Query() query: ListCoursesDto) {
    return this.service.list(user, query);
  }

  @Get(':id')
  find(@GetUser() user: AuthUser, @Param('id', ParseObjectIdPipe) id: string) {
    return this.service.findById(user, id);
  }

  @RequireRole('teacher')
  @Patch(':id')
  update(
    @GetUser() user: AuthUser,
    @Param('id', ParseObjectIdPipe) id: string,
    @Body() dto: UpdateCourseDto,
  ) {
    return this.service.update(user, id, dto);
  }

  @RequireRole('teacher')
  @ApiOperation({ summary: 'draft → published' })
  @Post(':id/publish')
  publish(@GetUser() user: AuthUser, @Param('id', ParseObjectIdPipe) id: string) {
    return this.service.publish(user, id);
  }

  @RequireRole('teacher')
  @ApiOperation({ summary: 'draft | published → archived' })
  @Post(':id/archive')
  archive(@GetUser() user: AuthUser, @Param('id', ParseObjectIdPipe) id: string) {
    return this.service.archive(user, id);
  }
}
