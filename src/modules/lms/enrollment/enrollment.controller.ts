import { Controller, Get, Param, Post, Query } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { Auth, GetUser, RequireRole } from '../../../auth/decorators';
import { AuthUser } from '../../../auth/interfaces/auth-user.interface';
import { ParseObjectIdPipe } from '../../../common/pipes/parse-object-id.pipe';
import { ListEnrollmentsDto } from './dto/list-enrollments.dto';
import { EnrollmentService } from './enrollment.service';

@ApiTags('Enrollments')
@Auth()
@Controller()
export class EnrollmentController {
  constructor(private readonly service: EnrollmentService) {}

  @ApiOperation({ summary: 'Matricular al usuario actual (idempotente)' })
  @Post('courses/:id/enroll')
  enroll(@GetUser() user: AuthUser, @Param('id', ParseObjectIdPipe) courseId: string) {
    return this.service.enroll(user, courseId);
  }

  @Get('enrollments/me')
  mine(@GetUser() user: AuthUser) {
    return this.service.listMine(user);
  }

  @RequireRole('teacher')
  @Get('enrollments')
  list(@GetUser() user: AuthUser, @Query() query: ListEnrollmentsDto) {
    return this.service.list(user, query);
  }

  @Get('enrollments/:id')
  get(@GetUser() user: AuthUser, @Param('id', ParseObjectIdPipe) id: string) {
    return this.service.get(user, id);
  }

  @ApiOperation({ summary: 'Retirar matrícula (alumno propio o admin)' })
  @Post('enrollments/:id/withdraw')
  withdraw(@GetUser() user: AuthUser, @Param('id', ParseObjectIdPipe) id: string) {
    return this.service.withdraw(user, id);
  }
}
