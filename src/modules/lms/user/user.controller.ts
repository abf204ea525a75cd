import { Body, Controller, Get, Post, Query } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { Auth, GetUser } from '../../../auth/decorators';
import { AuthUser } from '../../../auth/interfaces/auth-user.interface';
import { CreateUserDto } from './dto/create-user.dto';
import { UserService } from './user.service';

@ApiTags('Users')
@Controller('users')
export class UserController {
  constructor(private readonly service: UserService) {}

  @Auth('admin')
  @ApiOperation({ summary: 'Crea un usuario dentro del tenant del admin' })
  @Post()
  create(@GetUser() user: AuthUser, @Body() dto: CreateUserDto) {
    return this.service.create(user.tenantId, dto);
  }

  @Auth('admin')
  @Get()
  list(
    @GetUser() user: AuthUser,
    @Query('limit') limit = 50,
    @Query('skip') skip = 0,
  ) {
    return this.service.list(user.tenantId, Number(limit), Number(skip));
  }

  @Auth()
  @Get('me')
  me(@GetUser() user: AuthUser) {
    return this.service.get(user.tenantId, user.userId);
  }
}
