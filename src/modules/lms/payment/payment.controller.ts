import { Body, Controller, Get, HttpCode, Param, Post } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { Auth, GetUser, RequireRole } from '../../../auth/decorators';
import { AuthUser } from '../../../auth/interfaces/auth-user.interface';
import { ParseObjectIdPipe } from '../../../common/pipes/parse-object-id.pipe';
import { CreatePaymentDto } from './dto/create-payment.dto';
import { FailPaymentDto } from './dto/fail-payment.dto';
import { PaymentService } from './payment.service';

@ApiTags('Payments')
@Auth()
@Controller('payments')
export class PaymentController {
  constructor(private readonly service: PaymentService) {}

  @Post()
  create(@GetUser() user: AuthUser, @Body() dto: CreatePaymentDto) {
    return this.service.create(user, dto);
  }

  @Get('me')
  mine(@GetUser() user: AuthUser) {
    return this.service.listMine(user);
  }

  @RequireRole('admin')
  @HttpCode(200)
  @Post(':id/confirm')
  confirm(@GetUser() user: AuthUser, @Param('id', ParseObjectIdPipe) id: string) {
    return this.service.confirm(user, id);
  }

  @RequireRole('admin')
  @HttpCode(200)
  @Post(':id/fail')
  fail(
    @GetUser() user: AuthUser,
    @Param('id', ParseObjectIdPipe) id: string,
    @Body() dto: FailPaymentDto,
  ) {
    return this.service.fail(user, id, dto.reason);
  }
}
