import { Body, Controller, Delete, Get, Param, Post } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { Auth, GetUser } from '../../../auth/decorators';
import { AuthUser } from '../../../auth/interfaces/auth-user.interface';
import { ParseObjectIdPipe } from '../../../common/pipes/parse-object-id.pipe';
import { BookmarkService } from './bookmark.service';
import { UpsertBookmarkDto } from './dto/upsert-bookmark.dto';

@ApiTags('Bookmarks')
@Auth()
@Controller()
export class BookmarkController {
  constructor(private readonly service: BookmarkService) {}

  @Get('lessons/:id/bookmarks')
  forLesson(@GetUser() user: AuthUser, @Param('id', ParseObjectIdPipe) id: string) {
    return this.service.listForLesson(user, id);
  }

  @Post('lessons/:id/bookmarks')
  upsert(
    @GetUser() user: AuthUser,
    @Param('id', ParseObjectIdPipe) id: string,
    @Body() dto: UpsertBookmarkDto,
  ) {
    return this.service.upsert(user, id, dto);
  }

  @Get('bookmarks')
  mine(@GetUser() user: AuthUser) {
    return this.service.listMine(user);
  }

  @Delete('bookmarks/:id')
  remove(@GetUser() user: AuthUser, @Param('id', ParseObjectIdPipe) id: string) {
    return this.service.remove(user, id);
  }
}
