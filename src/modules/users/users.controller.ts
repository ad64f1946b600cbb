import { Controller, Get, Param } from '@nestjs/common';
import { ParseRequiredUuidPipe } from '../../common/pipes/parse-required-uuid.pipe';
import { UsersService } from './users.service';

@Controller('users')
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  @Get(':id')
  profile(@Param('id', new ParseRequiredUuidPipe('userId')) id: string) {
    return this.usersService.getProfile(id);
  }
}
