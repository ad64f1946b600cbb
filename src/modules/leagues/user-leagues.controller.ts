import { Controller, Get, Param } from '@nestjs/common';
import { ParseRequiredUuidPipe } from '../../common/pipes/parse-required-uuid.pipe';
import { LeaguesService } from './leagues.service';

@Controller('users/:userId/leagues')
export class UserLeaguesController {
  constructor(private readonly leaguesService: LeaguesService) {}

  @Get()
  list(@Param('userId', new ParseRequiredUuidPipe('userId')) userId: string) {
    return this.leaguesService.listLeaguesForUser(userId);
  }
}
