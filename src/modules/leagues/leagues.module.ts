import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { League } from './league.entity';
import { LeagueMembership } from './league-membership.entity';
import { LeaguePost } from './league-post.entity';
import { TournamentEvent } from '../events/event.entity';
import { Stage } from '../events/stage.entity';
import { LeaguesService } from './leagues.service';
import { LeaguesController } from './leagues.controller';
import { UserLeaguesController } from './user-leagues.controller';
import { UsersModule } from '../users/users.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      League,
      LeagueMembership,
      LeaguePost,
      TournamentEvent,
      Stage,
    ]),
    UsersModule,
  ],
  controllers: [LeaguesController, UserLeaguesController],
  providers: [LeaguesService],
  exports: [LeaguesService],
})
export class LeaguesModule {}
