import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { TournamentEvent } from './event.entity';
import { Stage } from './stage.entity';
import { Participant } from './participant.entity';
import { EventsService } from './events.service';
import { EventsController } from './events.controller';
import { LeagueEventsController } from './league-events.controller';
import { LeaguesModule } from '../leagues/leagues.module';
import { UsersModule } from '../users/users.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([TournamentEvent, Stage, Participant]),
    LeaguesModule,
    UsersModule,
  ],
  controllers: [EventsController, LeagueEventsController],
  providers: [EventsService],
  exports: [EventsService],
})
export class EventsModule {}
