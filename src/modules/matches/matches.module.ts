import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Match } from './match.entity';
import { MatchesService } from './matches.service';
import { MatchesController } from './matches.controller';
import { EventsModule } from '../events/events.module';
import { LeaguesModule } from '../leagues/leagues.module';

@Module({
  imports: [TypeOrmModule.forFeature([Match]), EventsModule, LeaguesModule],
  controllers: [MatchesController],
  providers: [MatchesService],
  exports: [MatchesService],
})
export class MatchesModule {}
