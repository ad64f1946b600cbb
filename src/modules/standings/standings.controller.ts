import { Controller, Get, Param } from '@nestjs/common';
import { ParseRequiredUuidPipe } from '../../common/pipes/parse-required-uuid.pipe';
import { StandingsService } from './standings.service';

@Controller()
export class StandingsController {
  constructor(private readonly standings: StandingsService) {}

  @Get('events/:id/standings')
  event(@Param('id', new ParseRequiredUuidPipe('eventId')) id: string) {
    return this.standings.eventStandings(id);
  }

  // ── participants ─────────────────────────────────────────────────

  @Get('participants/:id/standings')
  participant(
    @Param('id', new ParseRequiredUuidPipe('participantId')) id: string,
  ) {
    return this.standings.participantStandings(id);
  }

  @Get('participants/:id/win-percentage')
  async winPercentage(
    @Param('id', new ParseRequiredUuidPipe('participantId')) id: string,
  ) {
    const matchWinPercentage = await this.standings.matchWinPercentage(id);
    return { participantId: id, matchWinPercentage };
  }

  @Get('participants/:id/opponent-win-percentage')
  async opponentWinPercentage(
    @Param('id', new ParseRequiredUuidPipe('participantId')) id: string,
  ) {
    const opponentMatchWinPercentage =
      await this.standings.opponentMatchWinPercentage(id);
    return { participantId: id, opponentMatchWinPercentage };
  }

  // ── users ────────────────────────────────────────────────────────

  @Get('users/:id/standings')
  user(@Param('id', new ParseRequiredUuidPipe('userId')) id: string) {
    return this.standings.userStandings(id);
  }

  @Get('users/:id/win-percentage')
  async userWinPercentage(
    @Param('id', new ParseRequiredUuidPipe('userId')) id: string,
  ) {
    const matchWinPercentage = await this.standings.userMatchWinPercentage(id);
    return { userId: id, matchWinPercentage };
  }
}
