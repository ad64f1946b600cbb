import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';

import { Match } from './match.entity';
import { CreateMatchDto } from './dto/create-match.dto';
import { ReportResultsDto } from './dto/report-results.dto';
import {
  GameCounts,
  applyResults,
  assertValidGameCounts,
} from './match-resolution';
import { MatchView, toMatchView } from './match.views';
import { EventsService } from '../events/events.service';
import { LeaguesService } from '../leagues/leagues.service';
import { Actor } from '../auth/actor';
import { ClockService } from '../../common/clock/clock.service';
import { InvalidMatchParticipantsError } from '../../common/errors/domain-errors';

@Injectable()
export class MatchesService {
  private readonly logger = new Logger(MatchesService.name);

  constructor(
    private readonly dataSource: DataSource,
    @InjectRepository(Match)
    private readonly matchRepo: Repository<Match>,
    private readonly events: EventsService,
    private readonly leagues: LeaguesService,
    private readonly clock: ClockService,
  ) {}

  async createMatch(
    stageId: string,
    actor: Actor,
    dto: CreateMatchDto,
  ): Promise<MatchView> {
    if (dto.participant1Id === dto.participant2Id) {
      throw new InvalidMatchParticipantsError(
        'A match needs two different participants',
      );
    }

    const stage = await this.events.getStageOrThrow(stageId);
    const event = await this.events.getEventOrThrow(stage.eventId);
    await this.leagues.assertEditable(event.leagueId, actor);

    for (const participantId of [dto.participant1Id, dto.participant2Id]) {
      const participant = await this.events.getParticipantOrThrow(participantId);
      if (participant.eventId !== stage.eventId) {
        throw new InvalidMatchParticipantsError(
          `Participant ${participantId} is not enrolled in event ${stage.eventId}`,
        );
      }
    }

    const saved = await this.matchRepo.save(
      this.matchRepo.create({
        stageId,
        participant1Id: dto.participant1Id,
        participant2Id: dto.participant2Id,
        winnerId: null,
        loserId: null,
        p1Wins: null,
        p2Wins: null,
        draws: null,
        recordedAt: null,
      }),
    );

    this.logger.log(
      `match ${saved.id} created in stage ${stageId}: ${dto.participant1Id} vs ${dto.participant2Id}`,
    );
    return toMatchView(saved);
  }

  /**
   * Records game counts and resolves the winner. Calling it again
   * overwrites every result field. The row stays locked until commit, so
   * concurrent reports serialize and the last one wins.
   */
  async addResults(
    matchId: string,
    actor: Actor,
    dto: ReportResultsDto,
  ): Promise<MatchView> {
    const counts: GameCounts = {
      p1Wins: dto.p1Wins,
      p2Wins: dto.p2Wins,
      draws: dto.draws ?? 0,
    };
    assertValidGameCounts(counts);

    const match = await this.getMatchOrThrow(matchId);
    const stage = await this.events.getStageOrThrow(match.stageId);
    const event = await this.events.getEventOrThrow(stage.eventId);
    await this.leagues.assertEditable(event.leagueId, actor);

    const saved = await this.dataSource.transaction(async (manager) => {
      const repo = manager.getRepository(Match);

      const locked = await repo.findOne({
        where: { id: matchId },
        lock: { mode: 'pessimistic_write' },
      });
      if (!locked) throw this.matchNotFound();

      return repo.save(applyResults(locked, counts, this.clock.now()));
    });

    this.logger.log(
      `match ${matchId} result ${counts.p1Wins}-${counts.p2Wins}-${counts.draws}, winner ${saved.winnerId ?? 'none'}`,
    );
    return toMatchView(saved);
  }

  async getMatch(matchId: string): Promise<MatchView> {
    return toMatchView(await this.getMatchOrThrow(matchId));
  }

  async listMatchesForStage(stageId: string): Promise<MatchView[]> {
    await this.events.getStageOrThrow(stageId);
    const matches = await this.matchRepo.find({
      where: { stageId },
      order: { createdAt: 'ASC' },
    });
    return matches.map(toMatchView);
  }

  async listMatchesForParticipant(participantId: string): Promise<MatchView[]> {
    await this.events.getParticipantOrThrow(participantId);
    const matches = await this.matchRepo.find({
      where: [{ participant1Id: participantId }, { participant2Id: participantId }],
      order: { createdAt: 'ASC' },
    });
    return matches.map(toMatchView);
  }

  private async getMatchOrThrow(matchId: string): Promise<Match> {
    const match = await this.matchRepo.findOne({ where: { id: matchId } });
    if (!match) throw this.matchNotFound();
    return match;
  }

  private matchNotFound() {
    return new NotFoundException({
      statusCode: 404,
      code: 'MATCH_NOT_FOUND',
      message: 'Match not found',
    });
  }
}
