import { Injectable } from '@nestjs/common';
import { DataSource, EntityManager, In } from 'typeorm';

import { Match } from '../matches/match.entity';
import { Participant } from '../events/participant.entity';
import { Stage } from '../events/stage.entity';
import { EventsService } from '../events/events.service';
import { UsersService } from '../users/users.service';
import {
  StandingsRow,
  Tally,
  combineTallies,
  opponentMatchWinPercentage,
  buildStandingsTable,
  tallyFor,
  winPercentage,
  winPercentageOrNull,
} from './standings.engine';

export interface ParticipantStandingsView extends Tally {
  participantId: string;
  eventId: string;
  userId: string;
  matchWinPercentage: number | null;
}

export interface UserStandingsView extends Tally {
  userId: string;
  events: number;
  matchWinPercentage: number | null;
}

export interface EventStandingsRow extends StandingsRow {
  userId: string;
  name: string | null;
}

/**
 * Every read runs in one REPEATABLE READ transaction so all figures of a
 * response come from the same set of matches.
 */
@Injectable()
export class StandingsService {
  constructor(
    private readonly dataSource: DataSource,
    private readonly events: EventsService,
    private readonly users: UsersService,
  ) {}

  async participantStandings(
    participantId: string,
  ): Promise<ParticipantStandingsView> {
    const participant = await this.events.getParticipantOrThrow(participantId);
    const matches = await this.read((manager) =>
      this.participantMatches(manager, [participantId]),
    );

    const tally = tallyFor(matches, participantId);
    return {
      participantId,
      eventId: participant.eventId,
      userId: participant.userId,
      ...tally,
      matchWinPercentage: winPercentageOrNull(tally),
    };
  }

  async matchWinPercentage(participantId: string): Promise<number> {
    await this.events.getParticipantOrThrow(participantId);
    const matches = await this.read((manager) =>
      this.participantMatches(manager, [participantId]),
    );
    return winPercentage(
      tallyFor(matches, participantId),
      `Participant ${participantId}`,
    );
  }

  async opponentMatchWinPercentage(participantId: string): Promise<number> {
    const participant = await this.events.getParticipantOrThrow(participantId);
    // Opponents' records span the whole event, not just the shared matches.
    const matches = await this.read((manager) =>
      this.eventMatches(manager, participant.eventId),
    );
    return opponentMatchWinPercentage(
      matches,
      participantId,
      `Participant ${participantId}`,
    );
  }

  async eventStandings(eventId: string): Promise<EventStandingsRow[]> {
    await this.events.getEventOrThrow(eventId);

    const { participants, matches } = await this.read(async (manager) => ({
      participants: await manager.getRepository(Participant).find({
        where: { eventId },
        relations: ['user'],
      }),
      matches: await this.eventMatches(manager, eventId),
    }));

    const byId = new Map(participants.map((p) => [p.id, p]));
    return buildStandingsTable([...byId.keys()], matches).flatMap((row) => {
      const p = byId.get(row.participantId);
      return p ? [{ ...row, userId: p.userId, name: p.user?.name ?? null }] : [];
    });
  }

  /** Counts summed over every event the user entered. */
  async userStandings(userId: string): Promise<UserStandingsView> {
    await this.users.getByIdOrThrow(userId);

    const { participantIds, matches } = await this.read(async (manager) => {
      const participants = await manager
        .getRepository(Participant)
        .find({ where: { userId } });
      const ids = participants.map((p) => p.id);
      return {
        participantIds: ids,
        matches: await this.participantMatches(manager, ids),
      };
    });

    const tally = combineTallies(
      participantIds.map((id) => tallyFor(matches, id)),
    );
    return {
      userId,
      events: participantIds.length,
      ...tally,
      matchWinPercentage: winPercentageOrNull(tally),
    };
  }

  /** Fails with NoMatchesError when the user has played nothing. */
  async userMatchWinPercentage(userId: string): Promise<number> {
    const standings = await this.userStandings(userId);
    return winPercentage(standings, `User ${userId}`);
  }

  // ── helpers ──────────────────────────────────────────────────────

  private read<T>(work: (manager: EntityManager) => Promise<T>): Promise<T> {
    return this.dataSource.transaction('REPEATABLE READ', work);
  }

  private participantMatches(
    manager: EntityManager,
    participantIds: string[],
  ): Promise<Match[]> {
    if (participantIds.length === 0) return Promise.resolve([]);
    return manager.getRepository(Match).find({
      where: [
        { participant1Id: In(participantIds) },
        { participant2Id: In(participantIds) },
      ],
    });
  }

  private async eventMatches(
    manager: EntityManager,
    eventId: string,
  ): Promise<Match[]> {
    const stages = await manager
      .getRepository(Stage)
      .find({ where: { eventId }, select: { id: true } });
    if (stages.length === 0) return [];

    return manager.getRepository(Match).find({
      where: { stageId: In(stages.map((s) => s.id)) },
    });
  }
}
