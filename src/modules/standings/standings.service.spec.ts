import { Test, TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { StandingsService } from './standings.service';
import { Match } from '../matches/match.entity';
import { Participant } from '../events/participant.entity';
import { Stage } from '../events/stage.entity';
import { EventsService } from '../events/events.service';
import { UsersService } from '../users/users.service';
import { NoMatchesError } from '../../common/errors/domain-errors';
import { createMockRepo, MockRepo } from '@/test-utils/mock-repo';
import {
  createMockDataSource,
  MockDataSource,
} from '@/test-utils/mock-datasource';
import {
  EVENT_ID,
  USER_ID,
  USER_ID_2,
  fakeEvent,
  fakeMatch,
  fakeParticipant,
  fakeStage,
  fakeUser,
} from '@/test-utils/fixtures';

describe('StandingsService', () => {
  let service: StandingsService;
  let matchRepo: MockRepo<Match>;
  let participantRepo: MockRepo<Participant>;
  let stageRepo: MockRepo<Stage>;
  let dataSource: MockDataSource;
  let events: { getParticipantOrThrow: jest.Mock; getEventOrThrow: jest.Mock };
  let users: { getByIdOrThrow: jest.Mock };

  beforeEach(async () => {
    matchRepo = createMockRepo<Match>();
    participantRepo = createMockRepo<Participant>();
    stageRepo = createMockRepo<Stage>();
    dataSource = createMockDataSource([
      [Match, matchRepo],
      [Participant, participantRepo],
      [Stage, stageRepo],
    ]);
    events = {
      getParticipantOrThrow: jest
        .fn()
        .mockImplementation(async (id: string) => fakeParticipant({ id })),
      getEventOrThrow: jest.fn().mockResolvedValue(fakeEvent()),
    };
    users = {
      getByIdOrThrow: jest.fn().mockResolvedValue(fakeUser()),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        StandingsService,
        { provide: DataSource, useValue: dataSource },
        { provide: EventsService, useValue: events },
        { provide: UsersService, useValue: users },
      ],
    }).compile();

    service = module.get<StandingsService>(StandingsService);
  });

  it('reads participant standings under REPEATABLE READ', async () => {
    matchRepo.find.mockResolvedValue([
      fakeMatch({
        id: 'm1',
        participant1Id: 'p1',
        participant2Id: 'p2',
        winnerId: 'p1',
        loserId: 'p2',
      }),
      fakeMatch({ id: 'm2', participant1Id: 'p3', participant2Id: 'p1' }),
    ]);

    await expect(service.participantStandings('p1')).resolves.toEqual({
      participantId: 'p1',
      eventId: EVENT_ID,
      userId: USER_ID,
      matches: 2,
      won: 1,
      lost: 0,
      matchWinPercentage: 0.5,
    });
    expect(dataSource.transaction).toHaveBeenCalledWith(
      'REPEATABLE READ',
      expect.any(Function),
    );
  });

  it('fails the win percentage of a participant without matches', async () => {
    matchRepo.find.mockResolvedValue([]);

    await expect(service.matchWinPercentage('p1')).rejects.toBeInstanceOf(
      NoMatchesError,
    );
  });

  it('computes the opponent percentage over the whole event', async () => {
    stageRepo.find.mockResolvedValue([fakeStage({ id: 's1' })]);
    matchRepo.find.mockResolvedValue([
      fakeMatch({
        id: 'm1',
        participant1Id: 'p1',
        participant2Id: 'p2',
        winnerId: 'p1',
        loserId: 'p2',
      }),
      fakeMatch({
        id: 'm2',
        participant1Id: 'p2',
        participant2Id: 'p3',
        winnerId: 'p2',
        loserId: 'p3',
      }),
    ]);

    await expect(service.opponentMatchWinPercentage('p1')).resolves.toBe(1);
  });

  it('builds the event table with user names', async () => {
    participantRepo.find.mockResolvedValue([
      fakeParticipant({
        id: 'p1',
        userId: USER_ID,
        user: fakeUser({ id: USER_ID, name: 'alice' }),
      }),
      fakeParticipant({
        id: 'p2',
        userId: USER_ID_2,
        user: fakeUser({ id: USER_ID_2, name: 'bob' }),
      }),
    ]);
    stageRepo.find.mockResolvedValue([fakeStage({ id: 's1' })]);
    matchRepo.find.mockResolvedValue([
      fakeMatch({
        participant1Id: 'p1',
        participant2Id: 'p2',
        winnerId: 'p2',
        loserId: 'p1',
      }),
    ]);

    await expect(service.eventStandings(EVENT_ID)).resolves.toEqual([
      {
        participantId: 'p2',
        userId: USER_ID_2,
        name: 'bob',
        matches: 1,
        won: 1,
        lost: 0,
        winPercentage: 1,
      },
      {
        participantId: 'p1',
        userId: USER_ID,
        name: 'alice',
        matches: 1,
        won: 0,
        lost: 1,
        winPercentage: 0,
      },
    ]);
  });

  it('skips the match query for an event without stages', async () => {
    participantRepo.find.mockResolvedValue([fakeParticipant({ id: 'p1' })]);
    stageRepo.find.mockResolvedValue([]);

    const rows = await service.eventStandings(EVENT_ID);

    expect(rows).toEqual([
      {
        participantId: 'p1',
        userId: USER_ID,
        name: null,
        matches: 0,
        won: 0,
        lost: 0,
        winPercentage: null,
      },
    ]);
    expect(matchRepo.find).not.toHaveBeenCalled();
  });

  describe('user aggregates', () => {
    it('sums over every event the user entered', async () => {
      participantRepo.find.mockResolvedValue([
        fakeParticipant({ id: 'p1', eventId: 'e1' }),
        fakeParticipant({ id: 'p9', eventId: 'e2' }),
      ]);
      matchRepo.find.mockResolvedValue([
        fakeMatch({
          participant1Id: 'p1',
          participant2Id: 'x',
          winnerId: 'p1',
          loserId: 'x',
        }),
        fakeMatch({
          participant1Id: 'y',
          participant2Id: 'p9',
          winnerId: 'y',
          loserId: 'p9',
        }),
        fakeMatch({
          participant1Id: 'p9',
          participant2Id: 'z',
          winnerId: 'p9',
          loserId: 'z',
        }),
      ]);

      await expect(service.userStandings(USER_ID)).resolves.toEqual({
        userId: USER_ID,
        events: 2,
        matches: 3,
        won: 2,
        lost: 1,
        matchWinPercentage: 2 / 3,
      });
    });

    it('fails the win percentage of a user who never played', async () => {
      participantRepo.find.mockResolvedValue([]);

      await expect(
        service.userMatchWinPercentage(USER_ID),
      ).rejects.toThrow(`User ${USER_ID} has no recorded matches`);
      expect(matchRepo.find).not.toHaveBeenCalled();
    });
  });
});
