import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { ForbiddenException, NotFoundException } from '@nestjs/common';
import { EventsService } from './events.service';
import { TournamentEvent } from './event.entity';
import { Stage } from './stage.entity';
import { Participant } from './participant.entity';
import { LeaguesService } from '../leagues/leagues.service';
import { UsersService } from '../users/users.service';
import { ClockService } from '../../common/clock/clock.service';
import { AuthenticatedActor } from '../auth/actor';
import {
  DuplicateParticipantError,
  EmptyCollectionError,
  InvalidStageDatesError,
} from '../../common/errors/domain-errors';
import { createMockRepo, MockRepo } from '@/test-utils/mock-repo';
import {
  createMockDataSource,
  MockDataSource,
} from '@/test-utils/mock-datasource';
import {
  EVENT_ID,
  LEAGUE_ID,
  USER_ID,
  USER_ID_2,
  fakeEvent,
  fakeParticipant,
  fakeStage,
  fakeUser,
} from '@/test-utils/fixtures';

const editor: AuthenticatedActor = {
  kind: 'user',
  userId: USER_ID,
  email: 'alice@example.com',
  isAdmin: false,
};

describe('EventsService', () => {
  let service: EventsService;
  let eventRepo: MockRepo<TournamentEvent>;
  let stageRepo: MockRepo<Stage>;
  let participantRepo: MockRepo<Participant>;
  let dataSource: MockDataSource;
  let leagues: { assertEditable: jest.Mock; assertMemberOrEditor: jest.Mock };
  let users: { getByIdOrThrow: jest.Mock };

  beforeEach(async () => {
    eventRepo = createMockRepo<TournamentEvent>();
    stageRepo = createMockRepo<Stage>();
    participantRepo = createMockRepo<Participant>();
    dataSource = createMockDataSource([[Participant, participantRepo]]);
    leagues = {
      assertEditable: jest.fn().mockResolvedValue(undefined),
      assertMemberOrEditor: jest.fn().mockResolvedValue(undefined),
    };
    users = {
      getByIdOrThrow: jest
        .fn()
        .mockImplementation(async (id: string) =>
          fakeUser({ id, name: id === USER_ID ? 'alice' : 'bob' }),
        ),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        EventsService,
        { provide: DataSource, useValue: dataSource },
        { provide: getRepositoryToken(TournamentEvent), useValue: eventRepo },
        { provide: getRepositoryToken(Stage), useValue: stageRepo },
        { provide: getRepositoryToken(Participant), useValue: participantRepo },
        { provide: LeaguesService, useValue: leagues },
        { provide: UsersService, useValue: users },
        { provide: ClockService, useValue: { today: () => '2024-03-05' } },
      ],
    }).compile();

    service = module.get<EventsService>(EventsService);
  });

  describe('createEvent', () => {
    it('creates an unscheduled event for an editor', async () => {
      eventRepo.save.mockImplementation(async (e: Partial<TournamentEvent>) =>
        fakeEvent({ ...e, id: EVENT_ID }),
      );

      const view = await service.createEvent(LEAGUE_ID, editor, {
        name: ' Spring Open ',
      });

      expect(leagues.assertEditable).toHaveBeenCalledWith(LEAGUE_ID, editor);
      expect(view).toEqual({
        id: EVENT_ID,
        name: 'Spring Open',
        leagueId: LEAGUE_ID,
        startDate: null,
        endDate: null,
        isPast: false,
        isUpcoming: false,
        inProgress: false,
      });
    });

    it('stops before writing when the caller may not edit', async () => {
      leagues.assertEditable.mockRejectedValue(new ForbiddenException());

      await expect(
        service.createEvent(LEAGUE_ID, editor, { name: 'x' }),
      ).rejects.toBeInstanceOf(ForbiddenException);
      expect(eventRepo.save).not.toHaveBeenCalled();
    });
  });

  describe('dates', () => {
    beforeEach(() => {
      eventRepo.findOne.mockResolvedValue(fakeEvent());
    });

    it('reports the range and flags of a running event', async () => {
      stageRepo.find.mockResolvedValue([
        fakeStage({ startDate: '2024-03-01', endDate: '2024-03-03' }),
        fakeStage({ startDate: '2024-03-04', endDate: '2024-03-09' }),
      ]);

      await expect(service.getEvent(EVENT_ID)).resolves.toMatchObject({
        startDate: '2024-03-01',
        endDate: '2024-03-09',
        isPast: false,
        isUpcoming: false,
        inProgress: true,
      });
      await expect(service.inProgress(EVENT_ID)).resolves.toBe(true);
    });

    it('fails the date queries for an event without stages', async () => {
      stageRepo.find.mockResolvedValue([]);

      await expect(service.getStartDate(EVENT_ID)).rejects.toBeInstanceOf(
        EmptyCollectionError,
      );
      await expect(service.isUpcoming(EVENT_ID)).rejects.toBeInstanceOf(
        EmptyCollectionError,
      );
    });

    it('throws EVENT_NOT_FOUND for an unknown event', async () => {
      eventRepo.findOne.mockResolvedValue(null);

      const err = await service.getEndDate(EVENT_ID).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(NotFoundException);
      expect(err).toMatchObject({ response: { code: 'EVENT_NOT_FOUND' } });
    });
  });

  describe('addStage', () => {
    it('rejects a stage that ends before it starts', async () => {
      await expect(
        service.addStage(EVENT_ID, editor, {
          startDate: '2024-03-10',
          endDate: '2024-03-09',
        }),
      ).rejects.toBeInstanceOf(InvalidStageDatesError);
      expect(eventRepo.findOne).not.toHaveBeenCalled();
    });

    it('saves a stage once the league editor is confirmed', async () => {
      eventRepo.findOne.mockResolvedValue(fakeEvent());
      stageRepo.save.mockImplementation(async (s: Partial<Stage>) =>
        fakeStage({ ...s, id: 'stage-9' }),
      );

      const view = await service.addStage(EVENT_ID, editor, {
        startDate: '2024-04-01',
        endDate: '2024-04-01',
      });

      expect(leagues.assertEditable).toHaveBeenCalledWith(LEAGUE_ID, editor);
      expect(view).toEqual({
        id: 'stage-9',
        eventId: EVENT_ID,
        startDate: '2024-04-01',
        endDate: '2024-04-01',
      });
    });
  });

  describe('addParticipant', () => {
    beforeEach(() => {
      eventRepo.findOne.mockResolvedValue(fakeEvent());
    });

    it('lets a league member enroll themself', async () => {
      participantRepo.findOne.mockResolvedValue(null);
      participantRepo.save.mockImplementation(async (p: Partial<Participant>) =>
        fakeParticipant({ ...p, id: 'participant-9' }),
      );

      const view = await service.addParticipant(EVENT_ID, editor);

      expect(leagues.assertMemberOrEditor).toHaveBeenCalledWith(
        LEAGUE_ID,
        editor,
      );
      expect(leagues.assertEditable).not.toHaveBeenCalled();
      expect(view).toEqual({
        id: 'participant-9',
        eventId: EVENT_ID,
        userId: USER_ID,
        name: 'alice',
      });
    });

    it('needs an editor to enroll someone else', async () => {
      participantRepo.findOne.mockResolvedValue(null);
      participantRepo.save.mockImplementation(async (p: Partial<Participant>) =>
        fakeParticipant({ ...p, id: 'participant-9' }),
      );

      const view = await service.addParticipant(EVENT_ID, editor, USER_ID_2);

      expect(leagues.assertEditable).toHaveBeenCalledWith(LEAGUE_ID, editor);
      expect(view.userId).toBe(USER_ID_2);
      expect(view.name).toBe('bob');
    });

    it('rejects a second enrollment', async () => {
      participantRepo.findOne.mockResolvedValue(fakeParticipant());

      await expect(
        service.addParticipant(EVENT_ID, editor),
      ).rejects.toBeInstanceOf(DuplicateParticipantError);
      expect(participantRepo.save).not.toHaveBeenCalled();
    });

    it('maps a concurrent enrollment to DuplicateParticipantError', async () => {
      participantRepo.findOne.mockResolvedValue(null);
      participantRepo.save.mockRejectedValue({ code: '23505' });

      await expect(
        service.addParticipant(EVENT_ID, editor),
      ).rejects.toBeInstanceOf(DuplicateParticipantError);
    });
  });

  it('isParticipant checks the (event, user) pair', async () => {
    participantRepo.count.mockResolvedValueOnce(1).mockResolvedValueOnce(0);

    await expect(service.isParticipant(EVENT_ID, USER_ID)).resolves.toBe(true);
    await expect(service.isParticipant(EVENT_ID, USER_ID_2)).resolves.toBe(
      false,
    );
    expect(participantRepo.count).toHaveBeenCalledWith({
      where: { eventId: EVENT_ID, userId: USER_ID },
    });
  });
});
