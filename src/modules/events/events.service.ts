import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';

import { TournamentEvent } from './event.entity';
import { Stage } from './stage.entity';
import { Participant } from './participant.entity';
import { CreateEventDto } from './dto/create-event.dto';
import { CreateStageDto } from './dto/create-stage.dto';
import * as schedule from './event-schedule';
import {
  EventView,
  ParticipantView,
  StageView,
  toEventView,
  toParticipantView,
  toStageView,
} from './event.views';
import { LeaguesService } from '../leagues/leagues.service';
import { UsersService } from '../users/users.service';
import { Actor, AuthenticatedActor } from '../auth/actor';
import { ClockService } from '../../common/clock/clock.service';
import {
  DuplicateParticipantError,
  InvalidStageDatesError,
} from '../../common/errors/domain-errors';
import { isUniqueViolation } from '../../common/errors/pg-error';

@Injectable()
export class EventsService {
  private readonly logger = new Logger(EventsService.name);

  constructor(
    private readonly dataSource: DataSource,
    @InjectRepository(TournamentEvent)
    private readonly eventRepo: Repository<TournamentEvent>,
    @InjectRepository(Stage)
    private readonly stageRepo: Repository<Stage>,
    @InjectRepository(Participant)
    private readonly participantRepo: Repository<Participant>,
    private readonly leagues: LeaguesService,
    private readonly users: UsersService,
    private readonly clock: ClockService,
  ) {}

  // ── events ───────────────────────────────────────────────────────

  async createEvent(
    leagueId: string,
    actor: Actor,
    dto: CreateEventDto,
  ): Promise<EventView> {
    await this.leagues.assertEditable(leagueId, actor);

    const saved = await this.eventRepo.save(
      this.eventRepo.create({ leagueId, name: dto.name.trim() }),
    );

    this.logger.log(`event ${saved.id} created in league ${leagueId}`);
    return toEventView(saved, null);
  }

  async getEventOrThrow(eventId: string): Promise<TournamentEvent> {
    const event = await this.eventRepo.findOne({ where: { id: eventId } });
    if (!event) {
      throw new NotFoundException({
        statusCode: 404,
        code: 'EVENT_NOT_FOUND',
        message: 'Event not found',
      });
    }
    return event;
  }

  async getEvent(eventId: string): Promise<EventView> {
    const event = await this.getEventOrThrow(eventId);
    const stages = await this.stagesOf(eventId);
    return toEventView(event, schedule.classifyEvent(stages, this.clock.today()));
  }

  // ── derived dates ────────────────────────────────────────────────

  async getStartDate(eventId: string): Promise<string> {
    return schedule.getStartDate(await this.loadStages(eventId));
  }

  async getEndDate(eventId: string): Promise<string> {
    return schedule.getEndDate(await this.loadStages(eventId));
  }

  async isPast(eventId: string): Promise<boolean> {
    return schedule.isPast(await this.loadStages(eventId), this.clock.today());
  }

  async isUpcoming(eventId: string): Promise<boolean> {
    return schedule.isUpcoming(
      await this.loadStages(eventId),
      this.clock.today(),
    );
  }

  async inProgress(eventId: string): Promise<boolean> {
    return schedule.inProgress(
      await this.loadStages(eventId),
      this.clock.today(),
    );
  }

  // ── stages ───────────────────────────────────────────────────────

  async addStage(
    eventId: string,
    actor: Actor,
    dto: CreateStageDto,
  ): Promise<StageView> {
    if (!schedule.isValidStageRange(dto.startDate, dto.endDate)) {
      throw new InvalidStageDatesError(dto.startDate, dto.endDate);
    }

    const event = await this.getEventOrThrow(eventId);
    await this.leagues.assertEditable(event.leagueId, actor);

    const saved = await this.stageRepo.save(
      this.stageRepo.create({
        eventId,
        startDate: dto.startDate,
        endDate: dto.endDate,
      }),
    );

    this.logger.log(
      `stage ${saved.id} (${saved.startDate}..${saved.endDate}) added to event ${eventId}`,
    );
    return toStageView(saved);
  }

  async listStages(eventId: string): Promise<StageView[]> {
    const stages = await this.loadStages(eventId);
    return stages.map(toStageView);
  }

  async getStageOrThrow(stageId: string): Promise<Stage> {
    const stage = await this.stageRepo.findOne({ where: { id: stageId } });
    if (!stage) {
      throw new NotFoundException({
        statusCode: 404,
        code: 'STAGE_NOT_FOUND',
        message: 'Stage not found',
      });
    }
    return stage;
  }

  // ── participants ─────────────────────────────────────────────────

  /**
   * Enrolls `userId` (the caller when omitted). Members of the event's
   * league may enroll themselves; enrolling anyone else takes an editor.
   */
  async addParticipant(
    eventId: string,
    actor: AuthenticatedActor,
    userId?: string,
  ): Promise<ParticipantView> {
    const targetUserId = userId ?? actor.userId;
    const event = await this.getEventOrThrow(eventId);

    if (targetUserId === actor.userId) {
      await this.leagues.assertMemberOrEditor(event.leagueId, actor);
    } else {
      await this.leagues.assertEditable(event.leagueId, actor);
    }
    const user = await this.users.getByIdOrThrow(targetUserId);

    let saved: Participant;
    try {
      saved = await this.dataSource.transaction(async (manager) => {
        const repo = manager.getRepository(Participant);

        const existing = await repo.findOne({
          where: { eventId, userId: targetUserId },
        });
        if (existing) throw new DuplicateParticipantError(eventId, targetUserId);

        return repo.save(repo.create({ eventId, userId: targetUserId }));
      });
    } catch (e: unknown) {
      if (isUniqueViolation(e)) {
        this.logger.warn(
          `concurrent enrollment of ${targetUserId} in event ${eventId}`,
        );
        throw new DuplicateParticipantError(eventId, targetUserId);
      }
      throw e;
    }

    this.logger.log(`user ${targetUserId} enrolled in event ${eventId}`);
    return { ...toParticipantView(saved), name: user.name };
  }

  async isParticipant(eventId: string, userId: string): Promise<boolean> {
    const n = await this.participantRepo.count({ where: { eventId, userId } });
    return n > 0;
  }

  async listParticipants(eventId: string): Promise<ParticipantView[]> {
    await this.getEventOrThrow(eventId);
    const participants = await this.participantRepo.find({
      where: { eventId },
      relations: ['user'],
      order: { enrolledAt: 'ASC' },
    });
    return participants.map(toParticipantView);
  }

  async getParticipantOrThrow(participantId: string): Promise<Participant> {
    const participant = await this.participantRepo.findOne({
      where: { id: participantId },
      relations: ['user'],
    });
    if (!participant) {
      throw new NotFoundException({
        statusCode: 404,
        code: 'PARTICIPANT_NOT_FOUND',
        message: 'Participant not found',
      });
    }
    return participant;
  }

  // ── helpers ──────────────────────────────────────────────────────

  private async loadStages(eventId: string): Promise<Stage[]> {
    await this.getEventOrThrow(eventId);
    return this.stagesOf(eventId);
  }

  private stagesOf(eventId: string): Promise<Stage[]> {
    return this.stageRepo.find({
      where: { eventId },
      order: { startDate: 'ASC', endDate: 'ASC' },
    });
  }
}
