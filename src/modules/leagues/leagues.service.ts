import {
  ForbiddenException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, In, Repository } from 'typeorm';

import { League } from './league.entity';
import { LeagueMembership } from './league-membership.entity';
import { LeaguePost } from './league-post.entity';
import { CreateLeagueDto } from './dto/create-league.dto';
import { CreatePostDto } from './dto/create-post.dto';
import { EventTimingFilter } from './dto/league-events-query.dto';
import { TournamentEvent } from '../events/event.entity';
import { Stage } from '../events/stage.entity';
import { classifyEvent, groupStagesByEvent } from '../events/event-schedule';
import { EventView, toEventView } from '../events/event.views';
import { UsersService, UserView, toUserView } from '../users/users.service';
import { Actor, AuthenticatedActor, isAuthenticated } from '../auth/actor';
import { ClockService } from '../../common/clock/clock.service';
import {
  DuplicateLeagueNameError,
  DuplicateMembershipError,
  MembershipNotFoundError,
} from '../../common/errors/domain-errors';
import { isUniqueViolation } from '../../common/errors/pg-error';

const DEFAULT_POST_LIMIT = 20;

type RoleFlags = Pick<LeagueMembership, 'moderator' | 'owner'>;

export interface LeagueView {
  id: string;
  name: string;
  creatorId: string;
  creationDate: string;
}

export interface MembershipView {
  leagueId: string;
  userId: string;
  moderator: boolean;
  owner: boolean;
}

export interface PostView {
  id: string;
  leagueId: string;
  authorId: string;
  title: string;
  body: string;
  createdAt: string;
}

export interface LeagueRoster {
  members: UserView[];
  moderators: UserView[];
  owners: UserView[];
}

@Injectable()
export class LeaguesService {
  private readonly logger = new Logger(LeaguesService.name);

  constructor(
    private readonly dataSource: DataSource,
    @InjectRepository(League)
    private readonly leagueRepo: Repository<League>,
    @InjectRepository(LeagueMembership)
    private readonly membershipRepo: Repository<LeagueMembership>,
    @InjectRepository(LeaguePost)
    private readonly postRepo: Repository<LeaguePost>,
    @InjectRepository(TournamentEvent)
    private readonly eventRepo: Repository<TournamentEvent>,
    @InjectRepository(Stage)
    private readonly stageRepo: Repository<Stage>,
    private readonly users: UsersService,
    private readonly clock: ClockService,
  ) {}

  // ── leagues ──────────────────────────────────────────────────────

  async createLeague(
    actor: AuthenticatedActor,
    dto: CreateLeagueDto,
  ): Promise<LeagueView> {
    const name = dto.name.trim();

    const taken = await this.leagueRepo.findOne({ where: { name } });
    if (taken) throw new DuplicateLeagueNameError(name);

    const league = this.leagueRepo.create({
      name,
      creatorId: actor.userId,
      creationDate: this.clock.today(),
    });

    let saved: League;
    try {
      saved = await this.leagueRepo.save(league);
    } catch (e: unknown) {
      if (isUniqueViolation(e)) throw new DuplicateLeagueNameError(name);
      throw e;
    }

    this.logger.log(`league ${saved.id} created by ${actor.userId}`);
    return this.toLeagueView(saved);
  }

  async listLeagues(): Promise<LeagueView[]> {
    const leagues = await this.leagueRepo.find({ order: { name: 'ASC' } });
    return leagues.map((l) => this.toLeagueView(l));
  }

  async getLeagueOrThrow(leagueId: string): Promise<League> {
    const league = await this.leagueRepo.findOne({ where: { id: leagueId } });
    if (!league) {
      throw new NotFoundException({
        statusCode: 404,
        code: 'LEAGUE_NOT_FOUND',
        message: 'League not found',
      });
    }
    return league;
  }

  async getLeagueDetail(leagueId: string, actor: Actor) {
    const league = await this.getLeagueOrThrow(leagueId);
    const membership = await this.findMembership(leagueId, actor);

    return {
      ...this.toLeagueView(league),
      isMember: membership !== null,
      editable: this.isEditor(league, actor, membership),
    };
  }

  async listLeaguesForUser(userId: string): Promise<LeagueView[]> {
    await this.users.getByIdOrThrow(userId);
    const memberships = await this.membershipRepo.find({
      where: { userId },
      relations: ['league'],
    });
    return memberships
      .map((m) => this.toLeagueView(m.league))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  // ── membership ───────────────────────────────────────────────────

  /**
   * Enrolls `userId` (the caller when omitted) as a plain member. Adding
   * someone other than yourself takes an editor.
   */
  async addMember(
    leagueId: string,
    actor: AuthenticatedActor,
    userId?: string,
  ): Promise<MembershipView> {
    const targetUserId = userId ?? actor.userId;

    if (targetUserId === actor.userId) {
      await this.getLeagueOrThrow(leagueId);
    } else {
      await this.assertEditable(leagueId, actor);
    }
    await this.users.getByIdOrThrow(targetUserId);

    let saved: LeagueMembership;
    try {
      saved = await this.dataSource.transaction(async (manager) => {
        const repo = manager.getRepository(LeagueMembership);

        const existing = await repo.findOne({
          where: { leagueId, userId: targetUserId },
        });
        if (existing) throw new DuplicateMembershipError(leagueId, targetUserId);

        return repo.save(
          repo.create({
            leagueId,
            userId: targetUserId,
            moderator: false,
            owner: false,
          }),
        );
      });
    } catch (e: unknown) {
      if (isUniqueViolation(e)) {
        this.logger.warn(
          `concurrent membership insert for ${targetUserId} in ${leagueId}`,
        );
        throw new DuplicateMembershipError(leagueId, targetUserId);
      }
      throw e;
    }

    this.logger.log(`user ${targetUserId} joined league ${leagueId}`);
    return this.toMembershipView(saved);
  }

  addModerator(leagueId: string, actor: Actor, userId: string) {
    return this.setRole(leagueId, actor, userId, {
      moderator: true,
      owner: false,
    });
  }

  addOwner(leagueId: string, actor: Actor, userId: string) {
    return this.setRole(leagueId, actor, userId, {
      moderator: false,
      owner: true,
    });
  }

  async getMembers(leagueId: string): Promise<UserView[]> {
    return (await this.getRoster(leagueId)).members;
  }

  async getModerators(leagueId: string): Promise<UserView[]> {
    return (await this.getRoster(leagueId)).moderators;
  }

  async getOwners(leagueId: string): Promise<UserView[]> {
    return (await this.getRoster(leagueId)).owners;
  }

  async getRoster(leagueId: string): Promise<LeagueRoster> {
    await this.getLeagueOrThrow(leagueId);
    const memberships = await this.membershipRepo.find({
      where: { leagueId },
      relations: ['user'],
      order: { joinedAt: 'ASC' },
    });

    return {
      members: memberships.map((m) => toUserView(m.user)),
      moderators: memberships
        .filter((m) => m.moderator)
        .map((m) => toUserView(m.user)),
      owners: memberships.filter((m) => m.owner).map((m) => toUserView(m.user)),
    };
  }

  // ── permissions ──────────────────────────────────────────────────

  /** Creator or moderator. Anonymous actors never qualify. */
  async editableByUser(leagueId: string, actor: Actor): Promise<boolean> {
    const league = await this.getLeagueOrThrow(leagueId);
    const membership = await this.findMembership(leagueId, actor);
    return this.isEditor(league, actor, membership);
  }

  async isMember(leagueId: string, actor: Actor): Promise<boolean> {
    return (await this.findMembership(leagueId, actor)) !== null;
  }

  /** Editors and platform admins pass; everyone else gets LEAGUE_FORBIDDEN. */
  async assertEditable(leagueId: string, actor: Actor): Promise<League> {
    const league = await this.getLeagueOrThrow(leagueId);
    if (actor.isAdmin) return league;

    const membership = await this.findMembership(leagueId, actor);
    if (!this.isEditor(league, actor, membership)) {
      throw this.forbidden('Only league editors can perform this action');
    }
    return league;
  }

  async assertMemberOrEditor(leagueId: string, actor: Actor): Promise<League> {
    const league = await this.getLeagueOrThrow(leagueId);
    if (actor.isAdmin) return league;

    const membership = await this.findMembership(leagueId, actor);
    if (!membership && !this.isEditor(league, actor, membership)) {
      throw this.forbidden('You are not a member of this league');
    }
    return league;
  }

  // ── events ───────────────────────────────────────────────────────

  /**
   * Events of a league with their date range and temporal flags. Events
   * without stages match no filter.
   */
  async listEvents(
    leagueId: string,
    filter?: EventTimingFilter,
  ): Promise<EventView[]> {
    await this.getLeagueOrThrow(leagueId);

    const events = await this.eventRepo.find({
      where: { leagueId },
      order: { name: 'ASC' },
    });
    if (events.length === 0) return [];

    const stages = await this.stageRepo.find({
      where: { eventId: In(events.map((e) => e.id)) },
    });
    const stagesByEvent = groupStagesByEvent(stages);
    const today = this.clock.today();

    const views = events.map((event) =>
      toEventView(event, classifyEvent(stagesByEvent.get(event.id) ?? [], today)),
    );

    switch (filter) {
      case 'current':
        return views.filter((v) => v.inProgress);
      case 'past':
        return views.filter((v) => v.isPast);
      case 'upcoming':
        return views.filter((v) => v.isUpcoming);
      default:
        return views;
    }
  }

  currentEvents(leagueId: string) {
    return this.listEvents(leagueId, 'current');
  }

  pastEvents(leagueId: string) {
    return this.listEvents(leagueId, 'past');
  }

  upcomingEvents(leagueId: string) {
    return this.listEvents(leagueId, 'upcoming');
  }

  // ── posts ────────────────────────────────────────────────────────

  async addPost(
    leagueId: string,
    actor: AuthenticatedActor,
    dto: CreatePostDto,
  ): Promise<PostView> {
    await this.assertMemberOrEditor(leagueId, actor);

    const post = this.postRepo.create({
      leagueId,
      authorId: actor.userId,
      title: dto.title.trim(),
      body: dto.body,
    });
    const saved = await this.postRepo.save(post);

    this.logger.log(`post ${saved.id} added to league ${leagueId}`);
    return this.toPostView(saved);
  }

  async listPosts(
    leagueId: string,
    limit = DEFAULT_POST_LIMIT,
  ): Promise<PostView[]> {
    await this.getLeagueOrThrow(leagueId);
    const posts = await this.postRepo.find({
      where: { leagueId },
      order: { createdAt: 'DESC' },
      take: limit,
    });
    return posts.map((p) => this.toPostView(p));
  }

  // ── helpers ──────────────────────────────────────────────────────

  private async setRole(
    leagueId: string,
    actor: Actor,
    userId: string,
    flags: RoleFlags,
  ): Promise<MembershipView> {
    await this.assertEditable(leagueId, actor);

    const saved = await this.dataSource.transaction(async (manager) => {
      const repo = manager.getRepository(LeagueMembership);

      const membership = await repo.findOne({
        where: { leagueId, userId },
        lock: { mode: 'pessimistic_write' },
      });
      if (!membership) throw new MembershipNotFoundError(leagueId, userId);

      membership.moderator = flags.moderator;
      membership.owner = flags.owner;
      return repo.save(membership);
    });

    this.logger.log(
      `user ${userId} in league ${leagueId}: moderator=${flags.moderator} owner=${flags.owner}`,
    );
    return this.toMembershipView(saved);
  }

  private findMembership(
    leagueId: string,
    actor: Actor,
  ): Promise<LeagueMembership | null> {
    if (!isAuthenticated(actor)) return Promise.resolve(null);
    return this.membershipRepo.findOne({
      where: { leagueId, userId: actor.userId },
    });
  }

  private isEditor(
    league: League,
    actor: Actor,
    membership: LeagueMembership | null,
  ): boolean {
    if (!isAuthenticated(actor)) return false;
    if (league.creatorId === actor.userId) return true;
    return membership?.moderator === true;
  }

  private forbidden(message: string) {
    return new ForbiddenException({
      statusCode: 403,
      code: 'LEAGUE_FORBIDDEN',
      message,
    });
  }

  private toLeagueView(league: League): LeagueView {
    return {
      id: league.id,
      name: league.name,
      creatorId: league.creatorId,
      creationDate: league.creationDate,
    };
  }

  private toMembershipView(m: LeagueMembership): MembershipView {
    return {
      leagueId: m.leagueId,
      userId: m.userId,
      moderator: m.moderator,
      owner: m.owner,
    };
  }

  private toPostView(p: LeaguePost): PostView {
    return {
      id: p.id,
      leagueId: p.leagueId,
      authorId: p.authorId,
      title: p.title,
      body: p.body,
      createdAt: p.createdAt.toISOString(),
    };
  }
}
