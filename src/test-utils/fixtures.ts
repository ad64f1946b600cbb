import { User } from '../modules/users/user.entity';
import { League } from '../modules/leagues/league.entity';
import { LeagueMembership } from '../modules/leagues/league-membership.entity';
import { LeaguePost } from '../modules/leagues/league-post.entity';
import { TournamentEvent } from '../modules/events/event.entity';
import { Stage } from '../modules/events/stage.entity';
import { Participant } from '../modules/events/participant.entity';
import { Match } from '../modules/matches/match.entity';

export const USER_ID = '00000000-0000-4000-8000-000000000001';
export const USER_ID_2 = '00000000-0000-4000-8000-000000000002';
export const USER_ID_3 = '00000000-0000-4000-8000-000000000003';
export const LEAGUE_ID = '00000000-0000-4000-8000-0000000000a1';
export const EVENT_ID = '00000000-0000-4000-8000-0000000000b1';
export const STAGE_ID = '00000000-0000-4000-8000-0000000000c1';
export const MATCH_ID = '00000000-0000-4000-8000-0000000000d1';

const CREATED = new Date('2024-01-01T12:00:00Z');

export function fakeUser(overrides: Partial<User> = {}): User {
  return Object.assign(
    new User(),
    {
      id: USER_ID,
      name: 'alice',
      email: 'alice@example.com',
      passwordHash: 'hashed',
      admin: false,
      joinDate: '2024-01-01',
      createdAt: CREATED,
    },
    overrides,
  );
}

export function fakeLeague(overrides: Partial<League> = {}): League {
  return Object.assign(
    new League(),
    {
      id: LEAGUE_ID,
      name: 'Friday Night',
      creatorId: USER_ID,
      creationDate: '2024-01-01',
      createdAt: CREATED,
    },
    overrides,
  );
}

export function fakeMembership(
  overrides: Partial<LeagueMembership> = {},
): LeagueMembership {
  return Object.assign(
    new LeagueMembership(),
    {
      id: 'membership-1',
      leagueId: LEAGUE_ID,
      userId: USER_ID_2,
      moderator: false,
      owner: false,
      joinedAt: CREATED,
    },
    overrides,
  );
}

export function fakePost(overrides: Partial<LeaguePost> = {}): LeaguePost {
  return Object.assign(
    new LeaguePost(),
    {
      id: 'post-1',
      leagueId: LEAGUE_ID,
      authorId: USER_ID,
      title: 'Welcome',
      body: 'First event starts soon',
      createdAt: CREATED,
    },
    overrides,
  );
}

export function fakeEvent(
  overrides: Partial<TournamentEvent> = {},
): TournamentEvent {
  return Object.assign(
    new TournamentEvent(),
    {
      id: EVENT_ID,
      name: 'Spring Open',
      leagueId: LEAGUE_ID,
      createdAt: CREATED,
    },
    overrides,
  );
}

export function fakeStage(overrides: Partial<Stage> = {}): Stage {
  return Object.assign(
    new Stage(),
    {
      id: STAGE_ID,
      eventId: EVENT_ID,
      startDate: '2024-03-01',
      endDate: '2024-03-07',
    },
    overrides,
  );
}

export function fakeParticipant(
  overrides: Partial<Participant> = {},
): Participant {
  return Object.assign(
    new Participant(),
    {
      id: 'participant-1',
      eventId: EVENT_ID,
      userId: USER_ID,
      enrolledAt: CREATED,
    },
    overrides,
  );
}

export function fakeMatch(overrides: Partial<Match> = {}): Match {
  return Object.assign(
    new Match(),
    {
      id: MATCH_ID,
      stageId: STAGE_ID,
      participant1Id: 'participant-1',
      participant2Id: 'participant-2',
      winnerId: null,
      loserId: null,
      p1Wins: null,
      p2Wins: null,
      draws: null,
      recordedAt: null,
      createdAt: CREATED,
    },
    overrides,
  );
}
