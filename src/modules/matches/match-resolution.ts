import { InvalidResultError } from '../../common/errors/domain-errors';
import { Match } from './match.entity';

/** Game wins that take a best-of-3 match. */
export const GAMES_TO_WIN = 2;

export interface GameCounts {
  p1Wins: number;
  p2Wins: number;
  draws: number;
}

export type MatchStatus = 'unplayed' | 'resolved';

type Seats = Pick<Match, 'participant1Id' | 'participant2Id'>;

export function assertValidGameCounts(counts: GameCounts): void {
  for (const [field, value] of Object.entries(counts)) {
    if (!Number.isInteger(value) || value < 0) {
      throw new InvalidResultError(
        `${field} must be a non-negative integer, got ${String(value)}`,
      );
    }
  }
}

/**
 * Participant1 is checked first, so a count where both sides reach
 * GAMES_TO_WIN goes to participant1.
 */
export function resolveOutcome(
  seats: Seats,
  counts: GameCounts,
): { winnerId: string | null; loserId: string | null } {
  if (counts.p1Wins >= GAMES_TO_WIN) {
    return { winnerId: seats.participant1Id, loserId: seats.participant2Id };
  }
  if (counts.p2Wins >= GAMES_TO_WIN) {
    return { winnerId: seats.participant2Id, loserId: seats.participant1Id };
  }
  return { winnerId: null, loserId: null };
}

/** Replaces every result field; earlier results leave no trace. */
export function applyResults(
  match: Match,
  counts: GameCounts,
  recordedAt: Date,
): Match {
  assertValidGameCounts(counts);
  const { winnerId, loserId } = resolveOutcome(match, counts);

  match.p1Wins = counts.p1Wins;
  match.p2Wins = counts.p2Wins;
  match.draws = counts.draws;
  match.recordedAt = recordedAt;
  match.winnerId = winnerId;
  match.loserId = loserId;
  return match;
}

export function matchStatus(match: Pick<Match, 'winnerId'>): MatchStatus {
  return match.winnerId === null ? 'unplayed' : 'resolved';
}
