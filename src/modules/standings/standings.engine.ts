import { NoMatchesError } from '../../common/errors/domain-errors';
import { Match } from '../matches/match.entity';

/**
 * Read-only derivations over a set of matches. Every match a participant
 * sits in counts toward its total, played or not, so an unresolved match
 * lowers the win percentage until a winner is recorded.
 */

export type MatchRecord = Pick<
  Match,
  'participant1Id' | 'participant2Id' | 'winnerId' | 'loserId'
>;

export interface Tally {
  matches: number;
  won: number;
  lost: number;
}

export interface StandingsRow extends Tally {
  participantId: string;
  winPercentage: number | null;
}

const EMPTY_TALLY: Tally = { matches: 0, won: 0, lost: 0 };

export function involves(match: MatchRecord, participantId: string): boolean {
  return (
    match.participant1Id === participantId ||
    match.participant2Id === participantId
  );
}

export function matchesFor<T extends MatchRecord>(
  matches: T[],
  participantId: string,
): T[] {
  return matches.filter((m) => involves(m, participantId));
}

export function matchesWon<T extends MatchRecord>(
  matches: T[],
  participantId: string,
): T[] {
  return matches.filter((m) => m.winnerId === participantId);
}

export function matchesLost<T extends MatchRecord>(
  matches: T[],
  participantId: string,
): T[] {
  return matches.filter((m) => m.loserId === participantId);
}

export function tallyFor(matches: MatchRecord[], participantId: string): Tally {
  return {
    matches: matchesFor(matches, participantId).length,
    won: matchesWon(matches, participantId).length,
    lost: matchesLost(matches, participantId).length,
  };
}

export function combineTallies(tallies: Tally[]): Tally {
  return tallies.reduce(
    (acc, t) => ({
      matches: acc.matches + t.matches,
      won: acc.won + t.won,
      lost: acc.lost + t.lost,
    }),
    EMPTY_TALLY,
  );
}

/** won / matches; undefined at zero matches. */
export function winPercentage(tally: Tally, subject: string): number {
  if (tally.matches === 0) throw new NoMatchesError(subject);
  return tally.won / tally.matches;
}

export function winPercentageOrNull(tally: Tally): number | null {
  return tally.matches === 0 ? null : tally.won / tally.matches;
}

export function opponentOf(match: MatchRecord, participantId: string): string {
  return match.participant1Id === participantId
    ? match.participant2Id
    : match.participant1Id;
}

/**
 * Mean over distinct opponents of each opponent's win percentage, leaving
 * out the matches that opponent played against `participantId`.
 * Opponents with nothing left are skipped.
 */
export function opponentMatchWinPercentage(
  matches: MatchRecord[],
  participantId: string,
  subject: string,
): number {
  const own = matchesFor(matches, participantId);
  if (own.length === 0) throw new NoMatchesError(subject);

  const opponents = new Set(own.map((m) => opponentOf(m, participantId)));
  const others = matches.filter((m) => !involves(m, participantId));

  const percentages: number[] = [];
  for (const opponent of opponents) {
    const rate = winPercentageOrNull(tallyFor(others, opponent));
    if (rate !== null) percentages.push(rate);
  }

  if (percentages.length === 0) throw new NoMatchesError(subject);
  return percentages.reduce((a, b) => a + b, 0) / percentages.length;
}

/** Win percentage desc, wins desc, then participant id for a stable order. */
export function buildStandingsTable(
  participantIds: string[],
  matches: MatchRecord[],
): StandingsRow[] {
  const rows = participantIds.map((participantId) => {
    const tally = tallyFor(matches, participantId);
    return { participantId, ...tally, winPercentage: winPercentageOrNull(tally) };
  });

  return rows.sort((a, b) => {
    const pa = a.winPercentage ?? -1;
    const pb = b.winPercentage ?? -1;
    if (pa !== pb) return pb - pa;
    if (a.won !== b.won) return b.won - a.won;
    return a.participantId < b.participantId ? -1 : 1;
  });
}
