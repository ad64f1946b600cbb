import { Match } from './match.entity';
import { MatchStatus, matchStatus } from './match-resolution';

export interface MatchView {
  id: string;
  stageId: string;
  participant1Id: string;
  participant2Id: string;
  status: MatchStatus;
  winnerId: string | null;
  loserId: string | null;
  p1Wins: number | null;
  p2Wins: number | null;
  draws: number | null;
  recordedAt: string | null;
}

export function toMatchView(match: Match): MatchView {
  return {
    id: match.id,
    stageId: match.stageId,
    participant1Id: match.participant1Id,
    participant2Id: match.participant2Id,
    status: matchStatus(match),
    winnerId: match.winnerId,
    loserId: match.loserId,
    p1Wins: match.p1Wins,
    p2Wins: match.p2Wins,
    draws: match.draws,
    recordedAt: match.recordedAt ? match.recordedAt.toISOString() : null,
  };
}
