import { TournamentEvent } from './event.entity';
import { Stage } from './stage.entity';
import { Participant } from './participant.entity';
import { EventTiming } from './event-schedule';

export interface EventView {
  id: string;
  name: string;
  leagueId: string;
  startDate: string | null;
  endDate: string | null;
  isPast: boolean;
  isUpcoming: boolean;
  inProgress: boolean;
}

export interface StageView {
  id: string;
  eventId: string;
  startDate: string;
  endDate: string;
}

export interface ParticipantView {
  id: string;
  eventId: string;
  userId: string;
  name: string | null;
}

/** An event without stages is reported as unscheduled: no dates, no flags. */
export function toEventView(
  event: Pick<TournamentEvent, 'id' | 'name' | 'leagueId'>,
  timing: EventTiming | null,
): EventView {
  return {
    id: event.id,
    name: event.name,
    leagueId: event.leagueId,
    startDate: timing?.startDate ?? null,
    endDate: timing?.endDate ?? null,
    isPast: timing?.isPast ?? false,
    isUpcoming: timing?.isUpcoming ?? false,
    inProgress: timing?.inProgress ?? false,
  };
}

export function toStageView(stage: Stage): StageView {
  return {
    id: stage.id,
    eventId: stage.eventId,
    startDate: stage.startDate,
    endDate: stage.endDate,
  };
}

export function toParticipantView(p: Participant): ParticipantView {
  return {
    id: p.id,
    eventId: p.eventId,
    userId: p.userId,
    name: p.user?.name ?? null,
  };
}
