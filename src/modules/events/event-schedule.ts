import { EmptyCollectionError } from '../../common/errors/domain-errors';
import { Stage } from './stage.entity';

/**
 * Temporal classification of an event from its stages.
 *
 * Dates are ISO calendar strings (YYYY-MM-DD), which order the same way
 * lexicographically as chronologically, so plain string comparison is used
 * throughout. All boundaries are inclusive: a stage ending today makes its
 * event both in progress and past, and one starting today makes it both in
 * progress and upcoming.
 */

export type StageWindow = Pick<Stage, 'startDate' | 'endDate'>;

export interface EventTiming {
  startDate: string;
  endDate: string;
  isPast: boolean;
  isUpcoming: boolean;
  inProgress: boolean;
}

export function isValidStageRange(startDate: string, endDate: string): boolean {
  return startDate <= endDate;
}

export function getStartDate(stages: StageWindow[], subject = 'Event'): string {
  if (stages.length === 0) throw new EmptyCollectionError(subject);
  return stages.reduce(
    (min, s) => (s.startDate < min ? s.startDate : min),
    stages[0].startDate,
  );
}

export function getEndDate(stages: StageWindow[], subject = 'Event'): string {
  if (stages.length === 0) throw new EmptyCollectionError(subject);
  return stages.reduce(
    (max, s) => (s.endDate > max ? s.endDate : max),
    stages[0].endDate,
  );
}

export function isPast(stages: StageWindow[], today: string): boolean {
  return getEndDate(stages) <= today;
}

export function isUpcoming(stages: StageWindow[], today: string): boolean {
  return today <= getStartDate(stages);
}

export function inProgress(stages: StageWindow[], today: string): boolean {
  return getStartDate(stages) <= today && today <= getEndDate(stages);
}

/** Null for an event without stages. */
export function classifyEvent(
  stages: StageWindow[],
  today: string,
): EventTiming | null {
  if (stages.length === 0) return null;

  const startDate = getStartDate(stages);
  const endDate = getEndDate(stages);
  return {
    startDate,
    endDate,
    isPast: endDate <= today,
    isUpcoming: today <= startDate,
    inProgress: startDate <= today && today <= endDate,
  };
}

export function groupStagesByEvent<T extends Pick<Stage, 'eventId'>>(
  stages: T[],
): Map<string, T[]> {
  const byEvent = new Map<string, T[]>();
  for (const stage of stages) {
    const list = byEvent.get(stage.eventId);
    if (list) list.push(stage);
    else byEvent.set(stage.eventId, [stage]);
  }
  return byEvent;
}
