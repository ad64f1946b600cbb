import { IsIn, IsOptional } from 'class-validator';

export const EVENT_TIMING_FILTERS = ['current', 'past', 'upcoming'] as const;
export type EventTimingFilter = (typeof EVENT_TIMING_FILTERS)[number];

export class LeagueEventsQueryDto {
  @IsOptional()
  @IsIn(EVENT_TIMING_FILTERS)
  status?: EventTimingFilter;
}
