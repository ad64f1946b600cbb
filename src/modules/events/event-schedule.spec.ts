import { EmptyCollectionError } from '../../common/errors/domain-errors';
import {
  classifyEvent,
  getEndDate,
  getStartDate,
  groupStagesByEvent,
  inProgress,
  isPast,
  isUpcoming,
  isValidStageRange,
} from './event-schedule';

const stages = [
  { startDate: '2024-03-08', endDate: '2024-03-10' },
  { startDate: '2024-03-01', endDate: '2024-03-04' },
  { startDate: '2024-03-05', endDate: '2024-03-12' },
];

describe('event schedule', () => {
  it('spans the earliest start to the latest end', () => {
    expect(getStartDate(stages)).toBe('2024-03-01');
    expect(getEndDate(stages)).toBe('2024-03-12');
  });

  it('takes the latest end even when it is not on the last-starting stage', () => {
    expect(
      getEndDate([
        { startDate: '2024-01-01', endDate: '2024-02-01' },
        { startDate: '2024-01-10', endDate: '2024-01-12' },
      ]),
    ).toBe('2024-02-01');
  });

  it('fails on an event without stages', () => {
    expect(() => getStartDate([])).toThrow(EmptyCollectionError);
    expect(() => getEndDate([], 'Event e1')).toThrow('Event e1 has no stages');
    expect(() => isPast([], '2024-03-01')).toThrow(EmptyCollectionError);
  });

  it('is both in progress and past on the last day', () => {
    expect(inProgress(stages, '2024-03-12')).toBe(true);
    expect(isPast(stages, '2024-03-12')).toBe(true);
    expect(isUpcoming(stages, '2024-03-12')).toBe(false);
  });

  it('is both in progress and upcoming on the first day', () => {
    expect(inProgress(stages, '2024-03-01')).toBe(true);
    expect(isUpcoming(stages, '2024-03-01')).toBe(true);
    expect(isPast(stages, '2024-03-01')).toBe(false);
  });

  it('is only upcoming before the first day', () => {
    expect(classifyEvent(stages, '2024-02-29')).toEqual({
      startDate: '2024-03-01',
      endDate: '2024-03-12',
      isPast: false,
      isUpcoming: true,
      inProgress: false,
    });
  });

  it('is only past after the last day', () => {
    expect(classifyEvent(stages, '2024-03-13')).toEqual({
      startDate: '2024-03-01',
      endDate: '2024-03-12',
      isPast: true,
      isUpcoming: false,
      inProgress: false,
    });
  });

  it('classifies an event without stages as null', () => {
    expect(classifyEvent([], '2024-03-13')).toBeNull();
  });

  it('accepts single-day stages and rejects reversed ranges', () => {
    expect(isValidStageRange('2024-03-01', '2024-03-01')).toBe(true);
    expect(isValidStageRange('2024-03-02', '2024-03-01')).toBe(false);
  });

  it('groups stages by event id', () => {
    const grouped = groupStagesByEvent([
      { id: 's1', eventId: 'a' },
      { id: 's2', eventId: 'b' },
      { id: 's3', eventId: 'a' },
    ]);

    expect(grouped.get('a')?.map((s) => s.id)).toEqual(['s1', 's3']);
    expect(grouped.get('b')?.map((s) => s.id)).toEqual(['s2']);
  });
});
