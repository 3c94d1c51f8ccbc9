import { describe, it, expect, vi } from 'vitest';
import { run, sortEvents } from '../src/pipeline.js';
import type { EventSource } from '../src/pipeline.js';
import { toRfc3339 } from '../src/time-range.js';
import type { CalendarConfig, CalendarEvent } from '../schemas/index.js';

function timed(id: string, start: string, end = start): CalendarEvent {
  return {
    id,
    summary: id,
    start: { kind: 'timed', dateTime: start },
    end: { kind: 'timed', dateTime: end },
  };
}

function allDay(id: string, date: string, endDate = date): CalendarEvent {
  return {
    id,
    summary: id,
    start: { kind: 'all-day', date },
    end: { kind: 'all-day', date: endDate },
  };
}

describe('sortEvents', () => {
  it('should order events by start', () => {
    const sorted = sortEvents([
      timed('c', '2024-06-01T15:00:00Z'),
      timed('a', '2024-06-01T09:00:00Z'),
      timed('b', '2024-06-01T11:00:00Z'),
    ]);

    expect(sorted.map((e) => e.id)).toEqual(['a', 'b', 'c']);
  });

  it('should keep fetch order for equal starts', () => {
    const sorted = sortEvents([
      timed('work-late', '2024-06-01T12:00:00Z'),
      timed('work-standup', '2024-06-01T09:00:00Z'),
      timed('home-standup', '2024-06-01T09:00:00Z'),
      timed('team-standup', '2024-06-01T09:00:00Z'),
    ]);

    expect(sorted.map((e) => e.id)).toEqual([
      'work-standup',
      'home-standup',
      'team-standup',
      'work-late',
    ]);
  });

  it('should place all-day events ahead of timed events on the same day', () => {
    const sorted = sortEvents([
      timed('morning', '2024-06-02T08:00:00Z'),
      allDay('holiday', '2024-06-02', '2024-06-03'),
      timed('yesterday', '2024-06-01T20:00:00Z'),
    ]);

    expect(sorted.map((e) => e.id)).toEqual(['yesterday', 'holiday', 'morning']);
  });

  it('should not mutate its input', () => {
    const events = [timed('b', '2024-06-02T00:00:00Z'), timed('a', '2024-06-01T00:00:00Z')];

    sortEvents(events);

    expect(events.map((e) => e.id)).toEqual(['b', 'a']);
  });
});

describe('run', () => {
  const config: CalendarConfig = {
    timezone: 'UTC',
    startDate: '2024-06-01T00:00:00',
    endDate: '2024-06-02T23:59:59',
    calendarIds: ['work', 'home'],
  };

  it('should fetch the configured window and emit sorted lines', async () => {
    const source: EventSource = {
      fetchAll: vi.fn(async () => [
        { ...timed('Review', '2024-06-01T14:00:00Z', '2024-06-01T15:00:00Z'), conferenceId: 'xyz-abcd-efg' },
        timed('Breakfast', '2024-06-01T07:00:00Z', '2024-06-01T07:30:00Z'),
        allDay('Offsite', '2024-06-02', '2024-06-03'),
      ]),
    };

    const lines = await run(config, {
      source,
      clock: () => new Date(Date.UTC(2024, 5, 1, 6, 0, 0)),
    });

    const [calendarIds, start, end] = vi.mocked(source.fetchAll).mock.calls[0];
    expect(calendarIds).toEqual(['work', 'home']);
    expect(toRfc3339(start)).toBe('2024-06-01T00:00:00.000+00:00');
    expect(toRfc3339(end)).toBe('2024-06-02T23:59:59.000+00:00');

    expect(lines).toEqual([
      'Today        07:00 - 07:30    Breakfast' + ' '.repeat(37) + ' ' + ' '.repeat(12),
      'Today        14:00 - 15:00    📹 Review' + ' '.repeat(40) + ' xyz-abcd-efg',
      'Tomorrow     All day          Offsite' + ' '.repeat(39) + ' ' + ' '.repeat(12),
    ]);
  });

  it('should emit nothing when no calendar has events', async () => {
    const lines = await run(config, { source: { fetchAll: async () => [] } });

    expect(lines).toEqual([]);
  });
});
