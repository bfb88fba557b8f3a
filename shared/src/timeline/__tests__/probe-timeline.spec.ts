import { describe, it, expect, vi } from 'vitest';
import { ProbeTimeline } from '../probe-timeline';

describe('ProbeTimeline', () => {
  const fixedClock = () => Date.parse('2024-03-01T12:00:00.000Z');

  it('prefixes entries with an ISO timestamp', () => {
    const timeline = new ProbeTimeline({ now: fixedClock });
    const entry = timeline.append('Component loaded.');
    expect(entry).toBe('2024-03-01T12:00:00.000Z Component loaded.');
    expect(timeline.entries).toEqual([entry]);
  });

  it('keeps entries in append order', () => {
    const timeline = new ProbeTimeline({ now: fixedClock });
    timeline.append('first');
    timeline.append('second');
    expect(timeline.size).toBe(2);
    expect(timeline.entries.map((entry) => entry.split(' ')[1])).toEqual([
      'first',
      'second',
    ]);
  });

  it('hands out snapshots that later appends do not change', () => {
    const timeline = new ProbeTimeline({ now: fixedClock });
    timeline.append('first');
    const snapshot = timeline.entries;
    timeline.append('second');
    expect(snapshot).toHaveLength(1);
  });

  it('notifies subscribers until they unsubscribe', () => {
    const timeline = new ProbeTimeline({ now: fixedClock });
    const listener = vi.fn();
    const unsubscribe = timeline.subscribe(listener);

    timeline.append('seen');
    unsubscribe();
    timeline.append('not seen');

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith('2024-03-01T12:00:00.000Z seen');
  });
});
