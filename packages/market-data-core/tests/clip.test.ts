import { describe, it, expect } from 'vitest';
import type { Bar } from '@mdd/contracts';
import { clipBars, normalizeBars } from '../src/clip.js';
import { groupBarsByDay } from '../src/group.js';

function bar(timestamp: number, close = 100): Bar {
  return { timestamp, open: close, high: close, low: close, close, volume: 10 };
}

describe('clipBars', () => {
  const bars = [bar(10), bar(20), bar(30), bar(40)];

  it('keeps both bounds', () => {
    expect(clipBars(bars, 20, 30).map((b) => b.timestamp)).toEqual([20, 30]);
  });

  it('returns an empty array for an inverted range', () => {
    expect(clipBars(bars, 30, 20)).toEqual([]);
  });

  it('returns an empty array for empty input', () => {
    expect(clipBars([], 0, 100)).toEqual([]);
  });

  it('returns a new array', () => {
    const result = clipBars(bars, 0, 100);
    expect(result).toEqual(bars);
    expect(result).not.toBe(bars);
  });
});

describe('normalizeBars', () => {
  const jan1 = Date.UTC(2024, 0, 1);
  const jan2 = Date.UTC(2024, 0, 2);
  const jan3 = Date.UTC(2024, 0, 3);

  it('drops bars outside the requested days', () => {
    const result = normalizeBars(
      [bar(jan1 - 60_000), bar(jan1), bar(jan2 - 1), bar(jan2)],
      '2024-01-01',
      '2024-01-01'
    );

    expect(result.bars.map((b) => b.timestamp)).toEqual([jan1, jan2 - 1]);
    expect(result.outOfRange).toBe(2);
    expect(result.duplicates).toBe(0);
  });

  it('keeps the first bar of a repeated timestamp', () => {
    const result = normalizeBars(
      [bar(jan1, 1), bar(jan1 + 60_000, 2), bar(jan1, 3)],
      '2024-01-01',
      '2024-01-01'
    );

    expect(result.bars.map((b) => b.close)).toEqual([1, 2]);
    expect(result.duplicates).toBe(1);
  });

  it('sorts unordered input', () => {
    const result = normalizeBars([bar(jan3), bar(jan1), bar(jan2)], '2024-01-01', '2024-01-03');
    expect(result.bars.map((b) => b.timestamp)).toEqual([jan1, jan2, jan3]);
  });

  it('does not mutate the input', () => {
    const input = [bar(jan2), bar(jan1)];
    normalizeBars(input, '2024-01-01', '2024-01-02');
    expect(input.map((b) => b.timestamp)).toEqual([jan2, jan1]);
  });
});

describe('groupBarsByDay', () => {
  it('creates a group for every day, including empty ones', () => {
    const groups = groupBarsByDay(
      [bar(Date.UTC(2024, 0, 1, 14, 30)), bar(Date.UTC(2024, 0, 3, 15)), bar(Date.UTC(2024, 0, 3, 16))],
      '2024-01-01',
      '2024-01-03'
    );

    expect(groups.map((g) => [g.day, g.bars.length])).toEqual([
      ['2024-01-01', 1],
      ['2024-01-02', 0],
      ['2024-01-03', 2],
    ]);
  });

  it('ignores bars outside the range', () => {
    const groups = groupBarsByDay([bar(Date.UTC(2023, 11, 31, 23, 59))], '2024-01-01', '2024-01-01');
    expect(groups).toEqual([{ day: '2024-01-01', bars: [] }]);
  });
});
