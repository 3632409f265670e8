import {
  dayRange,
  isValidDateString,
  isWithinRange,
  parseDateToIso,
  todayString,
} from './date.util';

describe('date util', () => {
  it('validates calendar dates', () => {
    expect(isValidDateString('2026-02-28')).toBe(true);
    expect(isValidDateString('2026-02-30')).toBe(false);
    expect(isValidDateString('2026-2-3')).toBe(false);
  });

  it('computes the day interval at an offset', () => {
    expect(dayRange('2026-03-10', 2)).toEqual({
      from: '2026-03-09T22:00:00.000Z',
      to: '2026-03-10T22:00:00.000Z',
    });
  });

  it('treats the interval as half-open', () => {
    const range = dayRange('2026-03-10', 0);

    expect(isWithinRange('2026-03-10T00:00:00.000Z', range)).toBe(true);
    expect(isWithinRange('2026-03-10T23:59:59.999Z', range)).toBe(true);
    expect(isWithinRange('2026-03-11T00:00:00.000Z', range)).toBe(false);
    expect(isWithinRange('not a date', range)).toBe(false);
  });

  it('rolls today over at the configured offset', () => {
    const now = new Date('2026-03-10T23:30:00.000Z');

    expect(todayString(0, now)).toBe('2026-03-10');
    expect(todayString(2, now)).toBe('2026-03-11');
  });

  it('returns empty string for unparseable dates', () => {
    expect(parseDateToIso('Tue, 10 Mar 2026 18:45:00 GMT')).toBe(
      '2026-03-10T18:45:00.000Z',
    );
    expect(parseDateToIso('yesterday')).toBe('');
  });
});
