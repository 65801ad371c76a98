import { formatCotTimestamp, parseCotTimestamp } from '../timestamps';

describe('parseCotTimestamp', () => {
  it('parses UTC timestamps with and without fractions', () => {
    expect(parseCotTimestamp('2024-01-01T00:00:00Z')).toBe(1704067200000);
    expect(parseCotTimestamp('2024-01-01T00:00:00.5Z')).toBe(1704067200500);
    expect(parseCotTimestamp('2024-01-01T00:00:00.123Z')).toBe(1704067200123);
  });

  it('truncates sub-millisecond precision', () => {
    expect(parseCotTimestamp('2024-01-01T00:00:00.123999Z')).toBe(1704067200123);
  });

  it('applies zone offsets', () => {
    expect(parseCotTimestamp('2024-01-01T02:00:00+02:00')).toBe(1704067200000);
    expect(parseCotTimestamp('2023-12-31T19:30:00-04:30')).toBe(1704067200000);
  });

  it('rejects text that is not an ISO-8601 date-time', () => {
    expect(parseCotTimestamp('')).toBeNull();
    expect(parseCotTimestamp('yesterday')).toBeNull();
    expect(parseCotTimestamp('2024-01-01')).toBeNull();
    expect(parseCotTimestamp('2024-01-01T00:00:00')).toBeNull();
    expect(parseCotTimestamp('2024-01-01 00:00:00Z')).toBeNull();
    expect(parseCotTimestamp('1704067200')).toBeNull();
  });

  it('rejects impossible calendar values', () => {
    expect(parseCotTimestamp('2024-02-30T00:00:00Z')).toBeNull();
    expect(parseCotTimestamp('2024-13-01T00:00:00Z')).toBeNull();
    expect(parseCotTimestamp('2024-01-01T24:00:00Z')).toBeNull();
    expect(parseCotTimestamp('2024-01-01T00:00:00+25:00')).toBeNull();
  });

  it('accepts leap days', () => {
    expect(parseCotTimestamp('2024-02-29T12:00:00Z')).toBe(Date.UTC(2024, 1, 29, 12));
  });
});

describe('formatCotTimestamp', () => {
  it('writes UTC with millisecond precision', () => {
    expect(formatCotTimestamp(1704067200000)).toBe('2024-01-01T00:00:00.000Z');
    expect(formatCotTimestamp(1704067200123)).toBe('2024-01-01T00:00:00.123Z');
  });

  it('is read back unchanged', () => {
    const ms = Date.UTC(2031, 6, 4, 13, 37, 5, 250);
    expect(parseCotTimestamp(formatCotTimestamp(ms))).toBe(ms);
  });
});
