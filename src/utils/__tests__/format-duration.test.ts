import { describe, it, expect } from 'vitest';
import { formatDuration } from '../format-duration.js';

describe('formatDuration', () => {
  it('formats zero or negative duration', () => {
    expect(formatDuration(0)).toBe('0s');
    expect(formatDuration(-100)).toBe('0s');
  });

  it('rounds to the nearest second', () => {
    expect(formatDuration(400)).toBe('0s');
    expect(formatDuration(500)).toBe('1s');
    expect(formatDuration(8400)).toBe('8s');
  });

  it('formats durations under 1 hour', () => {
    expect(formatDuration(125000)).toBe('2m 5s');
    expect(formatDuration(180000)).toBe('3m');
    expect(formatDuration(3599000)).toBe('59m 59s');
  });

  it('drops seconds once past an hour', () => {
    expect(formatDuration(3600000)).toBe('1h');
    expect(formatDuration(3665000)).toBe('1h 1m');
    expect(formatDuration(7200000)).toBe('2h');
  });
});
