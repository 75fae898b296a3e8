import { describe, it, expect } from 'vitest';
import {
  assTimestamps,
  msToTimestamp,
  srtTimestamps,
  timestampCodec,
  timestampToMs,
  vttTimestamps,
} from './timestamps';

describe('vttTimestamps', () => {
  it('should parse timestamps with and without hours', () => {
    expect(vttTimestamps.parse('1:02:03.5')).toBe(3723500);
    expect(vttTimestamps.parse('01:02:03.500')).toBe(3723500);
    expect(vttTimestamps.parse('02:03.5')).toBe(123500);
    expect(vttTimestamps.parse('00:00:00.000')).toBe(0);
  });

  it('should pad or cut the fraction to milliseconds', () => {
    expect(vttTimestamps.parse('00:00:01.1')).toBe(1100);
    expect(vttTimestamps.parse('00:00:01.12')).toBe(1120);
    expect(vttTimestamps.parse('00:00:01.1234')).toBe(1123);
  });

  it('should return null for text that is not a timestamp', () => {
    expect(vttTimestamps.parse('invalid')).toBeNull();
    expect(vttTimestamps.parse('00:01')).toBeNull();
    expect(vttTimestamps.parse('00:00:01,000')).toBeNull();
  });

  it('should format fixed-width timestamps', () => {
    expect(vttTimestamps.format(3723500)).toBe('01:02:03.500');
    expect(vttTimestamps.format(0)).toBe('00:00:00.000');
    expect(vttTimestamps.format(1)).toBe('00:00:00.001');
  });

  it('should clamp negative and truncate fractional input', () => {
    expect(vttTimestamps.format(-5)).toBe('00:00:00.000');
    expect(vttTimestamps.format(1.9)).toBe('00:00:00.001');
  });

  it('should round-trip whole milliseconds', () => {
    for (const ms of [0, 1, 999, 59999, 3600000, 86399999, 359999999]) {
      expect(vttTimestamps.parse(vttTimestamps.format(ms))).toBe(ms);
    }
  });
});

describe('srtTimestamps', () => {
  it('should parse comma timestamps', () => {
    expect(srtTimestamps.parse('01:02:03,500')).toBe(3723500);
  });

  it('should handle period separator', () => {
    expect(srtTimestamps.parse('00:00:01.250')).toBe(1250);
  });

  it('should format with a comma', () => {
    expect(srtTimestamps.format(3723500)).toBe('01:02:03,500');
  });

  it('should round-trip whole milliseconds', () => {
    for (const ms of [0, 7, 61001, 359999999]) {
      expect(srtTimestamps.parse(srtTimestamps.format(ms))).toBe(ms);
    }
  });
});

describe('assTimestamps', () => {
  it('should parse centisecond timestamps', () => {
    expect(assTimestamps.parse('1:02:03.45')).toBe(3723450);
    expect(assTimestamps.parse('0:00:05')).toBe(5000);
  });

  it('should truncate to centiseconds when formatting', () => {
    expect(assTimestamps.format(3723456)).toBe('1:02:03.45');
    expect(assTimestamps.format(36000000)).toBe('10:00:00.00');
  });

  it('should round-trip multiples of ten milliseconds', () => {
    for (const ms of [0, 10, 990, 61230, 3723450]) {
      expect(assTimestamps.parse(assTimestamps.format(ms))).toBe(ms);
    }
  });
});

describe('timestampToMs / msToTimestamp', () => {
  it('should default to the vtt grammar', () => {
    expect(timestampToMs('00:00:01.000')).toBe(1000);
    expect(msToTimestamp(1000)).toBe('00:00:01.000');
  });

  it('should pick the codec of a format', () => {
    expect(timestampCodec('srt')).toBe(srtTimestamps);
    expect(timestampCodec('ass')).toBe(assTimestamps);
  });

  it('should apply the requested format', () => {
    expect(timestampToMs('00:00:01,000', 'srt')).toBe(1000);
    expect(msToTimestamp(1000, 'srt')).toBe('00:00:01,000');
    expect(msToTimestamp(1000, 'ass')).toBe('0:00:01.00');
  });
});
