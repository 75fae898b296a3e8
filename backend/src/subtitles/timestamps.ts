import { Milliseconds, SubtitleFormat } from './types';

/**
 * Converts between timestamp text and milliseconds for one format
 */
export interface TimestampCodec {
  /** Lenient pattern used to find timestamps inside a document */
  readonly pattern: string;
  /** Strict fixed-width grammar the validator checks against */
  readonly strict: string;
  parse(text: string): Milliseconds | null;
  format(ms: Milliseconds): string;
}

interface TimeParts {
  hours: number;
  minutes: number;
  seconds: number;
  millis: number;
}

/**
 * Reads a fractional-second field as milliseconds.
 * The digits are right-padded or cut to three: "5" is 500, "1234" is 123.
 */
function fractionToMillis(fraction: string | undefined): number {
  if (!fraction) return 0;
  return parseInt(fraction.padEnd(3, '0').slice(0, 3), 10);
}

function partsToMs(parts: TimeParts): Milliseconds {
  return (
    Math.trunc(parts.hours) * 3600000 +
    Math.trunc(parts.minutes) * 60000 +
    Math.trunc(parts.seconds) * 1000 +
    Math.trunc(parts.millis)
  );
}

function msToParts(ms: Milliseconds): TimeParts {
  const total = Math.max(0, Math.trunc(ms));
  return {
    hours: Math.floor(total / 3600000),
    minutes: Math.floor((total % 3600000) / 60000),
    seconds: Math.floor((total % 60000) / 1000),
    millis: total % 1000,
  };
}

function pad(value: number, width: number): string {
  return value.toString().padStart(width, '0');
}

function parseWith(regex: RegExp, text: string): Milliseconds | null {
  const match = regex.exec(text.trim());
  if (!match) return null;

  return partsToMs({
    hours: parseInt(match[1] ?? '0', 10),
    minutes: parseInt(match[2] ?? '0', 10),
    seconds: parseInt(match[3] ?? '0', 10),
    millis: fractionToMillis(match[4]),
  });
}

/**
 * WebVTT timestamps: `[HH:]MM:SS.mmm`, hours optional
 */
export const vttTimestamps: TimestampCodec = {
  pattern: '(?:\\d+:)?\\d+:\\d+\\.\\d+',
  strict: '\\d{2}(?::\\d{2})?:\\d{2}(?:\\.\\d{0,3})?',

  parse(text: string): Milliseconds | null {
    return parseWith(/^(?:(\d+):)?(\d+):(\d+)\.(\d+)$/, text);
  },

  format(ms: Milliseconds): string {
    const { hours, minutes, seconds, millis } = msToParts(ms);
    return `${pad(hours, 2)}:${pad(minutes, 2)}:${pad(seconds, 2)}.${pad(millis, 3)}`;
  },
};

/**
 * SubRip timestamps: `HH:MM:SS,mmm`. A period before the fraction is
 * tolerated when parsing.
 */
export const srtTimestamps: TimestampCodec = {
  pattern: '\\d+:\\d+:\\d+,\\d+',
  strict: '\\d{2}:\\d{2}:\\d{2},\\d{3}',

  parse(text: string): Milliseconds | null {
    return parseWith(/^(\d+):(\d+):(\d+)[,.](\d+)$/, text);
  },

  format(ms: Milliseconds): string {
    const { hours, minutes, seconds, millis } = msToParts(ms);
    return `${pad(hours, 2)}:${pad(minutes, 2)}:${pad(seconds, 2)},${pad(millis, 3)}`;
  },
};

/**
 * Advanced SubStation timestamps: `H:MM:SS.cc` with centisecond precision
 */
export const assTimestamps: TimestampCodec = {
  pattern: '\\d+:\\d+:\\d+(?:\\.\\d+)?',
  strict: '\\d:\\d{2}:\\d{2}\\.\\d{2}',

  parse(text: string): Milliseconds | null {
    return parseWith(/^(\d+):(\d+):(\d+)(?:\.(\d+))?$/, text);
  },

  format(ms: Milliseconds): string {
    const { hours, minutes, seconds, millis } = msToParts(ms);
    return `${hours}:${pad(minutes, 2)}:${pad(seconds, 2)}.${pad(Math.floor(millis / 10), 2)}`;
  },
};

const CODECS: Record<SubtitleFormat, TimestampCodec> = {
  vtt: vttTimestamps,
  srt: srtTimestamps,
  ass: assTimestamps,
};

export function timestampCodec(format: SubtitleFormat): TimestampCodec {
  return CODECS[format];
}

/**
 * Converts a timestamp to milliseconds
 * @param text - Timestamp such as "01:02:03.500"
 * @param format - Grammar to apply (default vtt)
 * @returns Milliseconds, or null when the text is not a timestamp
 */
export function timestampToMs(text: string, format: SubtitleFormat = 'vtt'): Milliseconds | null {
  return CODECS[format].parse(text);
}

/**
 * Formats milliseconds as a fixed-width timestamp
 * @param ms - Non-negative millisecond count
 * @param format - Grammar to emit (default vtt)
 */
export function msToTimestamp(ms: Milliseconds, format: SubtitleFormat = 'vtt'): string {
  return CODECS[format].format(ms);
}
