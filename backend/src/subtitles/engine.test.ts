import { describe, it, expect } from 'vitest';
import { createEngine, detectFormat, isSubtitleFormat } from './engine';
import { patternSet } from './patterns';

describe('createEngine', () => {
  it('should build an engine for each format', () => {
    expect(createEngine('vtt').format).toBe('vtt');
    expect(createEngine('srt').format).toBe('srt');
    expect(createEngine('ass').format).toBe('ass');
  });

  it('should expose the frozen pattern set of the format', () => {
    const engine = createEngine('srt');
    expect(engine.patterns).toBe(patternSet('srt'));
    expect(Object.isFrozen(engine.patterns)).toBe(true);
    expect(patternSet('ass').identifier).toBeNull();
  });

  it('should convert timestamps in the format grammar', () => {
    expect(createEngine('srt').msToTimestamp(61001)).toBe('00:01:01,001');
    expect(createEngine('ass').timestampToMs('0:01:01.50')).toBe(61500);
  });
});

describe('isSubtitleFormat', () => {
  it('should only accept known tags', () => {
    expect(isSubtitleFormat('vtt')).toBe(true);
    expect(isSubtitleFormat('txt')).toBe(false);
    expect(isSubtitleFormat(undefined)).toBe(false);
  });
});

describe('detectFormat', () => {
  it('should use the file extension first', () => {
    expect(detectFormat('movie.SRT')).toBe('srt');
    expect(detectFormat('episode.vtt', '1\n00:00:01,000 --> 00:00:02,000\n')).toBe('vtt');
    expect(detectFormat('old.ssa')).toBe('ass');
  });

  it('should fall back to the content', () => {
    expect(detectFormat('notes.txt', 'WEBVTT\n\n00:00:01.000 --> 00:00:02.000\nHi\n')).toBe('vtt');
    expect(detectFormat(undefined, '1\n00:00:01,000 --> 00:00:02,000\nHi\n')).toBe('srt');
    expect(detectFormat(undefined, '[Script Info]\nTitle: Test\n')).toBe('ass');
    expect(detectFormat(undefined, '00:00:01.000 --> 00:00:02.000\nHi\n')).toBe('vtt');
  });

  it('should return null when nothing matches', () => {
    expect(detectFormat(undefined, 'hello')).toBeNull();
    expect(detectFormat('notes.txt')).toBeNull();
  });
});
