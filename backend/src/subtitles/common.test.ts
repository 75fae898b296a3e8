import { describe, it, expect } from 'vitest';
import { SubtitleDocument } from './document';
import { createEngine } from './engine';
import { MalformedInputError, PreconditionError } from './errors';

const vtt = createEngine('vtt');
const srt = createEngine('srt');
const ass = createEngine('ass');

const VTT_CUES = `WEBVTT

00:00:01.000 --> 00:00:02.000
Hello

00:00:03.000 --> 00:00:04.000
World
`;

describe('listCues', () => {
  it('should project every vtt cue', () => {
    expect(vtt.listCues(new SubtitleDocument(VTT_CUES))).toEqual([
      { id: '00:00:01.000', start: 1000, stop: 2000, text: 'Hello', position: 8 },
      { id: '00:00:03.000', start: 3000, stop: 4000, text: 'World', position: 45 },
    ]);
  });

  it('should project srt cues with their index', () => {
    const doc = new SubtitleDocument('1\n00:00:01,000 --> 00:00:02,000\nHello\n\n2\n00:00:03,000 --> 00:00:04,000\nWorld\n');
    expect(srt.listCues(doc).map((cue) => [cue.id, cue.position, cue.text])).toEqual([
      ['1', 0, 'Hello'],
      ['2', 39, 'World'],
    ]);
  });

  it('should project ass Dialogue lines', () => {
    const doc = new SubtitleDocument(
      '[Events]\nDialogue: 0,0:00:01.00,0:00:02.00,Default,,0,0,0,,Hi\nDialogue: 0,0:00:03.00,0:00:04.50,Default,,0,0,0,,Yo\n'
    );
    expect(ass.listCues(doc)).toEqual([
      { id: '0:00:01.00', start: 1000, stop: 2000, text: 'Hi', position: 9 },
      { id: '0:00:03.00', start: 3000, stop: 4500, text: 'Yo', position: 62 },
    ]);
  });

  it('should return nothing for an empty document', () => {
    expect(vtt.listCues(new SubtitleDocument(''))).toEqual([]);
  });
});

describe('setStartTime / setStopTime', () => {
  it('should rewrite the timestamps of the current cue', () => {
    const doc = new SubtitleDocument(VTT_CUES);
    expect(vtt.setStartTime(doc, 50, 3500)).toBe(45);
    expect(vtt.setStopTime(doc, 45, 4500)).toBe(45);
    expect(vtt.cueAtTime(doc, 4200)).toBe('00:00:03.500');
    expect(doc.text).toContain('00:00:03.500 --> 00:00:04.500\nWorld');
  });

  it('should shift positions after a timestamp that changes length', () => {
    const doc = new SubtitleDocument(VTT_CUES);
    const pos = vtt.setStartTime(doc, 38, 360000000);

    expect(doc.slice(8, 38)).toBe('100:00:00.000 --> 00:00:02.000');
    expect(pos).toBe(39);
    expect(doc.slice(pos, pos + 5)).toBe('Hello');
  });

  it('should fail when no cue is at the position', () => {
    const doc = new SubtitleDocument(VTT_CUES);
    expect(() => vtt.setStartTime(doc, 0, 1000)).toThrow(new PreconditionError('No subtitle at position 0'));
    expect(doc.text).toBe(VTT_CUES);
  });
});

describe('shiftCue', () => {
  it('should move both times of the cue', () => {
    const doc = new SubtitleDocument(VTT_CUES);
    expect(vtt.shiftCue(doc, 8, 500)).toBe(8);
    expect(doc.slice(8, 37)).toBe('00:00:01.500 --> 00:00:02.500');
  });

  it('should clamp at zero', () => {
    const doc = new SubtitleDocument(VTT_CUES);
    vtt.shiftCue(doc, 8, -5000);
    expect(doc.slice(8, 37)).toBe('00:00:00.000 --> 00:00:00.000');
  });

  it('should work on ass Dialogue lines', () => {
    const doc = new SubtitleDocument('Dialogue: 0,0:00:01.00,0:00:02.00,Default,,0,0,0,,Hi\n');
    ass.shiftCue(doc, 0, 1000);
    expect(doc.text).toBe('Dialogue: 0,0:00:02.00,0:00:03.00,Default,,0,0,0,,Hi\n');
  });
});

describe('sortCues', () => {
  it('should order vtt cues by start time', () => {
    const doc = new SubtitleDocument('00:00:03.000 --> 00:00:04.000\nB\n\n00:00:01.000 --> 00:00:02.000\nA\n');
    vtt.sortCues(doc);
    expect(doc.text).toBe('00:00:01.000 --> 00:00:02.000\nA\n\n00:00:03.000 --> 00:00:04.000\nB\n');
  });

  it('should renumber srt cues after sorting', () => {
    const doc = new SubtitleDocument('1\n00:00:03,000 --> 00:00:04,000\nB\n\n2\n00:00:01,000 --> 00:00:02,000\nA\n');
    srt.sortCues(doc);
    expect(doc.text).toBe('1\n00:00:01,000 --> 00:00:02,000\nA\n\n2\n00:00:03,000 --> 00:00:04,000\nB\n');
  });

  it('should keep the order of cues that start together', () => {
    const doc = new SubtitleDocument(
      'Dialogue: 0,0:00:05.00,0:00:06.00,Default,,0,0,0,,C\n' +
        'Dialogue: 0,0:00:01.00,0:00:02.00,Default,,0,0,0,,A\n' +
        'Dialogue: 0,0:00:01.00,0:00:03.00,Default,,0,0,0,,B\n'
    );
    ass.sortCues(doc);
    expect(ass.listCues(doc).map((cue) => cue.text)).toEqual(['A', 'B', 'C']);
  });

  it('should roll back the sanitize pass when validation fails', () => {
    const original = '00:00:03.000 --> 00:00:04.000\nB\n\n\n00:00:01.000 -> 00:00:02.000\nA\n';
    const doc = new SubtitleDocument(original);
    expect(() => vtt.sortCues(doc)).toThrow(MalformedInputError);
    expect(doc.text).toBe(original);
  });
});
