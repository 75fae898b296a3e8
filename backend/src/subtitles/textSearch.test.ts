import { describe, it, expect } from 'vitest';
import { SubtitleDocument } from './document';
import { createEngine } from './engine';
import {
  compiledPatternCount,
  lookingAt,
  MAX_COMPILED_PATTERNS,
  searchBackward,
  searchForward,
} from './textSearch';

describe('textSearch', () => {
  it('should match only at the given offset', () => {
    expect(lookingAt('abc def', 'def', 4)?.[0]).toBe('def');
    expect(lookingAt('abc def', 'def', 3)).toBeNull();
  });

  it('should search forward from an offset', () => {
    expect(searchForward('a1b2', '\\d', 2)?.index).toBe(3);
    expect(searchForward('a1b2', '\\d', 4)).toBeNull();
  });

  it('should search backward for a match ending before the origin', () => {
    expect(searchBackward('ab ab', 'ab', 4)?.index).toBe(0);
    expect(searchBackward('ab ab', 'ab', 5)?.index).toBe(3);
  });

  it('should keep a bounded number of compiled patterns', () => {
    const engine = createEngine('vtt');
    const doc = new SubtitleDocument('00:00:01.000 --> 00:00:02.000\nHello\n');

    for (let i = 0; i < MAX_COMPILED_PATTERNS * 2; i++) {
      expect(engine.locateCueIdentifier(doc, 0, `cue-${i}`)).toBeNull();
    }

    expect(compiledPatternCount()).toBe(MAX_COMPILED_PATTERNS);
    expect(engine.locateCueIdentifier(doc, 0, '00:00:01.000')).toBe(0);
    expect(engine.cueText(doc, 0)).toBe('Hello');
  });
});
