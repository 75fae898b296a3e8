import { createBlockEngine } from './blockEngine';
import { srtPatterns } from './patterns';
import { escapeRegExp } from './textSearch';
import { srtTimestamps } from './timestamps';
import { EngineOptions, FormatEngine } from './types';

const TS = srtPatterns.timestamp;

/**
 * SubRip: every cue starts with a numeric index line. Indexes are
 * regenerated after each structural edit.
 */
export function createSrtEngine(options: EngineOptions): FormatEngine {
  return createBlockEngine(
    {
      format: 'srt',
      codec: srtTimestamps,
      patterns: srtPatterns,
      head: `(?<head>(?<anchor>\\d+)[ \\t]*\\n(?=${TS}))`,
      headFor: (id) => `(?<head>(?<anchor>${escapeRegExp(id)})[ \\t]*\\n(?=${TS}))`,
      timingPrefix: '\\d+[ \\t]*\\n',
      identifierAt: '\\d+(?=[ \\t]*\\n)',
      identifierLine: true,
      comment: null,
      strictIdentifier: /^\d+$/,
      timingTail: '',
      skipBlock: null,
      renumbers: true,
      renderCue: (timing, text, id) => `${id ?? '0'}\n${timing}\n${text}\n`,
    },
    options
  );
}
