import { createBlockEngine } from './blockEngine';
import { VTT_COMMENT_BLOCK, vttPatterns } from './patterns';
import { escapeRegExp } from './textSearch';
import { vttTimestamps } from './timestamps';
import { EngineOptions, FormatEngine } from './types';

const TS = vttPatterns.timestamp;
const ID_LINE = `(?:${vttPatterns.identifier ?? ''}\\n)?`;

/**
 * WebVTT: the start timestamp doubles as the cue identifier. A cue may carry
 * an identifier line above its timing line, and NOTE comment blocks may sit
 * between cues.
 */
export function createVttEngine(options: EngineOptions): FormatEngine {
  return createBlockEngine(
    {
      format: 'vtt',
      codec: vttTimestamps,
      patterns: vttPatterns,
      head: `(?<head>${ID_LINE}(?<anchor>${TS}))`,
      headFor: (id) => `(?<head>${ID_LINE}(?<anchor>${escapeRegExp(id)}))(?![\\d.:])`,
      timingPrefix: ID_LINE,
      identifierAt: TS,
      identifierLine: false,
      comment: VTT_COMMENT_BLOCK,
      strictIdentifier: null,
      // Cue settings such as "align:start" may follow the stop time
      timingTail: '(?:[ \\t]+[^\\n]*)?',
      skipBlock: /^(?:WEBVTT|NOTE|STYLE|REGION)(?:[ \t]|$)/,
      renumbers: false,
      renderCue: (timing, text, id) => `${id ? `${id}\n` : ''}${timing}\n${text}\n`,
    },
    options
  );
}
