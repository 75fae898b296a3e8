import { assTimestamps, srtTimestamps, vttTimestamps } from './timestamps';
import { PatternSet, SubtitleFormat } from './types';

/**
 * A WebVTT comment block: the NOTE keyword line, its continuation lines and
 * the blank line(s) closing it
 */
export const VTT_COMMENT_BLOCK = 'NOTE(?:[ \\t][^\\n]*)?\\n(?:[^\\n]*\\S[^\\n]*\\n)*(?:[ \\t]*\\n)+';

/** One or more blank lines following the newline that ends a cue */
const BLANK_LINES = '(?:[ \\t]*\\n){2,}';

/** A non-blank line that is not a start/stop transition line */
const VTT_IDENTIFIER = '(?=[^\\n]*\\S)(?:(?!-->)[^\\n])+';

export const vttPatterns: PatternSet = Object.freeze({
  timestamp: vttTimestamps.pattern,
  separator: `${BLANK_LINES}(?:${VTT_COMMENT_BLOCK})*`,
  identifier: VTT_IDENTIFIER,
});

export const srtPatterns: PatternSet = Object.freeze({
  timestamp: srtTimestamps.pattern,
  separator: BLANK_LINES,
  identifier: '\\d+',
});

export const assPatterns: PatternSet = Object.freeze({
  timestamp: assTimestamps.pattern,
  separator: '\\n(?:[ \\t]*\\n)*',
  identifier: null,
});

const PATTERN_SETS: Record<SubtitleFormat, PatternSet> = {
  vtt: vttPatterns,
  srt: srtPatterns,
  ass: assPatterns,
};

export function patternSet(format: SubtitleFormat): PatternSet {
  return PATTERN_SETS[format];
}
