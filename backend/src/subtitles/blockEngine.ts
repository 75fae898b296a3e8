import { SubtitleDocument } from './document';
import { MalformedInputError, PreconditionError, ViolationKind } from './errors';
import {
  groupStart,
  lineEnd,
  lookingAt,
  matchEnd,
  nextLineStart,
  searchBackward,
  searchForward,
} from './textSearch';
import { TimestampCodec } from './timestamps';
import { CueInit, EngineOptions, FormatEngine, Milliseconds, PatternSet, Position } from './types';

/**
 * Grammar of a format whose cues are blocks of lines separated by blank
 * lines: an optional identifier line, a `START --> STOP` timing line and the
 * cue text
 */
export interface BlockGrammar {
  format: 'srt' | 'vtt';
  codec: TimestampCodec;
  patterns: PatternSet;
  /**
   * A cue head as it appears right after a separator. Must define the named
   * groups `head` (first character of the cue) and `anchor` (identifier).
   */
  head: string;
  /** Same as `head`, restricted to the cue whose identifier is `id` */
  headFor(id: string): string;
  /** What may sit between a separator and the timing line */
  timingPrefix: string;
  /** Pattern the identifier must match at the anchor */
  identifierAt: string;
  /** Whether the identifier has a line of its own above the timing line */
  identifierLine: boolean;
  /** Comment blocks a separator may carry */
  comment: string | null;
  /** Strict grammar of identifier lines, null if they are not checked */
  strictIdentifier: RegExp | null;
  /** Allowed after the stop timestamp on the timing line */
  timingTail: string;
  /** Blocks opened by these lines are never cues */
  skipBlock: RegExp | null;
  /** Index lines are rewritten 1..n after structural edits */
  renumbers: boolean;
  renderCue(timing: string, text: string, id: string | undefined): string;
}

interface CueHead {
  start: Position;
  anchor: Position;
}

const ARROW = '[ \\t]*-->[ \\t]*';
const CANONICAL_ARROW = ' --> ';

/**
 * Builds the navigator, editor, sanitizer and validator for a block format.
 * Every operation scans the document text around the given position; nothing
 * is cached between calls.
 */
export function createBlockEngine(grammar: BlockGrammar, options: EngineOptions): FormatEngine {
  const { codec, patterns } = grammar;
  const TS = patterns.timestamp;
  const SEP = patterns.separator;
  const comments = grammar.comment ? `(?:${grammar.comment})*` : '';

  const CUE = `(?:${SEP}|^\\s*)${grammar.head}`;
  // An empty cue text may leave a single newline between timing line and next cue
  const TEXT_END_HERE = `(?:[ \\t]*\\n)+${comments}${grammar.head}|\\s*(?![\\s\\S])`;
  const TEXT_END = `${SEP}${grammar.head}|\\s*(?![\\s\\S])`;

  // Navigation

  function toHead(match: RegExpExecArray | null): CueHead | null {
    if (!match) return null;
    const start = groupStart(match, 'head');
    const anchor = groupStart(match, 'anchor');
    return start === null || anchor === null ? null : { start, anchor };
  }

  function verified(text: string, head: CueHead | null): CueHead | null {
    return head && lookingAt(text, grammar.identifierAt, head.anchor) ? head : null;
  }

  function headStartingBefore(text: string, limit: Position, inclusive: boolean): CueHead | null {
    const match = searchBackward(text, CUE, limit, (candidate) => {
      const start = groupStart(candidate, 'head');
      return start !== null && (inclusive ? start <= limit : start < limit);
    });
    return verified(text, toHead(match));
  }

  function currentHead(text: string, pos: Position): CueHead | null {
    return headStartingBefore(text, Math.max(0, Math.min(pos, text.length)), true);
  }

  function findHead(text: string, pos: Position, id?: string): CueHead | null {
    if (id === undefined) {
      return currentHead(text, pos);
    }
    const match = searchForward(text, `(?:${SEP}|^\\s*)${grammar.headFor(id)}`, 0);
    return verified(text, toHead(match));
  }

  function headAfter(text: string, from: Position): CueHead | null {
    return verified(text, toHead(searchForward(text, CUE, from)));
  }

  function timingStart(text: string, head: CueHead): Position {
    return grammar.identifierLine ? nextLineStart(text, head.anchor) : head.anchor;
  }

  function nextHead(text: string, head: CueHead): CueHead | null {
    return headAfter(text, lineEnd(text, timingStart(text, head)));
  }

  function previousHead(text: string, head: CueHead): CueHead | null {
    return headStartingBefore(text, head.start, false);
  }

  function startTimeAt(text: string, head: CueHead): Position | null {
    const timing = timingStart(text, head);
    return lookingAt(text, TS, timing) ? timing : null;
  }

  function stopTimeAt(text: string, head: CueHead): Position | null {
    const start = startTimeAt(text, head);
    if (start === null) return null;
    const arrow = searchForward(text, ARROW, start);
    if (!arrow || arrow.index > lineEnd(text, start)) return null;
    const stop = matchEnd(arrow);
    return lookingAt(text, TS, stop) ? stop : null;
  }

  function textStartAt(text: string, head: CueHead): Position {
    return nextLineStart(text, timingStart(text, head));
  }

  function textEndAt(text: string, head: CueHead): Position {
    const textStart = textStartAt(text, head);
    if (lookingAt(text, TEXT_END_HERE, textStart)) {
      return textStart;
    }
    const boundary = searchForward(text, TEXT_END, textStart);
    return boundary ? boundary.index : text.length;
  }

  function timeAt(text: string, pos: Position | null): Milliseconds | null {
    if (pos === null) return null;
    const token = lookingAt(text, TS, pos);
    return token ? codec.parse(token[0]) : null;
  }

  function cueIdAt(text: string, head: CueHead): string | null {
    return lookingAt(text, grammar.identifierAt, head.anchor)?.[0] ?? null;
  }

  // Editing

  function buildCue(cue: CueInit): { value: string; textOffset: number } {
    const start = cue.start ?? 0;
    const stop = cue.stop ?? start + options.defaultCueLength;
    const text = cue.text ?? '';
    const timing = `${codec.format(start)}${CANONICAL_ARROW}${codec.format(stop)}`;
    const value = grammar.renderCue(timing, text, cue.id);
    return { value, textOffset: value.length - text.length - 1 };
  }

  function writeTimestamp(doc: SubtitleDocument, pos: Position | null, ms: Milliseconds): void {
    const token = pos === null ? null : lookingAt(doc.text, TS, pos);
    if (pos === null || !token) {
      throw new PreconditionError('Subtitle has no readable timestamp to replace');
    }
    doc.replace(pos, pos + token[0].length, codec.format(ms));
  }

  /** Makes sure one blank line follows `end` and returns the offset after it */
  function ensureSeparator(doc: SubtitleDocument, end: Position): Position {
    let gap = lookingAt(doc.text, '[ \\t]*\\n[ \\t]*\\n', end);
    while (!gap) {
      doc.insert(end, '\n');
      gap = lookingAt(doc.text, '[ \\t]*\\n[ \\t]*\\n', end);
    }
    return matchEnd(gap);
  }

  /** Inserts a cue block right in front of an existing cue head */
  function insertBefore(doc: SubtitleDocument, head: CueHead, cue: CueInit): Position {
    const { value, textOffset } = buildCue(cue);
    doc.insert(head.start, value);
    const following = head.start + value.length;
    if (lookingAt(doc.text, `[ \\t]*${grammar.head}`, following)) {
      doc.insert(following, '\n');
    }
    return regenerateIds(doc, head.start + textOffset);
  }

  function regenerateIds(doc: SubtitleDocument, pos: Position = 0): Position {
    if (!grammar.renumbers) return pos;

    return doc.transact(() => {
      let tracked = pos;
      let cursor = 0;
      let index = 1;

      for (let head = headAfter(doc.text, cursor); head; head = headAfter(doc.text, cursor)) {
        const current = cueIdAt(doc.text, head) ?? '';
        const wanted = String(index);
        if (current !== wanted) {
          const end = head.anchor + current.length;
          doc.replace(head.anchor, end, wanted);
          if (end <= tracked) {
            tracked += wanted.length - current.length;
          } else if (head.anchor < tracked) {
            tracked = head.anchor;
          }
        }
        cursor = head.anchor + wanted.length;
        index++;
      }
      return tracked;
    });
  }

  function appendCue(doc: SubtitleDocument, pos: Position, cue: CueInit = {}, afterId?: string): Position {
    return doc.transact(() => {
      const text = doc.text;
      const current = findHead(text, pos, afterId);
      if (!current && afterId !== undefined) {
        throw new PreconditionError(`Cannot find subtitle ${afterId}`);
      }

      const next = current ? nextHead(text, current) : headAfter(text, pos);
      if (next) {
        return insertBefore(doc, next, cue);
      }

      let insertAt: Position;
      if (current || /\S/.test(text)) {
        const end = current ? textEndAt(text, current) : text.trimEnd().length;
        if (!/\S/.test(text.slice(end))) {
          doc.delete(end, doc.length);
        }
        insertAt = ensureSeparator(doc, end);
      } else {
        doc.delete(0, doc.length);
        insertAt = 0;
      }

      const { value, textOffset } = buildCue(cue);
      doc.insert(insertAt, value);
      return regenerateIds(doc, insertAt + textOffset);
    });
  }

  function prependCue(doc: SubtitleDocument, pos: Position, cue: CueInit = {}, beforeId?: string): Position {
    return doc.transact(() => {
      const text = doc.text;
      const target = findHead(text, pos, beforeId);
      if (!target && beforeId !== undefined) {
        throw new PreconditionError(`Cannot find subtitle ${beforeId}`);
      }

      const before = target ?? headAfter(text, pos);
      return before ? insertBefore(doc, before, cue) : appendCue(doc, pos, cue);
    });
  }

  function mergeWithNext(doc: SubtitleDocument, pos: Position): Position {
    return doc.transact(() => {
      const text = doc.text;
      const current = currentHead(text, pos);
      if (!current) {
        throw new PreconditionError('No subtitle to merge');
      }
      const next = nextHead(text, current);
      if (!next) {
        throw new PreconditionError('No subtitle to merge into');
      }
      const newStop = timeAt(text, stopTimeAt(text, next));
      if (newStop === null) {
        throw new PreconditionError(`Cannot read stop time of subtitle ${cueIdAt(text, next) ?? ''}`);
      }

      const end = textEndAt(text, current);
      const nextTextStart = textStartAt(text, next);
      if (end === textStartAt(text, current)) {
        doc.delete(end, nextTextStart);
      } else if (textEndAt(text, next) === nextTextStart) {
        // Whatever followed the empty cue, separator included, stays
        doc.delete(end, lineEnd(text, timingStart(text, next)));
      } else {
        doc.replace(end, nextTextStart, '\n');
      }

      writeTimestamp(doc, stopTimeAt(doc.text, current), newStop);
      return regenerateIds(doc, current.anchor);
    });
  }

  // Maintenance

  function canonicalGap(gap: string): string {
    if (!grammar.comment) return '\n\n';
    const blocks = gap.match(new RegExp(grammar.comment, 'g')) ?? [];
    return ['', ...blocks.map((block) => block.trimEnd()), ''].join('\n\n');
  }

  function sanitize(doc: SubtitleDocument): void {
    doc.transact(() => {
      const stripped = doc.text
        .replace(/[ \t\r]+$/gm, '')
        .replace(/^[ \t]+/gm, '')
        .replace(/^\n+/, '');
      doc.replace(0, doc.length, stripped);

      // Exactly one blank line (plus any comment blocks) between cues
      let current = headAfter(doc.text, 0);
      while (current) {
        const next = nextHead(doc.text, current);
        if (!next) break;
        const end = textEndAt(doc.text, current);
        const gap = doc.slice(end, next.start);
        const wanted = canonicalGap(gap);
        if (gap !== wanted) {
          doc.replace(end, next.start, wanted);
        }
        const shift = wanted.length - gap.length;
        current = { start: next.start + shift, anchor: next.anchor + shift };
      }

      // One trailing newline, two when the last cue has no text
      const text = doc.text;
      if (/\S/.test(text)) {
        const last = currentHead(text, text.length);
        const end = last ? textEndAt(text, last) : text.trimEnd().length;
        const emptyText = last !== null && end === textStartAt(text, last);
        const tail = emptyText && !text.slice(0, end).endsWith('\n') ? '\n\n' : '\n';
        if (text.slice(end) !== tail) {
          doc.replace(end, text.length, tail);
        }
      }

      const arrows = new RegExp(`^(${TS})${ARROW}`, 'gm');
      const normalized = doc.text.replace(arrows, `$1${CANONICAL_ARROW}`);
      if (normalized !== doc.text) {
        doc.replace(0, doc.length, normalized);
      }
    });
  }

  /**
   * Checks a timing line in order: start time, separator token, stop time.
   * Returns the first stage that fails.
   */
  const strictStart = new RegExp(`^${codec.strict}$`);
  const strictStop = new RegExp(`^${codec.strict}${grammar.timingTail}$`);

  function checkTimingLine(line: string): ViolationKind | null {
    const startToken = lookingAt(line, TS, 0)?.[0] ?? '';
    if (!strictStart.test(startToken)) return 'start';
    const rest = line.slice(startToken.length);
    if (!rest.startsWith(CANONICAL_ARROW)) return 'separator';
    if (!strictStop.test(rest.slice(CANONICAL_ARROW.length))) return 'stop';
    return null;
  }

  function validate(doc: SubtitleDocument): void {
    const text = doc.text;
    if (text.length === 0) return;

    const lines = text.split('\n');
    const offsets: number[] = [];
    let offset = 0;
    for (const line of lines) {
      offsets.push(offset);
      offset += line.length + 1;
    }

    const startsWithTimestamp = (line: string): boolean => lookingAt(line, TS, 0) !== null;
    const fail = (kind: ViolationKind, index: number): never => {
      throw new MalformedInputError(kind, lines[index] ?? '', index + 1, offsets[index] ?? 0);
    };

    let index = 0;
    while (index < lines.length) {
      const first = lines[index] ?? '';
      if (/^[ \t]*$/.test(first)) {
        index++;
        continue;
      }

      let blockEnd = index;
      while (blockEnd < lines.length && !/^[ \t]*$/.test(lines[blockEnd] ?? '')) blockEnd++;

      if (!grammar.skipBlock?.test(first)) {
        const second = index + 1 < blockEnd ? lines[index + 1] : undefined;
        let timing: number | null = null;
        if (startsWithTimestamp(first)) {
          timing = index;
          if (grammar.strictIdentifier) fail('id', index);
        } else if (second !== undefined && (startsWithTimestamp(second) || grammar.strictIdentifier?.test(first))) {
          timing = index + 1;
          if (grammar.strictIdentifier && !grammar.strictIdentifier.test(first)) fail('id', index);
        }

        if (timing !== null) {
          const violation = checkTimingLine(lines[timing] ?? '');
          if (violation) fail(violation, timing);
        }

        // Any further timing line in the block lacks the blank line before it
        for (let line = timing === null ? index : timing + 1; line < blockEnd; line++) {
          const content = lines[line] ?? '';
          if (startsWithTimestamp(content)) {
            fail(checkTimingLine(content) ?? 'gap', line);
          }
        }
      }
      index = blockEnd;
    }
  }

  function cueAtTime(doc: SubtitleDocument, ms: Milliseconds): string | null {
    const text = doc.text;
    const hours = Math.floor(ms / 3600000).toString().padStart(2, '0');
    const minutes = Math.floor((ms % 3600000) / 60000).toString().padStart(2, '0');
    const region = `(?:${SEP}|^\\s*)${grammar.timingPrefix}`;

    // Jump to the first cue of the hour, then of the minute, before scanning
    let candidate: CueHead | null = null;
    const hourMatch = searchForward(text, `${region}${hours}:`, 0);
    if (hourMatch) {
      const minuteMatch = searchForward(text, `${region}${hours}:${minutes}:`, hourMatch.index);
      candidate = currentHead(text, matchEnd(minuteMatch ?? hourMatch));
    }

    // A cue that began in the previous region may still cover ms
    let head = candidate ? previousHead(text, candidate) ?? candidate : headAfter(text, 0);
    while (head) {
      const start = timeAt(text, startTimeAt(text, head));
      if (start !== null && start > ms) break;
      const stop = timeAt(text, stopTimeAt(text, head));
      if (start !== null && stop !== null && stop >= ms) {
        return cueIdAt(text, head);
      }
      head = nextHead(text, head);
    }
    return null;
  }

  return {
    format: grammar.format,
    patterns,

    timestampToMs: (text) => codec.parse(text),
    msToTimestamp: (ms) => codec.format(ms),

    locateCueIdentifier: (doc, pos, id) => findHead(doc.text, pos, id)?.anchor ?? null,
    locateCueStart: (doc, pos, id) => findHead(doc.text, pos, id)?.start ?? null,

    nextCueIdentifier(doc, pos) {
      const current = currentHead(doc.text, pos);
      const next = current ? nextHead(doc.text, current) : headAfter(doc.text, pos);
      return next?.anchor ?? null;
    },

    previousCueIdentifier(doc, pos) {
      const current = currentHead(doc.text, pos);
      return current ? previousHead(doc.text, current)?.anchor ?? null : null;
    },

    locateStartTime(doc, pos, id) {
      const head = findHead(doc.text, pos, id);
      return head ? startTimeAt(doc.text, head) : null;
    },

    locateStopTime(doc, pos, id) {
      const head = findHead(doc.text, pos, id);
      return head ? stopTimeAt(doc.text, head) : null;
    },

    locateTextStart(doc, pos, id) {
      const head = findHead(doc.text, pos, id);
      return head ? textStartAt(doc.text, head) : null;
    },

    locateTextEnd(doc, pos, id) {
      const head = findHead(doc.text, pos, id);
      return head ? textEndAt(doc.text, head) : null;
    },

    cueId(doc, pos) {
      const head = currentHead(doc.text, pos);
      return head ? cueIdAt(doc.text, head) : null;
    },

    cueAtTime,
    makeCue: (cue = {}) => buildCue(cue).value,
    prependCue,
    appendCue,
    mergeWithNext,
    regenerateIds,
    sanitize,
    validate,
  };
}
