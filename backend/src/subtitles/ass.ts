import { SubtitleDocument } from './document';
import { MalformedInputError, PreconditionError, ViolationKind } from './errors';
import { assPatterns } from './patterns';
import { escapeRegExp, lineEnd, lookingAt, matchEnd, searchBackward, searchForward } from './textSearch';
import { assTimestamps } from './timestamps';
import { CueInit, EngineOptions, FormatEngine, Milliseconds, Position } from './types';

const TS = assPatterns.timestamp;
const LINE_START = '(?<![^\\n])';
const DIALOGUE = `${LINE_START}Dialogue:`;
const FIELD = '[^,\\n]*,';
const LINE_BREAK = '\\N';

/** Number of commas before the Text field of an event line */
const TEXT_FIELD_INDEX = 9;

/**
 * Advanced SubStation Alpha: every cue is one `Dialogue:` line in the
 * [Events] section. The line start is the cue position and the start
 * timestamp is its identifier.
 */
export function createAssEngine(options: EngineOptions): FormatEngine {
  const codec = assTimestamps;

  function currentLine(text: string, pos: Position): Position | null {
    const origin = Math.max(0, Math.min(pos, text.length));
    return searchBackward(text, DIALOGUE, origin, () => true)?.index ?? null;
  }

  function lineById(text: string, id: string): Position | null {
    return searchForward(text, `${DIALOGUE}[ \\t]*${FIELD}${escapeRegExp(id)},`, 0)?.index ?? null;
  }

  function findLine(text: string, pos: Position, id?: string): Position | null {
    return id === undefined ? currentLine(text, pos) : lineById(text, id);
  }

  function lineAfter(text: string, from: Position): Position | null {
    return searchForward(text, DIALOGUE, from)?.index ?? null;
  }

  function nextLine(text: string, line: Position): Position | null {
    return lineAfter(text, lineEnd(text, line));
  }

  function previousLine(text: string, line: Position): Position | null {
    if (line === 0) return null;
    return searchBackward(text, DIALOGUE, line - 1, () => true)?.index ?? null;
  }

  function fieldAt(text: string, line: Position, fields: number): Position | null {
    const prefix = lookingAt(text, `Dialogue:[ \\t]*(?:${FIELD}){${fields}}`, line);
    return prefix ? matchEnd(prefix) : null;
  }

  function timestampField(text: string, line: Position, fields: number): Position | null {
    const pos = fieldAt(text, line, fields);
    return pos !== null && lookingAt(text, `${TS}(?=,)`, pos) ? pos : null;
  }

  function textStartAt(text: string, line: Position): Position {
    return fieldAt(text, line, TEXT_FIELD_INDEX) ?? lineEnd(text, line);
  }

  function timeAt(text: string, pos: Position | null): Milliseconds | null {
    if (pos === null) return null;
    const token = lookingAt(text, TS, pos);
    return token ? codec.parse(token[0]) : null;
  }

  function cueIdAt(text: string, line: Position): string | null {
    const start = timestampField(text, line, 1);
    return start === null ? null : lookingAt(text, TS, start)?.[0] ?? null;
  }

  function buildCue(cue: CueInit): { value: string; textOffset: number } {
    const start = cue.start ?? 0;
    const stop = cue.stop ?? start + options.defaultCueLength;
    const text = (cue.text ?? '').replace(/\r?\n/g, LINE_BREAK);
    const value = `Dialogue: 0,${codec.format(start)},${codec.format(stop)},Default,,0,0,0,,${text}\n`;
    return { value, textOffset: value.length - text.length - 1 };
  }

  function insertLineAt(doc: SubtitleDocument, pos: Position, cue: CueInit): Position {
    const { value, textOffset } = buildCue(cue);
    doc.insert(pos, value);
    return pos + textOffset;
  }

  function appendCue(doc: SubtitleDocument, pos: Position, cue: CueInit = {}, afterId?: string): Position {
    return doc.transact(() => {
      const text = doc.text;
      const current = findLine(text, pos, afterId);
      if (current === null && afterId !== undefined) {
        throw new PreconditionError(`Cannot find subtitle ${afterId}`);
      }

      if (current === null) {
        const next = lineAfter(text, pos);
        if (next !== null) {
          return insertLineAt(doc, next, cue);
        }
      }

      const end = current === null ? text.trimEnd().length : lineEnd(text, current);
      if (end > 0 && !lookingAt(text, '\\n', end)) {
        doc.insert(end, '\n');
      }
      return insertLineAt(doc, end > 0 ? end + 1 : 0, cue);
    });
  }

  function prependCue(doc: SubtitleDocument, pos: Position, cue: CueInit = {}, beforeId?: string): Position {
    return doc.transact(() => {
      const text = doc.text;
      const target = findLine(text, pos, beforeId);
      if (target === null && beforeId !== undefined) {
        throw new PreconditionError(`Cannot find subtitle ${beforeId}`);
      }

      const before = target ?? lineAfter(text, pos);
      return before === null ? appendCue(doc, pos, cue) : insertLineAt(doc, before, cue);
    });
  }

  function mergeWithNext(doc: SubtitleDocument, pos: Position): Position {
    return doc.transact(() => {
      const text = doc.text;
      const current = currentLine(text, pos);
      if (current === null) {
        throw new PreconditionError('No subtitle to merge');
      }
      const next = nextLine(text, current);
      if (next === null) {
        throw new PreconditionError('No subtitle to merge into');
      }
      const newStop = timeAt(text, timestampField(text, next, 2));
      if (newStop === null) {
        throw new PreconditionError(`Cannot read stop time of subtitle ${cueIdAt(text, next) ?? ''}`);
      }

      const end = lineEnd(text, current);
      const nextTextStart = textStartAt(text, next);
      const currentEmpty = end === textStartAt(text, current);
      const nextEmpty = lineEnd(text, next) === nextTextStart;
      doc.replace(end, nextTextStart, currentEmpty || nextEmpty ? '' : LINE_BREAK);

      const stop = timestampField(doc.text, current, 2);
      const token = stop === null ? null : lookingAt(doc.text, TS, stop);
      if (stop === null || !token) {
        throw new PreconditionError('Subtitle has no readable stop time');
      }
      doc.replace(stop, stop + token[0].length, codec.format(newStop));
      return current;
    });
  }

  function sanitize(doc: SubtitleDocument): void {
    doc.transact(() => {
      let text = doc.text
        .replace(/[ \t\r]+$/gm, '')
        .replace(/^[ \t]+/gm, '')
        .replace(/^\n+/, '')
        .replace(/^(Dialogue:[^\n]*)\n+(?=Dialogue:)/gm, '$1\n')
        .replace(/^Dialogue:[ \t]*/gm, 'Dialogue: ');
      if (/\S/.test(text)) {
        text = `${text.trimEnd()}\n`;
      }
      if (text !== doc.text) {
        doc.replace(0, doc.length, text);
      }
    });
  }

  const strict = new RegExp(`^${codec.strict}$`);

  function checkDialogueLine(line: string): ViolationKind | null {
    const fields = line.replace(/^Dialogue:[ \t]*/, '').split(',');
    if (!strict.test(fields[1] ?? '')) return 'start';
    if (fields.length < 3) return 'fields';
    if (!strict.test(fields[2] ?? '')) return 'stop';
    if (fields.length <= TEXT_FIELD_INDEX) return 'fields';
    return null;
  }

  function validate(doc: SubtitleDocument): void {
    const text = doc.text;
    if (text.length === 0) return;

    let offset = 0;
    text.split('\n').forEach((line, index) => {
      if (line.startsWith('Dialogue:')) {
        const violation = checkDialogueLine(line);
        if (violation) {
          throw new MalformedInputError(violation, line, index + 1, offset);
        }
      }
      offset += line.length + 1;
    });
  }

  // Event lines are not required to be in order, so every line is checked
  function cueAtTime(doc: SubtitleDocument, ms: Milliseconds): string | null {
    const text = doc.text;
    for (let line = lineAfter(text, 0); line !== null; line = nextLine(text, line)) {
      const start = timeAt(text, timestampField(text, line, 1));
      const stop = timeAt(text, timestampField(text, line, 2));
      if (start !== null && stop !== null && start <= ms && stop >= ms) {
        return cueIdAt(text, line);
      }
    }
    return null;
  }

  return {
    format: 'ass',
    patterns: assPatterns,

    timestampToMs: (text) => codec.parse(text),
    msToTimestamp: (ms) => codec.format(ms),

    locateCueIdentifier: (doc, pos, id) => findLine(doc.text, pos, id),
    locateCueStart: (doc, pos, id) => findLine(doc.text, pos, id),

    nextCueIdentifier(doc, pos) {
      const current = currentLine(doc.text, pos);
      return current === null ? lineAfter(doc.text, pos) : nextLine(doc.text, current);
    },

    previousCueIdentifier(doc, pos) {
      const current = currentLine(doc.text, pos);
      return current === null ? null : previousLine(doc.text, current);
    },

    locateStartTime(doc, pos, id) {
      const line = findLine(doc.text, pos, id);
      return line === null ? null : timestampField(doc.text, line, 1);
    },

    locateStopTime(doc, pos, id) {
      const line = findLine(doc.text, pos, id);
      return line === null ? null : timestampField(doc.text, line, 2);
    },

    locateTextStart(doc, pos, id) {
      const line = findLine(doc.text, pos, id);
      return line === null ? null : textStartAt(doc.text, line);
    },

    locateTextEnd(doc, pos, id) {
      const line = findLine(doc.text, pos, id);
      return line === null ? null : lineEnd(doc.text, line);
    },

    cueId(doc, pos) {
      const line = currentLine(doc.text, pos);
      return line === null ? null : cueIdAt(doc.text, line);
    },

    cueAtTime,
    makeCue: (cue = {}) => buildCue(cue).value,
    prependCue,
    appendCue,
    mergeWithNext,
    regenerateIds: (_doc, pos = 0) => pos,
    sanitize,
    validate,
  };
}
