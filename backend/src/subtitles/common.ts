import { SubtitleDocument } from './document';
import { PreconditionError } from './errors';
import { lookingAt } from './textSearch';
import { Cue, FormatEngine, Milliseconds, Position, SubtitleEngine } from './types';

interface CueSpan {
  start: Position;
  end: Position;
  ms: Milliseconds;
}

/**
 * Adds the format-independent readers and edits to a format engine. Each one
 * is expressed through the navigator, so it works the same for every format.
 */
export function withCommonOperations(core: FormatEngine): SubtitleEngine {
  const TS = core.patterns.timestamp;

  function timeAt(doc: SubtitleDocument, pos: Position | null): Milliseconds | null {
    if (pos === null) return null;
    const token = lookingAt(doc.text, TS, pos);
    return token ? core.timestampToMs(token[0]) : null;
  }

  function cueText(doc: SubtitleDocument, pos: Position, id?: string): string | null {
    const start = core.locateTextStart(doc, pos, id);
    const end = core.locateTextEnd(doc, pos, id);
    return start === null || end === null ? null : doc.slice(start, end);
  }

  /** Replaces the timestamp at `at` and returns `pos` adjusted for the edit */
  function writeTimestamp(doc: SubtitleDocument, at: Position, ms: Milliseconds, pos: Position): Position {
    const token = lookingAt(doc.text, TS, at);
    if (!token) {
      throw new PreconditionError(`No timestamp at position ${at}`);
    }
    const end = at + token[0].length;
    const value = core.msToTimestamp(ms);
    doc.replace(at, end, value);
    if (pos >= end) return pos + value.length - token[0].length;
    return pos > at ? at : pos;
  }

  function setTime(
    doc: SubtitleDocument,
    pos: Position,
    ms: Milliseconds,
    locate: (doc: SubtitleDocument, pos: Position) => Position | null
  ): Position {
    return doc.transact(() => {
      const at = locate(doc, pos);
      if (at === null) {
        throw new PreconditionError(`No subtitle at position ${pos}`);
      }
      return writeTimestamp(doc, at, ms, pos);
    });
  }

  function shiftCue(doc: SubtitleDocument, pos: Position, deltaMs: Milliseconds): Position {
    return doc.transact(() => {
      const startAt = core.locateStartTime(doc, pos);
      const stopAt = core.locateStopTime(doc, pos);
      const start = timeAt(doc, startAt);
      const stop = timeAt(doc, stopAt);
      if (startAt === null || stopAt === null || start === null || stop === null) {
        throw new PreconditionError(`No subtitle at position ${pos}`);
      }

      // Stop comes after start in every format, so write it first
      const tracked = writeTimestamp(doc, stopAt, Math.max(0, stop + deltaMs), pos);
      return writeTimestamp(doc, startAt, Math.max(0, start + deltaMs), tracked);
    });
  }

  /** Identifier positions of every cue, in document order */
  function cuePositions(doc: SubtitleDocument): Position[] {
    const positions: Position[] = [];
    let pos = core.locateCueIdentifier(doc, 0) ?? core.nextCueIdentifier(doc, 0);
    while (pos !== null) {
      positions.push(pos);
      const next = core.nextCueIdentifier(doc, pos);
      if (next === null || next <= pos) break;
      pos = next;
    }
    return positions;
  }

  function listCues(doc: SubtitleDocument): Cue[] {
    const cues: Cue[] = [];
    for (const pos of cuePositions(doc)) {
      const id = core.cueId(doc, pos);
      const start = timeAt(doc, core.locateStartTime(doc, pos));
      const stop = timeAt(doc, core.locateStopTime(doc, pos));
      const text = cueText(doc, pos);
      // Cues with an unreadable timing line are left out
      if (id !== null && start !== null && stop !== null && text !== null) {
        cues.push({ id, start, stop, text, position: pos });
      }
    }
    return cues;
  }

  function sortCues(doc: SubtitleDocument): void {
    doc.transact(() => {
      core.sanitize(doc);
      core.validate(doc);

      const spans: CueSpan[] = [];
      for (const pos of cuePositions(doc)) {
        const start = core.locateCueStart(doc, pos);
        const end = core.locateTextEnd(doc, pos);
        const ms = timeAt(doc, core.locateStartTime(doc, pos));
        if (start !== null && end !== null && ms !== null) {
          spans.push({ start, end, ms });
        }
      }

      const sorted = [...spans].sort((a, b) => a.ms - b.ms);
      const blocks = sorted.map((span) => doc.slice(span.start, span.end));
      for (let i = spans.length - 1; i >= 0; i--) {
        const span = spans[i];
        const block = blocks[i];
        if (span && block !== undefined && doc.slice(span.start, span.end) !== block) {
          doc.replace(span.start, span.end, block);
        }
      }

      core.regenerateIds(doc);
    });
  }

  return {
    ...core,
    startTime: (doc, pos, id) => timeAt(doc, core.locateStartTime(doc, pos, id)),
    stopTime: (doc, pos, id) => timeAt(doc, core.locateStopTime(doc, pos, id)),
    cueText,
    setStartTime: (doc, pos, ms) => setTime(doc, pos, ms, core.locateStartTime),
    setStopTime: (doc, pos, ms) => setTime(doc, pos, ms, core.locateStopTime),
    shiftCue,
    listCues,
    sortCues,
  };
}
