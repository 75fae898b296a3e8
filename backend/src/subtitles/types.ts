import type { SubtitleDocument } from './document';

/**
 * Supported subtitle formats
 * - vtt: cues identified by their start timestamp
 * - srt: cues identified by a numeric index line
 * - ass: one `Dialogue:` line per cue
 */
export type SubtitleFormat = 'srt' | 'vtt' | 'ass';

export const SUBTITLE_FORMATS: readonly SubtitleFormat[] = ['srt', 'vtt', 'ass'];

/** Zero-based offset into the document text */
export type Position = number;

/** Integer millisecond count */
export type Milliseconds = number;

/**
 * The grammars bound to a format, as regular expression sources.
 * Frozen once created; the engines compose them into larger patterns.
 */
export interface PatternSet {
  readonly timestamp: string;
  readonly separator: string;
  /** Optional identifier line, null when the format has none */
  readonly identifier: string | null;
}

/**
 * Values used to synthesize a new cue
 */
export interface CueInit {
  /** Start time in milliseconds (default 0) */
  start?: Milliseconds;
  /** Stop time in milliseconds (default start + default cue length) */
  stop?: Milliseconds;
  /** Cue text, may span several lines (default empty) */
  text?: string;
  /** Identifier line for index-based formats */
  id?: string;
}

/**
 * Read-only projection of a cue, produced on demand
 */
export interface Cue {
  id: string;
  start: Milliseconds;
  stop: Milliseconds;
  text: string;
  /** Position of the cue identifier */
  position: Position;
}

/**
 * Engine behaviour that callers may tune per document
 */
export interface EngineOptions {
  /** Length of a synthesized cue when no stop time is given */
  defaultCueLength: Milliseconds;
}

/**
 * Operations every format implements. Navigator methods never mutate the
 * document and return null when the requested element does not exist.
 */
export interface FormatEngine {
  readonly format: SubtitleFormat;
  readonly patterns: PatternSet;

  timestampToMs(text: string): Milliseconds | null;
  msToTimestamp(ms: Milliseconds): string;

  locateCueIdentifier(doc: SubtitleDocument, pos: Position, id?: string): Position | null;
  locateCueStart(doc: SubtitleDocument, pos: Position, id?: string): Position | null;
  nextCueIdentifier(doc: SubtitleDocument, pos: Position): Position | null;
  previousCueIdentifier(doc: SubtitleDocument, pos: Position): Position | null;
  locateStartTime(doc: SubtitleDocument, pos: Position, id?: string): Position | null;
  locateStopTime(doc: SubtitleDocument, pos: Position, id?: string): Position | null;
  locateTextStart(doc: SubtitleDocument, pos: Position, id?: string): Position | null;
  locateTextEnd(doc: SubtitleDocument, pos: Position, id?: string): Position | null;
  cueId(doc: SubtitleDocument, pos: Position): string | null;
  cueAtTime(doc: SubtitleDocument, ms: Milliseconds): string | null;

  makeCue(cue?: CueInit): string;
  prependCue(doc: SubtitleDocument, pos: Position, cue?: CueInit, beforeId?: string): Position;
  appendCue(doc: SubtitleDocument, pos: Position, cue?: CueInit, afterId?: string): Position;
  mergeWithNext(doc: SubtitleDocument, pos: Position): Position;
  /** Renumbers index-based cues, returning `pos` shifted by the edits before it */
  regenerateIds(doc: SubtitleDocument, pos?: Position): Position;

  sanitize(doc: SubtitleDocument): void;
  /** Throws MalformedInputError for the first violation found */
  validate(doc: SubtitleDocument): void;
}

/**
 * The full contract handed to callers: the format engine plus the
 * format-independent operations built on top of it
 */
export interface SubtitleEngine extends FormatEngine {
  startTime(doc: SubtitleDocument, pos: Position, id?: string): Milliseconds | null;
  stopTime(doc: SubtitleDocument, pos: Position, id?: string): Milliseconds | null;
  cueText(doc: SubtitleDocument, pos: Position, id?: string): string | null;
  setStartTime(doc: SubtitleDocument, pos: Position, ms: Milliseconds): Position;
  setStopTime(doc: SubtitleDocument, pos: Position, ms: Milliseconds): Position;
  shiftCue(doc: SubtitleDocument, pos: Position, deltaMs: Milliseconds): Position;
  listCues(doc: SubtitleDocument): Cue[];
  sortCues(doc: SubtitleDocument): void;
}
