/** Error codes used to map engine failures onto responses */
export type SubtitleErrorCode = 'malformed_input' | 'precondition' | 'transaction';

/**
 * Which part of a cue a validation failure was found in. `gap` is a timing
 * line with no blank line before it; `fields` an ass event line without all
 * of its comma-separated fields.
 */
export type ViolationKind = 'id' | 'start' | 'separator' | 'stop' | 'gap' | 'fields';

/**
 * Base class for every failure raised by the subtitle engine.
 * A failure only aborts the requested operation.
 */
export class SubtitleError extends Error {
  readonly code: SubtitleErrorCode;

  constructor(code: SubtitleErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SubtitleError';
    this.code = code;
  }
}

/**
 * An edit was requested against a document state that cannot support it
 */
export class PreconditionError extends SubtitleError {
  constructor(message: string) {
    super('precondition', message);
    this.name = 'PreconditionError';
  }
}

const VIOLATION_LABELS: Record<ViolationKind, string> = {
  id: 'Found invalid subtitle ID',
  start: 'Found invalid start time',
  separator: 'Found invalid separator between start and stop time',
  stop: 'Found invalid stop time',
  gap: 'Found subtitle without a blank line before it',
  fields: 'Found event line with missing fields',
};

/**
 * The validator found a line that breaks the format grammar
 */
export class MalformedInputError extends SubtitleError {
  readonly kind: ViolationKind;
  /** The offending line, without its newline */
  readonly line: string;
  /** 1-based line number */
  readonly lineNumber: number;
  /** Offset of the first character of the line */
  readonly position: number;

  constructor(kind: ViolationKind, line: string, lineNumber: number, position: number) {
    super('malformed_input', `${VIOLATION_LABELS[kind]}: ${JSON.stringify(line)}`);
    this.name = 'MalformedInputError';
    this.kind = kind;
    this.line = line;
    this.lineNumber = lineNumber;
    this.position = position;
  }
}

/**
 * An unexpected exception interrupted a multi-step edit; the document was
 * restored to its state before the edit
 */
export class TransactionError extends SubtitleError {
  constructor(message: string, cause: unknown) {
    super('transaction', message, { cause });
    this.name = 'TransactionError';
  }
}
