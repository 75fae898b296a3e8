import { MalformedInputError, SubtitleError } from '../subtitles/errors';

/**
 * The request body or query is missing a field or has one of the wrong type
 */
export class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BadRequestError';
  }
}

export interface ErrorResponse {
  status: number;
  body: Record<string, unknown>;
}

/**
 * Maps a failure onto the status code and JSON body sent to the client
 */
export function toErrorResponse(err: Error, exposeInternal: boolean): ErrorResponse {
  if (err instanceof BadRequestError) {
    return { status: 400, body: { error: err.message } };
  }

  if (err instanceof MalformedInputError) {
    return {
      status: 422,
      body: {
        error: err.message,
        code: err.code,
        kind: err.kind,
        line: err.line,
        lineNumber: err.lineNumber,
        position: err.position,
      },
    };
  }

  if (err instanceof SubtitleError) {
    const status = err.code === 'precondition' ? 409 : 500;
    return { status, body: { error: err.message, code: err.code } };
  }

  // body-parser sets a client error status on bad or oversized payloads
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return { status: err.status, body: { error: err.message } };
  }

  return {
    status: 500,
    body: { error: exposeInternal ? err.message : 'Internal server error' },
  };
}
