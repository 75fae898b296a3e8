import { Router, Request, Response, NextFunction } from 'express';
import { config } from '../config';
import { sessionLocks, sessionStore } from '../sessions';
import { EditingSession } from '../sessions/types';
import {
  createEngine,
  CueInit,
  detectFormat,
  isSubtitleFormat,
  MalformedInputError,
  Position,
  SubtitleDocument,
  SubtitleEngine,
  SubtitleFormat,
} from '../subtitles';
import { BadRequestError } from './errors';

const router = Router();

/**
 * Error handler wrapper
 */
const asyncHandler =
  (fn: (req: Request, res: Response, next: NextFunction) => Promise<void>) =>
  (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };

const NAVIGATE_OPERATIONS = [
  'locateCueIdentifier',
  'locateCueStart',
  'nextCueIdentifier',
  'previousCueIdentifier',
  'locateStartTime',
  'locateStopTime',
  'locateTextStart',
  'locateTextEnd',
] as const;

type NavigateOperation = (typeof NAVIGATE_OPERATIONS)[number];

function isNavigateOperation(value: unknown): value is NavigateOperation {
  return NAVIGATE_OPERATIONS.some((operation) => operation === value);
}

const engines = new Map<SubtitleFormat, SubtitleEngine>();

function engineFor(format: SubtitleFormat): SubtitleEngine {
  let engine = engines.get(format);
  if (!engine) {
    engine = createEngine(format, { defaultCueLength: config.defaultCueLength });
    engines.set(format, engine);
  }
  return engine;
}

// Request parsing

function bodyOf(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  return typeof body === 'object' && body !== null ? { ...body } : {};
}

function optionalNumber(body: Record<string, unknown>, key: string): number | undefined {
  const value = body[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new BadRequestError(`${key} must be a number`);
  }
  return Math.trunc(value);
}

function optionalString(body: Record<string, unknown>, key: string): string | undefined {
  const value = body[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new BadRequestError(`${key} must be a string`);
  }
  return value;
}

/** The position named in the request, else the session cursor, clamped to the text */
function positionFrom(body: Record<string, unknown>, session: EditingSession): Position {
  const position = optionalNumber(body, 'position') ?? session.position;
  return Math.max(0, Math.min(position, session.content.length));
}

interface LoadedSession {
  session: EditingSession;
  engine: SubtitleEngine;
  doc: SubtitleDocument;
}

async function loadSession(id: string, res: Response): Promise<LoadedSession | null> {
  const session = await sessionStore.get(id);
  if (!session) {
    res.status(404).json({ error: 'Session not found' });
    return null;
  }
  return { session, engine: engineFor(session.format), doc: new SubtitleDocument(session.content) };
}

/**
 * Runs a handler against a loaded session. Requests on the same session run
 * one at a time, from loading the document to storing the result.
 */
function sessionRoute(handler: (loaded: LoadedSession, req: Request, res: Response) => Promise<void> | void) {
  return asyncHandler(async (req: Request, res: Response) => {
    const id = req.params.id ?? '';
    await sessionLocks.lock(id, async () => {
      const loaded = await loadSession(id, res);
      if (!loaded) return;

      await handler(loaded, req, res);
    });
  });
}

/**
 * Stores the edited text and cursor and sends them back
 */
async function commit(res: Response, loaded: LoadedSession, position: Position): Promise<void> {
  const session = await sessionStore.update(loaded.session.id, loaded.doc.text, position);
  res.json({ position: session.position, content: session.content });
}

/**
 * Runs an edit against a session and persists the result
 */
function editRoute(edit: (loaded: LoadedSession, body: Record<string, unknown>) => Position) {
  return sessionRoute(async (loaded, req, res) => {
    const position = edit(loaded, bodyOf(req));
    await commit(res, loaded, position);
  });
}

/**
 * GET /api/sessions
 * List all sessions
 */
router.get(
  '/',
  asyncHandler(async (_req: Request, res: Response) => {
    const sessions = await sessionStore.list();
    res.json({ sessions });
  })
);

/**
 * POST /api/sessions
 * Open a document for editing
 */
router.post(
  '/',
  asyncHandler(async (req: Request, res: Response) => {
    const body = bodyOf(req);
    const name = optionalString(body, 'name') ?? 'untitled';
    const content = (optionalString(body, 'content') ?? '').replace(/\r\n?/g, '\n');

    const requested = body.format;
    let format: SubtitleFormat | null;
    if (requested === undefined) {
      format = detectFormat(name, content);
    } else if (isSubtitleFormat(requested)) {
      format = requested;
    } else {
      res.status(400).json({ error: 'format must be srt, vtt or ass' });
      return;
    }

    const session = await sessionStore.create({ name, format: format ?? config.defaultFormat, content });
    console.info(`Session ${session.id} opened (${session.format}, ${content.length} chars)`);
    res.status(201).json({ session });
  })
);

/**
 * GET /api/sessions/:id
 * Get the session with its cues
 */
router.get(
  '/:id',
  sessionRoute(({ session, engine, doc }, _req, res) => {
    res.json({ session, cues: engine.listCues(doc) });
  })
);

/**
 * DELETE /api/sessions/:id
 * Delete a session
 */
router.delete(
  '/:id',
  asyncHandler(async (req: Request, res: Response) => {
    const id = req.params.id ?? '';
    const deleted = await sessionLocks.lock(id, () => sessionStore.delete(id));

    if (!deleted) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }

    res.json({ message: 'Session deleted' });
  })
);

/**
 * POST /api/sessions/:id/navigate
 * Move the cursor with a navigator operation. The cursor is kept when the
 * target does not exist.
 */
router.post(
  '/:id/navigate',
  sessionRoute(async (loaded, req, res) => {
    const body = bodyOf(req);
    const { operation } = body;
    if (!isNavigateOperation(operation)) {
      res.status(400).json({ error: 'Unknown operation', operations: NAVIGATE_OPERATIONS });
      return;
    }

    const { engine, doc, session } = loaded;
    const from = positionFrom(body, session);
    const id = optionalString(body, 'id');
    let target: Position | null;
    switch (operation) {
      case 'nextCueIdentifier':
        target = engine.nextCueIdentifier(doc, from);
        break;
      case 'previousCueIdentifier':
        target = engine.previousCueIdentifier(doc, from);
        break;
      default:
        target = engine[operation](doc, from, id);
    }

    if (target === null) {
      res.json({ found: false, position: session.position });
      return;
    }

    await sessionStore.update(session.id, session.content, target);
    res.json({ found: true, position: target, cueId: engine.cueId(doc, target) });
  })
);

/**
 * GET /api/sessions/:id/cue-at?ms=
 * Find the cue shown at a point in time
 */
router.get(
  '/:id/cue-at',
  sessionRoute(({ engine, doc }, req, res) => {
    const ms = Number(req.query.ms);
    if (typeof req.query.ms !== 'string' || !Number.isFinite(ms)) {
      res.status(400).json({ error: 'ms query parameter must be a number' });
      return;
    }

    const id = engine.cueAtTime(doc, ms);
    const position = id === null ? null : engine.locateCueIdentifier(doc, 0, id);
    res.json({ id, position });
  })
);

/**
 * POST /api/sessions/:id/cues
 * Insert a cue before or after the cursor, or next to the cue `target`
 */
router.post(
  '/:id/cues',
  editRoute(({ engine, doc, session }, body) => {
    const placement = body.placement ?? 'after';
    if (placement !== 'before' && placement !== 'after') {
      throw new BadRequestError('placement must be before or after');
    }

    const cue: CueInit = {
      start: optionalNumber(body, 'start'),
      stop: optionalNumber(body, 'stop'),
      text: optionalString(body, 'text'),
      id: optionalString(body, 'id'),
    };
    const target = optionalString(body, 'target');
    const position = positionFrom(body, session);

    return placement === 'before'
      ? engine.prependCue(doc, position, cue, target)
      : engine.appendCue(doc, position, cue, target);
  })
);

/**
 * POST /api/sessions/:id/merge
 * Merge the cue at the cursor with the one after it
 */
router.post(
  '/:id/merge',
  editRoute(({ engine, doc, session }, body) => engine.mergeWithNext(doc, positionFrom(body, session)))
);

/**
 * POST /api/sessions/:id/sanitize
 * Normalise whitespace and separators
 */
router.post(
  '/:id/sanitize',
  editRoute(({ engine, doc, session }) => {
    engine.sanitize(doc);
    return Math.min(session.position, doc.length);
  })
);

/**
 * POST /api/sessions/:id/sort
 * Order cues by start time
 */
router.post(
  '/:id/sort',
  editRoute(({ engine, doc }) => {
    engine.sortCues(doc);
    return 0;
  })
);

/**
 * PATCH /api/sessions/:id/times
 * Shift the cue at the cursor and/or set its start and stop times
 */
router.patch(
  '/:id/times',
  editRoute(({ engine, doc, session }, body) => {
    const shift = optionalNumber(body, 'shift');
    const start = optionalNumber(body, 'start');
    const stop = optionalNumber(body, 'stop');
    if (shift === undefined && start === undefined && stop === undefined) {
      throw new BadRequestError('Provide shift, start or stop');
    }

    return doc.transact(() => {
      let position = positionFrom(body, session);
      if (shift !== undefined) position = engine.shiftCue(doc, position, shift);
      if (start !== undefined) position = engine.setStartTime(doc, position, start);
      if (stop !== undefined) position = engine.setStopTime(doc, position, stop);
      return position;
    });
  })
);

/**
 * POST /api/sessions/:id/validate
 * Check the document against the format grammar
 */
router.post(
  '/:id/validate',
  sessionRoute(({ engine, doc }, _req, res) => {
    try {
      engine.validate(doc);
      res.json({ valid: true });
    } catch (error) {
      if (!(error instanceof MalformedInputError)) throw error;
      res.json({
        valid: false,
        violation: {
          error: error.message,
          kind: error.kind,
          line: error.line,
          lineNumber: error.lineNumber,
          position: error.position,
        },
      });
    }
  })
);

export default router;
