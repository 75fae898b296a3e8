import { Router, Request, Response } from 'express';
import { config } from '../config';
import { SUBTITLE_FORMATS } from '../subtitles';

const router = Router();

/**
 * GET /api/health
 * Health check endpoint
 */
router.get('/', (_req: Request, res: Response) => {
  res.json({
    status: 'healthy',
    formats: SUBTITLE_FORMATS,
    config: {
      defaultFormat: config.defaultFormat,
      defaultCueLength: config.defaultCueLength,
      maxDocumentSize: config.maxDocumentSize,
    },
  });
});

export default router;
