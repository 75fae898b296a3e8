import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import apiRouter from './api';
import { toErrorResponse } from './api/errors';
import { config } from './config';

const app = express();

// Middleware
app.use(cors());
app.use(express.json({ limit: config.maxDocumentSize }));

// API routes
app.use('/api', apiRouter);

// Error handling middleware
app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
  const { status, body } = toErrorResponse(err, config.nodeEnv === 'development');
  if (status >= 500) {
    console.error('Error:', err);
  } else {
    console.error('Error:', err.message);
  }
  res.status(status).json(body);
});

// 404 handler
app.use((_req: Request, res: Response) => {
  res.status(404).json({ error: 'Not found' });
});

export default app;
