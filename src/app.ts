/**
 * Express Application Configuration
 */

import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { env } from './config/env';
import { errorHandler } from './middleware/error-handler';
import { rateLimitMiddleware } from './middleware/rate-limit.middleware';
import type { RateLimitConfig } from './lib/rate-limit/rate-limit.types';

// Import routers
import chatRouter from './modules/chat/chat.router';
import evaluationRouter from './modules/evaluation/evaluation.router';

export interface AppOptions {
  /** Limits for browser-launching routes; null disables them */
  rateLimit?: RateLimitConfig | null;
}

const defaultRateLimit = (): RateLimitConfig | null =>
  env.RATE_LIMIT_ENABLED
    ? {
        windowMs: env.RATE_LIMIT_WINDOW_MS,
        maxRequests: env.RATE_LIMIT_MAX_REQUESTS,
        message: 'Too many requests, please try again later.',
        standardHeaders: true,
        legacyHeaders: true,
      }
    : null;

export const createApp = (options: AppOptions = {}): Application => {
  const app = express();
  const rateLimit = options.rateLimit === undefined ? defaultRateLimit() : options.rateLimit;

  // ============================================================================
  // Security & Middleware
  // ============================================================================

  app.use(helmet());

  app.use(
    cors({
      origin: env.CLIENT_URL,
      credentials: true,
      methods: ['GET', 'POST'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    })
  );

  app.use(express.json({ limit: '1mb' }));

  // Only routes that launch a browser are throttled; cancel and status stay reachable
  if (rateLimit) {
    const limiter = rateLimitMiddleware(rateLimit);
    app.post('/api/extract', limiter);
    app.use('/api/evaluations', limiter);
  }

  // ============================================================================
  // Routes
  // ============================================================================

  app.get('/health', (req: Request, res: Response) => {
    res.json({
      success: true,
      message: 'Chat answer extractor is running',
      timestamp: new Date().toISOString(),
      environment: env.NODE_ENV,
    });
  });

  app.use('/api/extract', chatRouter);
  app.use('/api/evaluations', evaluationRouter);

  // 404 Handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: 'Route not found',
      path: req.path,
    });
  });

  // ============================================================================
  // Error Handler (must be last)
  // ============================================================================

  app.use(errorHandler);

  return app;
};
