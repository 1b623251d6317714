import express, { type Express } from 'express';
import { createCorsMiddleware } from './middleware/cors';
import { errorHandler } from './middleware/errorHandler';
import { createRequireAuth } from './middleware/auth';
import type { Services } from './services';
import { createSubmissionsRouter } from './routes/submissions';
import { createLibraryRouter } from './routes/library';
import { createNotificationsRouter } from './routes/notifications';
import { createAuditRouter } from './routes/audit';

export interface AppOptions {
  jwtSecret: string;
  corsOrigins: string[];
  /** Reported by /health */
  migrations?: number;
}

export function createApp(services: Services, options: AppOptions): Express {
  const app = express();
  const requireAuth = createRequireAuth(services.store, options.jwtSecret);

  app.set('trust proxy', 'loopback');
  app.use(createCorsMiddleware(options.corsOrigins));
  app.use(express.json({ limit: '1mb' }));

  // ─── Health check ──────────────────────────────────────────────────────

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      db: 'postgresql',
      migrations: options.migrations ?? 0,
      timestamp: new Date().toISOString(),
      version: '1.0.0',
    });
  });

  // ─── Protected routes ─────────────────────────────────────────────────

  app.use('/api/submissions', requireAuth, createSubmissionsRouter(services));
  app.use('/api/library', requireAuth, createLibraryRouter(services));
  app.use('/api/notifications', requireAuth, createNotificationsRouter(services));
  app.use('/api/audit', requireAuth, createAuditRouter(services));

  // ─── 404 handler ──────────────────────────────────────────────────────

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // ─── Error handler (must be last) ─────────────────────────────────────

  app.use(errorHandler);

  return app;
}
