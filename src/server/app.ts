import express from 'express';
import type { RunController } from '../pipeline/run-controller.js';

/**
 * Liveness surface for hosting platforms that expect a listening process.
 */
export function createApp(controller: RunController): express.Express {
  const app = express();

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', time: new Date().toISOString() });
  });

  app.get('/', (_req, res) => {
    res.json({
      name: 'apartment-watch',
      status: 'ok',
      time: new Date().toISOString(),
      running: controller.running,
      lastRun: controller.lastSummary,
      endpoints: ['GET /health', 'GET /'],
    });
  });

  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    console.error('[server] error:', err);
    res.status(500).json({ error: err.message || 'Internal Server Error' });
  });

  return app;
}
