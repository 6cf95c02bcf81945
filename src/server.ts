import express, { NextFunction, Request, Response } from 'express';
import http from 'http';
import type { GatewayStatus } from './gateway';
import { log } from './log';
import { metricsHandler } from './metrics';
import { createHealthRouter } from './routes/health';

function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  log.error({ err }, 'unhandled error');
  res.status(500).json({ error: 'internal_server_error' });
}

export function buildServer(getStatus: () => GatewayStatus): { app: express.Express; server: http.Server } {
  const app = express();

  app.disable('x-powered-by');
  app.use('/health', createHealthRouter(getStatus));
  app.get('/metrics', (req, res, next) => {
    metricsHandler(req, res).catch(next);
  });

  app.use(errorHandler);

  const server = http.createServer(app);
  return { app, server };
}
