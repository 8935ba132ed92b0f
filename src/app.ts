import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import fileUpload from 'express-fileupload';

import type { GatewayConfig } from './config';
import type { HealthData } from './contracts/fax';
import { errorMessage } from './fax/errors';
import { probeBackend } from './fax/session';
import type { FaxBackend } from './fax/types';
import { faxRoutes, respond } from './routes/fax';
import { UploadStore } from './storage/uploads';

export interface AppDependencies {
  backend: FaxBackend;
  config: GatewayConfig;
  uploads?: UploadStore;
}

function rejectOversizedBodies(maxContentLength: number) {
  return (req: Request, res: Response, next: NextFunction) => {
    const declared = Number(req.headers['content-length'] ?? 0);
    if (Number.isFinite(declared) && declared > maxContentLength) {
      respond(res, 413, false, 'File too large');
      return;
    }
    next();
  };
}

export function createApp({ backend, config, uploads }: AppDependencies): Express {
  const app = express();
  const store = uploads ?? new UploadStore(config.uploadFolder);

  app.use(rejectOversizedBodies(config.maxContentLength));
  app.use(
    fileUpload({
      limits: { fileSize: config.maxContentLength },
      useTempFiles: false,
    }),
  );

  app.get('/api/health', async (_req: Request, res: Response) => {
    const reachable = await probeBackend(backend, config.hylafax.host);
    if (reachable.ok) {
      respond<HealthData>(res, 200, true, 'Fax server is reachable', { status: 'healthy' });
      return;
    }
    respond<HealthData>(res, 503, false, `Cannot connect to fax server: ${reachable.message}`, {
      status: 'unhealthy',
    });
  });

  app.use(
    '/api/fax',
    faxRoutes({
      backend,
      uploads: store,
      host: config.hylafax.host,
      username: config.hylafax.username,
      queryMaxJobs: config.queryMaxJobs,
      sendRateLimit: config.sendRateLimit,
      sendWindowMs: config.sendWindowMs,
    }),
  );

  app.use((_req: Request, res: Response) => {
    respond(res, 404, false, 'Not found');
  });

  // Unexpected failures: full detail goes to the log, never to the caller.
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    console.error(`[Fax] Unhandled error in ${req.method} ${req.path}: ${errorMessage(error)}`, error);
    if (res.headersSent) return;
    respond(res, 500, false, 'Internal server error');
  });

  return app;
}
