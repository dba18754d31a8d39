import express, { Request, Response } from 'express';
import cors from 'cors';
import morgan from 'morgan';
import swaggerUi from 'swagger-ui-express';
import type { PipelineDeps } from '@shellmatch/worker';
import { createServer } from './server';
import { openapiSpec } from './openapi';

export function createApp(deps: PipelineDeps, opts: { requestLog?: boolean } = {}) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '2mb' }));
  if (opts.requestLog !== false) app.use(morgan('dev'));

  // OpenAPI JSON and Swagger UI
  app.get('/api/openapi.json', (_req: Request, res: Response) => {
    res.json(openapiSpec);
  });
  app.use('/api/docs', swaggerUi.serve, swaggerUi.setup(openapiSpec));

  app.use('/api', createServer(deps));

  app.get('/health', (_req: Request, res: Response) => res.json({ ok: true }));
  return app;
}
