import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';

import { createScenariosRouter } from './controllers/scenarios.controller.js';
import { errorHandler } from './middleware/error-handler.js';
import type { RuntimeConfig } from './config/runtime.js';
import type { Runtime } from './runtime.js';

export type AppOptions = Pick<RuntimeConfig, 'corsOrigin' | 'httpLogFormat'>;

export function buildApp(
  runtime: Pick<Runtime, 'scenarios' | 'tasks' | 'dispatcher'>,
  options: AppOptions = { corsOrigin: '*', httpLogFormat: null },
): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: options.corsOrigin }));
  if (options.httpLogFormat) app.use(morgan(options.httpLogFormat));
  app.use(express.json({ limit: '1mb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/scenarios', createScenariosRouter(runtime));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}
