import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import logTime from './middleware/log-time';
import { callId } from './middleware/call-id';
import { createRouter, type RouterDeps } from './router';
import { buildCorsOptions } from './utils/cors-options';
import { helmetConfig } from './utils/helmet-config';
import type { Settings } from './config/settings';

export interface AppDeps extends Omit<RouterDeps, 'settings'> {
  settings: RouterDeps['settings'] & Pick<Settings, 'corsOrigins'>;
}

export function createApp(deps: AppDeps) {
  const app = express();

  app.set('trust proxy', 1);
  app.use(helmet(helmetConfig));
  app.use(callId);
  app.use(logTime);
  app.use(cors(buildCorsOptions(deps.settings.corsOrigins)));
  app.use(express.json());
  app.use('/api', createRouter(deps));

  return app;
}
