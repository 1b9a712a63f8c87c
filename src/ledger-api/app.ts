import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { API_PREFIX } from '@shared/constants';
import { config } from '@shared/config';
import { consoleLogger } from '@core/logger';
import { loadLedgerSources } from '@sheets/loader';
import { errorHandler, requestLogger } from './middleware/index';
import { createApiRouter } from './routes/index';
import type { LedgerRouterDeps } from './routes/ledger';

export type AppDeps = Pick<LedgerRouterDeps, 'policyPack' | 'dataDir'> &
  Partial<Pick<LedgerRouterDeps, 'logger' | 'loadSources'>>;

export function createApp(deps: AppDeps) {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));
  if (config.nodeEnv !== 'test') app.use(requestLogger);

  app.use(
    API_PREFIX,
    createApiRouter({
      policyPack: deps.policyPack,
      dataDir: deps.dataDir,
      logger: deps.logger ?? consoleLogger,
      loadSources:
        deps.loadSources ??
        ((dataDir, pack, logger) => loadLedgerSources(dataDir, pack.sources, logger)),
    }),
  );

  app.use(errorHandler);
  return app;
}
