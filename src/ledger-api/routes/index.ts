import { Router } from 'express';
import healthRouter from './health';
import { createLedgerRouter, type LedgerRouterDeps } from './ledger';
import { createPolicyPackRouter } from './policy-pack';

export function createApiRouter(deps: LedgerRouterDeps): Router {
  const router = Router();
  router.use(healthRouter);
  router.use('/policy-pack', createPolicyPackRouter(deps.policyPack));
  router.use('/ledger', createLedgerRouter(deps));
  return router;
}
