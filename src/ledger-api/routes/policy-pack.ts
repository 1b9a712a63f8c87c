import { Router } from 'express';
import type { PolicyPack } from '@core/policy-pack';
import type { ApiResponse } from '@shared/types';

export function createPolicyPackRouter(policyPack: PolicyPack): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const response: ApiResponse = {
      success: true,
      data: {
        meta: policyPack.meta,
        rules: policyPack.rules,
        sources: policyPack.sources.files,
      },
    };
    res.json(response);
  });

  return router;
}
