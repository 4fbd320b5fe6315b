import { Router } from 'express';
import { ELIGIBILITY_CORE_VERSION } from '@core/index';
import type { RuleSetRegistry } from '@core/registry';
import type { ApiResponse, HealthStatus } from '@shared/types';

export default function healthRouter(registry: RuleSetRegistry): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    const response: ApiResponse<HealthStatus> = {
      success: true,
      data: {
        status: 'ok',
        engineVersion: ELIGIBILITY_CORE_VERSION,
        ruleSets: registry.schemeCodes(),
      },
    };
    res.json(response);
  });

  return router;
}
