import { Router } from 'express';
import type { RuleSetRegistry } from '@core/registry';
import healthRouter from './health';
import eligibilityRouter, { type EligibilityRouterOptions } from './eligibility';
import ruleSetsRouter from './rule-sets';

export default function apiRouter(
  registry: RuleSetRegistry,
  options: EligibilityRouterOptions,
): Router {
  const router = Router();
  router.use(healthRouter(registry));
  router.use('/eligibility', eligibilityRouter(registry, options));
  router.use('/rule-sets', ruleSetsRouter(registry));
  return router;
}
