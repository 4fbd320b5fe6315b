import { Router } from 'express';
import type { RuleSetRegistry } from '@core/registry';
import { ruleSetFields, type RuleSet } from '@core/rule-set';
import type { ApiResponse, RuleSetSummary } from '@shared/types';

export function summarizeRuleSet(ruleSet: RuleSet): RuleSetSummary {
  const ruleCounts: Record<string, number> = {};
  for (const rule of ruleSet.rules) {
    ruleCounts[rule.kind] = (ruleCounts[rule.kind] ?? 0) + 1;
  }
  return {
    schemeCode: ruleSet.meta.schemeCode,
    name: ruleSet.meta.name,
    version: ruleSet.meta.version,
    effectiveDate: ruleSet.meta.effectiveDate,
    ruleCount: ruleSet.rules.length,
    ruleCounts,
  };
}

export default function ruleSetsRouter(registry: RuleSetRegistry): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const response: ApiResponse<RuleSetSummary[]> = {
      success: true,
      data: registry.list().map(summarizeRuleSet),
    };
    res.json(response);
  });

  router.get('/:schemeCode', (req, res) => {
    const ruleSet = registry.get(req.params.schemeCode);
    res.json({
      success: true,
      data: {
        meta: ruleSet.meta,
        lists: ruleSet.lists,
        rules: ruleSet.rules,
        ruleIds: Array.from(ruleSet.ruleIndex).sort(),
        fields: ruleSetFields(ruleSet),
      },
    });
  });

  // Builds the replacement rule sets first; a failure leaves the current ones active.
  router.post('/reload', async (_req, res, next) => {
    try {
      const schemeCodes = await registry.reload();
      console.warn(`[POLICY] Reloaded ${schemeCodes.length} rule set(s): ${schemeCodes.join(', ')}`);
      res.json({ success: true, data: { ruleSets: schemeCodes } });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
