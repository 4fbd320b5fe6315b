// src/eligibility-core/exclusions.ts
// Disqualifying conditions. Each is independent of the others and of the
// requirement checks; all of them are evaluated so the full set can be shown.

import { evaluateCondition, type EvaluationContext } from './predicates';
import { rulesOfKind } from './rule-set';

export interface ExclusionResult {
  exclusion_id: string;
  applies: boolean;
  reason: string;
  detail: string;
  citation?: string;
}

export function evaluateExclusions(ctx: EvaluationContext): ExclusionResult[] {
  return rulesOfKind(ctx.ruleSet, 'exclusion').map((rule) => {
    const outcome = evaluateCondition(rule.when, ctx);
    const result: ExclusionResult = {
      exclusion_id: rule.id,
      applies: outcome.holds,
      reason: rule.reason,
      detail: outcome.detail,
    };
    if (rule.citation) result.citation = rule.citation;
    return result;
  });
}

export function activeExclusionIds(results: readonly ExclusionResult[]): string[] {
  return results.filter((r) => r.applies).map((r) => r.exclusion_id);
}
