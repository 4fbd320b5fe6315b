// src/eligibility-core/conditional-requirements.ts

import { evaluateCondition, type EvaluationContext } from './predicates';
import { rulesOfKind } from './rule-set';

export interface ConditionalRequirementResult {
  requirement_id: string;
  triggered: boolean;
  /** True when not triggered: an inapplicable requirement is vacuously met. */
  satisfied: boolean;
  reason: string;
  trigger_detail: string;
  detail: string;
  citation?: string;
}

export function evaluateConditionalRequirements(
  ctx: EvaluationContext,
): ConditionalRequirementResult[] {
  return rulesOfKind(ctx.ruleSet, 'conditional_requirement').map((rule) => {
    const trigger = evaluateCondition(rule.trigger, ctx);
    const requirement = trigger.holds ? evaluateCondition(rule.requirement, ctx) : null;

    const result: ConditionalRequirementResult = {
      requirement_id: rule.id,
      triggered: trigger.holds,
      satisfied: requirement === null || requirement.holds,
      reason: rule.reason,
      trigger_detail: trigger.detail,
      detail: requirement === null ? 'not applicable' : requirement.detail,
    };
    if (rule.citation) result.citation = rule.citation;
    return result;
  });
}

export function failedConditionalIds(results: readonly ConditionalRequirementResult[]): string[] {
  return results.filter((r) => !r.satisfied).map((r) => r.requirement_id);
}
