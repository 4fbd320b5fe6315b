// src/eligibility-core/requirements.ts
// Unconditional mandatory field requirements. Every requirement is checked;
// evaluation never stops at the first failure.

import { describeValue, readField, type ApplicantFacts } from './applicant';
import { describeFieldOutcome, evaluateFieldCheck } from './predicates';
import { rulesOfKind, type RuleSet } from './rule-set';

export type ViolationKind = 'validation_error' | 'contract_violation';

export interface FieldViolation {
  kind: ViolationKind;
  message: string;
}

export interface RequirementResult {
  requirement_id: string;
  field: string;
  passed: boolean;
  reason: string;
  detail: string;
  value: string | number | boolean | null;
  violation?: FieldViolation;
  citation?: string;
}

export function evaluateRequirements(facts: ApplicantFacts, ruleSet: RuleSet): RequirementResult[] {
  return rulesOfKind(ruleSet, 'field_requirement').map((rule) => {
    const outcome = evaluateFieldCheck(rule.check, facts, rule.field, ruleSet.lists);
    const detail = describeFieldOutcome(rule.field, rule.check, outcome);

    const result: RequirementResult = {
      requirement_id: rule.id,
      field: rule.field,
      passed: outcome.passed,
      reason: rule.reason,
      detail,
      value: describeValue(readField(facts, rule.field), rule.sensitive ?? false),
    };
    if (!outcome.passed) {
      result.violation = {
        kind: outcome.missing ? 'contract_violation' : 'validation_error',
        message: detail,
      };
    }
    if (rule.citation) result.citation = rule.citation;
    return result;
  });
}

/** Fields with at least one failed requirement, in first-seen order. */
export function failedRequirementFields(results: readonly RequirementResult[]): string[] {
  const fields: string[] = [];
  for (const result of results) {
    if (!result.passed && !fields.includes(result.field)) fields.push(result.field);
  }
  return fields;
}
