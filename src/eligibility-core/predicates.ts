// src/eligibility-core/predicates.ts
// Evaluators for the rule-set predicate vocabulary (FieldCheck, Condition).
// Pure functions of (facts, rule set); a malformed value fails its check and
// never throws.

import {
  hasField,
  isFalseFlag,
  isTrueFlag,
  normalizeToken,
  readField,
  type ApplicantFacts,
} from './applicant';
import type { Condition, FieldCheck, RuleSet } from './rule-set';
import type { SpecialProvisionResolution } from './special-provisions';

export interface CheckOutcome {
  passed: boolean;
  missing: boolean;
}

export interface ConditionOutcome {
  holds: boolean;
  detail: string;
}

export interface EvaluationContext {
  facts: ApplicantFacts;
  ruleSet: RuleSet;
  specialProvision: SpecialProvisionResolution;
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

function isCalendarDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

// Identifiers such as phone or aadhaar numbers may arrive as JSON numbers.
function digitText(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) {
    return String(value);
  }
  return null;
}

export function describeCheck(check: FieldCheck): string {
  switch (check.type) {
    case 'present':
      return 'present';
    case 'non_empty_string':
      return 'a non-empty string';
    case 'boolean':
      return 'a boolean';
    case 'is_true':
      return 'true';
    case 'integer_range':
      return `an integer between ${check.min} and ${check.max}`;
    case 'number_greater_than':
      return `a number greater than ${check.value}`;
    case 'number_at_least':
      return `a number of at least ${check.value}`;
    case 'digits':
      return check.length === undefined ? 'numeric digits only' : `exactly ${check.length} digits`;
    case 'exact_length':
      return `exactly ${check.length} characters long`;
    case 'one_of':
      return `one of ${check.values.join(', ')}`;
    case 'in_list':
      return `in list ${check.list}`;
    case 'date_on_or_before':
      return `a YYYY-MM-DD date on or before ${check.cutoff}`;
  }
}

function passes(check: FieldCheck, value: unknown, lists: RuleSet['lists']): boolean {
  switch (check.type) {
    case 'present':
      return true;
    case 'non_empty_string':
      return typeof value === 'string' && value.trim() !== '';
    case 'boolean':
      return isTrueFlag(value) || isFalseFlag(value);
    case 'is_true':
      return isTrueFlag(value);
    case 'integer_range':
      return (
        typeof value === 'number' &&
        Number.isInteger(value) &&
        value >= check.min &&
        value <= check.max
      );
    case 'number_greater_than':
      return isFiniteNumber(value) && value > check.value;
    case 'number_at_least':
      return isFiniteNumber(value) && value >= check.value;
    case 'digits': {
      const text = digitText(value);
      if (text === null || !/^\d+$/.test(text)) return false;
      return check.length === undefined || text.length === check.length;
    }
    case 'exact_length':
      return typeof value === 'string' && value.length === check.length;
    case 'one_of': {
      if (typeof value !== 'string') return false;
      const candidate = check.caseInsensitive ? value.trim().toLowerCase() : value.trim();
      return check.values.some((allowed) =>
        check.caseInsensitive ? allowed.toLowerCase() === candidate : allowed === candidate,
      );
    }
    case 'in_list': {
      const token = normalizeToken(value);
      const list = lists[check.list] ?? [];
      return token !== null && list.some((entry) => entry.trim().toLowerCase() === token);
    }
    case 'date_on_or_before':
      // ISO dates order lexicographically.
      return typeof value === 'string' && isCalendarDate(value) && value <= check.cutoff;
  }
}

export function evaluateFieldCheck(
  check: FieldCheck,
  facts: ApplicantFacts,
  field: string,
  lists: RuleSet['lists'],
): CheckOutcome {
  if (!hasField(facts, field)) {
    return { passed: false, missing: true };
  }
  return { passed: passes(check, readField(facts, field), lists), missing: false };
}

export function describeFieldOutcome(field: string, check: FieldCheck, outcome: CheckOutcome): string {
  if (outcome.missing) return `${field} is missing`;
  return outcome.passed
    ? `${field} is ${describeCheck(check)}`
    : `${field} must be ${describeCheck(check)}`;
}

export function evaluateCondition(condition: Condition, ctx: EvaluationContext): ConditionOutcome {
  switch (condition.type) {
    case 'field': {
      const outcome = evaluateFieldCheck(condition.check, ctx.facts, condition.field, ctx.ruleSet.lists);
      return {
        holds: outcome.passed,
        detail: describeFieldOutcome(condition.field, condition.check, outcome),
      };
    }
    case 'all': {
      const parts = condition.conditions.map((c) => evaluateCondition(c, ctx));
      const failing = parts.filter((p) => !p.holds);
      return {
        holds: failing.length === 0,
        detail: (failing.length === 0 ? parts : failing).map((p) => p.detail).join('; '),
      };
    }
    case 'any': {
      const parts = condition.conditions.map((c) => evaluateCondition(c, ctx));
      const holding = parts.filter((p) => p.holds);
      return {
        holds: holding.length > 0,
        detail: (holding.length > 0 ? holding : parts).map((p) => p.detail).join(' | '),
      };
    }
    case 'not': {
      const inner = evaluateCondition(condition.condition, ctx);
      return { holds: !inner.holds, detail: `not (${inner.detail})` };
    }
    case 'special_region_declared':
      return {
        holds: ctx.specialProvision.declared,
        detail: ctx.specialProvision.declared
          ? `special region "${ctx.specialProvision.region_special}" declared`
          : 'no special region declared',
      };
    case 'special_provision_accepted':
      return { holds: ctx.specialProvision.accepted, detail: ctx.specialProvision.reason };
  }
}
