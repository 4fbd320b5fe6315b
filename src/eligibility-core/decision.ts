// src/eligibility-core/decision.ts
// Decision engine. Pure function: (rule set, applicant facts) -> Decision.
// Every component is always evaluated, so a Decision carries the complete
// explanation whatever the outcome.

import { describeValue, readField, type ApplicantFacts } from './applicant';
import {
  evaluateConditionalRequirements,
  failedConditionalIds,
  type ConditionalRequirementResult,
} from './conditional-requirements';
import { isConfigurationError, type ConfigurationErrorCode } from './errors';
import { activeExclusionIds, evaluateExclusions, type ExclusionResult } from './exclusions';
import { validateFamily, type FamilyDetail } from './family';
import type { EvaluationContext } from './predicates';
import { normalizeSchemeCode, type RuleSetRegistry } from './registry';
import {
  evaluateRequirements,
  failedRequirementFields,
  type RequirementResult,
} from './requirements';
import { conditionFields, rulesOfKind, type Condition, type RuleSet } from './rule-set';
import { resolveSpecialProvision, type SpecialProvisionResolution } from './special-provisions';

// ── Types ────────────────────────────────────────────────────────────────────

export type TraceComponent =
  | 'special_provision'
  | 'requirement'
  | 'conditional_requirement'
  | 'exclusion'
  | 'family'
  | 'decision';

export type TraceValue = string | number | boolean | null;

export interface TraceStep {
  step_number: number;
  component: TraceComponent;
  rule_id: string;
  description: string;
  inputs: Record<string, TraceValue>;
  output: boolean;
  detail: string;
}

export interface Decision {
  scheme_code: string;
  rule_set_version: string;
  eligible: boolean;
  reason?: string;
  failed_requirements: string[];
  active_exclusions: string[];
  failed_conditional_requirements: string[];
  family_valid: boolean;
  family_detail: FamilyDetail;
  applied_special_provisions: string[];
  requirement_results: RequirementResult[];
  conditional_results: ConditionalRequirementResult[];
  exclusion_results: ExclusionResult[];
  special_provision: SpecialProvisionResolution;
  cited_rules: string[];
  trace: TraceStep[];
}

export interface BulkRequest {
  scheme_code: string;
  facts: ApplicantFacts;
}

export type BulkResult =
  | { applicant_id: string | null; scheme_code: string; decision: Decision }
  | {
      applicant_id: string | null;
      scheme_code: string;
      error: string;
      code: ConfigurationErrorCode;
    };

// ── Trace assembly ───────────────────────────────────────────────────────────

function sensitiveFields(ruleSet: RuleSet): Set<string> {
  return new Set(
    rulesOfKind(ruleSet, 'field_requirement')
      .filter((r) => r.sensitive)
      .map((r) => r.field),
  );
}

function conditionInputs(
  conditions: readonly Condition[],
  facts: ApplicantFacts,
  sensitive: ReadonlySet<string>,
): Record<string, TraceValue> {
  const inputs: Record<string, TraceValue> = {};
  for (const condition of conditions) {
    for (const field of conditionFields(condition)) {
      inputs[field] = describeValue(readField(facts, field), sensitive.has(field));
    }
  }
  return inputs;
}

function buildReason(
  activeExclusions: string[],
  failedRequirements: string[],
  failedConditional: string[],
  family: FamilyDetail,
  familyValid: boolean,
): string | undefined {
  const parts: string[] = [];
  if (activeExclusions.length > 0) parts.push(`Excluded: ${activeExclusions.join(', ')}`);
  if (failedRequirements.length > 0) {
    parts.push(`Failed requirements: ${failedRequirements.join(', ')}`);
  }
  if (failedConditional.length > 0) {
    parts.push(`Failed conditional requirements: ${failedConditional.join(', ')}`);
  }
  if (!familyValid) parts.push(`Family structure: ${family.problems.join('; ')}`);
  return parts.length > 0 ? parts.join('. ') : undefined;
}

// ── Main evaluation ──────────────────────────────────────────────────────────

export function evaluateEligibility(ruleSet: RuleSet, facts: ApplicantFacts): Decision {
  const steps: TraceStep[] = [];
  const citedRules: string[] = [];
  const sensitive = sensitiveFields(ruleSet);

  const addStep = (step: Omit<TraceStep, 'step_number'>) => {
    steps.push({ step_number: steps.length + 1, ...step });
    if (step.component !== 'decision' && !citedRules.includes(step.rule_id)) {
      citedRules.push(step.rule_id);
    }
  };

  // ── Special provision ─────────────────────────────────────────────────────
  const specialProvision = resolveSpecialProvision(facts, ruleSet);
  if (specialProvision.declared) {
    addStep({
      component: 'special_provision',
      rule_id: specialProvision.provision_id ?? 'special_provision',
      description: 'Resolve region-specific certification',
      inputs: {
        region_special: specialProvision.region_special,
        has_special_certificate: specialProvision.has_certificate,
        certificate_type: specialProvision.certificate_type,
      },
      output: specialProvision.accepted,
      detail: specialProvision.reason,
    });
  }

  const ctx: EvaluationContext = { facts, ruleSet, specialProvision };

  // ── Requirements ──────────────────────────────────────────────────────────
  const requirementResults = evaluateRequirements(facts, ruleSet);
  for (const result of requirementResults) {
    addStep({
      component: 'requirement',
      rule_id: result.requirement_id,
      description: result.reason,
      inputs: { [result.field]: result.value },
      output: result.passed,
      detail: result.detail,
    });
  }

  // ── Conditional requirements ──────────────────────────────────────────────
  const conditionalResults = evaluateConditionalRequirements(ctx);
  const conditionalRules = rulesOfKind(ruleSet, 'conditional_requirement');
  conditionalResults.forEach((result, i) => {
    const rule = conditionalRules[i];
    addStep({
      component: 'conditional_requirement',
      rule_id: result.requirement_id,
      description: result.reason,
      inputs: {
        triggered: result.triggered,
        ...(rule ? conditionInputs([rule.trigger, rule.requirement], facts, sensitive) : {}),
      },
      output: result.satisfied,
      detail: result.triggered ? result.detail : `not triggered: ${result.trigger_detail}`,
    });
  });

  // ── Exclusions ────────────────────────────────────────────────────────────
  const exclusionResults = evaluateExclusions(ctx);
  const exclusionRules = rulesOfKind(ruleSet, 'exclusion');
  exclusionResults.forEach((result, i) => {
    const rule = exclusionRules[i];
    addStep({
      component: 'exclusion',
      rule_id: result.exclusion_id,
      description: result.reason,
      inputs: rule ? conditionInputs([rule.when], facts, sensitive) : {},
      output: result.applies,
      detail: result.detail,
    });
  });

  // ── Family ────────────────────────────────────────────────────────────────
  const family = validateFamily(facts, ruleSet);
  if (family.detail.rule_id !== null) {
    addStep({
      component: 'family',
      rule_id: family.detail.rule_id,
      description: 'Validate household composition',
      inputs: {
        member_count: family.detail.member_count,
        self_present: family.detail.self_present,
        spouse_present: family.detail.spouse_present,
        minor_children: family.detail.minor_children,
        adult_children: family.detail.adult_children,
      },
      output: family.valid,
      detail: family.valid ? 'household composition valid' : family.detail.problems.join('; '),
    });
  }

  // ── Final determination ───────────────────────────────────────────────────
  const failedRequirements = failedRequirementFields(requirementResults);
  const failedConditional = failedConditionalIds(conditionalResults);
  const activeExclusions = activeExclusionIds(exclusionResults);

  const eligible =
    activeExclusions.length === 0 &&
    failedRequirements.length === 0 &&
    failedConditional.length === 0 &&
    family.valid;

  addStep({
    component: 'decision',
    rule_id: 'final_determination',
    description: 'Final eligibility determination',
    inputs: {
      active_exclusions: activeExclusions.length,
      failed_requirements: failedRequirements.length,
      failed_conditional_requirements: failedConditional.length,
      family_valid: family.valid,
    },
    output: eligible,
    detail: 'no exclusions AND all requirements met AND all conditional requirements met AND family valid',
  });

  const decision: Decision = {
    scheme_code: ruleSet.meta.schemeCode,
    rule_set_version: ruleSet.meta.version,
    eligible,
    failed_requirements: failedRequirements,
    active_exclusions: activeExclusions,
    failed_conditional_requirements: failedConditional,
    family_valid: family.valid,
    family_detail: family.detail,
    applied_special_provisions:
      specialProvision.accepted && specialProvision.region !== null ? [specialProvision.region] : [],
    requirement_results: requirementResults,
    conditional_results: conditionalResults,
    exclusion_results: exclusionResults,
    special_provision: specialProvision,
    cited_rules: citedRules,
    trace: steps,
  };

  const reason = buildReason(
    activeExclusions,
    failedRequirements,
    failedConditional,
    family.detail,
    family.valid,
  );
  if (reason) decision.reason = reason;
  return decision;
}

/**
 * Resolves the scheme before evaluating; an unknown scheme code throws
 * ConfigurationError rather than producing an ineligible Decision.
 */
export function checkEligibility(
  registry: RuleSetRegistry,
  schemeCode: string,
  facts: ApplicantFacts,
): Decision {
  const ruleSet = registry.get(schemeCode);
  return evaluateEligibility(ruleSet, facts);
}

function applicantId(facts: ApplicantFacts): string | null {
  const id = readField(facts, 'farmer_id') ?? readField(facts, 'id');
  return typeof id === 'string' || typeof id === 'number' ? String(id) : null;
}

/**
 * Evaluates each request against its own scheme. A request naming an unknown
 * scheme yields an error entry; the rest of the batch is still evaluated.
 */
export function checkEligibilityBulk(
  registry: RuleSetRegistry,
  requests: readonly BulkRequest[],
): BulkResult[] {
  return requests.map(({ scheme_code, facts }) => {
    const applicant_id = applicantId(facts);
    try {
      const ruleSet = registry.get(scheme_code);
      return {
        applicant_id,
        scheme_code: ruleSet.meta.schemeCode,
        decision: evaluateEligibility(ruleSet, facts),
      };
    } catch (err) {
      if (!isConfigurationError(err)) throw err;
      return {
        applicant_id,
        scheme_code: normalizeSchemeCode(scheme_code),
        error: err.message,
        code: err.code,
      };
    }
  });
}
