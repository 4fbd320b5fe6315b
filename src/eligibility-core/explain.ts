// src/eligibility-core/explain.ts
// Human-readable rendering of a Decision. Reads only the Decision, so the
// explanation cannot disagree with the determination it describes.

import type { Decision } from './decision';

export interface ExplainOptions {
  /** Include passing checks as well as failures. */
  verbose?: boolean;
}

function mark(ok: boolean): string {
  return ok ? 'PASS' : 'FAIL';
}

export function explainDecision(decision: Decision, options: ExplainOptions = {}): string[] {
  const verbose = options.verbose ?? false;
  const lines: string[] = [];

  lines.push(
    `${decision.eligible ? 'ELIGIBLE' : 'NOT ELIGIBLE'} for ${decision.scheme_code} (rule set ${decision.rule_set_version})`,
  );
  if (decision.reason) lines.push(`Reason: ${decision.reason}`);

  if (decision.applied_special_provisions.length > 0) {
    lines.push(`Special provisions applied: ${decision.applied_special_provisions.join(', ')}`);
  } else if (decision.special_provision.declared) {
    lines.push(`Special provision not applied: ${decision.special_provision.reason}`);
  }

  lines.push('Exclusions:');
  const active = decision.exclusion_results.filter((r) => r.applies);
  if (active.length === 0) lines.push('  none');
  for (const result of active) {
    lines.push(`  - ${result.exclusion_id}: ${result.reason}`);
  }

  lines.push('Requirements:');
  const requirements = verbose
    ? decision.requirement_results
    : decision.requirement_results.filter((r) => !r.passed);
  if (requirements.length === 0) lines.push('  all met');
  for (const result of requirements) {
    lines.push(`  [${mark(result.passed)}] ${result.requirement_id}: ${result.detail}`);
  }

  lines.push('Conditional requirements:');
  const conditional = decision.conditional_results.filter(
    (r) => r.triggered && (verbose || !r.satisfied),
  );
  if (conditional.length === 0) {
    lines.push(verbose ? '  none triggered' : '  all met');
  }
  for (const result of conditional) {
    lines.push(`  [${mark(result.satisfied)}] ${result.requirement_id}: ${result.detail}`);
  }

  const family = decision.family_detail;
  if (decision.family_valid) {
    lines.push(
      `Family structure: valid (${family.minor_children} minor child(ren), spouse ${family.spouse_present ? 'present' : 'absent'})`,
    );
  } else {
    lines.push(`Family structure: invalid (${family.problems.join('; ')})`);
  }
  if (family.unrecognized_relations.length > 0) {
    lines.push(`  unrecognized relations: ${family.unrecognized_relations.join(', ')}`);
  }

  return lines;
}
