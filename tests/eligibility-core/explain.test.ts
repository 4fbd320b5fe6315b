import { describe, it, expect, beforeAll } from 'vitest';
import { evaluateEligibility } from '@core/decision';
import { explainDecision } from '@core/explain';
import { loadRuleSet, type RuleSet } from '@core/rule-set';
import { PM_KISAN_DIR, applicant } from '../helpers';

let ruleSet: RuleSet;

beforeAll(async () => {
  ruleSet = await loadRuleSet(PM_KISAN_DIR);
});

describe('explainDecision', () => {
  it('summarizes an eligible decision', () => {
    expect(explainDecision(evaluateEligibility(ruleSet, applicant()))).toEqual([
      'ELIGIBLE for pm-kisan (rule set 2019.1)',
      'Exclusions:',
      '  none',
      'Requirements:',
      '  all met',
      'Conditional requirements:',
      '  all met',
      'Family structure: valid (2 minor child(ren), spouse present)',
    ]);
  });

  it('lists exclusions and failed checks', () => {
    const facts = applicant({ is_nri: true, age: 16, is_professional: true });
    const lines = explainDecision(evaluateEligibility(ruleSet, facts));
    expect(lines).toEqual([
      'NOT ELIGIBLE for pm-kisan (rule set 2019.1)',
      'Reason: Excluded: professional, nri. Failed requirements: age. ' +
        'Failed conditional requirements: professional_profession',
      'Exclusions:',
      '  - professional: Registered practising professionals (doctors, engineers, lawyers, chartered accountants, architects)',
      '  - nri: Non-resident Indians as per the Income Tax Act, 1961',
      'Requirements:',
      '  [FAIL] age: age must be an integer between 18 and 120',
      'Conditional requirements:',
      '  [FAIL] professional_profession: profession is missing',
      'Family structure: valid (2 minor child(ren), spouse present)',
    ]);
  });

  it('names the special provision that was applied', () => {
    const facts = applicant({
      special_provisions: {
        pm_kisan: {
          region_special: 'jharkhand',
          has_special_certificate: true,
          certificate_type: 'vanshavali_certificate',
        },
      },
    });
    const lines = explainDecision(evaluateEligibility(ruleSet, facts), { verbose: true });
    expect(lines[1]).toBe('Special provisions applied: jharkhand');
    expect(lines).toContain(
      '  [PASS] special_region_certificate: Jharkhand: vanshavali_certificate accepted in place of land-title proof',
    );
    expect(lines).toContain('  [PASS] ifsc_code: ifsc_code is exactly 11 characters long');
  });

  it('explains why a declared special provision did not apply', () => {
    const facts = applicant({
      special_provisions: { pm_kisan: { region_special: 'nagaland', has_special_certificate: false } },
    });
    const lines = explainDecision(evaluateEligibility(ruleSet, facts));
    expect(lines[2]).toBe('Special provision not applied: Nagaland provision requires a special certificate');
  });

  it('says when no conditional requirement was triggered in verbose mode', () => {
    const lines = explainDecision(evaluateEligibility(ruleSet, applicant()), { verbose: true });
    expect(lines).toContain('  none triggered');
  });

  it('describes an invalid household', () => {
    const facts = applicant({
      family_members: [
        { relation: 'self', age: 45 },
        { relation: 'child', age: 20 },
        { relation: 'uncle', age: 60 },
      ],
    });
    const lines = explainDecision(evaluateEligibility(ruleSet, facts));
    expect(lines.slice(-2)).toEqual([
      'Family structure: invalid (no spouse (wife or husband) in household; children aged 18 or older present (ages 20))',
      '  unrecognized relations: uncle',
    ]);
  });
});
