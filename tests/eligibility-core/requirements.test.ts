import { describe, it, expect, beforeAll } from 'vitest';
import { evaluateRequirements, failedRequirementFields } from '@core/requirements';
import { loadRuleSet, parseRuleSet, type RuleSet } from '@core/rule-set';
import { PM_KISAN_DIR, applicant, applicantWithout } from '../helpers';

let ruleSet: RuleSet;

beforeAll(async () => {
  ruleSet = await loadRuleSet(PM_KISAN_DIR);
});

function resultFor(facts: Record<string, unknown>, id: string) {
  return evaluateRequirements(facts, ruleSet).find((r) => r.requirement_id === id);
}

describe('evaluateRequirements', () => {
  it('passes every requirement for a complete record', () => {
    const results = evaluateRequirements(applicant(), ruleSet);
    expect(results).toHaveLength(25);
    expect(failedRequirementFields(results)).toEqual([]);
  });

  it('reports an absent field as a contract violation', () => {
    expect(resultFor(applicantWithout('village'), 'village')).toEqual({
      requirement_id: 'village',
      field: 'village',
      passed: false,
      reason: 'Village must be provided',
      detail: 'village is missing',
      value: null,
      violation: { kind: 'contract_violation', message: 'village is missing' },
    });
  });

  it('reports a malformed value as a validation error', () => {
    const result = resultFor(applicant({ age: 17 }), 'age');
    expect(result?.passed).toBe(false);
    expect(result?.violation).toEqual({
      kind: 'validation_error',
      message: 'age must be an integer between 18 and 120',
    });
  });

  it('keeps evaluating after the first failure', () => {
    const facts = applicant({ age: 150, gender: 'unknown', ifsc_code: 'SHORT' });
    delete facts.name;
    expect(failedRequirementFields(evaluateRequirements(facts, ruleSet))).toEqual([
      'name',
      'age',
      'gender',
      'ifsc_code',
    ]);
  });

  it('requires every disqualification flag to be declared as a boolean', () => {
    const facts = applicant({ is_pensioner: 'sometimes' });
    delete facts.is_nri;
    const results = evaluateRequirements(facts, ruleSet);
    expect(failedRequirementFields(results)).toEqual(['is_pensioner', 'is_nri']);
    expect(results.find((r) => r.requirement_id === 'is_nri')?.violation?.kind).toBe('contract_violation');
  });

  it('accepts flags written as strings or numbers', () => {
    const facts = applicant({ land_owner: 'True', bank_account: 1, aadhaar_linked: '1', is_nri: 'false' });
    expect(failedRequirementFields(evaluateRequirements(facts, ruleSet))).toEqual([]);
  });

  it('masks sensitive values in results', () => {
    expect(resultFor(applicant(), 'aadhaar_number')?.value).toBe('********1234');
    expect(resultFor(applicant(), 'account_number')?.value).toBe('**********5566');
    expect(resultFor(applicant(), 'phone_number')?.value).toBe('******0001');
    expect(resultFor(applicant(), 'village')?.value).toBe('Test Village');
  });

  it('rejects land ownership dates after the cutoff', () => {
    expect(resultFor(applicant({ date_of_land_ownership: '2019-02-01' }), 'date_of_land_ownership')?.passed).toBe(true);
    const late = resultFor(applicant({ date_of_land_ownership: '2019-02-02' }), 'date_of_land_ownership');
    expect(late?.passed).toBe(false);
    expect(late?.detail).toBe('date_of_land_ownership must be a YYYY-MM-DD date on or before 2019-02-01');
    expect(late?.citation).toBe('Operational Guidelines para 4.1');
  });

  it('requires a positive land size', () => {
    expect(resultFor(applicant({ land_size_acres: 0 }), 'land_size_acres')?.passed).toBe(false);
    expect(resultFor(applicant({ land_size_acres: '2.5' }), 'land_size_acres')?.passed).toBe(false);
  });

  it('accepts category and gender in any case', () => {
    const facts = applicant({ category: 'SC', gender: 'Female' });
    expect(failedRequirementFields(evaluateRequirements(facts, ruleSet))).toEqual([]);
  });
});

describe('failedRequirementFields', () => {
  const ageRules = parseRuleSet(
    {
      schemeCode: 'test-scheme',
      name: 'Test Scheme',
      version: '1.0',
      effectiveDate: '2024-01-01',
      provisionKey: 'test_scheme',
    },
    {
      rules: [
        {
          id: 'applicant_age',
          kind: 'field_requirement',
          field: 'age',
          check: { type: 'integer_range', min: 18, max: 60 },
          reason: 'Applicant must be of working age',
        },
        {
          id: 'age_is_whole_years',
          kind: 'field_requirement',
          field: 'age',
          check: { type: 'integer_range', min: 0, max: 150 },
          reason: 'Age is recorded in whole years',
        },
        {
          id: 'applicant_name',
          kind: 'field_requirement',
          field: 'name',
          check: { type: 'non_empty_string' },
          reason: 'Name must be provided',
        },
      ],
    },
  );

  it('names the failing field rather than the rule id', () => {
    const results = evaluateRequirements({ age: 10, name: 'Test Farmer' }, ageRules);
    expect(failedRequirementFields(results)).toEqual(['age']);
    expect(results[0].requirement_id).toBe('applicant_age');
  });

  it('lists a field once when several of its requirements fail', () => {
    const results = evaluateRequirements({ age: 10.5 }, ageRules);
    expect(results.filter((r) => !r.passed).map((r) => r.requirement_id)).toEqual([
      'applicant_age',
      'age_is_whole_years',
      'applicant_name',
    ]);
    expect(failedRequirementFields(results)).toEqual(['age', 'name']);
  });
});
