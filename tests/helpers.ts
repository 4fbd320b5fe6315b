// tests/helpers.ts
import path from 'path';
import type { ApplicantRecord } from '@core/applicant';

export const PM_KISAN_DIR = path.resolve('rule-sets/pm-kisan');
export const RULE_SETS_ROOT = path.resolve('rule-sets');
export const FIXTURES_DIR = path.resolve('tests/fixtures');

/** Mirrors tests/fixtures/applicants/eligible-farmer.json. */
export const ELIGIBLE_FARMER: Readonly<ApplicantRecord> = {
  farmer_id: 'F-0001',
  name: 'Test Farmer',
  age: 45,
  gender: 'male',
  phone_number: '9000000001',
  aadhaar_number: '123412341234',
  aadhaar_linked: true,
  state: 'Test State',
  district: 'Test District',
  sub_district_block: 'Test Block',
  village: 'Test Village',
  land_size_acres: 2.5,
  land_owner: true,
  land_ownership: 'owned',
  date_of_land_ownership: '2015-06-15',
  bank_account: true,
  account_number: '00112233445566',
  ifsc_code: 'TEST0001234',
  category: 'general',
  is_constitutional_post_holder: false,
  is_political_office_holder: false,
  is_government_employee: false,
  is_pensioner: false,
  is_professional: false,
  is_nri: false,
  is_income_tax_payer: false,
  region: 'Test State',
  family_members: [
    { relation: 'self', name: 'Test Farmer', age: 45, gender: 'male' },
    { relation: 'wife', name: 'Test Spouse', age: 42, gender: 'female' },
    { relation: 'child', name: 'Test Child', age: 12, gender: 'female' },
    { relation: 'child', name: 'Test Child Two', age: 8, gender: 'male' },
  ],
};

/** A fully eligible PM-KISAN applicant with the given fields replaced. */
export function applicant(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return { ...structuredClone(ELIGIBLE_FARMER), ...overrides };
}

export function applicantWithout(...fields: string[]): Record<string, unknown> {
  const record = applicant();
  for (const field of fields) delete record[field];
  return record;
}

export function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
