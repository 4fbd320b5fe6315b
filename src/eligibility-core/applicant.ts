// src/eligibility-core/applicant.ts
// Fact store: the caller-supplied applicant snapshot and read helpers.
// The engine only reads facts; nothing here mutates a record.

// ── Wire shape ───────────────────────────────────────────────────────────────

export type Gender = 'male' | 'female' | 'other';

export type LandOwnership =
  | 'owned'
  | 'leased'
  | 'sharecropping'
  | 'joint'
  | 'institutional'
  | 'unknown';

export type Category = 'sc' | 'st' | 'general' | 'minority' | 'bpl';

export type FamilyMember = {
  relation: string;
  name?: string;
  age: number;
  gender?: Gender;
};

export type SpecialProvisionEvidence = {
  region_special: string;
  has_special_certificate: boolean;
  certificate_type?: string;
  certificate_details?: string;
};

/**
 * The applicant record as serialized by the record-storage service.
 * Field names are part of the wire contract and must not be renamed.
 */
export type ApplicantRecord = {
  farmer_id?: string;
  name: string;
  age: number;
  gender: Gender;
  phone_number: string;
  aadhaar_number: string;
  aadhaar_linked: boolean;

  state: string;
  district: string;
  sub_district_block: string;
  village: string;

  land_size_acres: number;
  land_owner: boolean;
  land_ownership: LandOwnership;
  date_of_land_ownership: string;

  bank_account: boolean;
  account_number: string;
  ifsc_code: string;

  category: Category;

  is_constitutional_post_holder: boolean;
  is_political_office_holder: boolean;
  is_government_employee: boolean;
  government_post?: string;
  is_pensioner: boolean;
  monthly_pension?: number;
  is_professional: boolean;
  profession?: string;
  is_nri: boolean;
  is_income_tax_payer: boolean;

  region: string;
  special_provisions?: Record<string, SpecialProvisionEvidence>;

  family_members: FamilyMember[];
};

/**
 * What the engine actually evaluates. Records arrive as parsed JSON, so every
 * field is read as `unknown` and checked by the rule that consumes it.
 */
export type ApplicantFacts = Readonly<Record<string, unknown>>;

// ── Readers ──────────────────────────────────────────────────────────────────

export function hasField(facts: ApplicantFacts, field: string): boolean {
  return (
    Object.prototype.hasOwnProperty.call(facts, field) &&
    facts[field] !== undefined &&
    facts[field] !== null
  );
}

export function readField(facts: ApplicantFacts, field: string): unknown {
  return hasField(facts, field) ? facts[field] : undefined;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function normalizeFlag(value: unknown): string | null {
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return String(value);
  if (typeof value === 'string') return value.trim().toLowerCase();
  return null;
}

// Flags may arrive as true/false, "True"/"false", 1/0 or "1"/"0".
export function isTrueFlag(value: unknown): boolean {
  const flag = normalizeFlag(value);
  return flag === 'true' || flag === '1';
}

export function isFalseFlag(value: unknown): boolean {
  const flag = normalizeFlag(value);
  return flag === 'false' || flag === '0';
}

export function normalizeToken(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const token = value.trim().toLowerCase();
  return token === '' ? null : token;
}

/**
 * Renders a fact for the trace. Sensitive values keep only their last four
 * characters.
 */
export function describeValue(
  value: unknown,
  sensitive = false,
): string | number | boolean | null {
  if (value === undefined || value === null) return null;
  if (sensitive) {
    const text = String(value);
    const visible = text.slice(-4);
    return `${'*'.repeat(Math.max(0, text.length - visible.length))}${visible}`;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return JSON.stringify(value);
}
