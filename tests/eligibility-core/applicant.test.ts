import { describe, it, expect } from 'vitest';
import { readFile } from 'fs/promises';
import path from 'path';
import {
  describeValue,
  hasField,
  isFalseFlag,
  isTrueFlag,
  normalizeToken,
  readField,
} from '@core/applicant';
import { ELIGIBLE_FARMER, FIXTURES_DIR } from '../helpers';

describe('flag parsing', () => {
  it('accepts booleans, numeric and string forms of true', () => {
    for (const value of [true, 'true', 'TRUE', ' True ', 1, '1']) {
      expect(isTrueFlag(value)).toBe(true);
    }
  });

  it('accepts booleans, numeric and string forms of false', () => {
    for (const value of [false, 'false', 'False', 0, '0']) {
      expect(isFalseFlag(value)).toBe(true);
    }
  });

  it('treats anything else as neither true nor false', () => {
    for (const value of ['yes', 2, null, undefined, {}, []]) {
      expect(isTrueFlag(value)).toBe(false);
      expect(isFalseFlag(value)).toBe(false);
    }
  });
});

describe('field readers', () => {
  const facts = { name: 'Test Farmer', government_post: null, age: 0 };

  it('treats null and absent fields as missing', () => {
    expect(hasField(facts, 'name')).toBe(true);
    expect(hasField(facts, 'age')).toBe(true);
    expect(hasField(facts, 'government_post')).toBe(false);
    expect(hasField(facts, 'profession')).toBe(false);
  });

  it('does not read inherited properties', () => {
    expect(hasField(facts, 'toString')).toBe(false);
    expect(readField(facts, 'toString')).toBeUndefined();
  });

  it('reads present values unchanged', () => {
    expect(readField(facts, 'age')).toBe(0);
    expect(readField(facts, 'government_post')).toBeUndefined();
  });
});

describe('normalizeToken', () => {
  it('trims and lower-cases strings', () => {
    expect(normalizeToken('  Manipur ')).toBe('manipur');
  });

  it('returns null for blank and non-string values', () => {
    expect(normalizeToken('   ')).toBeNull();
    expect(normalizeToken(42)).toBeNull();
  });
});

describe('describeValue', () => {
  it('passes primitives through', () => {
    expect(describeValue('owned')).toBe('owned');
    expect(describeValue(2.5)).toBe(2.5);
    expect(describeValue(false)).toBe(false);
    expect(describeValue(undefined)).toBeNull();
  });

  it('serializes structured values', () => {
    expect(describeValue([{ relation: 'self' }])).toBe('[{"relation":"self"}]');
  });

  it('masks sensitive values down to the last four characters', () => {
    expect(describeValue('123412341234', true)).toBe('********1234');
    expect(describeValue(9000000001, true)).toBe('******0001');
    expect(describeValue('123', true)).toBe('123');
  });
});

describe('applicant record', () => {
  it('matches the wire shape of the stored fixture', async () => {
    const file = path.join(FIXTURES_DIR, 'applicants', 'eligible-farmer.json');
    const stored: unknown = JSON.parse(await readFile(file, 'utf-8'));
    expect(stored).toEqual(ELIGIBLE_FARMER);
  });
});
