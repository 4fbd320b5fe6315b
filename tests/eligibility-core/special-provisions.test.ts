import { describe, it, expect, beforeAll } from 'vitest';
import { loadRuleSet, type RuleSet } from '@core/rule-set';
import { readProvisionEvidence, resolveSpecialProvision } from '@core/special-provisions';
import { PM_KISAN_DIR, applicant } from '../helpers';

let ruleSet: RuleSet;

beforeAll(async () => {
  ruleSet = await loadRuleSet(PM_KISAN_DIR);
});

function withProvision(entry: Record<string, unknown>) {
  return applicant({ special_provisions: { pm_kisan: entry } });
}

describe('readProvisionEvidence', () => {
  it('reads the scheme-keyed entry', () => {
    const evidence = readProvisionEvidence(
      withProvision({
        region_special: ' Manipur ',
        has_special_certificate: 'true',
        certificate_type: 'Village_Chief_Certificate',
        certificate_details: ' Issued by the village chief ',
      }),
      'pm_kisan',
    );
    expect(evidence).toEqual({
      region_special: 'manipur',
      has_certificate: true,
      certificate_type: 'village_chief_certificate',
      certificate_details: 'Issued by the village chief',
      source: 'scheme',
    });
  });

  it('falls back to top-level fields on legacy records', () => {
    const evidence = readProvisionEvidence(
      applicant({ region_special: 'Jharkhand', has_special_certificate: 1, certificate_type: 'vanshavali_certificate' }),
      'pm_kisan',
    );
    expect(evidence).toEqual({
      region_special: 'jharkhand',
      has_certificate: true,
      certificate_type: 'vanshavali_certificate',
      certificate_details: null,
      source: 'legacy',
    });
  });

  it('prefers the scheme-keyed entry over legacy fields', () => {
    const facts = applicant({
      region_special: 'jharkhand',
      special_provisions: { pm_kisan: { region_special: 'nagaland', has_special_certificate: false } },
    });
    expect(readProvisionEvidence(facts, 'pm_kisan').region_special).toBe('nagaland');
  });

  it('ignores entries kept for other schemes', () => {
    const facts = applicant({ special_provisions: { other_scheme: { region_special: 'manipur' } } });
    expect(readProvisionEvidence(facts, 'pm_kisan').source).toBe('none');
  });
});

describe('resolveSpecialProvision', () => {
  it('does nothing when no region is declared', () => {
    for (const region of ['none', 'None', '', 'n/a']) {
      const resolution = resolveSpecialProvision(withProvision({ region_special: region }), ruleSet);
      expect(resolution.declared).toBe(false);
      expect(resolution.reason).toBe('No special region declared');
    }
  });

  it('accepts a village authority certificate in Manipur', () => {
    const resolution = resolveSpecialProvision(
      withProvision({
        region_special: 'manipur',
        has_special_certificate: true,
        certificate_type: 'village_authority_certificate',
      }),
      ruleSet,
    );
    expect(resolution).toMatchObject({
      declared: true,
      provision_id: 'manipur',
      region: 'manipur',
      accepted_certificates: ['village_authority_certificate', 'village_chief_certificate'],
      accepted: true,
      reason: 'Manipur: village_authority_certificate accepted in place of land-title proof',
    });
  });

  it('accepts the community land certificate for the North East', () => {
    const resolution = resolveSpecialProvision(
      withProvision({
        region_special: 'north_east',
        has_special_certificate: true,
        certificate_type: 'community_land_certificate',
      }),
      ruleSet,
    );
    expect(resolution.provision_id).toBe('north_east_states');
    expect(resolution.accepted).toBe(true);
  });

  it('rejects a certificate meant for another region', () => {
    const resolution = resolveSpecialProvision(
      withProvision({
        region_special: 'manipur',
        has_special_certificate: true,
        certificate_type: 'vanshavali_certificate',
      }),
      ruleSet,
    );
    expect(resolution.accepted).toBe(false);
    expect(resolution.reason).toBe(
      'Manipur accepts village_authority_certificate or village_chief_certificate, got vanshavali_certificate',
    );
  });

  it('rejects a declared certificate with no type', () => {
    const resolution = resolveSpecialProvision(
      withProvision({ region_special: 'jharkhand', has_special_certificate: true }),
      ruleSet,
    );
    expect(resolution.reason).toBe('Jharkhand accepts vanshavali_certificate, got no certificate type');
  });

  it('reports regions without a provision', () => {
    const resolution = resolveSpecialProvision(
      withProvision({ region_special: 'atlantis', has_special_certificate: true, certificate_type: 'any' }),
      ruleSet,
    );
    expect(resolution).toMatchObject({
      declared: true,
      provision_id: null,
      region: 'atlantis',
      accepted: false,
      reason: 'No special provision exists for region "atlantis"',
    });
  });

  it('never rewrites land fields', () => {
    const facts = withProvision({
      region_special: 'nagaland',
      has_special_certificate: true,
      certificate_type: 'village_council_certificate',
    });
    const before = structuredClone(facts);
    resolveSpecialProvision(facts, ruleSet);
    expect(facts).toEqual(before);
  });
});
