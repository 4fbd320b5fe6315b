// src/eligibility-core/special-provisions.ts
// Region-specific relaxation of land-title evidence. Some regions hold land
// under community or customary tenure, so a certificate from a village
// authority stands in as proof of cultivation. The resolver only answers
// whether the supplied certificate is accepted; it never rewrites land fields.

import {
  isPlainObject,
  isTrueFlag,
  normalizeToken,
  readField,
  type ApplicantFacts,
} from './applicant';
import { rulesOfKind, type RuleSet, type SpecialProvisionRule } from './rule-set';

export interface SpecialProvisionEvidenceView {
  region_special: string | null;
  has_certificate: boolean;
  certificate_type: string | null;
  certificate_details: string | null;
  source: 'scheme' | 'legacy' | 'none';
}

export interface SpecialProvisionResolution extends SpecialProvisionEvidenceView {
  declared: boolean;
  provision_id: string | null;
  region: string | null;
  accepted_certificates: readonly string[];
  accepted: boolean;
  reason: string;
}

const NOT_DECLARED = new Set(['none', 'null', 'n/a']);

function toText(value: unknown): string | null {
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : null;
}

/**
 * Reads the scheme-keyed entry under `special_provisions`, falling back to
 * top-level fields on records written before the per-scheme map existed.
 */
export function readProvisionEvidence(
  facts: ApplicantFacts,
  provisionKey: string,
): SpecialProvisionEvidenceView {
  const provisions = readField(facts, 'special_provisions');
  const entry = isPlainObject(provisions) ? provisions[provisionKey] : undefined;

  if (isPlainObject(entry)) {
    return {
      region_special: normalizeToken(entry.region_special),
      has_certificate: isTrueFlag(entry.has_special_certificate),
      certificate_type: normalizeToken(entry.certificate_type),
      certificate_details: toText(entry.certificate_details),
      source: 'scheme',
    };
  }

  const legacyRegion = normalizeToken(readField(facts, 'region_special'));
  if (legacyRegion !== null) {
    return {
      region_special: legacyRegion,
      has_certificate: isTrueFlag(readField(facts, 'has_special_certificate')),
      certificate_type: normalizeToken(readField(facts, 'certificate_type')),
      certificate_details: toText(readField(facts, 'certificate_details')),
      source: 'legacy',
    };
  }

  return {
    region_special: null,
    has_certificate: false,
    certificate_type: null,
    certificate_details: null,
    source: 'none',
  };
}

function findProvision(ruleSet: RuleSet, region: string): SpecialProvisionRule | undefined {
  return rulesOfKind(ruleSet, 'special_provision').find(
    (rule) => rule.region.trim().toLowerCase() === region,
  );
}

export function resolveSpecialProvision(
  facts: ApplicantFacts,
  ruleSet: RuleSet,
): SpecialProvisionResolution {
  const evidence = readProvisionEvidence(facts, ruleSet.meta.provisionKey);
  const region = evidence.region_special;

  if (region === null || NOT_DECLARED.has(region)) {
    return {
      ...evidence,
      declared: false,
      provision_id: null,
      region: null,
      accepted_certificates: [],
      accepted: false,
      reason: 'No special region declared',
    };
  }

  const provision = findProvision(ruleSet, region);
  if (!provision) {
    return {
      ...evidence,
      declared: true,
      provision_id: null,
      region,
      accepted_certificates: [],
      accepted: false,
      reason: `No special provision exists for region "${region}"`,
    };
  }

  const base = {
    ...evidence,
    declared: true,
    provision_id: provision.id,
    region: provision.region,
    accepted_certificates: provision.acceptedCertificates,
  };

  if (!evidence.has_certificate) {
    return {
      ...base,
      accepted: false,
      reason: `${provision.label} provision requires a special certificate`,
    };
  }

  const certificate = evidence.certificate_type;
  const accepted =
    certificate !== null &&
    provision.acceptedCertificates.some((c) => c.trim().toLowerCase() === certificate);

  return {
    ...base,
    accepted,
    reason: accepted
      ? `${provision.label}: ${certificate} accepted in place of land-title proof`
      : `${provision.label} accepts ${provision.acceptedCertificates.join(' or ')}, got ${certificate ?? 'no certificate type'}`,
  };
}
