// src/eligibility-core/family.ts
// Household composition check: a linear scan over the family list that
// counts members by relation. Depends only on the family list.

import { isPlainObject, normalizeToken, readField, type ApplicantFacts } from './applicant';
import { rulesOfKind, type FamilyRule, type RuleSet } from './rule-set';

export interface FamilyDetail {
  rule_id: string | null;
  member_count: number;
  self_present: boolean;
  spouse_present: boolean;
  spouse_relations: string[];
  minor_children: number;
  adult_children: number;
  adult_child_ages: number[];
  children_with_unknown_age: number;
  unrecognized_relations: string[];
  problems: string[];
}

export interface FamilyResult {
  valid: boolean;
  detail: FamilyDetail;
}

function emptyDetail(rule: FamilyRule | undefined): FamilyDetail {
  return {
    rule_id: rule?.id ?? null,
    member_count: 0,
    self_present: false,
    spouse_present: false,
    spouse_relations: [],
    minor_children: 0,
    adult_children: 0,
    adult_child_ages: [],
    children_with_unknown_age: 0,
    unrecognized_relations: [],
    problems: [],
  };
}

function memberAge(member: Record<string, unknown>): number | null {
  const age = member.age;
  return typeof age === 'number' && Number.isFinite(age) && age >= 0 ? age : null;
}

export function validateFamily(facts: ApplicantFacts, ruleSet: RuleSet): FamilyResult {
  const [rule] = rulesOfKind(ruleSet, 'family');
  const detail = emptyDetail(rule);

  if (!rule) {
    return { valid: true, detail };
  }

  const members = readField(facts, rule.field);
  if (!Array.isArray(members)) {
    detail.problems.push(`${rule.field} is missing or not a list`);
    return { valid: false, detail };
  }

  const selfRelation = rule.selfRelation.toLowerCase();
  const childRelation = rule.childRelation.toLowerCase();
  const spouseRelations = rule.spouseRelations.map((r) => r.toLowerCase());

  detail.member_count = members.length;

  for (const member of members) {
    const relation = isPlainObject(member) ? normalizeToken(member.relation) : null;

    if (relation === selfRelation) {
      detail.self_present = true;
    } else if (relation !== null && spouseRelations.includes(relation)) {
      detail.spouse_present = true;
      if (!detail.spouse_relations.includes(relation)) detail.spouse_relations.push(relation);
    } else if (relation === childRelation && isPlainObject(member)) {
      const age = memberAge(member);
      if (age === null) {
        detail.children_with_unknown_age++;
      } else if (age < rule.maxChildAge) {
        detail.minor_children++;
      } else {
        detail.adult_children++;
        detail.adult_child_ages.push(age);
      }
    } else {
      detail.unrecognized_relations.push(relation ?? '(none)');
    }
  }

  if (rule.requireSelf && !detail.self_present) {
    detail.problems.push(`no "${rule.selfRelation}" entry in household`);
  }
  if (rule.requireSpouse && !detail.spouse_present) {
    detail.problems.push(`no spouse (${rule.spouseRelations.join(' or ')}) in household`);
  }
  if (detail.adult_children > 0) {
    detail.problems.push(
      `children aged ${rule.maxChildAge} or older present (ages ${detail.adult_child_ages.join(', ')})`,
    );
  }
  if (detail.children_with_unknown_age > 0) {
    detail.problems.push(`${detail.children_with_unknown_age} child(ren) with missing or invalid age`);
  }
  if (rule.unrecognizedRelations === 'reject' && detail.unrecognized_relations.length > 0) {
    detail.problems.push(`unrecognized relations: ${detail.unrecognized_relations.join(', ')}`);
  }

  return { valid: detail.problems.length === 0, detail };
}
