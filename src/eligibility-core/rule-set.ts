// src/eligibility-core/rule-set.ts
// Declarative scheme rule sets: types, document schemas and the loader.
// A rule set is pure data; loading validates it and freezes it so one value
// can be shared by every concurrent evaluation.

import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from './errors';

// ── Predicate vocabulary ─────────────────────────────────────────────────────

export type FieldCheck =
  | { type: 'present' }
  | { type: 'non_empty_string' }
  | { type: 'boolean' }
  | { type: 'is_true' }
  | { type: 'integer_range'; min: number; max: number }
  | { type: 'number_greater_than'; value: number }
  | { type: 'number_at_least'; value: number }
  | { type: 'digits'; length?: number }
  | { type: 'exact_length'; length: number }
  | { type: 'one_of'; values: readonly string[]; caseInsensitive?: boolean }
  | { type: 'in_list'; list: string }
  | { type: 'date_on_or_before'; cutoff: string };

export type Condition =
  | { type: 'field'; field: string; check: FieldCheck }
  | { type: 'all'; conditions: readonly Condition[] }
  | { type: 'any'; conditions: readonly Condition[] }
  | { type: 'not'; condition: Condition }
  | { type: 'special_region_declared' }
  | { type: 'special_provision_accepted' };

// ── Rules ────────────────────────────────────────────────────────────────────

interface RuleBase {
  id: string;
  reason: string;
  citation?: string;
}

export interface FieldRequirement extends RuleBase {
  kind: 'field_requirement';
  field: string;
  check: FieldCheck;
  sensitive?: boolean;
}

export interface ConditionalRequirement extends RuleBase {
  kind: 'conditional_requirement';
  trigger: Condition;
  requirement: Condition;
}

export interface ExclusionRule extends RuleBase {
  kind: 'exclusion';
  when: Condition;
}

export interface SpecialProvisionRule extends RuleBase {
  kind: 'special_provision';
  region: string;
  label: string;
  acceptedCertificates: readonly string[];
}

export type UnrecognizedRelationPolicy = 'ignore' | 'reject';

export interface FamilyRule extends RuleBase {
  kind: 'family';
  field: string;
  selfRelation: string;
  spouseRelations: readonly string[];
  childRelation: string;
  maxChildAge: number;
  requireSelf: boolean;
  requireSpouse: boolean;
  unrecognizedRelations: UnrecognizedRelationPolicy;
}

export type Rule =
  | FieldRequirement
  | ConditionalRequirement
  | ExclusionRule
  | SpecialProvisionRule
  | FamilyRule;

export type RuleKind = Rule['kind'];

export interface SchemeMeta {
  schemeCode: string;
  name: string;
  version: string;
  effectiveDate: string;
  description: string;
  source: string;
  provisionKey: string;
}

export interface RuleSet {
  readonly meta: Readonly<SchemeMeta>;
  readonly lists: Readonly<Record<string, readonly string[]>>;
  readonly rules: readonly Rule[];
  readonly ruleIndex: ReadonlySet<string>;
}

// ── Document schemas ─────────────────────────────────────────────────────────

const nonEmpty = z.string().trim().min(1);

export const fieldCheckSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('present') }),
  z.object({ type: z.literal('non_empty_string') }),
  z.object({ type: z.literal('boolean') }),
  z.object({ type: z.literal('is_true') }),
  z.object({ type: z.literal('integer_range'), min: z.number().int(), max: z.number().int() }),
  z.object({ type: z.literal('number_greater_than'), value: z.number() }),
  z.object({ type: z.literal('number_at_least'), value: z.number() }),
  z.object({ type: z.literal('digits'), length: z.number().int().positive().optional() }),
  z.object({ type: z.literal('exact_length'), length: z.number().int().positive() }),
  z.object({
    type: z.literal('one_of'),
    values: z.array(nonEmpty).min(1),
    caseInsensitive: z.boolean().optional(),
  }),
  z.object({ type: z.literal('in_list'), list: nonEmpty }),
  z.object({
    type: z.literal('date_on_or_before'),
    cutoff: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'cutoff must be YYYY-MM-DD'),
  }),
]);

export const conditionSchema: z.ZodType<Condition> = z.lazy(() =>
  z.discriminatedUnion('type', [
    z.object({ type: z.literal('field'), field: nonEmpty, check: fieldCheckSchema }),
    z.object({ type: z.literal('all'), conditions: z.array(conditionSchema).min(1) }),
    z.object({ type: z.literal('any'), conditions: z.array(conditionSchema).min(1) }),
    z.object({ type: z.literal('not'), condition: conditionSchema }),
    z.object({ type: z.literal('special_region_declared') }),
    z.object({ type: z.literal('special_provision_accepted') }),
  ]),
);

const ruleBase = {
  id: z.string().regex(/^[a-z0-9][a-z0-9_]*$/, 'rule ids are lower snake_case'),
  reason: nonEmpty,
  citation: z.string().optional(),
};

export const ruleSchema = z.discriminatedUnion('kind', [
  z.object({
    ...ruleBase,
    kind: z.literal('field_requirement'),
    field: nonEmpty,
    check: fieldCheckSchema,
    sensitive: z.boolean().optional(),
  }),
  z.object({
    ...ruleBase,
    kind: z.literal('conditional_requirement'),
    trigger: conditionSchema,
    requirement: conditionSchema,
  }),
  z.object({
    ...ruleBase,
    kind: z.literal('exclusion'),
    when: conditionSchema,
  }),
  z.object({
    ...ruleBase,
    kind: z.literal('special_provision'),
    region: nonEmpty,
    label: nonEmpty,
    acceptedCertificates: z.array(nonEmpty).min(1),
  }),
  z.object({
    ...ruleBase,
    kind: z.literal('family'),
    field: nonEmpty.default('family_members'),
    selfRelation: nonEmpty.default('self'),
    spouseRelations: z.array(nonEmpty).min(1).default(['wife', 'husband']),
    childRelation: nonEmpty.default('child'),
    maxChildAge: z.number().int().positive().default(18),
    requireSelf: z.boolean().default(true),
    requireSpouse: z.boolean().default(true),
    unrecognizedRelations: z.enum(['ignore', 'reject']).default('ignore'),
  }),
]);

export const schemeMetaSchema = z.object({
  schemeCode: z.string().regex(/^[a-z0-9][a-z0-9_-]*$/, 'scheme codes are lower-case slugs'),
  name: nonEmpty,
  version: nonEmpty,
  effectiveDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  description: z.string().default(''),
  source: z.string().default(''),
  provisionKey: nonEmpty,
});

export const rulesDocumentSchema = z.object({
  lists: z.record(z.string(), z.array(nonEmpty).min(1)).default({}),
  rules: z.array(ruleSchema).min(1),
});

// ── Structural checks ────────────────────────────────────────────────────────

function walkCondition(condition: Condition, visit: (c: Condition) => void): void {
  visit(condition);
  switch (condition.type) {
    case 'all':
    case 'any':
      condition.conditions.forEach((c) => walkCondition(c, visit));
      break;
    case 'not':
      walkCondition(condition.condition, visit);
      break;
    default:
      break;
  }
}

/** Fields a condition reads, in first-seen order. */
export function conditionFields(condition: Condition): string[] {
  const fields: string[] = [];
  walkCondition(condition, (c) => {
    if (c.type === 'field' && !fields.includes(c.field)) fields.push(c.field);
  });
  return fields;
}

function conditionsOf(rule: Rule): Condition[] {
  switch (rule.kind) {
    case 'field_requirement':
      return [{ type: 'field', field: rule.field, check: rule.check }];
    case 'conditional_requirement':
      return [rule.trigger, rule.requirement];
    case 'exclusion':
      return [rule.when];
    case 'special_provision':
    case 'family':
      return [];
  }
}

function checkStructure(lists: Record<string, readonly string[]>, rules: readonly Rule[]): string[] {
  const issues: string[] = [];
  const seenIds = new Set<string>();
  const seenRegions = new Set<string>();
  let familyRules = 0;
  let provisionRules = 0;
  let usesProvision = false;

  for (const rule of rules) {
    if (seenIds.has(rule.id)) issues.push(`duplicate rule id "${rule.id}"`);
    seenIds.add(rule.id);

    if (rule.kind === 'family') familyRules++;
    if (rule.kind === 'special_provision') {
      provisionRules++;
      const region = rule.region.trim().toLowerCase();
      if (seenRegions.has(region)) issues.push(`duplicate special provision for region "${region}"`);
      seenRegions.add(region);
    }

    for (const root of conditionsOf(rule)) {
      walkCondition(root, (c) => {
        if (c.type === 'field' && c.check.type === 'in_list' && !(c.check.list in lists)) {
          issues.push(`rule "${rule.id}" references missing list "${c.check.list}"`);
        }
        if (c.type === 'special_provision_accepted' || c.type === 'special_region_declared') {
          usesProvision = true;
        }
      });
    }
  }

  if (familyRules > 1) issues.push(`expected at most one family rule, found ${familyRules}`);
  if (usesProvision && provisionRules === 0) {
    issues.push('special provision conditions are used but no special_provision rules are defined');
  }
  return issues;
}

function formatZodIssues(prefix: string, error: z.ZodError): string[] {
  return error.issues.map((issue) => `${prefix}${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

// ── Parsing & loading ────────────────────────────────────────────────────────

/**
 * Validates raw scheme/rules documents and builds an immutable rule set.
 * Throws ConfigurationError listing every problem found.
 */
export function parseRuleSet(schemeDoc: unknown, rulesDoc: unknown): RuleSet {
  const meta = schemeMetaSchema.safeParse(schemeDoc);
  const body = rulesDocumentSchema.safeParse(rulesDoc);

  const issues: string[] = [];
  if (!meta.success) issues.push(...formatZodIssues('scheme.', meta.error));
  if (!body.success) issues.push(...formatZodIssues('rules.', body.error));
  if (meta.success && body.success) {
    issues.push(...checkStructure(body.data.lists, body.data.rules));
  }

  if (!meta.success || !body.success || issues.length > 0) {
    const label = meta.success ? meta.data.schemeCode : 'unknown scheme';
    throw new ConfigurationError(
      'INVALID_RULE_SET',
      `Invalid rule set for ${label}: ${issues.length} issue(s)`,
      issues,
    );
  }

  const ruleSet: RuleSet = {
    meta: meta.data,
    lists: body.data.lists,
    rules: body.data.rules,
    ruleIndex: new Set(body.data.rules.map((r) => r.id)),
  };
  return deepFreeze(ruleSet);
}

async function readJson(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigurationError('INVALID_RULE_SET', `Cannot read ${filePath}`, [
      err instanceof Error ? err.message : String(err),
    ]);
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError('INVALID_RULE_SET', `Malformed JSON in ${filePath}`, [
      err instanceof Error ? err.message : String(err),
    ]);
  }
}

export async function loadRuleSet(ruleSetDir: string): Promise<RuleSet> {
  const [schemeDoc, rulesDoc] = await Promise.all([
    readJson(path.join(ruleSetDir, 'scheme.json')),
    readJson(path.join(ruleSetDir, 'rules.json')),
  ]);
  return parseRuleSet(schemeDoc, rulesDoc);
}

// ── Selectors ────────────────────────────────────────────────────────────────

export function rulesOfKind<K extends RuleKind>(
  ruleSet: RuleSet,
  kind: K,
): Extract<Rule, { kind: K }>[] {
  return ruleSet.rules.filter((rule): rule is Extract<Rule, { kind: K }> => rule.kind === kind);
}

/**
 * Applicant fields the rule set reads, in rule order. Special provision
 * evidence is read from the `special_provisions` map.
 */
export function ruleSetFields(ruleSet: RuleSet): string[] {
  const fields: string[] = [];
  const add = (field: string) => {
    if (!fields.includes(field)) fields.push(field);
  };
  for (const rule of ruleSet.rules) {
    switch (rule.kind) {
      case 'special_provision':
        add('special_provisions');
        break;
      case 'family':
        add(rule.field);
        break;
      default:
        conditionsOf(rule).flatMap(conditionFields).forEach(add);
    }
  }
  return fields;
}
