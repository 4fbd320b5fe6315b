// src/eligibility-core/registry.ts
// Rule sets by scheme code. The registry holds one immutable map; a reload
// builds a complete replacement first and then swaps the reference, so a
// reader always sees a single consistent version.

import type { Dirent } from 'fs';
import { readdir } from 'fs/promises';
import path from 'path';
import { ConfigurationError } from './errors';
import { loadRuleSet, type RuleSet } from './rule-set';

export function normalizeSchemeCode(schemeCode: string): string {
  return schemeCode.trim().toLowerCase();
}

export async function loadRuleSets(rootDir: string): Promise<RuleSet[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(rootDir, { withFileTypes: true });
  } catch (err) {
    throw new ConfigurationError('INVALID_RULE_SET', `Cannot read rule-set directory ${rootDir}`, [
      err instanceof Error ? err.message : String(err),
    ]);
  }

  const dirs = entries
    .filter((e) => e.isDirectory())
    .map((e) => path.join(rootDir, e.name))
    .sort();
  return Promise.all(dirs.map((dir) => loadRuleSet(dir)));
}

function indexBySchemeCode(ruleSets: readonly RuleSet[]): ReadonlyMap<string, RuleSet> {
  const map = new Map<string, RuleSet>();
  for (const ruleSet of ruleSets) {
    const code = normalizeSchemeCode(ruleSet.meta.schemeCode);
    if (map.has(code)) {
      throw new ConfigurationError('INVALID_RULE_SET', `Duplicate scheme code "${code}"`, [
        `scheme code "${code}" is defined by more than one rule set`,
      ]);
    }
    map.set(code, ruleSet);
  }
  return map;
}

export class RuleSetRegistry {
  private current: ReadonlyMap<string, RuleSet>;

  constructor(ruleSets: readonly RuleSet[] = [], private readonly rootDir?: string) {
    this.current = indexBySchemeCode(ruleSets);
  }

  static async fromDirectory(rootDir: string): Promise<RuleSetRegistry> {
    return new RuleSetRegistry(await loadRuleSets(rootDir), rootDir);
  }

  /** Throws ConfigurationError for an unknown scheme code. */
  get(schemeCode: string): RuleSet {
    const ruleSet = this.current.get(normalizeSchemeCode(schemeCode));
    if (!ruleSet) {
      throw new ConfigurationError('UNKNOWN_SCHEME', `Unknown scheme_code "${schemeCode}"`, [
        `known schemes: ${this.schemeCodes().join(', ') || '(none)'}`,
      ]);
    }
    return ruleSet;
  }

  has(schemeCode: string): boolean {
    return this.current.has(normalizeSchemeCode(schemeCode));
  }

  schemeCodes(): string[] {
    return Array.from(this.current.keys()).sort();
  }

  list(): RuleSet[] {
    return this.schemeCodes().flatMap((code) => {
      const ruleSet = this.current.get(code);
      return ruleSet ? [ruleSet] : [];
    });
  }

  get size(): number {
    return this.current.size;
  }

  /** Replaces every rule set at once. The old map stays if indexing fails. */
  install(ruleSets: readonly RuleSet[]): void {
    this.current = indexBySchemeCode(ruleSets);
  }

  async reload(): Promise<string[]> {
    if (!this.rootDir) {
      throw new ConfigurationError('INVALID_RULE_SET', 'Registry was not loaded from a directory');
    }
    this.install(await loadRuleSets(this.rootDir));
    return this.schemeCodes();
  }
}
