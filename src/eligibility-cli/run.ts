// src/eligibility-cli/run.ts
// Offline rule testing: evaluate applicant files against one rule-set
// directory without starting the API.

import { readFile } from 'fs/promises';
import { parseArgs } from 'util';
import {
  evaluateEligibility,
  explainDecision,
  isConfigurationError,
  isPlainObject,
  loadRuleSet,
  type ApplicantFacts,
  type Decision,
  type RuleSet,
} from '@core/index';
import { CLI_EXIT_CODES } from '@shared/constants';

export interface CliIo {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

export const USAGE = [
  'Usage: eligibility-check --rule-set <dir> --applicant <file> [--explain] [--verbose]',
  '',
  '  --rule-set <dir>    directory holding scheme.json and rules.json',
  '  --applicant <file>  JSON file with one applicant record or an array of records',
  '  --explain           print a readable explanation instead of the Decision JSON',
  '  --verbose           with --explain, list passing checks as well',
].join('\n');

class UsageError extends Error {}

async function readApplicants(file: string): Promise<ApplicantFacts[]> {
  let raw: string;
  try {
    raw = await readFile(file, 'utf-8');
  } catch (err) {
    throw new UsageError(`Cannot read applicant file ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new UsageError(`Malformed JSON in ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const records: unknown[] = Array.isArray(parsed) ? parsed : [parsed];
  if (records.length === 0) throw new UsageError(`${file} contains no applicant records`);
  return records.map((record, i) => {
    if (!isPlainObject(record)) {
      throw new UsageError(`Applicant record ${i} in ${file} is not a JSON object`);
    }
    return record;
  });
}

function render(decision: Decision, explain: boolean, verbose: boolean): string {
  return explain
    ? explainDecision(decision, { verbose }).join('\n')
    : JSON.stringify(decision, null, 2);
}

function parseCliArgs(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    options: {
      'rule-set': { type: 'string' },
      applicant: { type: 'string' },
      explain: { type: 'boolean', default: false },
      verbose: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
    allowPositionals: false,
  }).values;
}

export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  let values: ReturnType<typeof parseCliArgs>;
  try {
    values = parseCliArgs(argv);
  } catch (err) {
    io.stderr(err instanceof Error ? err.message : String(err));
    io.stderr(USAGE);
    return CLI_EXIT_CODES.USAGE_ERROR;
  }

  if (values.help) {
    io.stdout(USAGE);
    return CLI_EXIT_CODES.ELIGIBLE;
  }

  const ruleSetDir = values['rule-set'];
  const applicantFile = values.applicant;
  if (!ruleSetDir || !applicantFile) {
    io.stderr('Both --rule-set and --applicant are required');
    io.stderr(USAGE);
    return CLI_EXIT_CODES.USAGE_ERROR;
  }

  let loaded: { ruleSet: RuleSet; applicants: ApplicantFacts[] };
  try {
    loaded = {
      ruleSet: await loadRuleSet(ruleSetDir),
      applicants: await readApplicants(applicantFile),
    };
  } catch (err) {
    if (isConfigurationError(err)) {
      io.stderr(`[${err.code}] ${err.message}`);
      err.issues.forEach((issue) => io.stderr(`  - ${issue}`));
      return CLI_EXIT_CODES.USAGE_ERROR;
    }
    if (err instanceof UsageError) {
      io.stderr(err.message);
      return CLI_EXIT_CODES.USAGE_ERROR;
    }
    throw err;
  }

  const { ruleSet, applicants } = loaded;
  const decisions = applicants.map((facts) => evaluateEligibility(ruleSet, facts));
  const verbose = values.verbose === true;
  if (values.explain) {
    io.stdout(decisions.map((d) => render(d, true, verbose)).join('\n\n'));
  } else if (decisions.length === 1) {
    io.stdout(render(decisions[0], false, false));
  } else {
    io.stdout(JSON.stringify(decisions, null, 2));
  }

  return decisions.every((d) => d.eligible)
    ? CLI_EXIT_CODES.ELIGIBLE
    : CLI_EXIT_CODES.NOT_ELIGIBLE;
}
