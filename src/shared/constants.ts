export const API_PREFIX = '/api';

export const DEFAULT_RULE_SETS_DIR = 'rule-sets';

export const DEFAULT_BULK_LIMIT = 500;

export const ERROR_CODES = ['UNKNOWN_SCHEME', 'INVALID_RULE_SET', 'INVALID_REQUEST'] as const;

export const CLI_EXIT_CODES = {
  ELIGIBLE: 0,
  NOT_ELIGIBLE: 1,
  USAGE_ERROR: 2,
} as const;
