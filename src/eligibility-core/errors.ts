// src/eligibility-core/errors.ts
// Fatal configuration errors. Per-field problems are never thrown; they are
// reported as violations on requirement results (see requirements.ts).

export type ConfigurationErrorCode = 'UNKNOWN_SCHEME' | 'INVALID_RULE_SET';

export class ConfigurationError extends Error {
  readonly code: ConfigurationErrorCode;
  readonly issues: string[];

  constructor(code: ConfigurationErrorCode, message: string, issues: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.code = code;
    this.issues = issues;
  }
}

export function isConfigurationError(err: unknown): err is ConfigurationError {
  return err instanceof ConfigurationError;
}
