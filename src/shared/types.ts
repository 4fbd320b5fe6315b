import type { ERROR_CODES } from './constants';

export type ErrorCode = (typeof ERROR_CODES)[number];

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  code?: ErrorCode;
  issues?: string[];
}

export interface RuleSetSummary {
  schemeCode: string;
  name: string;
  version: string;
  effectiveDate: string;
  ruleCount: number;
  ruleCounts: Record<string, number>;
}

export interface HealthStatus {
  status: 'ok';
  engineVersion: string;
  ruleSets: string[];
}
