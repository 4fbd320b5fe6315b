import 'dotenv/config';
import { DEFAULT_BULK_LIMIT, DEFAULT_RULE_SETS_DIR } from '@shared/constants';

/** Unset, non-numeric or non-positive values fall back to the default. */
export function positiveIntOr(value: string | undefined, fallback: number): number {
  const parsed = Number(value?.trim() || undefined);
  return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export const config = {
  port: positiveIntOr(process.env.PORT, 3002),
  nodeEnv: process.env.NODE_ENV || 'development',
  clientUrl: process.env.CLIENT_URL || 'http://localhost:5174',
  ruleSetsDir: process.env.RULE_SETS_DIR || DEFAULT_RULE_SETS_DIR,
  bulkLimit: positiveIntOr(process.env.BULK_LIMIT, DEFAULT_BULK_LIMIT),
} as const;
