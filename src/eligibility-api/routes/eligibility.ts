// src/eligibility-api/routes/eligibility.ts
import { Router } from 'express';
import { z } from 'zod';
import { checkEligibility, checkEligibilityBulk, type BulkRequest } from '@core/decision';
import type { RuleSetRegistry } from '@core/registry';
import type { ApiResponse } from '@shared/types';
import { formatIssues } from '../middleware/index';

const applicantSchema = z.record(z.string(), z.unknown());

export const checkRequestSchema = z.object({
  scheme_code: z.string().trim().min(1),
  applicant: applicantSchema,
});

const schemeCodeSchema = z.string().trim().min(1);

const bulkApplicationSchema = z.object({
  scheme_code: schemeCodeSchema.optional(),
  applicant: applicantSchema,
});

/**
 * Each application names its own scheme or inherits the top-level
 * scheme_code. Parses to one BulkRequest per application.
 */
export function bulkRequestSchema(limit: number) {
  return z
    .object({
      scheme_code: schemeCodeSchema.optional(),
      applications: z
        .array(bulkApplicationSchema)
        .min(1)
        .max(limit, `at most ${limit} applications per request`),
    })
    .transform((body, ctx) => {
      const requests: BulkRequest[] = [];
      body.applications.forEach((application, i) => {
        const schemeCode = application.scheme_code ?? body.scheme_code;
        if (schemeCode === undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['applications', i, 'scheme_code'],
            message: 'Required when no top-level scheme_code is given',
          });
          return;
        }
        requests.push({ scheme_code: schemeCode, facts: application.applicant });
      });
      return requests;
    });
}

export interface EligibilityRouterOptions {
  bulkLimit: number;
}

export default function eligibilityRouter(
  registry: RuleSetRegistry,
  options: EligibilityRouterOptions,
): Router {
  const router = Router();
  const bulkSchema = bulkRequestSchema(options.bulkLimit);

  // POST /eligibility/check -- evaluate one applicant
  router.post('/check', (req, res) => {
    const parsed = checkRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const response: ApiResponse = {
        success: false,
        error: 'Invalid request body',
        code: 'INVALID_REQUEST',
        issues: formatIssues(parsed.error),
      };
      return res.status(400).json(response);
    }

    const decision = checkEligibility(registry, parsed.data.scheme_code, parsed.data.applicant);
    res.json({ success: true, data: decision });
  });

  // POST /eligibility/bulk -- evaluate many applications, each against its scheme
  router.post('/bulk', (req, res) => {
    const parsed = bulkSchema.safeParse(req.body);
    if (!parsed.success) {
      const response: ApiResponse = {
        success: false,
        error: 'Invalid request body',
        code: 'INVALID_REQUEST',
        issues: formatIssues(parsed.error),
      };
      return res.status(400).json(response);
    }

    const results = checkEligibilityBulk(registry, parsed.data);
    res.json({ success: true, data: { results } });
  });

  return router;
}
