// packages/core/src/config/schema.ts

import { z } from 'zod';
import type { SiteConfig } from '../types/config.js';
import { ConfigError } from '../utils/errors.js';

const endpointSchema = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const siteDefaultsSchema = z.object({
  nameNode: endpointSchema,
  jobTracker: endpointSchema,
  configuration: z.record(z.string().min(1), z.string()).default({}),
});

const validationConfigSchema = z.object({
  forkJoin: z.boolean().default(true),
});

const actionTypeSchema = z.object({
  type: z.string().min(1),
  requiresEndpoints: z.boolean().default(false),
  supportsConfiguration: z.boolean().default(false),
});

export const siteConfigSchema = z
  .object({
    defaults: siteDefaultsSchema.default({}),
    validation: validationConfigSchema.default({}),
    actions: z.array(actionTypeSchema).default([]),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  })
  .superRefine((data, ctx) => {
    const seen = new Set<string>();
    data.actions.forEach((action, index) => {
      if (seen.has(action.type)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['actions', index, 'type'],
          message: `Action type "${action.type}" is declared more than once`,
        });
      }
      seen.add(action.type);
    });
  });

export type SiteConfigInput = z.input<typeof siteConfigSchema>;

/**
 * Validate and parse a site config object. Throws ConfigError on invalid input.
 */
export function validateSiteConfig(config: unknown): SiteConfig {
  const result = siteConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return result.data;
}
