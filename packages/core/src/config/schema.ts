/**
 * Zod schema for .waypost.yml configuration validation
 */

import { z } from 'zod';
import {
  DEFAULT_CAPACITY_CEILINGS,
  DEFAULT_PROBE_TIMEOUT_MS,
  DELEGATED_AGENT_SETTINGS,
  GH_CLI_SETTINGS,
  RETRY_SETTINGS,
} from '../constants/index.js';

// null means unbounded
const capacityCeilingSchema = z.number().int().positive().nullable();

export const strategyConfigSchema = z.object({
  enabled: z.boolean().default(true),
});

export const waypostConfigSchema = z.object({
  version: z.string().regex(/^\d+\.\d+$/),
  conventions: z
    .object({
      projectKeys: z
        .array(z.string().regex(/^[A-Za-z]+$/, 'Project keys contain letters only'))
        .optional(),
      initials: z
        .string()
        .regex(/^[a-z]{1,4}$/, 'Initials are 1-4 lowercase letters')
        .optional(),
    })
    .default({}),
  retrieval: z
    .object({
      probeTimeoutMs: z.number().int().positive().default(DEFAULT_PROBE_TIMEOUT_MS),
      backoff: z
        .object({
          initialDelayMs: z.number().int().min(0).default(RETRY_SETTINGS.initialDelayMs),
          maxDelayMs: z.number().int().min(0).default(RETRY_SETTINGS.maxDelayMs),
          multiplier: z.number().min(1).default(RETRY_SETTINGS.backoffMultiplier),
        })
        .default({}),
      strategies: z
        .object({
          structuredApi: strategyConfigSchema
            .extend({
              capacityCeiling: capacityCeilingSchema.default(
                DEFAULT_CAPACITY_CEILINGS.structured_api
              ),
            })
            .default({}),
          lightweightQuery: strategyConfigSchema
            .extend({
              capacityCeiling: capacityCeilingSchema.default(
                DEFAULT_CAPACITY_CEILINGS.lightweight_query
              ),
              binary: z.string().min(1).default(GH_CLI_SETTINGS.binary),
            })
            .default({}),
          delegatedAnalysis: strategyConfigSchema
            .extend({
              capacityCeiling: capacityCeilingSchema.default(null),
              binary: z.string().min(1).default(DELEGATED_AGENT_SETTINGS.binary),
              model: z.string().min(1).default(DELEGATED_AGENT_SETTINGS.defaultModel),
              maxTurns: z
                .number()
                .int()
                .positive()
                .default(DELEGATED_AGENT_SETTINGS.defaultMaxTurns),
            })
            .default({}),
        })
        .default({}),
    })
    .default({}),
});

export type WaypostConfigOutput = z.output<typeof waypostConfigSchema>;
