/**
 * Configuration loading and validation
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';
import { waypostConfigSchema, type WaypostConfigOutput } from './schema.js';
import type { WaypostConfig } from '../types/index.js';
import { CONFIG_FILE_NAMES } from '../constants/index.js';
import { createLogger } from '../logger/index.js';

const logger = createLogger('config');

export class ConfigError extends Error {
  constructor(
    message: string,
    public source: string | null,
    public issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export async function loadConfig(
  repoPath: string
): Promise<WaypostConfig | null> {
  for (const fileName of CONFIG_FILE_NAMES) {
    const configPath = join(repoPath, fileName);
    if (existsSync(configPath)) {
      logger.info({ configPath }, 'Found config file');
      const content = await readFile(configPath, 'utf-8');
      return parseConfig(content, configPath);
    }
  }

  logger.debug({ repoPath }, 'No config file found, using defaults');
  return null;
}

export function parseConfig(content: string, source: string | null = null): WaypostConfig {
  const raw: unknown = parseYaml(content);
  return validateConfig(raw, source);
}

export function validateConfig(config: unknown, source: string | null = null): WaypostConfig {
  const result = waypostConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration${source ? ` in ${source}` : ''}`,
      source,
      formatIssues(result.error)
    );
  }
  return transformConfig(result.data);
}

export function defaultConfig(): WaypostConfig {
  return validateConfig({ version: '1.0' });
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

function ceiling(value: number | null): number {
  return value === null ? Number.POSITIVE_INFINITY : value;
}

function transformConfig(parsed: WaypostConfigOutput): WaypostConfig {
  const { strategies } = parsed.retrieval;

  return {
    version: parsed.version,
    conventions: {
      projectKeys: parsed.conventions.projectKeys?.map((key) => key.toUpperCase()),
      initials: parsed.conventions.initials,
    },
    retrieval: {
      probeTimeoutMs: parsed.retrieval.probeTimeoutMs,
      backoff: parsed.retrieval.backoff,
      strategies: {
        structuredApi: {
          enabled: strategies.structuredApi.enabled,
          capacityCeiling: ceiling(strategies.structuredApi.capacityCeiling),
        },
        lightweightQuery: {
          enabled: strategies.lightweightQuery.enabled,
          capacityCeiling: ceiling(strategies.lightweightQuery.capacityCeiling),
          binary: strategies.lightweightQuery.binary,
        },
        delegatedAnalysis: {
          enabled: strategies.delegatedAnalysis.enabled,
          capacityCeiling: ceiling(strategies.delegatedAnalysis.capacityCeiling),
          binary: strategies.delegatedAnalysis.binary,
          model: strategies.delegatedAnalysis.model,
          maxTurns: strategies.delegatedAnalysis.maxTurns,
        },
      },
    },
  };
}

export { waypostConfigSchema } from './schema.js';
