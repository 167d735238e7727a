// packages/cli/src/utils.ts — Shared plumbing for the validate and inspect commands

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import {
  ConfigError,
  WorkflowParser,
  createLogger,
  createSchemaValidator,
  loadSiteConfig,
} from '@wfgraph/core';
import type { JobConfiguration, LogLevel, Logger, SiteConfigInput, WorkflowApp } from '@wfgraph/core';
import { InvalidArgumentError } from 'commander';
import { parse as parseYaml } from 'yaml';

export interface PipelineOptions {
  conf?: string;
  define: string[];
  forkJoin: boolean;
  schema: boolean;
  verbose?: boolean;
  /** Where `.wfgraph.yml` is looked up; the working directory by default. */
  projectDir?: string;
}

/** Commander collector for repeatable `-D key=value` flags. */
export function collectDefine(value: string, previous: string[]): string[] {
  const eq = value.indexOf('=');
  if (eq <= 0) {
    throw new InvalidArgumentError(`Expected key=value, got "${value}"`);
  }
  return [...previous, value];
}

function toConfValue(key: string, value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  throw new ConfigError(`Job configuration entry "${key}" must be a scalar value`, key);
}

/**
 * Job configuration from an optional YAML mapping, with `-D` definitions
 * applied on top in order.
 */
export function loadJobConf(confPath: string | undefined, defines: readonly string[]): JobConfiguration {
  const jobConf: JobConfiguration = new Map();

  if (confPath) {
    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(confPath, 'utf-8'));
    } catch (err) {
      throw new ConfigError(
        `Failed to read job configuration ${confPath}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    if (parsed !== null && parsed !== undefined) {
      if (typeof parsed !== 'object' || Array.isArray(parsed)) {
        throw new ConfigError(`Job configuration ${confPath} must be a mapping of key: value`);
      }
      for (const [key, value] of Object.entries(parsed)) {
        jobConf.set(key, toConfValue(key, value));
      }
    }
  }

  for (const define of defines) {
    const eq = define.indexOf('=');
    jobConf.set(define.slice(0, eq).trim(), define.slice(eq + 1));
  }
  return jobConf;
}

export function createCliLogger(verbose: boolean | undefined, fallback: LogLevel): Logger {
  return createLogger(verbose ? 'debug' : fallback);
}

/** Loads site config, job configuration and the definition, then runs the full pipeline. */
export function runPipeline(file: string, options: PipelineOptions): WorkflowApp {
  const overrides: SiteConfigInput | undefined = options.forkJoin
    ? undefined
    : { validation: { forkJoin: false } };
  const site = loadSiteConfig({ projectDir: options.projectDir, overrides });
  const logger = createCliLogger(options.verbose, site.logLevel);

  const jobConf = loadJobConf(options.conf, options.define);
  const path = resolve(file);
  const definition = readFileSync(path, 'utf-8');
  logger.debug(`Validating ${path}`);

  const parser = new WorkflowParser({
    siteConfig: site,
    schema: options.schema ? createSchemaValidator() : undefined,
    logger,
  });
  return parser.validateAndParse(definition, jobConf);
}
