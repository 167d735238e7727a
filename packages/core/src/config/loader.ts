// packages/core/src/config/loader.ts

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { SiteConfig } from '../types/config.js';
import { SITE_CONFIG_FILENAME } from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_SITE_CONFIG } from './defaults.js';
import type { SiteConfigInput } from './schema.js';
import { validateSiteConfig } from './schema.js';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects. Source values overwrite target values.
 * Arrays are replaced, not merged.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };
  for (const key of Object.keys(source)) {
    const srcVal = source[key];
    const tgtVal = result[key];
    if (srcVal === undefined) continue;
    result[key] = isPlainObject(srcVal) && isPlainObject(tgtVal) ? deepMerge(tgtVal, srcVal) : srcVal;
  }
  return result;
}

function readSiteFile(path: string): PlainObject {
  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(
      `Failed to parse ${SITE_CONFIG_FILENAME}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`${SITE_CONFIG_FILENAME} must contain a mapping at the top level`);
  }
  return parsed;
}

/**
 * Load site config with precedence: overrides > .wfgraph.yml > defaults.
 *
 * The merged result is validated once, so a bad override is reported the same
 * way as a bad file.
 */
export function loadSiteConfig(options?: {
  projectDir?: string;
  overrides?: SiteConfigInput;
  skipFile?: boolean;
}): SiteConfig {
  const projectDir = options?.projectDir ?? process.cwd();
  let merged: PlainObject = structuredClone({ ...DEFAULT_SITE_CONFIG });

  const configPath = join(projectDir, SITE_CONFIG_FILENAME);
  if (!options?.skipFile && existsSync(configPath)) {
    merged = deepMerge(merged, readSiteFile(configPath));
  }

  if (options?.overrides) {
    merged = deepMerge(merged, { ...options.overrides });
  }

  return validateSiteConfig(merged);
}
