import { join } from 'node:path';
import { CONFIG_FILE } from '../constants.js';
import { ConfigError } from '../errors.js';
import { readFileOrNull } from '../infra/fs-utils.js';
import { isPlainObject, validate } from '../infra/validator.js';
import type { Schema } from '../infra/validator.js';
import { LOG_LEVELS } from '../logging/logger.js';
import { MAX_NODES_RULE } from '../tree/tree.js';
import { DEFAULT_CONFIG } from './types.js';
import type { NavigatorConfig, PartialNavigatorConfig } from './types.js';

const UNSAFE_MERGE_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

const CONFIG_SCHEMA: Schema = {
  'logging.level': { type: 'enum', values: LOG_LEVELS },
  'build.maxNodes': MAX_NODES_RULE,
};

function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const key of Object.keys(override)) {
    if (UNSAFE_MERGE_KEYS.has(key)) continue;
    const val = override[key];
    if (isPlainObject(val)) {
      const current = result[key];
      result[key] = deepMerge(isPlainObject(current) ? current : {}, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

function toConfig(raw: Record<string, unknown>, source: string): NavigatorConfig {
  const errors = validate(raw, CONFIG_SCHEMA);
  if (errors.length > 0) {
    throw new ConfigError(`Invalid configuration in ${source}`, errors);
  }

  const logging = isPlainObject(raw.logging) ? raw.logging : {};
  const build = isPlainObject(raw.build) ? raw.build : {};
  const level = LOG_LEVELS.find((l) => l === logging.level) ?? DEFAULT_CONFIG.logging.level;
  const maxNodes = typeof build.maxNodes === 'number' ? build.maxNodes : undefined;

  return {
    logging: { level },
    build: maxNodes === undefined ? {} : { maxNodes },
  };
}

function defaults(): Record<string, unknown> {
  return { logging: { ...DEFAULT_CONFIG.logging }, build: { ...DEFAULT_CONFIG.build } };
}

/** Merge programmatic overrides over DEFAULT_CONFIG and validate the result. */
export function resolveConfig(overrides: PartialNavigatorConfig = {}): NavigatorConfig {
  return toConfig(deepMerge(defaults(), { ...overrides }), 'overrides');
}

export class ConfigLoader {
  /**
   * Read `tree-navigator.json` from `dir` and merge it over DEFAULT_CONFIG.
   * A missing file yields the defaults; malformed JSON or invalid values
   * throw ConfigError.
   */
  async load(dir: string, overrides: PartialNavigatorConfig = {}): Promise<NavigatorConfig> {
    const configPath = join(dir, CONFIG_FILE);
    let merged = defaults();

    const raw = await readFileOrNull(configPath);
    if (raw !== null) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch (e) {
        throw new ConfigError(
          `Invalid JSON in config file: ${configPath}`,
          [e instanceof Error ? e.message : String(e)],
          { cause: e },
        );
      }
      if (!isPlainObject(parsed)) {
        throw new ConfigError(`Config file must hold a JSON object: ${configPath}`, []);
      }
      merged = deepMerge(merged, parsed);
    }

    return toConfig(deepMerge(merged, { ...overrides }), configPath);
  }
}
