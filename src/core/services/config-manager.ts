/**
 * Configuration management service
 *
 * Handles reading/writing .changegate/config.json and resolving the
 * directories a project keeps its changes and schemas in.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import type {
  ChangegateConfig,
  ErrorCategory,
  RuleKind,
  RuleOverrides,
  Severity,
  SeverityMap,
} from '../../types/index.js';
import { CATEGORY_LABELS } from '../../types/index.js';
import { isRecord } from '../document/header.js';
import { errors } from '../../utils/errors.js';
import { fileExists } from './change-files.js';

export const CONFIG_DIR = '.changegate';
export const CONFIG_FILE = 'config.json';

/**
 * Schemas shipped with the package, used when the project has none
 */
export const BUNDLED_SCHEMAS_DIR = resolve(dirname(fileURLToPath(import.meta.url)), '..', '..', '..', 'schemas');

const RULE_KINDS: readonly RuleKind[] = ['proposal', 'tasks', 'spec'];
const SEVERITIES: readonly Severity[] = ['high', 'medium', 'low'];

export function configPath(rootPath: string): string {
  return join(rootPath, CONFIG_DIR, CONFIG_FILE);
}

/**
 * Get default changegate configuration
 */
export function getDefaultConfig(): ChangegateConfig {
  return {
    version: '1.0.0',
    changesDir: 'workflow/changes',
    schemasDir: 'workflow/schemas',
    rules: {},
    createdAt: new Date().toISOString(),
  };
}

// ============================================================================
// PARSING
// ============================================================================

function isCategory(key: string): key is ErrorCategory {
  return Object.hasOwn(CATEGORY_LABELS, key);
}

function parseSeverityMap(value: unknown, where: string): Partial<SeverityMap> {
  if (!isRecord(value)) throw new Error(`${where} must be an object`);

  const map: Partial<SeverityMap> = {};
  for (const [key, severity] of Object.entries(value)) {
    if (!isCategory(key)) throw new Error(`${where}.${key} is not an error category`);
    const match = SEVERITIES.find((candidate) => candidate === severity);
    if (!match) throw new Error(`${where}.${key} must be one of ${SEVERITIES.join(', ')}`);
    map[key] = match;
  }
  return map;
}

/**
 * Check one `rules.<kind>` object field by field
 */
export function parseRuleOverrides(value: unknown, where: string): RuleOverrides {
  if (!isRecord(value)) throw new Error(`${where} must be an object`);

  const overrides: RuleOverrides = {};
  for (const [key, field] of Object.entries(value)) {
    const at = `${where}.${key}`;
    switch (key) {
      case 'requirementPattern':
      case 'scenarioPattern':
      case 'whenKeyword':
      case 'thenKeyword':
        if (typeof field !== 'string') throw new Error(`${at} must be a string`);
        overrides[key] = field;
        break;
      case 'requiredHeadings':
        if (!Array.isArray(field) || !field.every((item): item is string => typeof item === 'string')) {
          throw new Error(`${at} must be a list of strings`);
        }
        overrides.requiredHeadings = field;
        break;
      case 'minScenarios':
        if (typeof field !== 'number' || !Number.isInteger(field) || field < 0) {
          throw new Error(`${at} must be a non-negative integer`);
        }
        overrides.minScenarios = field;
        break;
      case 'requireWhenThen':
        if (typeof field !== 'boolean') throw new Error(`${at} must be a boolean`);
        overrides.requireWhenThen = field;
        break;
      case 'severityMap':
        overrides.severityMap = parseSeverityMap(field, at);
        break;
      default:
        throw new Error(`${at} is not a rule setting`);
    }
  }
  return overrides;
}

/**
 * Typed configuration from parsed JSON; absent fields take their defaults
 */
export function parseConfig(data: unknown): ChangegateConfig {
  if (!isRecord(data)) throw new Error('expected a JSON object');

  const defaults = getDefaultConfig();
  const text = (key: string, fallback: string): string => {
    const value = data[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'string' || value.trim() === '') throw new Error(`${key} must be a non-empty string`);
    return value;
  };

  const rules: ChangegateConfig['rules'] = {};
  if (data.rules !== undefined) {
    if (!isRecord(data.rules)) throw new Error('rules must be an object');
    for (const [kind, overrides] of Object.entries(data.rules)) {
      const match = RULE_KINDS.find((candidate) => candidate === kind);
      if (!match) throw new Error(`rules.${kind} is not a document kind (${RULE_KINDS.join(', ')})`);
      rules[match] = parseRuleOverrides(overrides, `rules.${kind}`);
    }
  }

  return {
    version: text('version', defaults.version),
    changesDir: text('changesDir', defaults.changesDir),
    schemasDir: text('schemasDir', defaults.schemasDir),
    rules,
    createdAt: text('createdAt', defaults.createdAt),
  };
}

// ============================================================================
// FILES
// ============================================================================

/**
 * Read changegate configuration from .changegate/config.json.
 * Returns null when the file does not exist.
 */
export async function readChangegateConfig(rootPath: string): Promise<ChangegateConfig | null> {
  const path = configPath(rootPath);
  if (!(await fileExists(path))) return null;

  let data: unknown;
  try {
    data = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    throw errors.invalidConfig(path, error instanceof Error ? error.message : String(error));
  }

  try {
    return parseConfig(data);
  } catch (error) {
    throw errors.invalidConfig(path, error instanceof Error ? error.message : String(error));
  }
}

/**
 * Write changegate configuration to .changegate/config.json
 */
export async function writeChangegateConfig(rootPath: string, config: ChangegateConfig): Promise<void> {
  const path = configPath(rootPath);
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  } catch (error) {
    throw errors.fileWriteError(path, error instanceof Error ? error.message : String(error));
  }
}

/**
 * Check if changegate config already exists
 */
export async function changegateConfigExists(rootPath: string): Promise<boolean> {
  return fileExists(configPath(rootPath));
}

/**
 * Project configuration, or the defaults when the project has none
 */
export async function loadConfig(rootPath: string): Promise<ChangegateConfig> {
  return (await readChangegateConfig(rootPath)) ?? getDefaultConfig();
}

// ============================================================================
// DIRECTORIES
// ============================================================================

/**
 * The project's schemas directory when it exists, else the bundled schemas
 */
export async function resolveSchemasDir(rootPath: string, config: ChangegateConfig): Promise<string> {
  const projectSchemas = resolve(rootPath, config.schemasDir);
  return (await fileExists(projectSchemas)) ? projectSchemas : BUNDLED_SCHEMAS_DIR;
}

/**
 * Directory of one change instance; throws when it does not exist
 */
export async function resolveChangeDir(rootPath: string, config: ChangegateConfig, changeId: string): Promise<string> {
  const changesDir = resolve(rootPath, config.changesDir);
  const changeDir = join(changesDir, changeId);
  if (changeId.trim() === '' || !(await fileExists(changeDir))) {
    throw errors.changeNotFound(changeId, changesDir);
  }
  return changeDir;
}
