/**
 * Configuration service tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  BUNDLED_SCHEMAS_DIR,
  changegateConfigExists,
  configPath,
  getDefaultConfig,
  loadConfig,
  parseConfig,
  parseRuleOverrides,
  readChangegateConfig,
  resolveChangeDir,
  resolveSchemasDir,
  writeChangegateConfig,
} from './config-manager.js';
import { fileExists } from './change-files.js';

describe('config-manager', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'changegate-config-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe('getDefaultConfig', () => {
    it('should point at the workflow directories', () => {
      const config = getDefaultConfig();

      expect(config.changesDir).toBe('workflow/changes');
      expect(config.schemasDir).toBe('workflow/schemas');
      expect(config.rules).toEqual({});
    });
  });

  describe('parseConfig', () => {
    it('should fill absent fields with defaults', () => {
      const config = parseConfig({ changesDir: 'changes' });

      expect(config.changesDir).toBe('changes');
      expect(config.schemasDir).toBe('workflow/schemas');
    });

    it('should keep valid rule overrides', () => {
      const config = parseConfig({
        rules: { spec: { requiredHeadings: ['Overview'], minScenarios: 2, severityMap: { inconsistency: 'medium' } } },
      });

      expect(config.rules.spec).toEqual({
        requiredHeadings: ['Overview'],
        minScenarios: 2,
        severityMap: { inconsistency: 'medium' },
      });
    });

    it('should reject unknown document kinds', () => {
      expect(() => parseConfig({ rules: { readme: {} } })).toThrow('rules.readme is not a document kind');
    });

    it('should reject a non-object', () => {
      expect(() => parseConfig([])).toThrow('expected a JSON object');
    });
  });

  describe('parseRuleOverrides', () => {
    it('should reject wrongly typed settings', () => {
      expect(() => parseRuleOverrides({ minScenarios: -1 }, 'rules.spec')).toThrow(
        'rules.spec.minScenarios must be a non-negative integer'
      );
      expect(() => parseRuleOverrides({ requiredHeadings: ['a', 1] }, 'rules.spec')).toThrow(
        'rules.spec.requiredHeadings must be a list of strings'
      );
      expect(() => parseRuleOverrides({ severityMap: { missing_heading: 'fatal' } }, 'rules.spec')).toThrow(
        'rules.spec.severityMap.missing_heading must be one of high, medium, low'
      );
      expect(() => parseRuleOverrides({ severityMap: { typo: 'low' } }, 'rules.spec')).toThrow(
        'rules.spec.severityMap.typo is not an error category'
      );
      expect(() => parseRuleOverrides({ colour: 'red' }, 'rules.spec')).toThrow('rules.spec.colour is not a rule setting');
    });
  });

  describe('read and write', () => {
    it('should round-trip the configuration', async () => {
      const config = { ...getDefaultConfig(), rules: { tasks: { requiredHeadings: ['Tasks'] } } };

      await writeChangegateConfig(root, config);

      expect(await changegateConfigExists(root)).toBe(true);
      expect(await readChangegateConfig(root)).toEqual(config);
      expect(await readFile(configPath(root), 'utf-8')).toMatch(/\n$/);
    });

    it('should return null when there is no configuration', async () => {
      expect(await readChangegateConfig(root)).toBeNull();
      expect((await loadConfig(root)).changesDir).toBe('workflow/changes');
    });

    it('should reject malformed JSON as an invalid configuration', async () => {
      await mkdir(join(root, '.changegate'), { recursive: true });
      await writeFile(configPath(root), '{ "version": ');

      await expect(readChangegateConfig(root)).rejects.toMatchObject({ code: 'INVALID_CONFIG' });
    });

    it('should reject an invalid rule setting as an invalid configuration', async () => {
      await mkdir(join(root, '.changegate'), { recursive: true });
      await writeFile(configPath(root), JSON.stringify({ rules: { spec: { minScenarios: 'two' } } }));

      await expect(readChangegateConfig(root)).rejects.toThrow('rules.spec.minScenarios must be a non-negative integer');
    });
  });

  describe('directories', () => {
    it('should fall back to the bundled schemas', async () => {
      expect(await resolveSchemasDir(root, getDefaultConfig())).toBe(BUNDLED_SCHEMAS_DIR);
      expect(await fileExists(join(BUNDLED_SCHEMAS_DIR, 'spec.schema.json'))).toBe(true);
    });

    it('should prefer the project schemas when present', async () => {
      await mkdir(join(root, 'workflow', 'schemas'), { recursive: true });

      expect(await resolveSchemasDir(root, getDefaultConfig())).toBe(join(root, 'workflow', 'schemas'));
    });

    it('should resolve an existing change and reject a missing one', async () => {
      await mkdir(join(root, 'workflow', 'changes', 'add-auth'), { recursive: true });

      expect(await resolveChangeDir(root, getDefaultConfig(), 'add-auth')).toBe(
        join(root, 'workflow', 'changes', 'add-auth')
      );
      await expect(resolveChangeDir(root, getDefaultConfig(), 'nope')).rejects.toMatchObject({
        code: 'CHANGE_NOT_FOUND',
      });
    });
  });
});
