/**
 * Schema validator tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parseDocument } from '../document/header.js';
import { SchemaValidator, detectDocumentType, severityForKeyword } from './schema-validator.js';

const SCHEMAS_DIR = join(dirname(fileURLToPath(import.meta.url)), '..', '..', '..', 'schemas');

const SPEC_HEADER = '---\nid: auth\ntype: spec\ntitle: Auth\nversion: 1\n---\n# Auth\n';

describe('detectDocumentType', () => {
  it('should prefer the declared type', () => {
    expect(detectDocumentType({ type: 'Proposal' }, 'notes.md')).toBe('proposal');
  });

  it('should fall back to the filename', () => {
    expect(detectDocumentType({}, 'tasks.md')).toBe('tasks');
    expect(detectDocumentType(null, 'STATE.yaml')).toBe('state');
    expect(detectDocumentType({ type: 'unknown' }, 'auth.md')).toBe('spec');
  });

  it('should give up on other extensions', () => {
    expect(detectDocumentType({}, 'notes.txt')).toBeNull();
  });
});

describe('severityForKeyword', () => {
  it('should block on structural keywords', () => {
    expect(severityForKeyword('required')).toBe('high');
    expect(severityForKeyword('type')).toBe('high');
    expect(severityForKeyword('enum')).toBe('high');
    expect(severityForKeyword('pattern')).toBe('medium');
    expect(severityForKeyword('minimum')).toBe('medium');
  });
});

describe('SchemaValidator', () => {
  it('should accept a conforming header', async () => {
    const validator = new SchemaValidator(SCHEMAS_DIR);

    expect(await validator.validateDocument(parseDocument(SPEC_HEADER, 'auth.md'), 'specs/auth.md')).toEqual([]);
  });

  it('should skip documents without a header', async () => {
    const validator = new SchemaValidator(SCHEMAS_DIR);

    expect(await validator.validateDocument(parseDocument('# Auth\n', 'auth.md'))).toEqual([]);
    expect(validator.cacheSize).toBe(0);
  });

  it('should report a missing required field as high', async () => {
    const validator = new SchemaValidator(SCHEMAS_DIR);
    const doc = parseDocument(SPEC_HEADER.replace('title: Auth\n', ''), 'auth.md');

    expect(await validator.validateDocument(doc, 'specs/auth.md')).toEqual([
      {
        message: "Schema violation at header: must have required property 'title'",
        file: 'specs/auth.md',
        line: 1,
        severity: 'high',
        category: 'invalid_structure',
        subject: undefined,
      },
    ]);
  });

  it('should report a pattern violation as medium with its path', async () => {
    const validator = new SchemaValidator(SCHEMAS_DIR);
    const doc = parseDocument(SPEC_HEADER.replace('id: auth', 'id: Auth_Flow'), 'auth.md');
    const errors = await validator.validateDocument(doc);

    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({ severity: 'medium', subject: '/id', line: 1 });
    expect(errors[0].message).toMatch(/^Schema violation at header\/id: must match pattern/);
  });

  it('should report an unknown proposal status as high', async () => {
    const validator = new SchemaValidator(SCHEMAS_DIR);
    const doc = parseDocument('---\nid: add-auth\ntype: proposal\nversion: 1\nstatus: shipped\n---\n', 'proposal.md');
    const errors = await validator.validateDocument(doc, 'proposal.md');

    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({ severity: 'high', subject: '/status' });
  });

  it('should report unparsable header YAML', async () => {
    const validator = new SchemaValidator(SCHEMAS_DIR);
    const errors = await validator.validateDocument(parseDocument('---\nid: [unclosed\n---\n# Auth\n', 'auth.md'));

    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({ line: 1, severity: 'high', category: 'invalid_structure' });
    expect(errors[0].message).toMatch(/^Invalid YAML header: /);
  });

  it('should report a document whose type cannot be determined', async () => {
    const validator = new SchemaValidator(SCHEMAS_DIR);
    const errors = await validator.validateDocument(parseDocument('---\nid: x\n---\n', '/tmp/notes.txt'), 'notes.txt');

    expect(errors).toEqual([
      {
        message: 'Cannot determine document type for notes.txt',
        file: 'notes.txt',
        severity: 'medium',
        category: 'invalid_structure',
      },
    ]);
  });

  it('should compile each schema once per instance', async () => {
    const validator = new SchemaValidator(SCHEMAS_DIR);
    await validator.validateDocument(parseDocument(SPEC_HEADER, 'a.md'));
    await validator.validateDocument(parseDocument(SPEC_HEADER, 'b.md'));
    expect(validator.cacheSize).toBe(1);

    await validator.validateDocument(parseDocument('---\nid: t\ntype: tasks\nversion: 1\n---\n', 'tasks.md'));
    expect(validator.cacheSize).toBe(2);

    expect(new SchemaValidator(SCHEMAS_DIR).cacheSize).toBe(0);
  });

  describe('with files on disk', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'changegate-schema-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should surface a missing schema file as one error', async () => {
      const validator = new SchemaValidator(dir);
      const errors = await validator.validateDocument(parseDocument(SPEC_HEADER, 'auth.md'), 'specs/auth.md');

      expect(errors).toHaveLength(1);
      expect(errors[0]).toMatchObject({ severity: 'high', category: 'invalid_structure', subject: 'spec' });
      expect(errors[0].message).toMatch(/^Failed to load schema for 'spec': /);
    });

    it('should validate a YAML state record as a whole', async () => {
      const path = join(dir, 'STATE.yaml');
      await writeFile(path, 'change_id: add-auth\nphase: finished\n');

      const errors = await new SchemaValidator(SCHEMAS_DIR).validate(path, 'STATE.yaml');

      expect(errors).toHaveLength(1);
      expect(errors[0]).toMatchObject({ file: 'STATE.yaml', severity: 'high', subject: '/phase' });
    });
  });
});
