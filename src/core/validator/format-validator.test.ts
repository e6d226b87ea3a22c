/**
 * Format validator tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { parseDocument } from '../document/header.js';
import { FormatValidator } from './format-validator.js';
import { rulesFor } from './rules.js';

const VALID_SPEC = [
  '# Auth', // 1
  '',
  '## Overview',
  '',
  'Login for registered users.', // 5
  '',
  '## Requirements',
  '',
  '### R1: Login',
  '', // 10
  'Users log in with a password.',
  '',
  '## Acceptance Criteria',
  '',
  '#### Scenario: Successful login', // 15
  '- **WHEN** valid credentials are submitted',
  '- **THEN** a session is created',
  '',
].join('\n');

function check(content: string, label = 'specs/auth.md') {
  return new FormatValidator(rulesFor('spec')).validateDocument(parseDocument(content, label));
}

describe('FormatValidator', () => {
  it('should accept a complete spec', () => {
    expect(check(VALID_SPEC)).toEqual([]);
  });

  it('should report missing headings and scenarios for a bare requirements list', () => {
    const errors = check('## Requirements\n\n### R1: Foo\n');

    expect(errors.map((error) => [error.category, error.message])).toEqual([
      ['missing_heading', 'Missing required heading: Overview'],
      ['missing_heading', 'Missing required heading: Acceptance Criteria'],
      ['missing_scenario', 'Expected at least 1 scenario(s), found 0'],
    ]);
    expect(errors.every((error) => error.severity === 'high')).toBe(true);
  });

  it('should report an empty file once and nothing else', () => {
    expect(check('', 'specs/empty.md')).toEqual([
      { message: 'File is empty', file: 'specs/empty.md', severity: 'high', category: 'empty_content' },
    ]);
    expect(check('\n  \n')).toHaveLength(1);
  });

  it('should match required headings case-insensitively by prefix', () => {
    const content = VALID_SPEC.replace('## Overview', '## overview and goals');

    expect(check(content)).toEqual([]);
  });

  it('should report a requirement heading that does not match the pattern', () => {
    const content = VALID_SPEC.replace('### R1: Login', '### Login');

    expect(check(content)).toEqual([
      {
        message: "Requirement heading 'Login' does not match pattern ^R\\d+:",
        file: 'specs/auth.md',
        line: 9,
        severity: 'high',
        category: 'invalid_requirement_format',
        subject: 'Login',
      },
    ]);
  });

  it('should count a misnamed scenario heading but report its name', () => {
    const content = VALID_SPEC.replace('#### Scenario: Successful login', '#### Happy path');
    const errors = check(content);

    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({ category: 'missing_scenario', line: 15, subject: 'Happy path' });
  });

  it('should report a missing THEN clause', () => {
    const content = VALID_SPEC.replace('- **THEN** a session is created', '- a session is created');

    expect(check(content)).toEqual([
      {
        message: 'Missing **THEN** clause in scenarios',
        file: 'specs/auth.md',
        severity: 'high',
        category: 'missing_when_then',
        subject: 'THEN',
      },
    ]);
  });

  it('should ignore markers outside list items', () => {
    const content = [
      '## Overview',
      '',
      '## Acceptance Criteria',
      '',
      '#### Scenario: Prose only',
      '',
      'WHEN something happens THEN something follows.',
      '',
    ].join('\n');

    expect(check(content).map((error) => error.subject)).toEqual(['WHEN', 'THEN']);
  });

  it('should count a compact WHEN/THEN bullet as a scenario', () => {
    const content = [
      '## Overview',
      '',
      '## Acceptance Criteria',
      '',
      '- **WHEN** the token expires **THEN** the user is signed out',
      '',
    ].join('\n');

    expect(check(content)).toEqual([]);
  });

  it('should report lines relative to the whole document when a header is present', () => {
    const content = '---\nid: auth\n---\n## Requirements\n\n### Login\n';
    const errors = new FormatValidator(rulesFor('spec', { requiredHeadings: [], minScenarios: 0 })).validateDocument(
      parseDocument(content, 'specs/auth.md')
    );

    expect(errors).toHaveLength(1);
    expect(errors[0].line).toBe(6);
  });

  it('should apply severity overrides', () => {
    const rules = rulesFor('spec', { severityMap: { missing_heading: 'low' } });
    const errors = new FormatValidator(rules).validateDocument(
      parseDocument(VALID_SPEC.replace('## Overview', '## Summary'), 'specs/auth.md')
    );

    expect(errors).toEqual([
      {
        message: 'Missing required heading: Overview',
        file: 'specs/auth.md',
        severity: 'low',
        category: 'missing_heading',
        subject: 'Overview',
      },
    ]);
  });

  it('should skip the requirement pattern check when the pattern is invalid', () => {
    const rules = rulesFor('spec', { requirementPattern: '(unclosed' });
    const errors = new FormatValidator(rules).validateDocument(
      parseDocument(VALID_SPEC.replace('### R1: Login', '### Login'), 'specs/auth.md')
    );

    expect(errors).toEqual([]);
  });

  it('should accept anything under the lenient proposal rules', () => {
    const errors = new FormatValidator(rulesFor('proposal')).validateDocument(
      parseDocument('# Proposal\n\nFree text.\n', 'proposal.md')
    );

    expect(errors).toEqual([]);
  });

  describe('validate', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'changegate-format-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should read the file from disk', async () => {
      const path = join(dir, 'auth.md');
      await writeFile(path, VALID_SPEC);

      expect(await new FormatValidator(rulesFor('spec')).validate(path, 'specs/auth.md')).toEqual([]);
    });

    it('should report an unreadable file as one structural error', async () => {
      const errors = await new FormatValidator(rulesFor('spec')).validate(join(dir, 'missing.md'), 'specs/missing.md');

      expect(errors).toHaveLength(1);
      expect(errors[0]).toMatchObject({ file: 'specs/missing.md', severity: 'high', category: 'invalid_structure' });
      expect(errors[0].message).toMatch(/^Failed to read file: /);
    });
  });
});
