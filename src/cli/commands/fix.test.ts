/**
 * Tests for fix command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileExists } from '../../core/services/change-files.js';

// Mock dependencies
vi.mock('../../utils/logger.js', () => ({
  logger: {
    section: vi.fn(),
    info: vi.fn(),
    warning: vi.fn(),
    error: vi.fn(),
    success: vi.fn(),
    discovery: vi.fn(),
    analysis: vi.fn(),
    blank: vi.fn(),
    debug: vi.fn(),
    listItem: vi.fn(),
  },
}));

const PROPOSAL = [
  '---',
  'id: add-auth',
  'type: proposal',
  'version: 1',
  'status: proposed',
  'affected_specs:',
  '  - specs/auth.md',
  '---',
  '# Add authentication',
  '',
].join('\n');

const SPEC = [
  '---',
  'id: auth',
  'type: spec',
  'title: Auth',
  'version: 1',
  '---',
  '# Auth',
  '',
  '## Overview',
  '',
  'Sign-in for registered users.',
  '',
  '## Requirements',
  '',
  '### R1: Login',
  '',
  'Users log in with a password.',
  '',
  '## Acceptance Criteria',
  '',
  '#### Scenario: Successful login',
  '- **WHEN** valid credentials are submitted',
  '- **THEN** a session is created',
  '',
].join('\n');

async function run(command: Command, args: string[]): Promise<void> {
  const program = new Command().exitOverride().option('--root <path>').option('--no-color').addCommand(command);
  await program.parseAsync(args, { from: 'user' });
}

describe('fix command', () => {
  let root: string;
  let changeDir: string;

  beforeEach(async () => {
    vi.resetModules();
    root = await mkdtemp(join(tmpdir(), 'changegate-fix-cmd-'));
    changeDir = join(root, 'workflow', 'changes', 'add-auth');
    await mkdir(join(changeDir, 'specs'), { recursive: true });
    await writeFile(join(changeDir, 'proposal.md'), PROPOSAL);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
    process.exitCode = undefined;
    vi.clearAllMocks();
  });

  it('should insert the missing section without recording a run', async () => {
    await writeFile(join(changeDir, 'specs', 'auth.md'), SPEC.replace('## Overview\n\nSign-in for registered users.\n\n', ''));
    const { fixCommand } = await import('./fix.js');
    const { logger } = await import('../../utils/logger.js');

    await run(fixCommand, ['--root', root, 'fix', 'add-auth']);

    expect(logger.info).toHaveBeenCalledWith('Errors fixed', 1);
    expect(await readFile(join(changeDir, 'specs', 'auth.md'), 'utf-8')).toContain('\n## Overview\n');
    expect(await fileExists(join(changeDir, 'STATE.yaml'))).toBe(false);
    expect(process.exitCode).toBeUndefined();
  });

  it('should say so when there is nothing to fix', async () => {
    await writeFile(join(changeDir, 'specs', 'auth.md'), SPEC);
    const { fixCommand } = await import('./fix.js');
    const { logger } = await import('../../utils/logger.js');

    await run(fixCommand, ['--root', root, 'fix', 'add-auth']);

    expect(logger.success).toHaveBeenCalledWith('Nothing to fix');
  });
});
