/**
 * changegate init command
 *
 * Writes .changegate/config.json with the default directories and creates
 * the changes directory.
 */

import { Command } from 'commander';
import { mkdir } from 'node:fs/promises';
import { resolve } from 'node:path';
import { logger } from '../../utils/logger.js';
import { errors, handleError } from '../../utils/errors.js';
import {
  CONFIG_DIR,
  CONFIG_FILE,
  changegateConfigExists,
  getDefaultConfig,
  readChangegateConfig,
  writeChangegateConfig,
} from '../../core/services/config-manager.js';
import type { InitOptions } from '../../types/index.js';
import { projectRoot } from '../project.js';

export const initCommand = new Command('init')
  .description('Initialize changegate in the current project')
  .option('--force', 'Overwrite existing configuration', false)
  .addHelpText(
    'after',
    `
Examples:
  $ changegate init                  Initialize with defaults
  $ changegate init --force          Overwrite existing config

Creates ${CONFIG_DIR}/${CONFIG_FILE} and the changes directory it points at.
Per-document rule overrides go under "rules" in that file.
`
  )
  .action(async function (this: Command) {
    const opts = this.optsWithGlobals<InitOptions>();

    try {
      const rootPath = projectRoot(opts.root);
      logger.section('Initializing changegate');

      if ((await changegateConfigExists(rootPath)) && !opts.force) {
        logger.warning(`${CONFIG_DIR}/${CONFIG_FILE} already exists`);
        const existing = await readChangegateConfig(rootPath);
        if (existing) {
          logger.info('Created', existing.createdAt);
          logger.info('Changes', existing.changesDir);
        }
        logger.error('Configuration exists. Use --force to overwrite.');
        process.exitCode = 1;
        return;
      }

      const config = getDefaultConfig();
      await writeChangegateConfig(rootPath, config);
      logger.success(`Created ${CONFIG_DIR}/${CONFIG_FILE}`);

      const changesDir = resolve(rootPath, config.changesDir);
      try {
        await mkdir(changesDir, { recursive: true });
      } catch (error) {
        throw errors.fileWriteError(changesDir, error instanceof Error ? error.message : String(error));
      }
      logger.success(`Created ${config.changesDir}/`);

      logger.blank();
      logger.info('Schemas', `${config.schemasDir} (bundled schemas are used until it exists)`);
      logger.discovery(`Next: create ${config.changesDir}/<change-id>/proposal.md and run 'changegate validate <change-id>'`);
    } catch (error) {
      handleError(error, opts.color !== false);
    }
  });
