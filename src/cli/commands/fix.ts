/**
 * changegate fix command
 *
 * Inserts placeholder headings and scenarios for the mechanically fixable
 * errors of a change, then reports what is left.
 */

import { Command } from 'commander';
import { logger } from '../../utils/logger.js';
import { handleError } from '../../utils/errors.js';
import type { GlobalOptions } from '../../types/index.js';
import { formatErrorLine, validateChange } from '../../core/validator/pipeline.js';
import { openChange } from '../project.js';

export const fixCommand = new Command('fix')
  .description('Insert placeholders for missing headings and scenarios')
  .argument('<change-id>', 'Change directory name under the changes directory')
  .action(async function (this: Command, changeId: string) {
    const opts = this.optsWithGlobals<GlobalOptions>();

    try {
      const { changeDir, schemasDir, config } = await openChange(opts.root, changeId);
      logger.section(`Fixing ${changeId}`);

      const report = await validateChange(changeDir, { schemasDir, rules: config.rules, fix: true, record: false });
      const result = report.fixResult;

      if (!result) {
        logger.success('Nothing to fix');
      } else {
        for (const detail of result.fixDetails) {
          logger.listItem(detail.description);
        }
        logger.blank();
        logger.info('Files modified', result.filesModified);
        logger.info('Errors fixed', result.errorsFixed);
        logger.info('Already satisfied', result.alreadySatisfied);
      }

      if (report.errors.length > 0) {
        logger.blank();
        logger.warning(`${report.errors.length} error(s) need manual attention`);
        for (const error of report.errors) {
          logger.listItem(formatErrorLine(error), 1);
        }
      }

      if (!report.valid) {
        process.exitCode = 1;
      }
    } catch (error) {
      handleError(error, opts.color !== false);
    }
  });
