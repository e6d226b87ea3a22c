/**
 * changegate validate command
 *
 * Validates every document of a change, prints the errors grouped by file
 * and records the run in the change's STATE.yaml.
 */

import { Command } from 'commander';
import { configureLogger, logger } from '../../utils/logger.js';
import { handleError } from '../../utils/errors.js';
import type { ValidateOptions } from '../../types/index.js';
import {
  formatErrorLine,
  validateChange,
  type ChangeValidationReport,
} from '../../core/validator/pipeline.js';
import { openChange } from '../project.js';

// ============================================================================
// OUTPUT
// ============================================================================

export function printReport(report: ChangeValidationReport): void {
  if (report.fixResult) {
    const { errorsFixed, filesModified, fixDetails } = report.fixResult;
    logger.analysis(`Auto-fixer fixed ${errorsFixed} error(s) in ${filesModified} file(s)`);
    for (const detail of fixDetails) {
      logger.listItem(detail.description, 1);
    }
    logger.blank();
  }

  for (const [file, errors] of report.byFile()) {
    logger.discovery(file);
    for (const error of errors) {
      logger.listItem(formatErrorLine(error), 1);
    }
    logger.blank();
  }

  logger.info('High', report.counts.high);
  logger.info('Medium', report.counts.medium);
  logger.info('Low', report.counts.low);
  logger.info('Mode', report.mode);

  if (report.staleness.hasStale) {
    logger.blank();
    logger.warning(`${report.staleness.stale.length} file(s) changed since the last clean validation`);
    for (const file of report.staleness.stale) {
      logger.listItem(file, 1);
    }
  }

  logger.blank();
  if (report.valid) {
    logger.success(`Change '${report.changeId}' is valid`);
  } else {
    logger.error(`Change '${report.changeId}' failed validation`);
  }
}

// ============================================================================
// COMMAND
// ============================================================================

export const validateCommand = new Command('validate')
  .description('Validate the proposal, tasks and specs of a change')
  .argument('<change-id>', 'Change directory name under the changes directory')
  .option('--strict', 'Fail on any error, not only High severity ones', false)
  .option('--json', 'Print the error report as JSON', false)
  .option('--fix', 'Apply placeholder fixes, then validate again', false)
  .option('--no-record', 'Do not record this run in STATE.yaml')
  .addHelpText(
    'after',
    `
Examples:
  $ changegate validate add-auth            Validate and record the run
  $ changegate validate add-auth --strict   Fail on Medium and Low errors too
  $ changegate validate add-auth --json     Machine-readable report
  $ changegate validate add-auth --fix      Insert missing headings and scenarios first

The exit code is 1 when the change is not valid.
`
  )
  .action(async function (this: Command, changeId: string) {
    const opts = this.optsWithGlobals<ValidateOptions>();

    // stdout carries only the report in JSON mode; errors still reach stderr
    if (opts.json) {
      configureLogger({ quiet: true });
    }

    try {
      const { changeDir, schemasDir, config } = await openChange(opts.root, changeId);

      if (!opts.json) {
        logger.section(`Validating ${changeId}`);
        logger.debug(`Change directory: ${changeDir}`);
        logger.debug(`Schemas: ${schemasDir}`);
      }

      const report = await validateChange(changeDir, {
        strict: opts.strict ?? false,
        fix: opts.fix ?? false,
        schemasDir,
        rules: config.rules,
        record: opts.record ?? true,
      });

      if (opts.json) {
        console.log(JSON.stringify(report.toJson(), null, 2));
      } else {
        printReport(report);
      }

      if (!report.valid) {
        process.exitCode = 1;
      }
    } catch (error) {
      handleError(error, opts.color !== false);
    }
  });
