/**
 * changegate status command
 *
 * Shows the phase, iteration, last validation and staleness of a change.
 */

import { Command } from 'commander';
import { logger } from '../../utils/logger.js';
import { handleError } from '../../utils/errors.js';
import type { StatusOptions } from '../../types/index.js';
import { StateManager, type StalenessReport, type ValidationEntry } from '../../core/state/state-manager.js';
import { VALIDATION_STEP } from '../../core/validator/pipeline.js';
import { openChange } from '../project.js';

export interface ChangeStatus {
  change_id: string;
  phase: string;
  iteration: number;
  last_action: string | null;
  last_validation: ValidationEntry | null;
  staleness: {
    stale: string[];
    missing_checksums: string[];
    up_to_date: string[];
  };
}

export function buildStatus(state: StateManager, staleness: StalenessReport): ChangeStatus {
  return {
    change_id: state.state.change_id,
    phase: state.state.phase,
    iteration: state.state.iteration,
    last_action: state.state.last_action,
    last_validation: state.lastValidation(VALIDATION_STEP) ?? null,
    staleness: {
      stale: staleness.stale,
      missing_checksums: staleness.missingChecksums,
      up_to_date: staleness.upToDate,
    },
  };
}

function printFiles(label: string, files: string[]): void {
  if (files.length === 0) return;
  logger.info(label, files.length);
  for (const file of files) {
    logger.listItem(file, 2);
  }
}

export const statusCommand = new Command('status')
  .description('Show the workflow state of a change')
  .argument('<change-id>', 'Change directory name under the changes directory')
  .option('--json', 'Print the status as JSON', false)
  .action(async function (this: Command, changeId: string) {
    const opts = this.optsWithGlobals<StatusOptions>();

    try {
      const { changeDir } = await openChange(opts.root, changeId);
      const state = await StateManager.load(changeDir);
      const status = buildStatus(state, await state.checkStaleness());

      if (opts.json) {
        console.log(JSON.stringify(status, null, 2));
        return;
      }

      logger.section(`Status of ${status.change_id}`);
      logger.info('Phase', status.phase);
      logger.info('Iteration', status.iteration);
      logger.info('Last action', status.last_action ?? 'none');

      const last = status.last_validation;
      if (last) {
        const { high, medium, low } = last.result;
        logger.info(
          'Last validation',
          `${last.result.valid ? 'passed' : 'failed'} at ${last.timestamp} (${high} high, ${medium} medium, ${low} low, ${last.mode})`
        );
      } else {
        logger.info('Last validation', 'never');
      }

      logger.blank();
      printFiles('Stale', status.staleness.stale);
      printFiles('Never validated', status.staleness.missing_checksums);
      printFiles('Up to date', status.staleness.up_to_date);

      if (status.staleness.stale.length > 0) {
        logger.warning(`Run 'changegate validate ${changeId}' to re-check changed files`);
      }
    } catch (error) {
      handleError(error, opts.color !== false);
    }
  });
