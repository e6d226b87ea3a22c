/**
 * Change validation pipeline
 *
 * Validates every document of one change directory in a fixed order, checks
 * cross-document consistency, compares content against the recorded
 * checksums and records the outcome in STATE.yaml.
 */

import { basename, dirname, join } from 'node:path';
import {
  FIXABLE_CATEGORIES,
  type ErrorCategory,
  type RuleKind,
  type RuleOverrides,
  type Severity,
  type SeverityCounts,
  type ValidationError,
  type ValidationMode,
  type ValidationRules,
} from '../../types/index.js';
import { computeChecksum, loadDocument, type ParsedDocument } from '../document/header.js';
import { extractRequirements, type RequirementBlock } from '../document/blocks.js';
import { PROPOSAL_FILE, TASKS_FILE, fileExists, listSpecFiles } from '../services/change-files.js';
import { StalenessReport, StateManager } from '../state/state-manager.js';
import { AutoFixer, type FixResult } from './auto-fixer.js';
import { ConsistencyValidator } from './consistency-validator.js';
import { FormatValidator, unreadableFileError } from './format-validator.js';
import { rulesFor } from './rules.js';
import { SchemaValidator } from './schema-validator.js';
import { SemanticValidator } from './semantic-validator.js';
import { errors as cliErrors } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

// ============================================================================
// TYPES
// ============================================================================

export const VALIDATION_STEP = 'validate-proposal';

export interface ValidateChangeOptions {
  strict?: boolean;
  fix?: boolean;
  /** Directory holding `<type>.schema.json` files */
  schemasDir: string;
  rules?: Partial<Record<RuleKind, RuleOverrides>>;
  /** Record the run in STATE.yaml (default true) */
  record?: boolean;
  now?: () => Date;
}

/** External error report */
export interface ErrorReport {
  valid: boolean;
  counts: SeverityCounts;
  errors: Array<{
    severity: Severity;
    category: ErrorCategory;
    message: string;
    file: string;
    line?: number;
  }>;
  stale_files?: string[];
}

type RuleSet = Record<RuleKind, ValidationRules>;

// ============================================================================
// REPORT
// ============================================================================

const SEVERITY_ICONS: Record<Severity, string> = {
  high: '🔴',
  medium: '🟡',
  low: '🔵',
};

export function countBySeverity(errors: ValidationError[]): SeverityCounts {
  const counts: SeverityCounts = { high: 0, medium: 0, low: 0 };
  for (const error of errors) counts[error.severity]++;
  return counts;
}

/**
 * One-line rendering, e.g. `🔴 [HIGH] specs/auth.md:12 - Duplicate requirement ID 'R1'`
 */
export function formatErrorLine(error: ValidationError): string {
  const location = error.line === undefined ? error.file : `${error.file}:${error.line}`;
  return `${SEVERITY_ICONS[error.severity]} [${error.severity.toUpperCase()}] ${location} - ${error.message}`;
}

export class ChangeValidationReport {
  readonly counts: SeverityCounts;

  constructor(
    readonly changeId: string,
    readonly errors: ValidationError[],
    readonly staleness: StalenessReport,
    readonly mode: ValidationMode,
    readonly fixResult?: FixResult
  ) {
    this.counts = countBySeverity(errors);
  }

  /** Normal mode fails on High errors only; strict mode fails on any error */
  get valid(): boolean {
    return this.mode === 'strict' ? this.errors.length === 0 : this.counts.high === 0;
  }

  /** Errors grouped by file, in report order */
  byFile(): Map<string, ValidationError[]> {
    const groups = new Map<string, ValidationError[]>();
    for (const error of this.errors) {
      const group = groups.get(error.file);
      if (group) {
        group.push(error);
      } else {
        groups.set(error.file, [error]);
      }
    }
    return groups;
  }

  toJson(): ErrorReport {
    const report: ErrorReport = {
      valid: this.valid,
      counts: { ...this.counts },
      errors: this.errors.map((error) => ({
        severity: error.severity,
        category: error.category,
        message: error.message,
        file: error.file,
        ...(error.line === undefined ? {} : { line: error.line }),
      })),
    };
    if (this.staleness.stale.length > 0) {
      report.stale_files = [...this.staleness.stale];
    }
    return report;
  }
}

// ============================================================================
// PIPELINE
// ============================================================================

/**
 * Fingerprint of the effective rule set, stored with each history entry
 */
export function rulesHash(rules: RuleSet): string {
  return computeChecksum(JSON.stringify(rules));
}

async function loadOrReport(changeDir: string, label: string, errors: ValidationError[]): Promise<ParsedDocument | null> {
  try {
    return await loadDocument(join(changeDir, label));
  } catch (error) {
    errors.push(unreadableFileError(label, error));
    return null;
  }
}

/**
 * Document, cross-file and consistency checks, in report order
 */
async function collectErrors(changeDir: string, rules: RuleSet, schema: SchemaValidator): Promise<ValidationError[]> {
  const errors: ValidationError[] = [];

  logger.debug(`Validating ${PROPOSAL_FILE}`);
  if (await fileExists(join(changeDir, PROPOSAL_FILE))) {
    const proposal = await loadOrReport(changeDir, PROPOSAL_FILE, errors);
    if (proposal) {
      errors.push(...(await schema.validateDocument(proposal, PROPOSAL_FILE)));
      errors.push(...new FormatValidator(rules.proposal).validateDocument(proposal, PROPOSAL_FILE));
    }
  } else {
    errors.push({
      message: `Required file not found: ${PROPOSAL_FILE}`,
      file: PROPOSAL_FILE,
      severity: 'high',
      category: 'invalid_structure',
    });
  }

  if (await fileExists(join(changeDir, TASKS_FILE))) {
    logger.debug(`Validating ${TASKS_FILE}`);
    const tasks = await loadOrReport(changeDir, TASKS_FILE, errors);
    if (tasks) {
      errors.push(...(await schema.validateDocument(tasks, TASKS_FILE)));
      errors.push(...new FormatValidator(rules.tasks).validateDocument(tasks, TASKS_FILE));
    }
  }

  const format = new FormatValidator(rules.spec);
  const semantic = new SemanticValidator(rules.spec);
  const batch: Array<{ label: string; requirements: RequirementBlock[] }> = [];

  for (const specFile of await listSpecFiles(changeDir)) {
    logger.debug(`Validating ${specFile}`);
    const spec = await loadOrReport(changeDir, specFile, errors);
    if (!spec) continue;

    errors.push(...(await schema.validateDocument(spec, specFile)));
    errors.push(...format.validateDocument(spec, specFile));
    errors.push(...(await semantic.validateDocument(spec, specFile)));
    batch.push({ label: specFile, requirements: extractRequirements(spec) });
  }

  errors.push(...semantic.crossFileDuplicates(batch));
  errors.push(...(await new ConsistencyValidator(changeDir).validateAll()));

  return errors;
}

/**
 * Validate one change directory and record the outcome
 */
export async function validateChange(changeDir: string, options: ValidateChangeOptions): Promise<ChangeValidationReport> {
  if (!(await fileExists(changeDir))) {
    throw cliErrors.changeNotFound(basename(changeDir), dirname(changeDir));
  }

  const mode: ValidationMode = options.strict ? 'strict' : 'normal';
  const rules: RuleSet = {
    proposal: rulesFor('proposal', options.rules?.proposal),
    tasks: rulesFor('tasks', options.rules?.tasks),
    spec: rulesFor('spec', options.rules?.spec),
  };
  const schema = new SchemaValidator(options.schemasDir);

  let errors = await collectErrors(changeDir, rules, schema);

  let fixResult: FixResult | undefined;
  if (options.fix && errors.some((error) => FIXABLE_CATEGORIES[error.category])) {
    fixResult = await new AutoFixer(changeDir).fix(errors);
    logger.debug(`Auto-fixer fixed ${fixResult.errorsFixed} error(s) in ${fixResult.filesModified} file(s)`);
    errors = await collectErrors(changeDir, rules, schema);
  }

  const state = await StateManager.load(changeDir, { now: options.now });
  const staleness = await state.checkStaleness();
  const report = new ChangeValidationReport(state.state.change_id, errors, staleness, mode, fixResult);

  if (options.record ?? true) {
    state.recordValidation({
      step: VALIDATION_STEP,
      mode,
      valid: report.valid,
      counts: report.counts,
      errors: errors.map(formatErrorLine),
      rulesHash: rulesHash(rules),
    });
    if (report.counts.high === 0) {
      await state.updateAllChecksums();
      state.setLastAction(VALIDATION_STEP);
    }
    await state.save();
  }

  return report;
}
