/**
 * Validation rule presets
 *
 * One preset per document kind: lenient for proposal and tasks, strict for
 * specs. Overrides from the project configuration are merged on top.
 */

import type {
  ErrorCategory,
  RuleKind,
  RuleOverrides,
  Severity,
  SeverityMap,
  ValidationRules,
} from '../../types/index.js';
import { logger } from '../../utils/logger.js';

export const RULES_VERSION = '2.0';

export const DEFAULT_SEVERITY_MAP: SeverityMap = {
  missing_heading: 'high',
  missing_when_then: 'high',
  missing_scenario: 'high',
  invalid_requirement_format: 'high',
  duplicate_requirement: 'high',
  broken_reference: 'medium',
  circular_dependency: 'high',
  empty_content: 'high',
  invalid_structure: 'high',
  inconsistency: 'low',
};

const SPEC_RULES: ValidationRules = {
  requirementPattern: '^R\\d+:',
  scenarioPattern: '^Scenario:',
  requiredHeadings: ['Overview', 'Acceptance Criteria'],
  minScenarios: 1,
  requireWhenThen: true,
  whenKeyword: 'WHEN',
  thenKeyword: 'THEN',
  severityMap: DEFAULT_SEVERITY_MAP,
};

const LENIENT_RULES: ValidationRules = {
  requirementPattern: '',
  scenarioPattern: '',
  requiredHeadings: [],
  minScenarios: 0,
  requireWhenThen: false,
  whenKeyword: 'WHEN',
  thenKeyword: 'THEN',
  severityMap: DEFAULT_SEVERITY_MAP,
};

const PRESETS: Record<RuleKind, ValidationRules> = {
  proposal: LENIENT_RULES,
  tasks: LENIENT_RULES,
  spec: SPEC_RULES,
};

/**
 * Rules for a document kind with optional overrides applied
 */
export function rulesFor(kind: RuleKind, overrides: RuleOverrides = {}): ValidationRules {
  const preset = PRESETS[kind];
  const { severityMap, ...rest } = overrides;

  return {
    ...preset,
    ...rest,
    requiredHeadings: [...(rest.requiredHeadings ?? preset.requiredHeadings)],
    severityMap: { ...preset.severityMap, ...severityMap },
  };
}

export function severityOf(rules: ValidationRules, category: ErrorCategory): Severity {
  return rules.severityMap[category];
}

/**
 * Compile a configured pattern. An empty pattern disables its check; an invalid
 * one is logged and skipped.
 */
export function compilePattern(pattern: string, label: string): RegExp | null {
  if (pattern === '') return null;
  try {
    return new RegExp(pattern);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.debug(`Skipping ${label} check, invalid pattern /${pattern}/: ${reason}`);
    return null;
  }
}
