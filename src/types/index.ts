/**
 * Core type definitions for changegate
 */

// ============================================================================
// SEVERITY & CATEGORIES
// ============================================================================

export type Severity = 'high' | 'medium' | 'low';

export type ErrorCategory =
  | 'missing_heading'
  | 'missing_when_then'
  | 'missing_scenario'
  | 'invalid_requirement_format'
  | 'duplicate_requirement'
  | 'broken_reference'
  | 'circular_dependency'
  | 'empty_content'
  | 'invalid_structure'
  | 'inconsistency';

/**
 * Categories the auto-fixer knows how to repair
 */
export const FIXABLE_CATEGORIES = {
  missing_heading: true,
  missing_when_then: true,
  missing_scenario: true,
  invalid_requirement_format: false,
  duplicate_requirement: false,
  broken_reference: false,
  circular_dependency: false,
  empty_content: false,
  invalid_structure: false,
  inconsistency: false,
} as const satisfies Record<ErrorCategory, boolean>;

export const CATEGORY_LABELS = {
  missing_heading: 'Missing heading',
  missing_when_then: 'Missing WHEN/THEN',
  missing_scenario: 'Missing scenario',
  invalid_requirement_format: 'Invalid requirement format',
  duplicate_requirement: 'Duplicate requirement',
  broken_reference: 'Broken reference',
  circular_dependency: 'Circular dependency',
  empty_content: 'Empty content',
  invalid_structure: 'Invalid structure',
  inconsistency: 'Inconsistency',
} as const satisfies Record<ErrorCategory, string>;

export const SEVERITY_ORDER: readonly Severity[] = ['high', 'medium', 'low'];

export type SeverityMap = Record<ErrorCategory, Severity>;

// ============================================================================
// VALIDATION ERRORS
// ============================================================================

export interface ValidationError {
  message: string;
  /** Path of the offending file, relative to the change directory where possible */
  file: string;
  /** 1-based line number */
  line?: number;
  severity: Severity;
  category: ErrorCategory;
  /** Heading, id, path or anchor the error is about */
  subject?: string;
}

export interface SeverityCounts {
  high: number;
  medium: number;
  low: number;
}

export type ValidationMode = 'normal' | 'strict';

// ============================================================================
// DOCUMENTS
// ============================================================================

export type DocumentType = 'proposal' | 'tasks' | 'spec' | 'challenge' | 'state';

/** Rule preset a document is validated with */
export type RuleKind = 'proposal' | 'tasks' | 'spec';

export interface ValidationRules {
  /** Regex a level-3 heading under "Requirements" must match; empty disables */
  requirementPattern: string;
  /** Regex a level-4 scenario heading must match; empty disables */
  scenarioPattern: string;
  requiredHeadings: string[];
  minScenarios: number;
  requireWhenThen: boolean;
  whenKeyword: string;
  thenKeyword: string;
  severityMap: SeverityMap;
}

export type RuleOverrides = Partial<Omit<ValidationRules, 'severityMap'>> & {
  severityMap?: Partial<SeverityMap>;
};

// ============================================================================
// CONFIGURATION
// ============================================================================

export interface ChangegateConfig {
  version: string;
  /** Directory holding change instances, relative to the project root */
  changesDir: string;
  /** Directory holding <type>.schema.json files, relative to the project root */
  schemasDir: string;
  rules: Partial<Record<RuleKind, RuleOverrides>>;
  createdAt: string;
}

// ============================================================================
// CLI OPTIONS
// ============================================================================

export interface GlobalOptions {
  quiet?: boolean;
  verbose?: boolean;
  color?: boolean;
  root?: string;
}

export interface ValidateOptions extends GlobalOptions {
  strict?: boolean;
  json?: boolean;
  fix?: boolean;
  record?: boolean;
}

export interface StatusOptions extends GlobalOptions {
  json?: boolean;
}

export interface InitOptions extends GlobalOptions {
  force?: boolean;
}
