/**
 * Validator exports
 */

export { DEFAULT_SEVERITY_MAP, RULES_VERSION, compilePattern, rulesFor, severityOf } from './rules.js';
export { FormatValidator, unreadableFileError } from './format-validator.js';
export { DOCUMENT_TYPES, SchemaValidator, detectDocumentType, severityForKeyword } from './schema-validator.js';
export { SemanticValidator, localLinkTarget } from './semantic-validator.js';
export {
  ConsistencyValidator,
  findFirstCycle,
  parseSpecRef,
  resolveAnchor,
  slugify,
  type SpecRef,
} from './consistency-validator.js';
export {
  AutoFixer,
  addMissingHeading,
  addPlaceholderScenario,
  type FixDetail,
  type FixResult,
} from './auto-fixer.js';
export {
  ChangeValidationReport,
  VALIDATION_STEP,
  countBySeverity,
  formatErrorLine,
  rulesHash,
  validateChange,
  type ErrorReport,
  type ValidateChangeOptions,
} from './pipeline.js';
