/**
 * changegate library entry
 */

export * from './types/index.js';
export * from './core/document/index.js';
export * from './core/validator/index.js';
export * from './core/state/index.js';
export {
  BUNDLED_SCHEMAS_DIR,
  CONFIG_DIR,
  CONFIG_FILE,
  getDefaultConfig,
  loadConfig,
  parseConfig,
  readChangegateConfig,
  resolveChangeDir,
  resolveSchemasDir,
  writeChangegateConfig,
} from './core/services/config-manager.js';
export {
  PROPOSAL_FILE,
  SPECS_DIR,
  STATE_FILE,
  TASKS_FILE,
  TRACKED_FILES,
  listSpecFiles,
  listTrackedFiles,
} from './core/services/change-files.js';
export { ChangegateError, errors, formatError, isChangegateError, type ErrorCode } from './utils/errors.js';
