export {
  PHASES,
  SCHEMA_VERSION,
  StalenessReport,
  StateManager,
  parseState,
  type ChangeState,
  type ChecksumEntry,
  type LlmCall,
  type LlmCallInput,
  type LlmPricing,
  type Phase,
  type StateManagerOptions,
  type Telemetry,
  type ValidationEntry,
  type ValidationInput,
  type ValidationSummary,
} from './state-manager.js';
