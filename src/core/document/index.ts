/**
 * Document model exports
 */

export {
  computeChecksum,
  headerFields,
  isRecord,
  loadDocument,
  normalizeContent,
  parseDocument,
  parseHeader,
  splitHeader,
  type HeaderBlock,
  type ParsedDocument,
} from './header.js';

export { documentEvents, markdownEvents, parseMarkdown, textOf, type MarkdownEvent } from './markdown.js';

export {
  REQUIREMENT_HEADING,
  extractInlineRequirements,
  extractRequirements,
  extractScenarios,
  extractTasks,
  isCompactScenario,
  type InlineRequirementBlock,
  type Priority,
  type RequirementBlock,
  type ScenarioBlock,
  type TaskAction,
  type TaskBlock,
  type TaskStatus,
} from './blocks.js';
