/**
 * Block extraction
 *
 * Pulls requirement, scenario and task blocks out of a parsed document. Blocks
 * are rebuilt on every call and never cached.
 */

import YAML from 'yaml';
import type { Root } from 'mdast';
import { isRecord, type ParsedDocument } from './header.js';
import { documentEvents, parseMarkdown, textOf, type MarkdownEvent } from './markdown.js';

// ============================================================================
// TYPES
// ============================================================================

export type Priority = 'high' | 'medium' | 'low';

export type TaskAction = 'CREATE' | 'MODIFY' | 'DELETE' | 'RENAME';

export type TaskStatus = 'pending' | 'in_progress' | 'completed' | 'blocked';

export interface RequirementBlock {
  id: string;
  title: string;
  description: string;
  priority?: Priority;
  line: number;
}

export interface InlineRequirementBlock {
  id: string;
  priority?: Priority;
  status?: string;
  line: number;
}

export interface ScenarioBlock {
  name: string;
  given: string[];
  when: string[];
  then: string[];
  and: string[];
  line: number;
}

export interface TaskBlock {
  id: string;
  /** Leading integer of the dotted id */
  layer: number;
  title?: string;
  action?: TaskAction;
  status?: TaskStatus;
  file?: string;
  specRef?: string;
  dependsOn: string[];
  estimatedLines?: number;
  line: number;
}

export const REQUIREMENT_HEADING = /^(R\d+):(.*)$/;

const PRIORITIES: readonly Priority[] = ['high', 'medium', 'low'];
const ACTIONS: readonly TaskAction[] = ['CREATE', 'MODIFY', 'DELETE', 'RENAME'];
const STATUSES: readonly TaskStatus[] = ['pending', 'in_progress', 'completed', 'blocked'];

// ============================================================================
// HELPERS
// ============================================================================

function pick<T extends string>(allowed: readonly T[], value: unknown): T | undefined {
  if (typeof value !== 'string') return undefined;
  return allowed.find((candidate) => candidate.toLowerCase() === value.trim().toLowerCase());
}

function asString(value: unknown): string | undefined {
  if (typeof value === 'string') return value.trim() || undefined;
  if (typeof value === 'number') return String(value);
  return undefined;
}

function asStringList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.map(asString).filter((item): item is string => item !== undefined);
  }
  const single = asString(value);
  return single ? splitList(single) : [];
}

function splitList(value: string): string[] {
  return value
    .split(/[,\s]+/)
    .map((item) => item.replace(/[`[\]]/g, '').trim())
    .filter((item) => item !== '' && item.toLowerCase() !== 'none');
}

function layerOf(id: string): number {
  const leading = Number.parseInt(id, 10);
  return Number.isNaN(leading) ? 0 : leading;
}

/**
 * YAML fenced blocks of a document, parsed with every scalar kept as a string
 * so dotted task ids such as 1.10 survive intact
 */
function yamlBlocks(events: MarkdownEvent[]): Array<{ data: Record<string, unknown>; line: number }> {
  const blocks: Array<{ data: Record<string, unknown>; line: number }> = [];

  for (const event of events) {
    if (event.kind !== 'code') continue;
    if (event.lang !== 'yaml' && event.lang !== 'yml') continue;

    let data: unknown;
    try {
      data = YAML.parse(event.value, { schema: 'failsafe' });
    } catch {
      continue;
    }
    if (isRecord(data)) {
      blocks.push({ data, line: event.line });
    }
  }

  return blocks;
}

// ============================================================================
// REQUIREMENTS
// ============================================================================

/**
 * Requirement blocks declared inline as ```yaml `requirement:` blocks
 */
export function extractInlineRequirements(doc: ParsedDocument): InlineRequirementBlock[] {
  const blocks: InlineRequirementBlock[] = [];

  for (const { data, line } of yamlBlocks(documentEvents(doc))) {
    const requirement = data.requirement;
    if (!isRecord(requirement)) continue;

    const id = asString(requirement.id);
    if (!id) continue;

    blocks.push({
      id,
      priority: pick(PRIORITIES, requirement.priority),
      status: asString(requirement.status),
      line,
    });
  }

  return blocks;
}

/**
 * Requirement blocks from `### R<n>: title` headings
 */
export function extractRequirements(doc: ParsedDocument): RequirementBlock[] {
  const tree: Root = parseMarkdown(doc.body);
  const offset = doc.bodyStartLine - 1;
  const inline = new Map(extractInlineRequirements(doc).map((block) => [block.id, block]));
  const requirements: RequirementBlock[] = [];

  tree.children.forEach((node, index) => {
    if (node.type !== 'heading' || node.depth !== 3) return;

    const match = REQUIREMENT_HEADING.exec(textOf(node).trim());
    if (!match) return;

    const next = tree.children[index + 1];
    const description = next?.type === 'paragraph' ? textOf(next).trim() : '';

    requirements.push({
      id: match[1],
      title: match[2].trim(),
      description,
      priority: inline.get(match[1])?.priority,
      line: (node.position?.start.line ?? 1) + offset,
    });
  });

  return requirements;
}

// ============================================================================
// SCENARIOS
// ============================================================================

type Clause = 'given' | 'when' | 'then' | 'and';

const CLAUSE = /^\*{0,2}(GIVEN|WHEN|THEN|AND)\*{0,2}\s*:?\s*(.*)$/i;
const COMPACT = /^\*{0,2}WHEN\*{0,2}\s+(.+?)\s+\*{0,2}THEN\*{0,2}\s+(.+)$/i;

function clauseOf(text: string): { clause: Clause; rest: string } | null {
  const match = CLAUSE.exec(text);
  if (!match) return null;
  const keyword = match[1].toLowerCase();
  const clause: Clause =
    keyword === 'given' ? 'given' : keyword === 'when' ? 'when' : keyword === 'then' ? 'then' : 'and';
  return { clause, rest: match[2].trim() };
}

/**
 * True for a `WHEN … THEN …` list item written on a single line
 */
export function isCompactScenario(text: string): boolean {
  return COMPACT.test(text);
}

/**
 * Scenario blocks from `#### Scenario:` headings and their list items. A
 * compact WHEN/THEN bullet outside any scenario heading is a scenario of its own.
 */
export function extractScenarios(doc: ParsedDocument): ScenarioBlock[] {
  const scenarios: ScenarioBlock[] = [];
  let current: ScenarioBlock | null = null;

  for (const event of documentEvents(doc)) {
    if (event.kind === 'heading') {
      current = null;
      if (event.depth === 4) {
        const name = event.text.replace(/^Scenario\s*:\s*/i, '').trim();
        current = { name, given: [], when: [], then: [], and: [], line: event.line };
        scenarios.push(current);
      }
      continue;
    }

    if (event.kind !== 'listItem') continue;

    const compact = COMPACT.exec(event.text);
    if (compact && current) {
      current.when.push(compact[1].trim());
      current.then.push(compact[2].trim());
      continue;
    }
    if (compact) {
      scenarios.push({
        name: event.text,
        given: [],
        when: [compact[1].trim()],
        then: [compact[2].trim()],
        and: [],
        line: event.line,
      });
      continue;
    }

    const parsed = clauseOf(event.text);
    if (current && parsed) {
      current[parsed.clause].push(parsed.rest);
    }
  }

  return scenarios;
}

// ============================================================================
// TASKS
// ============================================================================

function taskFromRecord(record: Record<string, unknown>, line: number): TaskBlock | null {
  const id = asString(record.id);
  if (!id) return null;

  const estimated = asString(record.estimated_lines);
  const estimatedLines = estimated === undefined ? undefined : Number(estimated);

  return {
    id,
    layer: layerOf(id),
    title: asString(record.title),
    action: pick(ACTIONS, record.action),
    status: pick(STATUSES, record.status),
    file: asString(record.file),
    specRef: asString(record.spec_ref),
    dependsOn: asStringList(record.depends_on),
    estimatedLines: estimatedLines !== undefined && Number.isFinite(estimatedLines) ? estimatedLines : undefined,
    line,
  };
}

const CHECKLIST_TASK = /^(\d+(?:\.\d+)*)\s+(.+)$/;
const CHECKLIST_FIELD = /^(File|Spec|Depends|Action)\s*:\s*(.*)$/i;

function applyChecklistField(task: TaskBlock, field: string, value: string): void {
  const cleaned = value.replace(/`/g, '').trim();

  switch (field.toLowerCase()) {
    case 'file': {
      const action = /\((CREATE|MODIFY|DELETE|RENAME)\)/i.exec(cleaned);
      task.file = cleaned.replace(/\s*\([^)]*\)\s*$/, '').trim() || undefined;
      if (action) task.action = pick(ACTIONS, action[1]);
      break;
    }
    case 'spec':
      task.specRef = cleaned || undefined;
      break;
    case 'depends':
      task.dependsOn = splitList(cleaned);
      break;
    case 'action':
      task.action = pick(ACTIONS, cleaned);
      break;
  }
}

/**
 * Task blocks in document order
 *
 * Reads ```yaml blocks (with or without a `task:` root key) and checklist items
 * of the form `- [ ] 1.1 Title` whose nested bullets carry File/Spec/Depends.
 */
export function extractTasks(doc: ParsedDocument): TaskBlock[] {
  const events = documentEvents(doc);
  const tasks: Array<TaskBlock> = [];

  for (const { data, line } of yamlBlocks(events)) {
    const record = isRecord(data.task) ? data.task : data;
    if (record === data && !('action' in data || 'file' in data || 'depends_on' in data)) continue;
    const task = taskFromRecord(record, line);
    if (task) tasks.push(task);
  }

  let current: TaskBlock | null = null;
  for (const event of events) {
    if (event.kind !== 'listItem') continue;

    if (event.listDepth === 1) {
      current = null;
      const match = event.checked === null ? null : CHECKLIST_TASK.exec(event.text);
      if (match) {
        current = {
          id: match[1],
          layer: layerOf(match[1]),
          title: match[2].trim(),
          status: event.checked ? 'completed' : 'pending',
          dependsOn: [],
          line: event.line,
        };
        tasks.push(current);
      }
      continue;
    }

    const field = current ? CHECKLIST_FIELD.exec(event.text) : null;
    if (current && field) {
      applyChecklistField(current, field[1], field[2]);
    }
  }

  return tasks.sort((a, b) => a.line - b.line);
}
