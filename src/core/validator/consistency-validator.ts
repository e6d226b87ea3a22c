/**
 * Consistency validator
 *
 * Cross-document checks over one change directory:
 * - task spec_ref targets and anchors exist
 * - proposal.affected_specs matches the specs directory
 * - task dependencies exist and form no cycle
 * - spec parent/related references exist
 *
 * Each check is independent; validateAll() runs them in that order and keeps
 * going when one of them cannot read its inputs.
 */

import { dirname, join, posix } from 'node:path';
import type { ValidationError } from '../../types/index.js';
import { headerFields, loadDocument, type ParsedDocument } from '../document/header.js';
import { extractInlineRequirements, extractTasks, type TaskBlock } from '../document/blocks.js';
import {
  PROPOSAL_FILE,
  SPECS_DIR,
  TASKS_FILE,
  fileExists,
  listSpecFiles,
} from '../services/change-files.js';
import { errors as cliErrors } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

// ============================================================================
// TYPES
// ============================================================================

export interface SpecRef {
  /** Path relative to the change directory */
  path: string;
  anchor?: string;
}

type Color = 'white' | 'grey' | 'black';

// ============================================================================
// REFERENCE PARSING
// ============================================================================

function looksLikePath(value: string): boolean {
  return value.includes('/') || value.toLowerCase().endsWith('.md');
}

function specPath(value: string): string {
  const cleaned = value.trim().replace(/^\.\//, '');
  return looksLikePath(cleaned) ? posix.normalize(cleaned) : `${SPECS_DIR}/${cleaned}.md`;
}

/**
 * Parse a task's spec_ref
 *
 * - `specs/auth.md#R1` and `auth#R1`: path and anchor
 * - `auth:R1`: spec id and anchor
 * - `auth` or `specs/auth.md`: file only
 */
export function parseSpecRef(ref: string): SpecRef {
  const value = ref.trim();

  const hash = value.indexOf('#');
  if (hash !== -1) {
    const anchor = value.slice(hash + 1).trim();
    return { path: specPath(value.slice(0, hash)), anchor: anchor || undefined };
  }

  const colon = value.indexOf(':');
  if (colon !== -1 && !looksLikePath(value.slice(0, colon))) {
    const anchor = value.slice(colon + 1).trim();
    return { path: specPath(value.slice(0, colon)), anchor: anchor || undefined };
  }

  return { path: specPath(value) };
}

/**
 * GitHub-style heading slug
 */
export function slugify(text: string): string {
  return text
    .trim()
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s_-]/gu, '')
    .replace(/\s/g, '-');
}

const HEADING_LINE = /^#{1,6}[ \t]+(.*?)[ \t]*#*[ \t]*$/gm;

/**
 * True when the document has a heading (levels 1-6, at line start) whose text
 * equals the anchor, starts with it followed by ':' or whitespace, or slugs
 * to it; or an inline requirement block with that id
 */
export function resolveAnchor(doc: ParsedDocument, anchor: string): boolean {
  const wanted = anchor.trim();

  for (const match of doc.content.matchAll(HEADING_LINE)) {
    const text = match[1].trim();
    if (text === wanted) return true;
    if (text.startsWith(wanted) && /^[:\s]/.test(text.slice(wanted.length))) return true;
    if (slugify(text) === wanted) return true;
  }

  return extractInlineRequirements(doc).some((block) => block.id === wanted);
}

/**
 * Path of a spec list entry: a plain string or an object with a `path` field
 */
function referencedPath(entry: unknown): string | null {
  if (typeof entry === 'string') return entry.trim() || null;
  if (typeof entry === 'object' && entry !== null && 'path' in entry && typeof entry.path === 'string') {
    return entry.path.trim() || null;
  }
  return null;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// ============================================================================
// VALIDATOR
// ============================================================================

export class ConsistencyValidator {
  constructor(private readonly changeDir: string) {}

  /**
   * Task blocks of tasks.md, or none when the file does not exist
   */
  private async loadTasks(): Promise<TaskBlock[]> {
    const doc = await this.loadOptional(TASKS_FILE);
    return doc ? extractTasks(doc) : [];
  }

  private async loadOptional(relativePath: string): Promise<ParsedDocument | null> {
    try {
      return await loadDocument(join(this.changeDir, relativePath));
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw cliErrors.fileReadError(relativePath, error instanceof Error ? error.message : String(error));
    }
  }

  /**
   * Every task spec_ref must name an existing file and, when it carries an
   * anchor, a heading or requirement block in that file
   */
  async validateTaskSpecRefs(): Promise<ValidationError[]> {
    const errors: ValidationError[] = [];

    for (const task of await this.loadTasks()) {
      if (!task.specRef) continue;
      const ref = parseSpecRef(task.specRef);

      if (!(await fileExists(join(this.changeDir, ref.path)))) {
        errors.push({
          message: `Task ${task.id} references non-existent spec file: ${ref.path}`,
          file: TASKS_FILE,
          line: task.line,
          severity: 'high',
          category: 'broken_reference',
          subject: ref.path,
        });
        continue;
      }

      if (!ref.anchor) continue;

      let target: ParsedDocument;
      try {
        target = await loadDocument(join(this.changeDir, ref.path));
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        errors.push({
          message: `Task ${task.id} could not read spec file ${ref.path}: ${reason}`,
          file: TASKS_FILE,
          line: task.line,
          severity: 'medium',
          category: 'broken_reference',
          subject: ref.path,
        });
        continue;
      }

      if (!resolveAnchor(target, ref.anchor)) {
        errors.push({
          message: `Task ${task.id} references non-existent anchor #${ref.anchor} in ${ref.path}`,
          file: TASKS_FILE,
          line: task.line,
          severity: 'high',
          category: 'broken_reference',
          subject: `${ref.path}#${ref.anchor}`,
        });
      }
    }

    return errors;
  }

  /**
   * Declared specs must exist; existing specs should be declared
   */
  async validateProposalSpecAlignment(): Promise<ValidationError[]> {
    const proposal = await this.loadOptional(PROPOSAL_FILE);
    if (!proposal) return [];

    const fields = headerFields(proposal);
    if (!fields || !Array.isArray(fields.affected_specs)) return [];

    const entries: unknown[] = fields.affected_specs;
    const declared = new Set<string>();
    for (const entry of entries) {
      const path = referencedPath(entry);
      if (path) declared.add(posix.normalize(path.replace(/^\.\//, '')));
    }

    const errors: ValidationError[] = [];

    for (const path of declared) {
      if (!(await fileExists(join(this.changeDir, path)))) {
        errors.push({
          message: `Proposal references non-existent spec: ${path}`,
          file: PROPOSAL_FILE,
          severity: 'medium',
          category: 'broken_reference',
          subject: path,
        });
      }
    }

    for (const specFile of await listSpecFiles(this.changeDir)) {
      if (!declared.has(specFile)) {
        errors.push({
          message: `Spec file ${specFile} not listed in proposal.affected_specs`,
          file: specFile,
          severity: 'low',
          category: 'inconsistency',
          subject: specFile,
        });
      }
    }

    return errors;
  }

  /**
   * Task ids must be unique, dependencies must name existing tasks and the
   * graph must be acyclic. Only the first cycle found is reported.
   */
  async validateTaskDependencies(): Promise<ValidationError[]> {
    const tasks = await this.loadTasks();
    const errors: ValidationError[] = [];

    const byId = new Map<string, TaskBlock>();
    for (const task of tasks) {
      const first = byId.get(task.id);
      if (first) {
        errors.push({
          message: `Duplicate task ID '${task.id}' (first seen at line ${first.line})`,
          file: TASKS_FILE,
          line: task.line,
          severity: 'high',
          category: 'invalid_structure',
          subject: task.id,
        });
      } else {
        byId.set(task.id, task);
      }
    }

    // A repeated id contributes its dependencies to the first block's node
    const graph = new Map<string, string[]>();
    for (const task of tasks) {
      const edges = graph.get(task.id) ?? [];
      for (const dependency of task.dependsOn) {
        if (byId.has(dependency)) {
          edges.push(dependency);
        } else {
          errors.push({
            message: `Task ${task.id} depends on non-existent task: ${dependency}`,
            file: TASKS_FILE,
            line: task.line,
            severity: 'high',
            category: 'broken_reference',
            subject: dependency,
          });
        }
      }
      graph.set(task.id, edges);
    }

    const cycle = findFirstCycle(graph);
    if (cycle) {
      errors.push({
        message: `Circular dependency detected: ${cycle.join(' → ')}`,
        file: TASKS_FILE,
        line: byId.get(cycle[0])?.line,
        severity: 'high',
        category: 'circular_dependency',
        subject: cycle.join(' → '),
      });
    }

    return errors;
  }

  /**
   * parent_spec and related_specs in spec headers must point at existing specs
   */
  async validateSpecHierarchy(): Promise<ValidationError[]> {
    const errors: ValidationError[] = [];

    for (const specFile of await listSpecFiles(this.changeDir)) {
      const doc = await this.loadOptional(specFile);
      const fields = doc ? headerFields(doc) : null;
      if (!fields) continue;

      if (typeof fields.parent_spec === 'string' && fields.parent_spec.trim() !== '') {
        const parent = specPath(fields.parent_spec);
        if (!(await fileExists(join(this.changeDir, parent)))) {
          errors.push({
            message: `Spec ${specFile} references non-existent parent spec: ${fields.parent_spec}`,
            file: specFile,
            severity: 'medium',
            category: 'broken_reference',
            subject: parent,
          });
        }
      }

      const related: unknown[] = Array.isArray(fields.related_specs) ? fields.related_specs : [];
      for (const entry of related) {
        const path = referencedPath(entry);
        if (!path) continue;

        const fromChange = join(this.changeDir, specPath(path));
        const fromSpec = join(this.changeDir, dirname(specFile), path);
        if (!(await fileExists(fromChange)) && !(await fileExists(fromSpec))) {
          errors.push({
            message: `Spec ${specFile} references non-existent related spec: ${path}`,
            file: specFile,
            severity: 'low',
            category: 'broken_reference',
            subject: path,
          });
        }
      }
    }

    return errors;
  }

  async validateAll(): Promise<ValidationError[]> {
    const checks: Array<[string, () => Promise<ValidationError[]>]> = [
      ['task spec references', () => this.validateTaskSpecRefs()],
      ['proposal/spec alignment', () => this.validateProposalSpecAlignment()],
      ['task dependencies', () => this.validateTaskDependencies()],
      ['spec hierarchy', () => this.validateSpecHierarchy()],
    ];

    const errors: ValidationError[] = [];
    for (const [name, check] of checks) {
      try {
        errors.push(...(await check()));
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        logger.warning(`Skipped ${name} check: ${reason}`);
      }
    }
    return errors;
  }
}

// ============================================================================
// CYCLE DETECTION
// ============================================================================

/**
 * First cycle reachable in node insertion order, as a closed path
 * (`['1.1', '1.2', '1.1']`), or null. Iterative DFS with white/grey/black
 * colouring.
 */
export function findFirstCycle(graph: Map<string, string[]>): string[] | null {
  const color = new Map<string, Color>();

  for (const start of graph.keys()) {
    if ((color.get(start) ?? 'white') !== 'white') continue;

    const stack: Array<{ node: string; next: number }> = [{ node: start, next: 0 }];
    const path: string[] = [start];
    color.set(start, 'grey');

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const neighbors = graph.get(frame.node) ?? [];

      if (frame.next >= neighbors.length) {
        color.set(frame.node, 'black');
        stack.pop();
        path.pop();
        continue;
      }

      const neighbor = neighbors[frame.next];
      frame.next++;

      const state = color.get(neighbor) ?? 'white';
      if (state === 'grey') {
        return [...path.slice(path.indexOf(neighbor)), neighbor];
      }
      if (state === 'white') {
        color.set(neighbor, 'grey');
        stack.push({ node: neighbor, next: 0 });
        path.push(neighbor);
      }
    }
  }

  return null;
}
