/**
 * Auto-fixer
 *
 * Mechanical repair of missing headings and missing scenarios by inserting
 * placeholder text. Every insertion first checks whether the document already
 * satisfies the rule, so running the fixer again changes nothing. The fixer
 * never re-validates; callers run validation again to confirm.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { isAbsolute, join } from 'node:path';
import { FIXABLE_CATEGORIES, type ErrorCategory, type ValidationError } from '../../types/index.js';
import { normalizeContent } from '../document/header.js';
import { markdownEvents } from '../document/markdown.js';
import { errors as cliErrors } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

// ============================================================================
// TYPES
// ============================================================================

export interface FixDetail {
  file: string;
  category: ErrorCategory;
  outcome: 'fixed' | 'already_satisfied';
  description: string;
}

export interface FixResult {
  filesModified: number;
  errorsFixed: number;
  alreadySatisfied: number;
  unfixableErrors: ValidationError[];
  fixDetails: FixDetail[];
}

type Edit = (content: string) => string | null;

// ============================================================================
// TEXT EDITS
// ============================================================================

const AC_HEADING = 'Acceptance Criteria';

const PLACEHOLDER_SCENARIO = [
  '#### Scenario: Basic Usage',
  '- **WHEN** the feature is used',
  '- **THEN** it should work correctly',
];

const SECTION_BODIES: Record<string, string[]> = {
  overview: ['<!-- Brief description of this feature -->'],
  requirements: ['### R1: Basic Requirement', 'Description of the requirement.'],
  'acceptance criteria': PLACEHOLDER_SCENARIO,
};

const HEADING_LINE = /^#{1,6}[ \t]+(.*?)[ \t]*#*[ \t]*$/;

function headingText(line: string): string | null {
  const match = HEADING_LINE.exec(line);
  return match ? match[1].trim() : null;
}

function matchesHeading(text: string, wanted: string): boolean {
  const have = text.toLowerCase();
  const want = wanted.trim().toLowerCase();
  return have === want || have.startsWith(want);
}

function appendBlock(content: string, lines: string[]): string {
  const head = content.replace(/\s+$/, '');
  const block = lines.join('\n');
  return head === '' ? `${block}\n` : `${head}\n\n${block}\n`;
}

/**
 * Line range [start, end) of the `## Acceptance Criteria` section, heading
 * included
 */
function acceptanceSection(lines: string[]): { start: number; end: number } | null {
  const start = lines.findIndex((line) => /^##[ \t]+/.test(line) && matchesHeading(headingText(line) ?? '', AC_HEADING));
  if (start === -1) return null;

  let end = start + 1;
  while (end < lines.length && !/^#{1,2}[ \t]+/.test(lines[end])) end++;
  return { start, end };
}

/**
 * WHEN and THEN must appear as list text, the way the format validator reads
 * them; code blocks do not count
 */
function sectionSatisfied(lines: string[], section: { start: number; end: number }, needScenario: boolean): boolean {
  const body = lines.slice(section.start + 1, section.end).join('\n');
  let listDepth = 0;
  let hasWhen = false;
  let hasThen = false;
  let hasScenario = false;

  for (const event of markdownEvents(body)) {
    switch (event.kind) {
      case 'heading':
        if (event.depth === 4) hasScenario = true;
        break;
      case 'listStart':
        listDepth++;
        break;
      case 'listEnd':
        listDepth--;
        break;
      case 'text':
        if (listDepth > 0) {
          if (event.text.includes('WHEN')) hasWhen = true;
          if (event.text.includes('THEN')) hasThen = true;
        }
        break;
    }
  }

  return hasWhen && hasThen && (!needScenario || hasScenario);
}

/**
 * Append `## <heading>` with a placeholder body, or null when a heading with
 * that text already exists (case-insensitive, exact or prefix)
 */
export function addMissingHeading(content: string, heading: string): string | null {
  const exists = content.split('\n').some((line) => {
    const text = headingText(line);
    return text !== null && matchesHeading(text, heading);
  });
  if (exists) return null;

  const body = SECTION_BODIES[heading.trim().toLowerCase()] ?? [`<!-- ${heading} -->`];
  return appendBlock(content, [`## ${heading.trim()}`, '', ...body]);
}

/**
 * Insert a placeholder WHEN/THEN scenario directly under the Acceptance
 * Criteria heading, appending the section when it is missing. Null when the
 * section already holds a scenario with both markers.
 */
export function addPlaceholderScenario(content: string, needScenarioHeading = false): string | null {
  const lines = content.split('\n');
  const section = acceptanceSection(lines);

  if (!section) {
    return appendBlock(content, [`## ${AC_HEADING}`, '', ...PLACEHOLDER_SCENARIO]);
  }
  if (sectionSatisfied(lines, section, needScenarioHeading)) return null;

  const following = lines[section.start + 1];
  const insertion = ['', ...PLACEHOLDER_SCENARIO];
  if (following !== undefined && following.trim() !== '') insertion.push('');

  lines.splice(section.start + 1, 0, ...insertion);
  return lines.join('\n');
}

// ============================================================================
// FIXER
// ============================================================================

export class AutoFixer {
  /**
   * @param baseDir - directory that relative error paths are resolved against
   */
  constructor(private readonly baseDir: string) {}

  async fix(errors: ValidationError[]): Promise<FixResult> {
    const result: FixResult = {
      filesModified: 0,
      errorsFixed: 0,
      alreadySatisfied: 0,
      unfixableErrors: [],
      fixDetails: [],
    };

    const byFile = new Map<string, ValidationError[]>();
    for (const error of errors) {
      const group = byFile.get(error.file);
      if (group) {
        group.push(error);
      } else {
        byFile.set(error.file, [error]);
      }
    }

    for (const [file, fileErrors] of byFile) {
      await this.fixFile(file, fileErrors, result);
    }

    return result;
  }

  private async fixFile(file: string, fileErrors: ValidationError[], result: FixResult): Promise<void> {
    const path = isAbsolute(file) ? file : join(this.baseDir, file);

    let original: string;
    try {
      original = normalizeContent(await readFile(path, 'utf-8'));
    } catch (error) {
      logger.debug(`Cannot fix ${file}: ${error instanceof Error ? error.message : String(error)}`);
      result.unfixableErrors.push(...fileErrors);
      return;
    }

    let content = original;

    for (const error of fileErrors) {
      const edit = FIXABLE_CATEGORIES[error.category] ? this.editFor(error) : null;
      if (!edit) {
        result.unfixableErrors.push(error);
        continue;
      }

      if (edit(original) === null) {
        result.alreadySatisfied++;
        result.fixDetails.push({
          file,
          category: error.category,
          outcome: 'already_satisfied',
          description: `${file}: ${error.message} (already satisfied)`,
        });
        continue;
      }

      const updated = edit(content);
      if (updated !== null) content = updated;

      result.errorsFixed++;
      result.fixDetails.push({
        file,
        category: error.category,
        outcome: 'fixed',
        description:
          updated === null
            ? `${file}: ${error.message} (resolved by an earlier insertion)`
            : `${file}: ${describeFix(error)}`,
      });
    }

    if (content !== original) {
      try {
        await writeFile(path, content, 'utf-8');
      } catch (error) {
        throw cliErrors.fileWriteError(file, error instanceof Error ? error.message : String(error));
      }
      result.filesModified++;
    }
  }

  private editFor(error: ValidationError): Edit | null {
    switch (error.category) {
      case 'missing_heading': {
        const heading = error.subject ?? error.message.replace(/^Missing required heading:\s*/, '');
        if (heading.trim() === '') return null;
        return (content) => addMissingHeading(content, heading);
      }
      case 'missing_when_then':
        return (content) => addPlaceholderScenario(content);
      case 'missing_scenario':
        // A misnamed scenario heading carries its line; only a short count is fixable
        if (error.line !== undefined) return null;
        return (content) => addPlaceholderScenario(content, true);
      default:
        return null;
    }
  }
}

function describeFix(error: ValidationError): string {
  switch (error.category) {
    case 'missing_heading':
      return `Added missing '## ${error.subject ?? 'heading'}' section`;
    case 'missing_when_then':
      return 'Added placeholder scenario with WHEN/THEN';
    default:
      return 'Added placeholder scenario to Acceptance Criteria';
  }
}
