/**
 * Format validator
 *
 * Single-document structural checks over the heading/list event stream:
 * required headings, requirement and scenario heading patterns, minimum
 * scenario count and WHEN/THEN presence.
 */

import type { ValidationError, ValidationRules } from '../../types/index.js';
import { loadDocument, type ParsedDocument } from '../document/header.js';
import { documentEvents } from '../document/markdown.js';
import { isCompactScenario } from '../document/blocks.js';
import { compilePattern, severityOf } from './rules.js';

// ============================================================================
// TYPES
// ============================================================================

interface ScanState {
  section: string | null;
  lastHeadingDepth: number;
  listDepth: number;
  headings: string[];
  scenarioCount: number;
  hasWhen: boolean;
  hasThen: boolean;
}

// ============================================================================
// HELPERS
// ============================================================================

function headingMatches(heading: string, required: string): boolean {
  const have = heading.trim().toLowerCase();
  const want = required.trim().toLowerCase();
  return have === want || have.startsWith(want);
}

function inSection(state: ScanState, name: string): boolean {
  return state.section !== null && state.section.startsWith(name);
}

/**
 * Error for a file that could not be read
 */
export function unreadableFileError(file: string, error: unknown): ValidationError {
  const reason = error instanceof Error ? error.message : String(error);
  return {
    message: `Failed to read file: ${reason}`,
    file,
    severity: 'high',
    category: 'invalid_structure',
  };
}

// ============================================================================
// VALIDATOR
// ============================================================================

export class FormatValidator {
  private readonly requirementPattern: RegExp | null;
  private readonly scenarioPattern: RegExp | null;

  constructor(private readonly rules: ValidationRules) {
    this.requirementPattern = compilePattern(rules.requirementPattern, 'requirement heading');
    this.scenarioPattern = compilePattern(rules.scenarioPattern, 'scenario heading');
  }

  /**
   * Validate a file on disk
   *
   * @param label - path used in reported errors; defaults to `path`
   */
  async validate(path: string, label = path): Promise<ValidationError[]> {
    let doc: ParsedDocument;
    try {
      doc = await loadDocument(path);
    } catch (error) {
      return [unreadableFileError(label, error)];
    }
    return this.validateDocument(doc, label);
  }

  validateDocument(doc: ParsedDocument, label = doc.path): ValidationError[] {
    if (doc.content.trim() === '') {
      return [{ message: 'File is empty', file: label, severity: 'high', category: 'empty_content' }];
    }

    const errors: ValidationError[] = [];
    const state: ScanState = {
      section: null,
      lastHeadingDepth: 0,
      listDepth: 0,
      headings: [],
      scenarioCount: 0,
      hasWhen: false,
      hasThen: false,
    };

    for (const event of documentEvents(doc)) {
      switch (event.kind) {
        case 'heading':
          this.onHeading(state, event.depth, event.text, event.line, label, errors);
          break;
        case 'listStart':
          state.listDepth++;
          break;
        case 'listEnd':
          state.listDepth--;
          break;
        case 'listItem':
          if (
            state.lastHeadingDepth !== 4 &&
            (inSection(state, 'requirements') || inSection(state, 'acceptance criteria')) &&
            isCompactScenario(event.text)
          ) {
            state.scenarioCount++;
          }
          break;
        case 'text':
          if (state.listDepth > 0) {
            if (event.text.includes(this.rules.whenKeyword)) state.hasWhen = true;
            if (event.text.includes(this.rules.thenKeyword)) state.hasThen = true;
          }
          break;
      }
    }

    for (const required of this.rules.requiredHeadings) {
      if (!state.headings.some((heading) => headingMatches(heading, required))) {
        errors.push({
          message: `Missing required heading: ${required}`,
          file: label,
          severity: severityOf(this.rules, 'missing_heading'),
          category: 'missing_heading',
          subject: required,
        });
      }
    }

    if (state.scenarioCount < this.rules.minScenarios) {
      errors.push({
        message: `Expected at least ${this.rules.minScenarios} scenario(s), found ${state.scenarioCount}`,
        file: label,
        severity: severityOf(this.rules, 'missing_scenario'),
        category: 'missing_scenario',
      });
    }

    if (this.rules.requireWhenThen && this.rules.minScenarios > 0 && state.scenarioCount > 0) {
      for (const [found, keyword] of [
        [state.hasWhen, this.rules.whenKeyword],
        [state.hasThen, this.rules.thenKeyword],
      ] as const) {
        if (!found) {
          errors.push({
            message: `Missing **${keyword}** clause in scenarios`,
            file: label,
            severity: severityOf(this.rules, 'missing_when_then'),
            category: 'missing_when_then',
            subject: keyword,
          });
        }
      }
    }

    return errors;
  }

  private onHeading(
    state: ScanState,
    depth: number,
    text: string,
    line: number,
    label: string,
    errors: ValidationError[]
  ): void {
    state.headings.push(text);
    state.lastHeadingDepth = depth;

    if (depth <= 2) {
      state.section = depth === 2 ? text.trim().toLowerCase() : null;
      return;
    }

    const inRequirements = inSection(state, 'requirements');

    if (depth === 3 && inRequirements && this.requirementPattern && !this.requirementPattern.test(text)) {
      errors.push({
        message: `Requirement heading '${text}' does not match pattern ${this.requirementPattern.source}`,
        file: label,
        line,
        severity: severityOf(this.rules, 'invalid_requirement_format'),
        category: 'invalid_requirement_format',
        subject: text,
      });
    }

    if (depth === 4 && (inRequirements || inSection(state, 'acceptance criteria'))) {
      state.scenarioCount++;
      if (this.scenarioPattern && !this.scenarioPattern.test(text)) {
        errors.push({
          message: `Scenario heading '${text}' does not match pattern ${this.scenarioPattern.source}`,
          file: label,
          line,
          severity: severityOf(this.rules, 'missing_scenario'),
          category: 'missing_scenario',
          subject: text,
        });
      }
    }
  }
}
