/**
 * Semantic validator
 *
 * Duplicate requirement ids, broken local links and placeholder titles, for a
 * single document or an ordered batch of documents.
 */

import { dirname, resolve } from 'node:path';
import type { ValidationError, ValidationRules } from '../../types/index.js';
import { loadDocument, type ParsedDocument } from '../document/header.js';
import { documentEvents } from '../document/markdown.js';
import { extractRequirements, type RequirementBlock } from '../document/blocks.js';
import { severityOf } from './rules.js';
import { unreadableFileError } from './format-validator.js';
import { fileExists } from '../services/change-files.js';

const PLACEHOLDER = /\b(TODO|TBD|FIXME|XXX)\b/i;
const URL_SCHEME = /^[a-z][a-z0-9+.-]*:/i;

/**
 * Local file part of a link target, or null for URLs and in-page anchors
 */
export function localLinkTarget(url: string): string | null {
  const trimmed = url.trim();
  if (trimmed === '' || trimmed.startsWith('#') || URL_SCHEME.test(trimmed)) return null;

  const path = trimmed.split(/[#?]/, 1)[0];
  if (path === '') return null;
  try {
    return decodeURI(path);
  } catch {
    return path;
  }
}

export class SemanticValidator {
  constructor(private readonly rules: ValidationRules) {}

  async validate(path: string, label = path): Promise<ValidationError[]> {
    let doc: ParsedDocument;
    try {
      doc = await loadDocument(path);
    } catch (error) {
      return [unreadableFileError(label, error)];
    }
    return this.validateDocument(doc, label);
  }

  async validateDocument(doc: ParsedDocument, label = doc.path): Promise<ValidationError[]> {
    const requirements = extractRequirements(doc);
    return [...this.checkRequirements(requirements, label), ...(await this.checkLinks(doc, label))];
  }

  /**
   * Validate each file, then report requirement ids that reappear in a later
   * file of the list. The first file in list order owns an id.
   */
  async validateBatch(
    paths: string[],
    labelOf: (path: string) => string = (path) => path
  ): Promise<ValidationError[]> {
    const errors: ValidationError[] = [];
    const parsed: Array<{ label: string; requirements: RequirementBlock[] }> = [];

    for (const path of paths) {
      const label = labelOf(path);
      let doc: ParsedDocument;
      try {
        doc = await loadDocument(path);
      } catch (error) {
        errors.push(unreadableFileError(label, error));
        continue;
      }
      errors.push(...(await this.validateDocument(doc, label)));
      parsed.push({ label, requirements: extractRequirements(doc) });
    }

    return [...errors, ...this.crossFileDuplicates(parsed)];
  }

  /**
   * Requirement ids that reappear in a later document of the list. Repeats
   * inside one document are left to the per-document check.
   */
  crossFileDuplicates(documents: Array<{ label: string; requirements: RequirementBlock[] }>): ValidationError[] {
    const errors: ValidationError[] = [];
    const firstSeen = new Map<string, { label: string; line: number }>();

    for (const { label, requirements } of documents) {
      const local = new Set<string>();
      for (const requirement of requirements) {
        if (local.has(requirement.id)) continue;
        local.add(requirement.id);

        const first = firstSeen.get(requirement.id);
        if (!first) {
          firstSeen.set(requirement.id, { label, line: requirement.line });
          continue;
        }
        errors.push({
          message: `Duplicate requirement ID '${requirement.id}' across files (first seen in ${first.label} at line ${first.line})`,
          file: label,
          line: requirement.line,
          severity: severityOf(this.rules, 'duplicate_requirement'),
          category: 'duplicate_requirement',
          subject: requirement.id,
        });
      }
    }

    return errors;
  }

  private checkRequirements(requirements: RequirementBlock[], label: string): ValidationError[] {
    const errors: ValidationError[] = [];
    const firstLine = new Map<string, number>();

    for (const requirement of requirements) {
      const first = firstLine.get(requirement.id);
      if (first === undefined) {
        firstLine.set(requirement.id, requirement.line);
      } else {
        errors.push({
          message: `Duplicate requirement ID '${requirement.id}' (first seen at line ${first})`,
          file: label,
          line: requirement.line,
          severity: severityOf(this.rules, 'duplicate_requirement'),
          category: 'duplicate_requirement',
          subject: requirement.id,
        });
      }

      if (requirement.title === '') {
        errors.push({
          message: `Requirement '${requirement.id}' has empty title`,
          file: label,
          line: requirement.line,
          severity: 'high',
          category: 'empty_content',
          subject: requirement.id,
        });
        continue;
      }

      const placeholder = PLACEHOLDER.exec(requirement.title);
      if (placeholder) {
        errors.push({
          message: `Requirement '${requirement.id}' contains placeholder text: '${placeholder[1]}'`,
          file: label,
          line: requirement.line,
          severity: 'medium',
          category: 'empty_content',
          subject: requirement.id,
        });
      }
    }

    return errors;
  }

  private async checkLinks(doc: ParsedDocument, label: string): Promise<ValidationError[]> {
    const errors: ValidationError[] = [];
    const base = dirname(doc.path);

    for (const event of documentEvents(doc)) {
      if (event.kind !== 'link') continue;

      const target = localLinkTarget(event.url);
      if (target === null) continue;

      if (!(await fileExists(resolve(base, target)))) {
        errors.push({
          message: `Broken reference to file: ${target}`,
          file: label,
          line: event.line,
          severity: severityOf(this.rules, 'broken_reference'),
          category: 'broken_reference',
          subject: target,
        });
      }
    }

    return errors;
  }
}
