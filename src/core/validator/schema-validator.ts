/**
 * Schema validator
 *
 * Validates a document's YAML header against `<type>.schema.json`, where the
 * type is declared in the header or inferred from the filename. Compiled
 * schemas are cached per validator instance.
 */

import { Ajv, type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';
import addFormatsModule from 'ajv-formats';
import { readFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { DocumentType, Severity, ValidationError } from '../../types/index.js';
import { isRecord, loadDocument, parseHeader, type ParsedDocument } from '../document/header.js';
import { logger } from '../../utils/logger.js';
import { unreadableFileError } from './format-validator.js';

const addFormats = addFormatsModule.default;

export const DOCUMENT_TYPES: readonly DocumentType[] = ['proposal', 'tasks', 'spec', 'challenge', 'state'];

const FILENAME_TYPES: Record<string, DocumentType> = {
  'proposal.md': 'proposal',
  'tasks.md': 'tasks',
  'challenge.md': 'challenge',
  'state.yaml': 'state',
  'state.yml': 'state',
};

// ============================================================================
// TYPE DETECTION
// ============================================================================

/**
 * Document type from the header's `type` field, falling back to the filename
 */
export function detectDocumentType(header: unknown, fileName: string): DocumentType | null {
  if (isRecord(header) && typeof header.type === 'string') {
    const declared = header.type.trim().toLowerCase();
    const match = DOCUMENT_TYPES.find((type) => type === declared);
    if (match) return match;
  }

  const name = fileName.toLowerCase();
  const byName = FILENAME_TYPES[name];
  if (byName) return byName;
  return name.endsWith('.md') ? 'spec' : null;
}

/**
 * Keyword-based severity: structural violations block, the rest warn
 */
export function severityForKeyword(keyword: string): Severity {
  return /required|type|enum/.test(keyword) ? 'high' : 'medium';
}

function isSchema(value: unknown): value is SchemaObject | boolean {
  return typeof value === 'boolean' || isRecord(value);
}

function describeViolation(error: ErrorObject): string {
  const where = error.instancePath === '' ? 'header' : `header${error.instancePath}`;
  return `Schema violation at ${where}: ${error.message ?? error.keyword}`;
}

// ============================================================================
// VALIDATOR
// ============================================================================

export class SchemaValidator {
  private readonly ajv: Ajv;
  private readonly compiled = new Map<DocumentType, ValidateFunction>();

  constructor(private readonly schemasDir: string) {
    this.ajv = new Ajv({ allErrors: true, strict: false });
    addFormats(this.ajv);
  }

  /** Number of schemas compiled so far by this instance */
  get cacheSize(): number {
    return this.compiled.size;
  }

  async validate(path: string, label = path): Promise<ValidationError[]> {
    let doc: ParsedDocument;
    try {
      doc = await loadDocument(path);
    } catch (error) {
      return [unreadableFileError(label, error)];
    }

    // A YAML file is all header
    if (/\.ya?ml$/i.test(path)) {
      doc = { ...doc, header: parseHeader(doc.content), body: '' };
    }
    return this.validateDocument(doc, label);
  }

  async validateDocument(doc: ParsedDocument, label = doc.path): Promise<ValidationError[]> {
    if (!doc.header) return [];

    if (doc.header.parseError !== undefined) {
      return [
        {
          message: `Invalid YAML header: ${doc.header.parseError}`,
          file: label,
          line: 1,
          severity: 'high',
          category: 'invalid_structure',
        },
      ];
    }

    const type = detectDocumentType(doc.header.data, basename(doc.path));
    if (!type) {
      return [
        {
          message: `Cannot determine document type for ${basename(doc.path)}`,
          file: label,
          severity: 'medium',
          category: 'invalid_structure',
        },
      ];
    }

    let validate: ValidateFunction;
    try {
      validate = await this.schemaFor(type);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return [
        {
          message: `Failed to load schema for '${type}': ${reason}`,
          file: label,
          severity: 'high',
          category: 'invalid_structure',
          subject: type,
        },
      ];
    }

    if (validate(doc.header.data ?? {})) return [];

    return (validate.errors ?? []).map((error): ValidationError => ({
      message: describeViolation(error),
      file: label,
      line: 1,
      severity: severityForKeyword(error.keyword),
      category: 'invalid_structure',
      subject: error.instancePath || undefined,
    }));
  }

  /**
   * Compile `<type>.schema.json` on first use
   */
  private async schemaFor(type: DocumentType): Promise<ValidateFunction> {
    const cached = this.compiled.get(type);
    if (cached) return cached;

    const schemaPath = join(this.schemasDir, `${type}.schema.json`);
    logger.debug(`Compiling schema ${schemaPath}`);

    const schema: unknown = JSON.parse(await readFile(schemaPath, 'utf-8'));
    if (!isSchema(schema)) {
      throw new Error(`${schemaPath} is not a JSON Schema object`);
    }

    const validate = this.ajv.compile(schema);
    this.compiled.set(type, validate);
    return validate;
  }
}
