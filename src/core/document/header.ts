/**
 * Document loading and header block handling
 *
 * A document is a Markdown body optionally preceded by a YAML header fenced by
 * `---` lines. Content is normalised (BOM stripped, LF line endings) before
 * anything else looks at it, so line numbers agree across platforms.
 */

import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import YAML from 'yaml';

// ============================================================================
// TYPES
// ============================================================================

export interface HeaderBlock {
  /** YAML text between the delimiters */
  raw: string;
  /** Parsed value; undefined when the YAML did not parse */
  data: unknown;
  /** Parser message when the YAML did not parse */
  parseError?: string;
}

export interface ParsedDocument {
  path: string;
  /** Normalised full text */
  content: string;
  header: HeaderBlock | null;
  body: string;
  /** 1-based line of the document where the body begins */
  bodyStartLine: number;
}

// ============================================================================
// NORMALISATION
// ============================================================================

export function normalizeContent(text: string): string {
  const withoutBom = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  return withoutBom.replace(/\r\n?/g, '\n');
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// HEADER SPLITTING
// ============================================================================

const OPENING = '---\n';
const CLOSING = /\n---[ \t]*(?:\n|$)/;

function countLines(text: string): number {
  let count = 0;
  for (const ch of text) {
    if (ch === '\n') count++;
  }
  return count;
}

/**
 * Split normalised text into header YAML and body.
 * An opening delimiter without a closing one means there is no header.
 */
export function splitHeader(content: string): {
  rawHeader: string | null;
  body: string;
  bodyStartLine: number;
} {
  if (!content.startsWith(OPENING)) {
    return { rawHeader: null, body: content, bodyStartLine: 1 };
  }

  const rest = content.slice(OPENING.length - 1);
  const match = CLOSING.exec(rest);
  if (!match) {
    return { rawHeader: null, body: content, bodyStartLine: 1 };
  }

  const bodyOffset = OPENING.length - 1 + match.index + match[0].length;
  return {
    rawHeader: rest.slice(1, match.index),
    body: content.slice(bodyOffset),
    bodyStartLine: countLines(content.slice(0, bodyOffset)) + 1,
  };
}

export function parseHeader(raw: string): HeaderBlock {
  try {
    return { raw, data: YAML.parse(raw) };
  } catch (error) {
    return {
      raw,
      data: undefined,
      parseError: error instanceof Error ? error.message : String(error),
    };
  }
}

export function parseDocument(text: string, path: string): ParsedDocument {
  const content = normalizeContent(text);
  const { rawHeader, body, bodyStartLine } = splitHeader(content);

  return {
    path,
    content,
    header: rawHeader === null ? null : parseHeader(rawHeader),
    body,
    bodyStartLine,
  };
}

/**
 * Read and parse a document. Read failures propagate to the caller, which
 * decides how to report them.
 */
export async function loadDocument(path: string): Promise<ParsedDocument> {
  const text = await readFile(path, 'utf-8');
  return parseDocument(text, path);
}

/**
 * Header fields as a record, or null when there is no usable mapping
 */
export function headerFields(doc: ParsedDocument): Record<string, unknown> | null {
  const data = doc.header?.data;
  return isRecord(data) ? data : null;
}

// ============================================================================
// CHECKSUMS
// ============================================================================

/**
 * Content hash insensitive to line-ending style and trailing whitespace
 */
export function computeChecksum(text: string): string {
  const normalized = normalizeContent(text)
    .split('\n')
    .map((line) => line.trimEnd())
    .join('\n')
    .replace(/\n+$/, '');

  return `sha256:${createHash('sha256').update(normalized, 'utf-8').digest('hex')}`;
}
