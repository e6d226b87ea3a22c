/**
 * Markdown event stream
 *
 * Flattens the mdast tree produced by remark into the document-order events the
 * validators walk: headings, list boundaries, list items, inline text, fenced
 * code and links. Line numbers are shifted so they point into the full
 * document, header included.
 */

import { unified } from 'unified';
import remarkParse from 'remark-parse';
import remarkGfm from 'remark-gfm';
import type { Nodes, Root } from 'mdast';
import type { ParsedDocument } from './header.js';

// ============================================================================
// TYPES
// ============================================================================

export type MarkdownEvent =
  | { kind: 'heading'; depth: number; text: string; line: number }
  | { kind: 'listStart'; ordered: boolean; line: number }
  | { kind: 'listEnd'; line: number }
  | { kind: 'listItem'; text: string; checked: boolean | null; listDepth: number; line: number }
  | { kind: 'text'; text: string; line: number }
  | { kind: 'code'; lang: string | null; value: string; line: number }
  | { kind: 'link'; url: string; line: number };

// ============================================================================
// PARSING
// ============================================================================

const processor = unified().use(remarkParse).use(remarkGfm);

export function parseMarkdown(body: string): Root {
  return processor.parse(body);
}

/**
 * Plain text of a node, concatenating its descendants' values
 */
export function textOf(node: Nodes): string {
  if ('value' in node && typeof node.value === 'string') {
    return node.value;
  }
  if ('children' in node) {
    let text = '';
    for (const child of node.children) {
      text += textOf(child);
    }
    return text;
  }
  return '';
}

function lineOf(node: Nodes, offset: number): number {
  return (node.position?.start.line ?? 1) + offset;
}

function endLineOf(node: Nodes, offset: number): number {
  return (node.position?.end.line ?? 1) + offset;
}

/**
 * Walk a Markdown body into a flat event list
 *
 * @param lineOffset - added to every line number (body start line minus one)
 */
export function markdownEvents(body: string, lineOffset = 0): MarkdownEvent[] {
  const events: MarkdownEvent[] = [];
  let listDepth = 0;

  const visit = (node: Nodes): void => {
    switch (node.type) {
      case 'heading':
        events.push({
          kind: 'heading',
          depth: node.depth,
          text: textOf(node).trim(),
          line: lineOf(node, lineOffset),
        });
        return;

      case 'list':
        events.push({ kind: 'listStart', ordered: node.ordered ?? false, line: lineOf(node, lineOffset) });
        listDepth++;
        for (const child of node.children) visit(child);
        listDepth--;
        events.push({ kind: 'listEnd', line: endLineOf(node, lineOffset) });
        return;

      case 'listItem': {
        const lead = node.children.find((child) => child.type === 'paragraph');
        events.push({
          kind: 'listItem',
          text: lead ? textOf(lead).trim() : '',
          checked: node.checked ?? null,
          listDepth,
          line: lineOf(node, lineOffset),
        });
        for (const child of node.children) visit(child);
        return;
      }

      case 'code':
        events.push({
          kind: 'code',
          lang: node.lang ?? null,
          value: node.value,
          line: lineOf(node, lineOffset),
        });
        return;

      case 'link':
        events.push({ kind: 'link', url: node.url, line: lineOf(node, lineOffset) });
        for (const child of node.children) visit(child);
        return;

      case 'text':
      case 'inlineCode':
        events.push({ kind: 'text', text: node.value, line: lineOf(node, lineOffset) });
        return;

      default:
        if ('children' in node) {
          for (const child of node.children) visit(child);
        }
    }
  };

  visit(parseMarkdown(body));
  return events;
}

/**
 * Events for the body of a parsed document, with document line numbers
 */
export function documentEvents(doc: ParsedDocument): MarkdownEvent[] {
  return markdownEvents(doc.body, doc.bodyStartLine - 1);
}
