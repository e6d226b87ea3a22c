/**
 * Markdown event stream tests
 */

import { describe, it, expect } from 'vitest';
import { documentEvents, markdownEvents } from './markdown.js';
import { parseDocument } from './header.js';

describe('markdownEvents', () => {
  it('should emit headings and list boundaries in document order', () => {
    const events = markdownEvents('# Title\n\n## Requirements\n\n- **WHEN** a\n- THEN b\n');

    expect(events).toEqual([
      { kind: 'heading', depth: 1, text: 'Title', line: 1 },
      { kind: 'heading', depth: 2, text: 'Requirements', line: 3 },
      { kind: 'listStart', ordered: false, line: 5 },
      { kind: 'listItem', text: 'WHEN a', checked: null, listDepth: 1, line: 5 },
      { kind: 'text', text: 'WHEN', line: 5 },
      { kind: 'text', text: ' a', line: 5 },
      { kind: 'listItem', text: 'THEN b', checked: null, listDepth: 1, line: 6 },
      { kind: 'text', text: 'THEN b', line: 6 },
      { kind: 'listEnd', line: 6 },
    ]);
  });

  it('should report task list checkboxes and nesting depth', () => {
    const events = markdownEvents('- [x] 1.1 Done\n  - File: a.ts\n- [ ] 1.2 Open\n');
    const items = events.filter((event) => event.kind === 'listItem');

    expect(items).toEqual([
      { kind: 'listItem', text: '1.1 Done', checked: true, listDepth: 1, line: 1 },
      { kind: 'listItem', text: 'File: a.ts', checked: null, listDepth: 2, line: 2 },
      { kind: 'listItem', text: '1.2 Open', checked: false, listDepth: 1, line: 3 },
    ]);
  });

  it('should not treat fenced code as headings', () => {
    const events = markdownEvents('```yaml\n# not a heading\n```\n');

    expect(events).toEqual([{ kind: 'code', lang: 'yaml', value: '# not a heading', line: 1 }]);
  });

  it('should emit link targets', () => {
    const events = markdownEvents('See [auth](./auth.md#r1).\n');

    expect(events.filter((event) => event.kind === 'link')).toEqual([
      { kind: 'link', url: './auth.md#r1', line: 1 },
    ]);
  });
});

describe('documentEvents', () => {
  it('should offset line numbers past the header block', () => {
    const doc = parseDocument('---\nid: a\n---\n## Overview\n', 'a.md');

    expect(documentEvents(doc)).toEqual([{ kind: 'heading', depth: 2, text: 'Overview', line: 4 }]);
  });
});
