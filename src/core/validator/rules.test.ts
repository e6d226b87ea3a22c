/**
 * Rule preset tests
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_SEVERITY_MAP, compilePattern, rulesFor, severityOf } from './rules.js';

describe('rulesFor', () => {
  it('should give specs the strict preset', () => {
    const rules = rulesFor('spec');

    expect(rules.requiredHeadings).toEqual(['Overview', 'Acceptance Criteria']);
    expect(rules.minScenarios).toBe(1);
    expect(rules.requireWhenThen).toBe(true);
    expect(rules.requirementPattern).toBe('^R\\d+:');
  });

  it('should give proposals and tasks the lenient preset', () => {
    for (const kind of ['proposal', 'tasks'] as const) {
      const rules = rulesFor(kind);
      expect(rules.requiredHeadings).toEqual([]);
      expect(rules.minScenarios).toBe(0);
      expect(rules.requireWhenThen).toBe(false);
    }
  });

  it('should merge overrides over the preset', () => {
    const rules = rulesFor('spec', {
      requiredHeadings: ['Overview'],
      minScenarios: 2,
      severityMap: { inconsistency: 'medium' },
    });

    expect(rules.requiredHeadings).toEqual(['Overview']);
    expect(rules.minScenarios).toBe(2);
    expect(rules.scenarioPattern).toBe('^Scenario:');
    expect(severityOf(rules, 'inconsistency')).toBe('medium');
    expect(severityOf(rules, 'missing_heading')).toBe('high');
  });

  it('should not share heading lists between calls', () => {
    const first = rulesFor('spec');
    first.requiredHeadings.push('Extra');

    expect(rulesFor('spec').requiredHeadings).toEqual(['Overview', 'Acceptance Criteria']);
  });
});

describe('DEFAULT_SEVERITY_MAP', () => {
  it('should downgrade references and inconsistencies only', () => {
    expect(DEFAULT_SEVERITY_MAP.broken_reference).toBe('medium');
    expect(DEFAULT_SEVERITY_MAP.inconsistency).toBe('low');
    expect(DEFAULT_SEVERITY_MAP.circular_dependency).toBe('high');
  });
});

describe('compilePattern', () => {
  it('should disable the check for an empty pattern', () => {
    expect(compilePattern('', 'requirement heading')).toBeNull();
  });

  it('should skip an invalid pattern', () => {
    expect(compilePattern('(unclosed', 'requirement heading')).toBeNull();
  });

  it('should compile a valid pattern', () => {
    expect(compilePattern('^R\\d+:', 'requirement heading')?.test('R12: Login')).toBe(true);
  });
});
