import { describe, expect, it } from 'vitest';
import { findMissingTemplateKeys, formatReport } from '../audit.js';

describe('findMissingTemplateKeys', () => {
  const templates = {
    en: { b: 'B', a: 'A', c: 'C' },
    es: { a: 'x', b: '  ' },
    pt: { a: 'y', b: 'z', c: 'w' }
  };

  it('lists keys that are missing or blank, sorted', () => {
    expect(findMissingTemplateKeys(templates)).toEqual({ es: ['b', 'c'] });
  });

  it('compares against another reference language', () => {
    expect(findMissingTemplateKeys(templates, 'es')).toEqual({});
    expect(findMissingTemplateKeys(templates, 'xx')).toEqual({});
  });
});

describe('formatReport', () => {
  it('prints one block per language', () => {
    expect(formatReport({ es: ['b', 'c'], de: ['a'] })).toBe('de: 1 missing\n  a\nes: 2 missing\n  b\n  c');
  });

  it('says when nothing is missing', () => {
    expect(formatReport({})).toBe('All languages define every "en" template key.');
  });
});
