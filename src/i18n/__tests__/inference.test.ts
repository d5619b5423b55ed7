import { describe, expect, it } from 'vitest';
import { testConfig } from '../../test/fixtures.js';
import { inferProcessingLanguage, isPairValidForLanguage } from '../inference.js';

describe('isPairValidForLanguage', () => {
  const config = testConfig();

  it('requires the key in that language', () => {
    expect(isPairValidForLanguage({ key: 'idioma', value: 'es' }, 'es', config)).toBe(true);
    expect(isPairValidForLanguage({ key: 'idioma', value: 'es' }, 'en', config)).toBe(false);
  });

  it('requires style values in that language', () => {
    expect(isPairValidForLanguage({ key: 'estilo', value: 'Pirata' }, 'es', config)).toBe(true);
    expect(isPairValidForLanguage({ key: 'estilo', value: 'pirate' }, 'es', config)).toBe(false);
  });
});

describe('inferProcessingLanguage', () => {
  const config = testConfig();

  it('keeps the current language when every pair validates there', () => {
    expect(inferProcessingLanguage([{ key: 'target', value: 'es' }], 'en', config)).toBe('en');
  });

  it('switches to the single language where every pair validates', () => {
    expect(inferProcessingLanguage([{ key: 'idioma', value: 'es' }], 'en', config)).toBe('es');
  });

  it('breaks ties with the priority list', () => {
    const pairs = [{ key: 'estilo', value: 'pirata' }];
    expect(inferProcessingLanguage(pairs, 'en', config)).toBe('es');
    expect(inferProcessingLanguage(pairs, 'en', { ...config, inferencePriority: ['pt', 'es'] })).toBe('pt');
  });

  it('never infers English', () => {
    const pairs = [{ key: 'target', value: 'fr' }];
    expect(inferProcessingLanguage(pairs, 'pt', config)).toBe('pt');
  });

  it('stays put when no language validates', () => {
    expect(inferProcessingLanguage([{ key: 'bogus', value: 'x' }], 'en', config)).toBe('en');
  });
});
