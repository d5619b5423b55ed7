import { describe, expect, it } from 'vitest';
import type { MessageProfile } from '../../core/types.js';
import { testConfig, testTemplates } from '../../test/fixtures.js';
import { MessageCatalog, aprilFoolsKey } from '../catalog.js';

const profile = (speakingLanguage: string, speakingStyle = 'normal', pronouns: string | null = null): MessageProfile => ({
  speakingLanguage,
  speakingStyle,
  pronouns
});

describe('MessageCatalog', () => {
  const catalog = new MessageCatalog(
    {
      en: {
        greet: 'en bare',
        greet_normal: 'en normal',
        farewell_normal: 'en farewell',
        gendered: '{0} {gender, select, male {M} female {F} other {O}}'
      },
      es: { greet_normal: 'es normal', farewell: 'es bare' }
    },
    testConfig()
  );

  it('prefers the style variant, then _normal, then the bare key', () => {
    expect(catalog.resolveTemplate(profile('es', 'pirate'), 'greet')).toBe('es normal');
    expect(catalog.resolveTemplate(profile('en', 'pirate'), 'greet')).toBe('en normal');
  });

  it('searches the speaking language before English', () => {
    expect(catalog.resolveTemplate(profile('es'), 'farewell')).toBe('es bare');
    expect(catalog.resolveTemplate(profile('pt'), 'farewell')).toBe('en farewell');
  });

  it('renders a placeholder text for missing keys', () => {
    expect(catalog.format(profile('en'), 'nope')).toBe('nope (Message template not found)');
  });

  it('renders gender selects from the reader pronouns', () => {
    expect(catalog.format(profile('en', 'normal', 'she/her'), 'gendered', { mention: '@x' })).toBe('@x F');
    expect(catalog.format(profile('en', 'normal', 'he'), 'gendered', { mention: '@x' })).toBe('@x M');
    expect(catalog.format(profile('en'), 'gendered', { mention: '@x' })).toBe('@x O');
  });

  it('trims output when no mention is given', () => {
    expect(catalog.format(profile('en'), 'gendered')).toBe('O');
  });
});

describe('MessageCatalog quotes and names', () => {
  const config = { ...testConfig(), lowercaseLanguageNames: ['es'] };
  const catalog = new MessageCatalog(testTemplates(), config);

  it('uses the language quote marks or the fallback pair', () => {
    expect(catalog.quote(profile('en'), 'hi')).toBe('"hi"');
    expect(catalog.quote(profile('es'), 'hi')).toBe('«hi»');
    expect(catalog.quote(profile('en'), 'hi', ["'", "'"])).toBe("'hi'");
  });

  it('localizes language names', () => {
    expect(catalog.friendlyName(profile('en'), 'es')).toBe('Spanish');
    expect(catalog.friendlyName(profile('es'), 'en')).toBe('inglés');
    expect(catalog.friendlyName(profile('es'), 'fr')).toBe('french');
    expect(catalog.friendlyName(profile('en'), 'xx')).toBe('xx');
  });

  it('maps April 1st keys', () => {
    expect(aprilFoolsKey('apiError')).toBe('aprilFoolsApiError');
    expect(aprilFoolsKey('dailyLimit')).toBe('aprilFoolsApiError');
    expect(aprilFoolsKey('setLangCheck')).toBe('setLangCheck');
  });
});
