import { describe, expect, it } from 'vitest';
import { testConfig } from '../../test/fixtures.js';
import { permissions } from '../permissions.js';
import { createDefaultProfile, hasCustomSettings } from '../profiles.js';

const withPersona = (defaultBotPersona: string) => {
  const config = testConfig();
  config.defaultSettings.defaultBotPersona = defaultBotPersona;
  return createDefaultProfile(config, 'u1', 'alice');
};

describe('createDefaultProfile', () => {
  it('reads language and style from the persona', () => {
    expect(withPersona('es-pirata')).toEqual({
      userId: 'u1',
      username: 'alice',
      targetLanguage: 'default',
      speakingLanguage: 'es',
      speakingStyle: 'pirate',
      pronouns: null
    });
  });

  it('searches every style table for the persona style', () => {
    expect(withPersona('fr-pirata')).toMatchObject({ speakingLanguage: 'fr', speakingStyle: 'pirate' });
  });

  it('keeps built-in defaults for unknown parts', () => {
    expect(withPersona('xx-ninja')).toMatchObject({ speakingLanguage: 'en', speakingStyle: 'normal' });
    expect(withPersona('')).toMatchObject({ speakingLanguage: 'en', speakingStyle: 'normal' });
  });
});

describe('hasCustomSettings', () => {
  const defaults = withPersona('en-normal');

  it('detects any difference from the defaults', () => {
    expect(hasCustomSettings(defaults, defaults)).toBe(false);
    expect(hasCustomSettings({ ...defaults, pronouns: 'she/her' }, defaults)).toBe(true);
    expect(hasCustomSettings({ ...defaults, speakingStyle: 'pirate' }, defaults)).toBe(true);
  });
});

describe('permissions', () => {
  it('restricts moderation commands', () => {
    expect(permissions.canUseCommand('viewer', '!sul').allowed).toBe(false);
    expect(permissions.canUseCommand('moderator', '!SUL').allowed).toBe(true);
    expect(permissions.canUseCommand('broadcaster', '!translateblock').allowed).toBe(true);
    expect(permissions.canUseCommand('viewer', '!tr!').allowed).toBe(true);
  });
});
