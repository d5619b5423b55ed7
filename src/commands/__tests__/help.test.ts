import { describe, expect, it } from 'vitest';
import { createHarness } from '../../test/fakes.js';
import { helpCommand } from '../help.js';

describe('helpCommand', () => {
  it('links the guide for the requested language', async () => {
    const harness = createHarness();
    harness.settings.config.helpLinks = { en: 'https://example.com/en', es: 'https://example.com/es' };

    await helpCommand(harness.context({ command: '!translatehelp', rawInput: 'ES' }));

    expect(harness.replies).toEqual(['@alice guide https://example.com/es']);
  });

  it('falls back to the speaking language, then the default link', async () => {
    const harness = createHarness();
    harness.settings.config.helpLinks = { en: 'https://example.com/en', default: 'https://example.com/any' };
    await helpCommand(harness.context({ command: '!translatehelp', rawInput: 'pt' }));

    const other = createHarness();
    other.settings.config.helpLinks = { default: 'https://example.com/any' };
    await helpCommand(other.context({ command: '!translatehelp' }));

    expect(harness.replies).toEqual(['@alice guide https://example.com/en']);
    expect(other.replies).toEqual(['@alice guide https://example.com/any']);
  });

  it('replies when no link is configured', async () => {
    const harness = createHarness();
    harness.settings.config.helpLinks = {};
    await helpCommand(harness.context({ command: '!translatehelp' }));
    expect(harness.replies).toEqual(['@alice no guide']);
  });
});
