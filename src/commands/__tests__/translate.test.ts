import { describe, expect, it } from 'vitest';
import { createDefaultProfile } from '../../core/profiles.js';
import { createHarness } from '../../test/fakes.js';
import { testConfig, testTemplates } from '../../test/fixtures.js';
import { windowKeys } from '../../quota/windows.js';
import { RequestScope, SETTINGS_UNAVAILABLE_REPLY } from '../context.js';
import { segmentCommand } from '../segmenter.js';
import { chooseTier, resolveTargetLanguage, runTranslation, streamerProfile } from '../translate.js';

const translate = (harness: ReturnType<typeof createHarness>, rawInput: string, command = '!tr') =>
  runTranslation(harness.context({ rawInput, command }));

describe('runTranslation', () => {
  it('detects, translates and replies with a localized header', async () => {
    const harness = createHarness({ answers: ['en', 'Hola mundo'] });

    const outcome = await translate(harness, 'hello world');

    expect(outcome).toEqual({
      status: 'translated',
      reply: '@alice (Spanish): "Hola mundo"',
      detectedLanguage: 'en',
      targetLanguage: 'es',
      tier: 'fast'
    });
    expect(harness.replies).toEqual(['@alice (Spanish): "Hola mundo"']);
    expect(harness.completion.calls.map((call) => call.tier)).toEqual(['fast', 'fast']);
    expect(harness.completion.calls[1].prompt.endsWith('Text: hello world')).toBe(true);
  });

  it('commits one fast request for detection and one per segment', async () => {
    const harness = createHarness({ answers: ['en', 'Hola'] });
    await translate(harness, 'hello');

    const keys = windowKeys('fast', new Date('2024-06-10T12:00:00Z'), 'UTC');
    expect(await harness.counters.read([keys.day, keys.minute])).toEqual([2, 2]);
  });

  it('translates every segment with the strong tier when a tone is requested', async () => {
    const harness = createHarness({ answers: ['en', 'Buenos días', 'Nos vemos'] });

    const outcome = await translate(harness, 'good morning &joking& see you');

    expect(outcome.reply).toBe('@alice (Spanish): "Buenos días Nos vemos"');
    expect(harness.completion.calls.map((call) => call.tier)).toEqual(['fast', 'strong', 'strong']);
    expect(harness.completion.calls[1].prompt).toContain("'joking' style");
  });

  it('removes placeholders the backend left in the answer', async () => {
    const harness = createHarness({ answers: ['en', 'Hola [P1] amigo'] });
    const outcome = await translate(harness, 'hi %she% friend');
    expect(outcome.reply).toBe('@alice (Spanish): "Hola amigo"');
    expect(outcome.tier).toBe('strong');
  });

  it('restores escaped percent signs in the reply', async () => {
    const harness = createHarness({ answers: ['en', 'ahorra 50__ESCAPED_PERCENT__ ya'] });
    const outcome = await translate(harness, 'save 50\\% now');
    expect(outcome.reply).toBe('@alice (Spanish): "ahorra 50% ya"');
  });

  it('reports text already in the target language', async () => {
    const harness = createHarness({ answers: ['es'] });

    const outcome = await translate(harness, 'es hola amigos');

    expect(outcome.status).toBe('already-translated');
    expect(harness.replies).toEqual(['@alice already Spanish']);
    expect(harness.completion.calls).toHaveLength(1);
  });

  it('replies with the unknown-language template for gibberish', async () => {
    const harness = createHarness({ answers: ['und', 'UNDEF'] });

    const outcome = await translate(harness, 'asdfgh qwerty');

    expect(outcome.status).toBe('unrecognized');
    expect(outcome.targetLanguage).toBe('en');
    expect(harness.replies).toEqual(['@alice unknown']);
    expect(harness.completion.calls[1].tier).toBe('strong');
  });

  it('treats a lowercase unknown marker from the backend the same way', async () => {
    const harness = createHarness({ answers: ['und', 'undef'] });

    const outcome = await translate(harness, 'asdfgh qwerty');

    expect(outcome.status).toBe('unrecognized');
    expect(harness.replies).toEqual(['@alice unknown']);
  });

  it('replies with help when there is no text', async () => {
    const harness = createHarness();
    const outcome = await translate(harness, '');
    expect(outcome.status).toBe('help');
    expect(harness.replies).toEqual(['@alice help https://example.com/help']);
    expect(harness.completion.calls).toHaveLength(0);
  });

  it('echoes input made only of tags', async () => {
    const harness = createHarness();
    const outcome = await translate(harness, '&joking&');
    expect(outcome.status).toBe('echo');
    expect(harness.replies).toEqual(['&joking&']);
  });

  it('refuses blocked users and blocked words', async () => {
    const blockedUser = createHarness();
    blockedUser.settings.config.userBlocklist = { u1: 'alice' };
    expect((await translate(blockedUser, 'hello')).status).toBe('user-blocked');
    expect(blockedUser.replies).toEqual(['@alice blocked user']);

    const blockedWord = createHarness();
    blockedWord.settings.config.wordBlocklist = ['Spoiler'];
    expect((await translate(blockedWord, 'big SPOILER here')).status).toBe('word-blocked');
    expect(blockedWord.replies).toEqual(['@alice blocked word']);
    expect(blockedWord.completion.calls).toHaveLength(0);
  });

  it('uses the fixed reply when settings cannot be loaded', async () => {
    const harness = createHarness();
    harness.settings.failLoads = true;

    const outcome = await translate(harness, 'hello');

    expect(outcome.status).toBe('settings-unavailable');
    expect(harness.replies).toEqual([SETTINGS_UNAVAILABLE_REPLY]);
  });

  it('replies with the api error template when the backend returns nothing', async () => {
    const detectionFails = createHarness();
    expect((await translate(detectionFails, 'hello')).status).toBe('api-error');
    expect(detectionFails.replies).toEqual(['@alice api error']);

    const translationFails = createHarness({ answers: ['en'] });
    expect((await translate(translationFails, 'hello')).status).toBe('api-error');
    expect(translationFails.completion.calls).toHaveLength(2);
  });

  it('replies with the api error template when the backend throws', async () => {
    const harness = createHarness();
    harness.deps.completion = {
      complete: async () => {
        throw new Error('connection reset');
      }
    };

    expect((await translate(harness, 'hello')).status).toBe('api-error');
    expect(harness.replies).toEqual(['@alice api error']);
  });

  it('rejects a target missing from the language map', async () => {
    const harness = createHarness({ answers: ['en'] });
    await harness.profiles.save({ ...createDefaultProfile(testConfig(), 'u1', 'alice'), targetLanguage: 'xx' });

    const outcome = await translate(harness, 'hello');

    expect(outcome.status).toBe('api-error');
    expect(outcome.targetLanguage).toBe('xx');
    expect(harness.completion.calls).toHaveLength(1);
  });

  it('replies with the rate limit template once the minute window is full', async () => {
    const harness = createHarness({ answers: ['en', 'never used'] });
    harness.settings.config.apiLimits.fast.requestsPerMinute = 1;

    const outcome = await translate(harness, 'hello');

    expect(outcome.status).toBe('quota-exceeded');
    expect(harness.replies).toEqual(['@alice slow down']);
    expect(harness.completion.calls).toHaveLength(1);
  });

  it('stays silent when the fast tier has no room at all', async () => {
    const harness = createHarness();
    harness.settings.config.apiLimits.fast.requestsPerMinute = 0;

    expect((await translate(harness, 'hello')).status).toBe('throttled');
    expect(harness.replies).toEqual([]);
  });

  it('uses April 1st templates where they exist', async () => {
    const harness = createHarness({ now: new Date('2024-04-01T12:00:00Z') });
    await translate(harness, 'hello');
    expect(harness.replies).toEqual(['@alice gnomes']);
  });
});

describe('chooseTier', () => {
  const config = testConfig();
  const viewer = createDefaultProfile(config, 'u1', 'alice');

  it('uses the fast tier for plain text in a known language', () => {
    expect(chooseTier(segmentCommand('hello', '!tr', viewer, config), 'en')).toBe('fast');
  });

  it('uses the strong tier for undetermined or stylized input', () => {
    expect(chooseTier(segmentCommand('hello', '!tr', viewer, config), 'und')).toBe('strong');
    expect(chooseTier(segmentCommand('es-pirate hello', '!tr', viewer, config), 'en')).toBe('strong');
    expect(chooseTier(segmentCommand('hello', '!tr', { ...viewer, pronouns: 'he' }, config), 'en')).toBe('strong');
  });

  it('lets an explicit model tag win', () => {
    expect(chooseTier(segmentCommand('hello &flash&', '!tr', viewer, config), 'und')).toBe('fast');
    expect(chooseTier(segmentCommand('hello &flash&', '!tr!', viewer, config), 'en')).toBe('strong');
  });
});

describe('resolveTargetLanguage', () => {
  const config = testConfig();
  const viewer = createDefaultProfile(config, 'u1', 'alice');
  const plain = segmentCommand('hello', '!tr', viewer, config);

  it('prefers the command prefix', () => {
    expect(resolveTargetLanguage(segmentCommand('pt hello', '!tr', viewer, config), viewer, 'en', config)).toBe('pt');
  });

  it('sends text in the preferred language back to the speaking language', () => {
    const profile = { ...viewer, targetLanguage: 'fr', speakingLanguage: 'es' };
    expect(resolveTargetLanguage(plain, profile, 'en', config)).toBe('fr');
    expect(resolveTargetLanguage(plain, profile, 'fr', config)).toBe('es');
  });

  it('falls back to the channel defaults', () => {
    expect(resolveTargetLanguage(plain, viewer, 'en', config)).toBe('es');
    expect(resolveTargetLanguage(plain, viewer, 'de', config)).toBe('en');
  });
});

describe('streamerProfile', () => {
  it('renders the header in the persona language', () => {
    const config = testConfig();
    const caller = { ...createDefaultProfile(config, 'u1', 'alice'), speakingLanguage: 'es' };
    const scope = new RequestScope(config, testTemplates(), false);

    const header = streamerProfile(config, caller);

    expect(header).toEqual({ speakingLanguage: 'en', speakingStyle: 'normal', pronouns: null });
    expect(scope.message(header, 'translationHeader', { mention: '@alice', values: ['Spanish'] })).toBe('@alice (Spanish):');
  });
});
