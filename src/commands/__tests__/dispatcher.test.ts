import { describe, expect, it, vi } from 'vitest';
import type { IncomingChatMessage } from '../../channels/types.js';
import { RecordingSurface, createHarness } from '../../test/fakes.js';
import { CommandDispatcher, parseCommandLine } from '../dispatcher.js';

const message = (text: string, overrides: Partial<IncomingChatMessage> = {}): IncomingChatMessage => ({
  platform: 'twitch',
  userId: 'u1',
  username: 'alice',
  role: 'viewer',
  text,
  ...overrides
});

const setup = (answers: string[] = []) => {
  const harness = createHarness({ answers });
  const dispatcher = new CommandDispatcher(harness.deps, { chunkDelayMs: 0, wait: vi.fn(async () => {}) });
  return { harness, dispatcher, surface: new RecordingSurface() };
};

describe('parseCommandLine', () => {
  it('lowercases the command and trims the rest', () => {
    expect(parseCommandLine('  !TR   hello there ')).toEqual({ command: '!tr', rawInput: 'hello there' });
    expect(parseCommandLine('!tr!')).toEqual({ command: '!tr!', rawInput: '' });
  });

  it('ignores plain chat', () => {
    expect(parseCommandLine('hello !tr')).toBeNull();
  });
});

describe('CommandDispatcher', () => {
  it('routes translation commands and replies on the same surface', async () => {
    const { dispatcher, surface } = setup(['en', 'Hola']);

    await dispatcher.handle(message('!tr hello'), surface);

    expect(surface.sent).toEqual(['@alice (Spanish): "Hola"']);
  });

  it('remembers the last plain chatter per platform', async () => {
    const { dispatcher, surface } = setup();

    await dispatcher.handle(message('hi all', { userId: 'u7', username: 'bob' }), surface);
    await dispatcher.handle(message('!unknown command', { userId: 'u8', username: 'carl' }), surface);
    await dispatcher.handle(message('hey', { platform: 'youtube', userId: 'y1', username: 'yan' }), surface);

    expect(dispatcher.lastChatter('twitch')).toEqual({ userId: 'u8', username: 'carl' });
    expect(dispatcher.lastChatter('youtube')).toEqual({ userId: 'y1', username: 'yan' });
    expect(surface.sent).toEqual([]);
  });

  it('ignores moderator commands from viewers', async () => {
    const { harness, dispatcher, surface } = setup();

    await dispatcher.handle(message('!blockword spoiler'), surface);

    expect(surface.sent).toEqual([]);
    expect(harness.settings.savedConfigs).toHaveLength(0);
  });

  it('runs moderator commands for moderators and broadcasters', async () => {
    const { harness, dispatcher, surface } = setup();

    await dispatcher.handle(message('!blockword spoiler', { userId: 'm1', username: 'mod', role: 'moderator' }), surface);
    await dispatcher.handle(message('!blockword ending', { userId: 'b1', username: 'host', role: 'broadcaster' }), surface);

    expect(surface.sent).toEqual(["@mod added 'spoiler'", "@host added 'ending'"]);
    expect(harness.settings.config.wordBlocklist).toEqual(['spoiler', 'ending']);
  });

  it('blocks the last plain chatter', async () => {
    const { harness, dispatcher, surface } = setup();

    await dispatcher.handle(message('spam spam', { userId: 'u9', username: 'troll' }), surface);
    await dispatcher.handle(message('!translateblock', { userId: 'm1', username: 'mod', role: 'moderator' }), surface);

    expect(harness.settings.config.userBlocklist).toEqual({ u9: 'troll' });
  });

  it('contains handler failures', async () => {
    const { harness, dispatcher, surface } = setup();
    harness.profiles.getOrUpdate = async () => {
      throw new Error('database down');
    };

    await expect(dispatcher.handle(message('!sl'), surface)).resolves.toBeUndefined();
    expect(surface.sent).toEqual([]);
  });
});
