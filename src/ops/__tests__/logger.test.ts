import pino from 'pino';
import { describe, expect, it } from 'vitest';
import { loggerOptions } from '../logger.js';

const capture = () => {
  const lines: string[] = [];
  const log = pino({ ...loggerOptions, level: 'info' }, { write: (line: string) => lines.push(line) });
  return { log, lines };
};

describe('logger', () => {
  it('serializes errors logged under the error key', () => {
    const { log, lines } = capture();

    log.error({ error: new Error('boom'), input: 'hi' }, '[Translate] request failed');

    expect(lines).toHaveLength(1);
    const record: unknown = JSON.parse(lines[0]);
    expect(record).toMatchObject({
      msg: '[Translate] request failed',
      input: 'hi',
      error: { type: 'Error', message: 'boom', stack: expect.stringContaining('Error: boom') }
    });
  });
});
