import type { ChatSurface } from '../channels/types.js';
import { RateLimiter, sleep, type Sleeper } from '../ops/rate-limiter.js';

/** Room kept at the end of each chunk for the "(i/n) " counter. */
export const CHUNK_COUNTER_RESERVE = 7;

/**
 * Splits a message that is longer than `limit` at the last whitespace that
 * keeps each chunk within `limit - 7`, hard-cutting words with no space.
 */
export const splitIntoChunks = (message: string, limit: number): string[] => {
  if (message.length <= limit) return [message];

  const maxChunk = Math.max(1, limit - CHUNK_COUNTER_RESERVE);
  const chunks: string[] = [];
  let remaining = message;

  while (remaining.length > 0) {
    if (remaining.length <= maxChunk) {
      chunks.push(remaining);
      break;
    }

    let splitAt = remaining.lastIndexOf(' ', maxChunk);
    if (splitAt <= 0) splitAt = maxChunk;

    chunks.push(remaining.slice(0, splitAt));
    remaining = remaining.slice(splitAt).trim();
  }

  return chunks;
};

/** Delivers replies to one surface, pacing chunked messages. */
export class ReplySender {
  private readonly limiter: RateLimiter;

  constructor(
    private readonly surface: ChatSurface,
    private readonly chunkDelayMs: number,
    private readonly wait: Sleeper = sleep
  ) {
    this.limiter = new RateLimiter(chunkDelayMs, wait);
  }

  async send(message: string): Promise<void> {
    if (!message) return;

    const chunks = splitIntoChunks(message, this.surface.maxMessageLength);
    if (chunks.length === 1) {
      await this.surface.send(chunks[0]);
      return;
    }

    // One limiter slot per message keeps the chunks of concurrent replies apart.
    await this.limiter.run(async () => {
      for (const [index, chunk] of chunks.entries()) {
        if (index > 0) await this.wait(this.chunkDelayMs);
        await this.surface.send(`(${index + 1}/${chunks.length}) ${chunk}`);
      }
    });
  }
}
