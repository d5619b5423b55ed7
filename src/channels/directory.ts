import type { DirectoryUser, UserDirectory } from '../core/types.js';
import { HttpRequestError, fetchWithTimeout, isRetryableStatus } from '../ops/http.js';
import { z } from 'zod';

const HELIX_USERS_URL = 'https://api.twitch.tv/helix/users';

const helixUsersSchema = z.object({
  data: z.array(
    z.object({
      id: z.string(),
      login: z.string(),
      display_name: z.string()
    })
  )
});

export interface TwitchDirectoryConfig {
  clientId: string;
  oauthToken: string;
  timeoutMs: number;
}

/** Looks up Twitch accounts by login through the Helix API. */
export class TwitchUserDirectory implements UserDirectory {
  constructor(private readonly config: TwitchDirectoryConfig) {}

  async lookup(login: string): Promise<DirectoryUser | null> {
    const url = `${HELIX_USERS_URL}?login=${encodeURIComponent(login.toLowerCase())}`;
    const response = await fetchWithTimeout(
      url,
      {
        headers: {
          'Client-Id': this.config.clientId,
          Authorization: `Bearer ${this.config.oauthToken.replace(/^oauth:/, '')}`
        }
      },
      this.config.timeoutMs,
      'twitch-helix'
    );

    if (!response.ok) {
      throw new HttpRequestError(`Helix user lookup failed with status ${response.status}`, 'twitch-helix', {
        retryable: isRetryableStatus(response.status)
      });
    }

    const parsed = helixUsersSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new HttpRequestError('Unexpected Helix users payload', 'twitch-helix', { retryable: false, cause: parsed.error });
    }

    const [user] = parsed.data.data;
    return user ? { userId: user.id, displayName: user.display_name } : null;
  }
}
