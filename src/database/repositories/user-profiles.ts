import type { ProfileStore, UserProfile } from '../../core/types.js';
import { db } from '../connection.js';

interface UserProfileRow {
  user_id: string;
  username: string;
  target_language: string;
  speaking_language: string;
  speaking_style: string;
  pronouns: string | null;
}

const toUserProfile = (row: UserProfileRow): UserProfile => ({
  userId: row.user_id,
  username: row.username,
  targetLanguage: row.target_language,
  speakingLanguage: row.speaking_language,
  speakingStyle: row.speaking_style,
  pronouns: row.pronouns
});

export class UserProfilesRepository implements ProfileStore {
  async get(userId: string): Promise<UserProfile | null> {
    const result = await db.query<UserProfileRow>(
      'SELECT * FROM user_profiles WHERE user_id = $1 LIMIT 1',
      [userId]
    );

    const row = result.rows[0];
    return row ? toUserProfile(row) : null;
  }

  async getOrUpdate(userId: string, username: string, defaults: () => UserProfile): Promise<UserProfile> {
    const existing = await this.get(userId);

    if (!existing) {
      const profile = { ...defaults(), userId, username };
      await this.save(profile);
      return profile;
    }

    if (existing.username !== username) {
      await db.query(
        'UPDATE user_profiles SET username = $2, updated_at = NOW() WHERE user_id = $1',
        [userId, username]
      );
      return { ...existing, username };
    }

    return existing;
  }

  async save(profile: UserProfile): Promise<void> {
    await db.query(
      `INSERT INTO user_profiles (user_id, username, target_language, speaking_language, speaking_style, pronouns)
       VALUES ($1, $2, $3, $4, $5, $6)
       ON CONFLICT (user_id) DO UPDATE SET
         username = EXCLUDED.username,
         target_language = EXCLUDED.target_language,
         speaking_language = EXCLUDED.speaking_language,
         speaking_style = EXCLUDED.speaking_style,
         pronouns = EXCLUDED.pronouns,
         updated_at = NOW()`,
      [
        profile.userId,
        profile.username,
        profile.targetLanguage,
        profile.speakingLanguage,
        profile.speakingStyle,
        profile.pronouns
      ]
    );
  }

  async findIdByUsername(username: string): Promise<string | null> {
    const result = await db.query<{ user_id: string }>(
      'SELECT user_id FROM user_profiles WHERE LOWER(username) = LOWER($1) ORDER BY updated_at DESC LIMIT 1',
      [username]
    );

    return result.rows[0]?.user_id ?? null;
  }
}
