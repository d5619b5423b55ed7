import dotenv from 'dotenv';

dotenv.config();

interface EnvConfig {
  // Storage
  DATABASE_URL: string;

  // Completion backend
  AI_PROVIDER_FAST: string;
  AI_PROVIDER_STRONG: string;
  AI_TIMEOUT_MS: string;
  AI_RETRY_ATTEMPTS: string;
  ANTHROPIC_API_KEY?: string;
  ANTHROPIC_MODEL_FAST: string;
  ANTHROPIC_MODEL_STRONG: string;
  ANTHROPIC_MAX_TOKENS: string;
  ANTHROPIC_MIN_INTERVAL_MS: string;
  AI_API_URL?: string;
  OLLAMA_MODEL_FAST: string;
  OLLAMA_MODEL_STRONG: string;
  OLLAMA_MIN_INTERVAL_MS: string;

  // Twitch
  TWITCH_ENABLED: string;
  TWITCH_CHANNEL?: string;
  TWITCH_BOT_USERNAME?: string;
  TWITCH_OAUTH_TOKEN?: string;
  TWITCH_CLIENT_ID?: string;

  // YouTube
  YOUTUBE_ENABLED: string;
  YOUTUBE_ACCESS_TOKEN?: string;
  YOUTUBE_LIVE_CHAT_ID?: string;
  YOUTUBE_POLL_INTERVAL_MS: string;

  // Behavior
  QUOTA_TIMEZONE: string;
  CHAT_CHUNK_DELAY_MS: string;
  MAINTENANCE_ENABLED: string;
  QUOTA_CLEANUP_INTERVAL_MIN: string;

  // Environment
  NODE_ENV: string;
  LOG_LEVEL: string;
}

const getEnv = (key: keyof EnvConfig, defaultValue?: string): string => {
  return process.env[key] || defaultValue || '';
};

export const requireEnv = (key: keyof EnvConfig): string => {
  const value = env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
};

export const env: EnvConfig = {
  // Storage
  DATABASE_URL: getEnv('DATABASE_URL'),

  // Completion backend
  AI_PROVIDER_FAST: getEnv('AI_PROVIDER_FAST', 'anthropic'),
  AI_PROVIDER_STRONG: getEnv('AI_PROVIDER_STRONG', 'anthropic'),
  AI_TIMEOUT_MS: getEnv('AI_TIMEOUT_MS', '30000'),
  AI_RETRY_ATTEMPTS: getEnv('AI_RETRY_ATTEMPTS', '3'),
  ANTHROPIC_API_KEY: getEnv('ANTHROPIC_API_KEY'),
  ANTHROPIC_MODEL_FAST: getEnv('ANTHROPIC_MODEL_FAST', 'claude-3-5-haiku-latest'),
  ANTHROPIC_MODEL_STRONG: getEnv('ANTHROPIC_MODEL_STRONG', 'claude-3-5-sonnet-latest'),
  ANTHROPIC_MAX_TOKENS: getEnv('ANTHROPIC_MAX_TOKENS', '1024'),
  ANTHROPIC_MIN_INTERVAL_MS: getEnv('ANTHROPIC_MIN_INTERVAL_MS', '200'),
  AI_API_URL: getEnv('AI_API_URL'),
  OLLAMA_MODEL_FAST: getEnv('OLLAMA_MODEL_FAST', 'llama3.2:3b'),
  OLLAMA_MODEL_STRONG: getEnv('OLLAMA_MODEL_STRONG', 'llama3.1:8b'),
  OLLAMA_MIN_INTERVAL_MS: getEnv('OLLAMA_MIN_INTERVAL_MS', '100'),

  // Twitch
  TWITCH_ENABLED: getEnv('TWITCH_ENABLED', 'false'),
  TWITCH_CHANNEL: getEnv('TWITCH_CHANNEL'),
  TWITCH_BOT_USERNAME: getEnv('TWITCH_BOT_USERNAME'),
  TWITCH_OAUTH_TOKEN: getEnv('TWITCH_OAUTH_TOKEN'),
  TWITCH_CLIENT_ID: getEnv('TWITCH_CLIENT_ID'),

  // YouTube
  YOUTUBE_ENABLED: getEnv('YOUTUBE_ENABLED', 'false'),
  YOUTUBE_ACCESS_TOKEN: getEnv('YOUTUBE_ACCESS_TOKEN'),
  YOUTUBE_LIVE_CHAT_ID: getEnv('YOUTUBE_LIVE_CHAT_ID'),
  YOUTUBE_POLL_INTERVAL_MS: getEnv('YOUTUBE_POLL_INTERVAL_MS', '5000'),

  // Behavior
  QUOTA_TIMEZONE: getEnv('QUOTA_TIMEZONE', 'America/Los_Angeles'),
  CHAT_CHUNK_DELAY_MS: getEnv('CHAT_CHUNK_DELAY_MS', '500'),
  MAINTENANCE_ENABLED: getEnv('MAINTENANCE_ENABLED', 'true'),
  QUOTA_CLEANUP_INTERVAL_MIN: getEnv('QUOTA_CLEANUP_INTERVAL_MIN', '10'),

  // Environment
  NODE_ENV: getEnv('NODE_ENV', 'development'),
  LOG_LEVEL: getEnv('LOG_LEVEL', 'info')
};
