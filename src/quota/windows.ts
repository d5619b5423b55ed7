import type { ModelTier } from '../ai/types.js';

export const DEFAULT_TIMEZONES = ['America/Los_Angeles', 'US/Pacific'] as const;

const isValidTimeZone = (timeZone: string): boolean => {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch (error) {
    if (error instanceof RangeError) return false;
    throw error;
  }
};

/** First candidate the runtime knows, else UTC. */
export const resolveTimeZone = (candidates: readonly string[]): string => {
  for (const candidate of candidates) {
    if (candidate && isValidTimeZone(candidate)) return candidate;
  }
  console.warn(`[Quota] none of [${candidates.join(', ')}] is a known timezone, using UTC`);
  return 'UTC';
};

export interface ZonedParts {
  year: string;
  month: string;
  day: string;
  hour: string;
  minute: string;
}

export const zonedParts = (date: Date, timeZone: string): ZonedParts => {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23'
  });

  const parts: ZonedParts = { year: '', month: '', day: '', hour: '', minute: '' };
  for (const part of formatter.formatToParts(date)) {
    if (part.type === 'year' || part.type === 'month' || part.type === 'day' || part.type === 'hour' || part.type === 'minute') {
      parts[part.type] = part.value;
    }
  }
  return parts;
};

export interface QuotaWindowKeys {
  day: string;
  minute: string;
}

export const windowKeys = (tier: ModelTier, date: Date, timeZone: string): QuotaWindowKeys => {
  const { year, month, day, hour, minute } = zonedParts(date, timeZone);
  return {
    day: `quota:${tier}:day:${year}-${month}-${day}`,
    minute: `quota:${tier}:minute:${year}-${month}-${day}-${hour}-${minute}`
  };
};

export const isAprilFirst = (date: Date, timeZone: string): boolean => {
  const { month, day } = zonedParts(date, timeZone);
  return month === '04' && day === '01';
};
