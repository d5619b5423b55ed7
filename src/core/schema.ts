import { z } from 'zod';

/** language code → lowercase keyword → canonical token */
const keywordTableSchema = z.record(z.string(), z.record(z.string(), z.string()));

const tierLimitsSchema = z.object({
  requestsPerMinute: z.number().int().nonnegative(),
  requestsPerDay: z.number().int().nonnegative()
});

export const botConfigSchema = z.object({
  defaultSettings: z
    .object({
      autoTranslateFrom: z.string().default('en'),
      autoTranslateTo: z.string().default('pt'),
      defaultBotPersona: z.string().default('en-normal')
    })
    .default({}),
  apiLimits: z
    .object({
      fast: tierLimitsSchema.default({ requestsPerMinute: 1000, requestsPerDay: 10000 }),
      strong: tierLimitsSchema.default({ requestsPerMinute: 150, requestsPerDay: 10000 })
    })
    .default({}),
  wordBlocklist: z.array(z.string()).default([]),
  userBlocklist: z.record(z.string(), z.string()).default({}),
  inferencePriority: z.array(z.string()).default([]),
  languageMap: z.record(z.string(), z.string()).default({}),
  settingMap: keywordTableSchema.default({}),
  styleMap: keywordTableSchema.default({}),
  modelMap: keywordTableSchema.default({}),
  toneMap: keywordTableSchema.default({}),
  pronounNormalizationMap: keywordTableSchema.default({}),
  languagePronounHints: keywordTableSchema.default({}),
  helpLinks: z.record(z.string(), z.string()).default({}),
  lowercaseLanguageNames: z.array(z.string()).default([])
});

export const templateTableSchema = z.record(z.string(), z.record(z.string(), z.string()));

export type BotConfig = z.infer<typeof botConfigSchema>;
export type TemplateTable = z.infer<typeof templateTableSchema>;
export type KeywordTable = z.infer<typeof keywordTableSchema>;

export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ConfigurationError';
  }
}

const describeIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');

export const parseBotConfig = (raw: unknown): BotConfig => {
  const result = botConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid bot configuration: ${describeIssues(result.error)}`, { cause: result.error });
  }
  return result.data;
};

export const parseTemplateTable = (raw: unknown): TemplateTable => {
  const result = templateTableSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid template table: ${describeIssues(result.error)}`, { cause: result.error });
  }
  return result.data;
};
