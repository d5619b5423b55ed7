import fs from 'node:fs/promises';
import { parseTemplateTable, type TemplateTable } from '../core/schema.js';
import { FALLBACK_LANGUAGE, lookup } from './keywords.js';

export type MissingKeyReport = Record<string, string[]>;

/**
 * Keys the reference language defines that another language lacks or leaves
 * empty. Languages with nothing missing are omitted.
 */
export const findMissingTemplateKeys = (templates: TemplateTable, reference: string = FALLBACK_LANGUAGE): MissingKeyReport => {
  const referenceTable = lookup(templates, reference);
  if (!referenceTable) return {};

  const report: MissingKeyReport = {};
  for (const [language, table] of Object.entries(templates)) {
    if (language === reference) continue;

    const missing = Object.keys(referenceTable)
      .filter((key) => !lookup(table, key)?.trim())
      .sort();
    if (missing.length > 0) report[language] = missing;
  }
  return report;
};

export const formatReport = (report: MissingKeyReport, reference: string = FALLBACK_LANGUAGE): string => {
  const languages = Object.keys(report).sort();
  if (languages.length === 0) return `All languages define every "${reference}" template key.`;

  return languages
    .map((language) => `${language}: ${report[language].length} missing\n  ${report[language].join('\n  ')}`)
    .join('\n');
};

const loadTemplates = async (source: string): Promise<TemplateTable> => {
  if (source === '--stored') {
    const { SettingsRepository } = await import('../database/repositories/settings.js');
    const { db } = await import('../database/connection.js');
    try {
      return await new SettingsRepository().loadTemplates();
    } finally {
      await db.close();
    }
  }

  const path = source || new URL('../../data/templates.json', import.meta.url);
  return parseTemplateTable(JSON.parse(await fs.readFile(path, 'utf8')));
};

// CLI runner: node dist/i18n/audit.js [templates.json | --stored] [referenceLanguage]
if (import.meta.url === `file://${process.argv[1]}`) {
  const source = process.argv[2] ?? '';
  const reference = process.argv[3] ?? FALLBACK_LANGUAGE;

  loadTemplates(source)
    .then((templates) => {
      const report = findMissingTemplateKeys(templates, reference);
      console.log(formatReport(report, reference));
      process.exit(Object.keys(report).length === 0 ? 0 : 2);
    })
    .catch((err) => {
      console.error('[TemplateAudit] failed:', err);
      process.exit(1);
    });
}
