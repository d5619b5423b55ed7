import { parseBotConfig, parseTemplateTable } from '../core/schema.js';

export const testConfig = () =>
  parseBotConfig({
    defaultSettings: { autoTranslateFrom: 'en', autoTranslateTo: 'es', defaultBotPersona: 'en-normal' },
    apiLimits: {
      fast: { requestsPerMinute: 5, requestsPerDay: 100 },
      strong: { requestsPerMinute: 5, requestsPerDay: 100 }
    },
    inferencePriority: ['es', 'pt'],
    languageMap: { en: 'English', es: 'Spanish', pt: 'Portuguese', fr: 'French' },
    settingMap: {
      en: { target: 'target', speaking: 'speaking', style: 'style', pronouns: 'pronouns', clear: 'clear' },
      es: { idioma: 'target', hablo: 'speaking', estilo: 'style', pronombres: 'pronouns', borrar: 'clear' },
      pt: { alvo: 'target', estilo: 'style' }
    },
    styleMap: {
      en: { normal: 'normal', pirate: 'pirate' },
      es: { normal: 'normal', pirata: 'pirate' },
      pt: { pirata: 'pirate' }
    },
    modelMap: { en: { pro: 'strong', flash: 'fast' } },
    toneMap: { en: { joking: 'joking' } },
    pronounNormalizationMap: {
      en: { he: 'he/him', him: 'he/him', she: 'she/her', her: 'she/her', they: 'they/them', them: 'they/them' }
    },
    languagePronounHints: { es: { 'she/her': 'Use feminine endings for the speaker.' } },
    helpLinks: { en: 'https://example.com/help', default: 'https://example.com/help' }
  });

export const testTemplates = () =>
  parseTemplateTable({
    en: {
      translationHeader: '{0} ({1}):',
      apiError: '{0} api error',
      aprilFoolsApiError: '{0} gnomes',
      userBlocked: '{0} blocked user',
      blocked: '{0} blocked word',
      helpTranslate: '{0} help {1}',
      alreadyTranslated: '{0} already {1}',
      dailyLimit: '{0} daily',
      rateLimit: '{0} slow down',
      unknownTranslation: '{0} unknown',
      setLangCheck: '{0} {1}|{2}|{3}|{4}',
      setLangConfirmMulti: '{0} saved: {1}',
      confirmPartSpeaking: 'speaking {1}',
      confirmPartTarget: 'target {1}',
      confirmPartStyle: 'style {1}',
      confirmPartPronouns: 'pronouns {1}',
      invalidPair: '{0} bad pair {1}',
      invalidKey: '{0} bad key {1}',
      invalidValue: '{0} bad value {1} for {2}',
      invalidCode: '{0} bad code {1}',
      clearConfirm: '{0} cleared',
      clearNone: '{0} nothing to clear',
      userBlockedSl: '{0} no settings for you',
      sulNoUser: '{0} no user',
      sulCheck: '{0} {1}: {2}|{3}|{4}|{5}',
      sulClearConfirm: '{0} cleared {1}',
      sulConfirmMulti: '{0} updated {1}: {2}',
      adminBlockNoUser: '{0} who?',
      adminBlockConfirm: '{0} blocked {1}',
      adminBlockAlreadyExists: '{0} already blocked {1}',
      adminUnblockNoUser: '{0} unblock who?',
      adminUnblockConfirm: '{0} unblocked {1}',
      adminUnblockNotFound: '{0} not blocked {1}',
      blocklistNoWord: '{0} which word?',
      blocklistAddConfirm: '{0} added {1}',
      blocklistAlreadyExists: '{0} exists {1}',
      blocklistRemoveConfirm: '{0} removed {1}',
      blocklistNotFound: '{0} missing {1}',
      translateHelp: '{0} guide {1}',
      helpLinkNotFound: '{0} no guide',
      en_normal: 'English',
      es_normal: 'Spanish',
      none_normal: 'none',
      default_normal: 'auto',
      normal_normal: 'Normal',
      pirate_normal: 'Pirate'
    },
    es: {
      quote_start: '«',
      quote_end: '»',
      setLangConfirmMulti: '{0} guardado: {1}',
      confirmPartSpeaking: 'hablas {1}',
      confirmPartTarget: 'destino {1}',
      en_normal: 'Inglés',
      es_normal: 'Español'
    },
    pt: {
      pt_normal: 'Português'
    }
  });
