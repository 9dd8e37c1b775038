import { Injectable } from '@nestjs/common';

export const TRANSLATED_LANGUAGES = ['si', 'ta'] as const;

export type TranslatedLanguage = (typeof TRANSLATED_LANGUAGES)[number];

export type TranslatedPayload<T> = {
  translated: true;
  language: TranslatedLanguage;
  data: T;
};

export function isTranslatedLanguage(language: string): language is TranslatedLanguage {
  return TRANSLATED_LANGUAGES.some((candidate) => candidate === language);
}

/**
 * Marks payloads for Sinhala ("si") and Tamil ("ta") clients. The payload is
 * passed through as-is; no field is rewritten.
 */
@Injectable()
export class LanguageAgent {
  readonly name = 'Language & Accessibility Agent';

  translateResponse<T>(payload: T, language: string): T | TranslatedPayload<T> {
    if (isTranslatedLanguage(language)) {
      return { translated: true, language, data: payload };
    }
    return payload;
  }
}
