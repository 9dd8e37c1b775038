import { LanguageAgent, isTranslatedLanguage } from './language.agent';

describe('LanguageAgent', () => {
  const agent = new LanguageAgent();
  const payload = { origin: 'Colombo', destination: 'Galle', routes: [] };

  it.each(['si', 'ta'])('wraps the payload untouched for %p', (language) => {
    const result = agent.translateResponse(payload, language);

    expect(result).toEqual({ translated: true, language, data: payload });
    expect(result).not.toBe(payload);
  });

  it.each(['en', 'SI', 'fr', ''])('returns the payload itself for %p', (language) => {
    expect(agent.translateResponse(payload, language)).toBe(payload);
  });

  it('recognises only Sinhala and Tamil', () => {
    expect(isTranslatedLanguage('si')).toBe(true);
    expect(isTranslatedLanguage('ta')).toBe(true);
    expect(isTranslatedLanguage('en')).toBe(false);
  });
});
