import { Inject, Injectable } from '@nestjs/common';
import { PREFERENCE_STORE } from './preference.store';
import type { PreferenceStore } from './preference.store';
import type { PreferenceRecord } from './transit.types';

export const DEFAULT_USER_ID = 'default_user';

export function defaultPreference(): PreferenceRecord {
  return { mode: 'fastest', accessibility: false };
}

@Injectable()
export class PersonalizationAgent {
  readonly name = 'Personalization Agent';

  constructor(@Inject(PREFERENCE_STORE) private readonly store: PreferenceStore) {}

  learnPreference(userId: string, preference: PreferenceRecord): void {
    this.store.set(userId, preference);
  }

  getPersonalizedSuggestions(userId: string): PreferenceRecord {
    return this.store.get(userId) ?? defaultPreference();
  }
}
