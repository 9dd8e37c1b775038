import type { PreferenceRecord } from './transit.types';

export interface PreferenceStore {
  get(userId: string): PreferenceRecord | undefined;
  set(userId: string, record: PreferenceRecord): void;
}

export const PREFERENCE_STORE = Symbol('PREFERENCE_STORE');
