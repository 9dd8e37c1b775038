import { Injectable } from '@nestjs/common';
import type { PreferenceStore } from './preference.store';
import type { PreferenceRecord } from './transit.types';

/** Process-lifetime map; nothing is evicted or written to disk. */
@Injectable()
export class InMemoryPreferenceStore implements PreferenceStore {
  private readonly records = new Map<string, PreferenceRecord>();

  get(userId: string): PreferenceRecord | undefined {
    return this.records.get(userId);
  }

  set(userId: string, record: PreferenceRecord): void {
    this.records.set(userId, record);
  }
}
