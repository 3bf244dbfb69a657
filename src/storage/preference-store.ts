/**
 * PreferenceStore - durable home of each profile's preferred/blocked topics.
 *
 * Serialized form (one document per profile, key `preferences.<profileId>`):
 *   { "version": 1, "preferred": [...], "blocked": [...] }
 * Topics are written in set iteration order so save(load()) rewrites the
 * same document.
 */

import { z } from 'zod';
import type { Storage } from './storage.js';
import type { Logger } from '../types/logger.js';
import { createEmptyPreferenceSet, type PreferenceSet } from '../types/preferences.js';
import { collectTopics, type Topic } from '../types/topic.js';
import { InvalidProfileError, StoreUnavailableError } from '../core/errors.js';

/** Current document schema version */
export const PREFERENCE_DOCUMENT_VERSION = 1;

const KEY_PREFIX = 'preferences.';

const PROFILE_ID = /^[A-Za-z0-9_-]{1,64}$/;

const preferenceDocumentSchema = z.object({
  version: z.number().int().positive(),
  preferred: z.array(z.string()),
  blocked: z.array(z.string()),
});

export type PreferenceDocument = z.infer<typeof preferenceDocumentSchema>;

/**
 * Throw InvalidProfileError unless the id is usable as a storage key.
 */
export function assertProfileId(profileId: string): void {
  if (!PROFILE_ID.test(profileId)) {
    throw new InvalidProfileError(profileId);
  }
}

/**
 * Storage key for a profile.
 */
export function preferenceKey(profileId: string): string {
  assertProfileId(profileId);
  return `${KEY_PREFIX}${profileId}`;
}

/**
 * Convert a preference set to its persisted document.
 */
export function serializePreferences(set: PreferenceSet): PreferenceDocument {
  return {
    version: PREFERENCE_DOCUMENT_VERSION,
    preferred: Array.from(set.preferred),
    blocked: Array.from(set.blocked),
  };
}

/**
 * Rebuild a preference set from a persisted document.
 *
 * Entries are re-canonicalized and invalid ones dropped. A topic listed on
 * both sides is kept only as blocked.
 */
export function deserializePreferences(doc: PreferenceDocument): PreferenceSet {
  const blocked = new Set<Topic>(collectTopics(doc.blocked));
  const preferred = new Set<Topic>(collectTopics(doc.preferred).filter((t) => !blocked.has(t)));
  return { preferred, blocked };
}

/**
 * Durable load/save of preference sets over any Storage medium.
 */
export class PreferenceStore {
  private readonly storage: Storage;
  private readonly logger: Logger;

  constructor(storage: Storage, logger: Logger) {
    this.storage = storage;
    this.logger = logger.child({ component: 'preference-store' });
  }

  /**
   * Load a profile's preferences. A profile never saved before loads empty.
   * @throws InvalidProfileError for an unusable profile id
   * @throws StoreUnavailableError when the medium can't be read or holds garbage
   */
  async load(profileId: string): Promise<PreferenceSet> {
    const key = preferenceKey(profileId);

    let raw: unknown;
    try {
      raw = await this.storage.load(key);
    } catch (error) {
      throw new StoreUnavailableError(profileId, 'load', error);
    }

    if (raw === null) {
      this.logger.debug({ profileId }, 'No stored preferences, starting empty');
      return createEmptyPreferenceSet();
    }

    const parsed = preferenceDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      throw new StoreUnavailableError(profileId, 'load', parsed.error);
    }

    if (parsed.data.version > PREFERENCE_DOCUMENT_VERSION) {
      this.logger.warn(
        { profileId, version: parsed.data.version, supported: PREFERENCE_DOCUMENT_VERSION },
        'Preference document is newer than supported, reading known fields'
      );
    }

    const set = deserializePreferences(parsed.data);
    this.logger.debug(
      { profileId, preferred: set.preferred.size, blocked: set.blocked.size },
      'Preferences loaded'
    );
    return set;
  }

  /**
   * Persist a profile's preferences, replacing the previous document atomically.
   * @throws InvalidProfileError for an unusable profile id
   * @throws StoreUnavailableError when the write fails
   */
  async save(profileId: string, set: PreferenceSet): Promise<void> {
    const key = preferenceKey(profileId);
    const doc = serializePreferences(set);

    try {
      await this.storage.save(key, doc);
    } catch (error) {
      throw new StoreUnavailableError(profileId, 'save', error);
    }

    this.logger.debug(
      { profileId, preferred: doc.preferred.length, blocked: doc.blocked.length },
      'Preferences saved'
    );
  }

  /**
   * Ids of every profile with stored preferences.
   */
  async listProfiles(): Promise<string[]> {
    if (!this.storage.keys) {
      return [];
    }
    const keys = await this.storage.keys(KEY_PREFIX);
    return keys.map((k) => k.slice(KEY_PREFIX.length)).filter((id) => PROFILE_ID.test(id));
  }
}
