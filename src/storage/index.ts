/**
 * Storage module exports.
 */

export type { Storage } from './storage.js';
export type { JSONStorageConfig } from './json-storage.js';
export { JSONStorage, createJSONStorage } from './json-storage.js';
export type { PreferenceDocument } from './preference-store.js';
export {
  PreferenceStore,
  PREFERENCE_DOCUMENT_VERSION,
  assertProfileId,
  preferenceKey,
  serializePreferences,
  deserializePreferences,
} from './preference-store.js';
