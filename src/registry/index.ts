export type { SnapshotListener, PersistenceWarningListener } from './preference-registry.js';
export { PreferenceRegistry } from './preference-registry.js';
