/**
 * PreferenceRegistry - live owner of every open profile's preferred/blocked sets.
 *
 * Mutations:
 * - are validated and canonicalized before anything else
 * - run one at a time per profile, in arrival order (SerialQueue)
 * - update memory synchronously, then dispatch a save without awaiting it
 *
 * Saves run one at a time per profile. A queued save that a newer one
 * supersedes is skipped; a superseded save that was already running has its
 * outcome ignored. Save failures never roll back memory: they are logged and
 * handed to persistence warning listeners.
 */

import type { Logger } from '../types/logger.js';
import type {
  PersistenceStatus,
  PersistenceWarning,
  PreferenceSnapshot,
} from '../types/preferences.js';
import { createTopic, type Topic } from '../types/topic.js';
import { SerialQueue } from '../core/serial-queue.js';
import { ProfileNotLoadedError, toError } from '../core/errors.js';
import { assertProfileId, type PreferenceStore } from '../storage/preference-store.js';

export type SnapshotListener = (snapshot: PreferenceSnapshot) => void;
export type PersistenceWarningListener = (warning: PersistenceWarning) => void;

/**
 * Per-profile live state.
 */
interface ProfileState {
  readonly profileId: string;
  readonly preferred: Set<Topic>;
  readonly blocked: Set<Topic>;
  version: number;
  snapshot: PreferenceSnapshot;
  readonly writer: SerialQueue;
  readonly saves: SerialQueue;
  requestedVersion: number;
  committedVersion: number;
  lastError: Error | null;
}

/** Returns true when the state changed */
type Mutation = (state: ProfileState) => boolean;

/**
 * Set that rejects changes once constructed.
 * Snapshot sets are shared by every reader of a version.
 */
class FrozenSet<T> extends Set<T> {
  private sealed = false;

  constructor(values: Iterable<T>) {
    super(values);
    this.sealed = true;
    Object.freeze(this);
  }

  override add(value: T): this {
    if (this.sealed) {
      throw new TypeError('Snapshot sets are read-only');
    }
    return super.add(value);
  }

  override delete(_value: T): boolean {
    throw new TypeError('Snapshot sets are read-only');
  }

  override clear(): void {
    throw new TypeError('Snapshot sets are read-only');
  }
}

function freezeSnapshot(
  state: Pick<ProfileState, 'profileId' | 'version' | 'preferred' | 'blocked'>
): PreferenceSnapshot {
  return Object.freeze({
    profileId: state.profileId,
    version: state.version,
    preferred: new FrozenSet(state.preferred),
    blocked: new FrozenSet(state.blocked),
  });
}

/**
 * Move a topic into `target`, evicting it from `other` first.
 */
function moveInto(target: Set<Topic>, other: Set<Topic>, topic: Topic): boolean {
  const evicted = other.delete(topic);
  if (target.has(topic)) {
    return evicted;
  }
  target.add(topic);
  return true;
}

export class PreferenceRegistry {
  private readonly store: PreferenceStore;
  private readonly logger: Logger;

  private readonly profiles = new Map<string, ProfileState>();
  private readonly loading = new Map<string, Promise<ProfileState>>();

  private readonly snapshotListeners = new Set<SnapshotListener>();
  private readonly warningListeners = new Set<PersistenceWarningListener>();

  constructor(store: PreferenceStore, logger: Logger) {
    this.store = store;
    this.logger = logger.child({ component: 'preference-registry' });
  }

  // ============================================================
  // Loading
  // ============================================================

  /**
   * Load a profile (once) and return its snapshot.
   * Concurrent callers share the same load.
   * @throws StoreUnavailableError if the load fails; a later call retries
   */
  async open(profileId: string): Promise<PreferenceSnapshot> {
    const state = await this.ensureLoaded(profileId);
    return state.snapshot;
  }

  /**
   * Whether a profile is loaded and readable synchronously.
   */
  isLoaded(profileId: string): boolean {
    return this.profiles.has(profileId);
  }

  private ensureLoaded(profileId: string): Promise<ProfileState> {
    assertProfileId(profileId);

    const existing = this.profiles.get(profileId);
    if (existing) {
      return Promise.resolve(existing);
    }

    const inFlight = this.loading.get(profileId);
    if (inFlight) {
      return inFlight;
    }

    const load = this.store.load(profileId).then(
      (set) => {
        const live = {
          profileId,
          version: 0,
          preferred: new Set(set.preferred),
          blocked: new Set(set.blocked),
        };
        const state: ProfileState = {
          ...live,
          snapshot: freezeSnapshot(live),
          writer: new SerialQueue(),
          saves: new SerialQueue(),
          requestedVersion: -1,
          committedVersion: -1,
          lastError: null,
        };

        this.profiles.set(profileId, state);
        this.loading.delete(profileId);
        this.logger.debug(
          { profileId, preferred: state.preferred.size, blocked: state.blocked.size },
          'Profile opened'
        );
        return state;
      },
      (error: unknown) => {
        this.loading.delete(profileId);
        throw error;
      }
    );

    this.loading.set(profileId, load);
    return load;
  }

  private requireLoaded(profileId: string): ProfileState {
    const state = this.profiles.get(profileId);
    if (!state) {
      throw new ProfileNotLoadedError(profileId);
    }
    return state;
  }

  // ============================================================
  // Mutations
  // ============================================================

  /**
   * Add a topic to preferred, evicting it from blocked.
   * @throws InvalidTopicError for unusable input (nothing changes)
   */
  async addPreferred(profileId: string, topic: string): Promise<PreferenceSnapshot> {
    const canonical = createTopic(topic);
    return this.mutate(profileId, 'addPreferred', (s) =>
      moveInto(s.preferred, s.blocked, canonical)
    );
  }

  /**
   * Remove a topic from preferred. Absent topics are a no-op.
   */
  async removePreferred(profileId: string, topic: string): Promise<PreferenceSnapshot> {
    const canonical = createTopic(topic);
    return this.mutate(profileId, 'removePreferred', (s) => s.preferred.delete(canonical));
  }

  /**
   * Add a topic to blocked, evicting it from preferred.
   */
  async addBlocked(profileId: string, topic: string): Promise<PreferenceSnapshot> {
    const canonical = createTopic(topic);
    return this.mutate(profileId, 'addBlocked', (s) =>
      moveInto(s.blocked, s.preferred, canonical)
    );
  }

  /**
   * Remove a topic from blocked. Absent topics are a no-op.
   */
  async removeBlocked(profileId: string, topic: string): Promise<PreferenceSnapshot> {
    const canonical = createTopic(topic);
    return this.mutate(profileId, 'removeBlocked', (s) => s.blocked.delete(canonical));
  }

  /**
   * Remove a preferred topic, or add it (evicting from blocked) if absent.
   */
  async togglePreferred(profileId: string, topic: string): Promise<PreferenceSnapshot> {
    const canonical = createTopic(topic);
    return this.mutate(profileId, 'togglePreferred', (s) =>
      s.preferred.has(canonical)
        ? s.preferred.delete(canonical)
        : moveInto(s.preferred, s.blocked, canonical)
    );
  }

  /**
   * Add the topics picked during onboarding as one mutation and one save.
   * Any invalid entry rejects the whole call before anything changes.
   */
  async completeOnboarding(
    profileId: string,
    topics: Iterable<string>
  ): Promise<PreferenceSnapshot> {
    const canonical = Array.from(topics, (t) => createTopic(t));
    return this.mutate(profileId, 'completeOnboarding', (s) => {
      let changed = false;
      for (const topic of canonical) {
        changed = moveInto(s.preferred, s.blocked, topic) || changed;
      }
      return changed;
    });
  }

  private async mutate(
    profileId: string,
    operation: string,
    mutation: Mutation
  ): Promise<PreferenceSnapshot> {
    const state = await this.ensureLoaded(profileId);

    return state.writer.run(() => {
      if (!mutation(state)) {
        this.logger.trace({ profileId, operation }, 'Mutation was a no-op');
        return state.snapshot;
      }

      state.version++;
      state.snapshot = freezeSnapshot(state);

      this.logger.debug(
        {
          profileId,
          operation,
          version: state.version,
          preferred: state.preferred.size,
          blocked: state.blocked.size,
        },
        'Preferences changed'
      );

      this.scheduleSave(state);
      this.notify(state.snapshot);
      return state.snapshot;
    });
  }

  // ============================================================
  // Reads
  // ============================================================

  /**
   * Snapshot of a loaded profile.
   * @throws ProfileNotLoadedError if the profile was never opened
   */
  snapshot(profileId: string): PreferenceSnapshot {
    return this.requireLoaded(profileId).snapshot;
  }

  /**
   * Preferred topics of a loaded profile.
   */
  currentPreferred(profileId: string): ReadonlySet<Topic> {
    return this.requireLoaded(profileId).snapshot.preferred;
  }

  /**
   * Blocked topics of a loaded profile.
   */
  currentBlocked(profileId: string): ReadonlySet<Topic> {
    return this.requireLoaded(profileId).snapshot.blocked;
  }

  // ============================================================
  // Change notification
  // ============================================================

  /**
   * Receive every new snapshot after a state-changing mutation.
   * @returns Unsubscribe function
   */
  subscribe(listener: SnapshotListener): () => void {
    this.snapshotListeners.add(listener);
    return () => {
      this.snapshotListeners.delete(listener);
    };
  }

  /**
   * Receive failures of a profile's latest save.
   * @returns Unsubscribe function
   */
  onPersistenceWarning(listener: PersistenceWarningListener): () => void {
    this.warningListeners.add(listener);
    return () => {
      this.warningListeners.delete(listener);
    };
  }

  private notify(snapshot: PreferenceSnapshot): void {
    for (const listener of this.snapshotListeners) {
      try {
        listener(snapshot);
      } catch (error) {
        this.logger.error(
          { profileId: snapshot.profileId, error: toError(error).message },
          'Snapshot listener failed'
        );
      }
    }
  }

  private warn(warning: PersistenceWarning): void {
    this.logger.warn(
      { profileId: warning.profileId, version: warning.version, error: warning.error.message },
      'Preference save failed, keeping in-memory state'
    );

    for (const listener of this.warningListeners) {
      try {
        listener(warning);
      } catch (error) {
        this.logger.error(
          { profileId: warning.profileId, error: toError(error).message },
          'Persistence warning listener failed'
        );
      }
    }
  }

  // ============================================================
  // Persistence
  // ============================================================

  private scheduleSave(state: ProfileState): void {
    const { profileId } = state;
    const snapshot = state.snapshot;
    const version = snapshot.version;
    state.requestedVersion = version;

    void state.saves
      .run(async () => {
        if (version < state.requestedVersion) {
          this.logger.trace({ profileId, version }, 'Queued save superseded, skipped');
          return;
        }

        try {
          await this.store.save(profileId, snapshot);
        } catch (error) {
          if (version < state.requestedVersion) {
            this.logger.debug({ profileId, version }, 'Superseded save failed, ignored');
            return;
          }
          state.lastError = toError(error);
          this.warn({ profileId, version, error: state.lastError });
          return;
        }

        state.committedVersion = Math.max(state.committedVersion, version);
        if (version === state.requestedVersion) {
          state.lastError = null;
        }
      })
      .catch((error: unknown) => {
        this.logger.error({ profileId, error: toError(error).message }, 'Save task failed');
      });
  }

  /**
   * Wait until every pending mutation and save of a profile has settled.
   * A profile still loading is waited for first.
   * @throws ProfileNotLoadedError if the profile was never opened
   */
  async flush(profileId: string): Promise<PersistenceStatus> {
    const inFlight = this.loading.get(profileId);
    if (inFlight) {
      await inFlight;
    }
    const state = this.requireLoaded(profileId);

    while (state.writer.size > 0 || state.saves.size > 0) {
      await state.writer.idle();
      await state.saves.idle();
    }

    return {
      profileId,
      committedVersion: state.committedVersion,
      pendingVersion: state.requestedVersion,
      lastError: state.lastError,
    };
  }

  /**
   * Flush every loaded profile, including those whose first load is in flight.
   */
  async close(): Promise<PersistenceStatus[]> {
    await Promise.allSettled(Array.from(this.loading.values()));
    const statuses = await Promise.all(Array.from(this.profiles.keys(), (id) => this.flush(id)));
    this.logger.debug({ profiles: statuses.length }, 'Registry closed');
    return statuses;
  }
}
