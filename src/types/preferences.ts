/**
 * Preference and content types shared by the registry, filter and feed.
 */

import type { Topic } from './topic.js';

/**
 * A viewer's interests and blocklist.
 * Invariant: no topic is in both sets.
 */
export interface PreferenceSet {
  readonly preferred: ReadonlySet<Topic>;
  readonly blocked: ReadonlySet<Topic>;
}

/**
 * Immutable view of one profile's preferences handed to the UI.
 */
export interface PreferenceSnapshot extends PreferenceSet {
  readonly profileId: string;
  /** Mutation counter for this profile, starts at 0 after load */
  readonly version: number;
}

/**
 * Minimal content item shape the filter reads.
 * Feed items may carry any other fields; they are passed through untouched.
 */
export interface ContentItem {
  readonly id?: string | undefined;
  readonly title: string;
  readonly description?: string | undefined;
  readonly tags?: readonly string[] | undefined;
}

/**
 * Outcome of evaluating one item against a preference set.
 */
export interface FilterDecision<T extends ContentItem = ContentItem> {
  readonly item: T;
  readonly visible: boolean;
  /** matchedPreferred.length * boostUnit, or 0 when hidden */
  readonly relevanceDelta: number;
  /** First blocked topic (in sorted order) found in the item */
  readonly blockedBy: Topic | null;
  /** Distinct preferred topics found, sorted */
  readonly matchedPreferred: readonly Topic[];
  /** True when evaluation failed and the visible/zero fallback was used */
  readonly degraded: boolean;
}

/**
 * How topics are located in item text.
 * - word-boundary: whole words or space/hyphen joined phrases
 * - substring: plain substring check
 */
export type MatchMode = 'word-boundary' | 'substring';

/**
 * Emitted when the latest save of a profile fails.
 */
export interface PersistenceWarning {
  profileId: string;
  /** Snapshot version the failed save carried */
  version: number;
  error: Error;
}

/**
 * Save progress for one profile.
 */
export interface PersistenceStatus {
  profileId: string;
  /** Highest version known to be on disk (-1 if nothing was saved this session) */
  committedVersion: number;
  /** Highest version a save was requested for (-1 if none) */
  pendingVersion: number;
  /** Error of the latest save attempt, null if it succeeded */
  lastError: Error | null;
}

/**
 * Create an empty preference set.
 */
export function createEmptyPreferenceSet(): PreferenceSet {
  return {
    preferred: new Set<Topic>(),
    blocked: new Set<Topic>(),
  };
}

/**
 * True when both sets hold the same topics (order ignored).
 */
export function preferenceSetsEqual(a: PreferenceSet, b: PreferenceSet): boolean {
  return sameMembers(a.preferred, b.preferred) && sameMembers(a.blocked, b.blocked);
}

function sameMembers(a: ReadonlySet<Topic>, b: ReadonlySet<Topic>): boolean {
  if (a.size !== b.size) return false;
  for (const topic of a) {
    if (!b.has(topic)) return false;
  }
  return true;
}
