/**
 * Content Filter - decides whether a feed item is shown and how much it is boosted.
 *
 * Pure: the decision depends only on the item text and the preference set.
 * 1. Exclusion: any blocked topic in the item hides it. Exclusion beats boosts.
 * 2. Boost: each distinct preferred topic found adds boostUnit. Topics that
 *    match the same texts ("family vlog", "family-vlog") count once.
 * Topics are checked in sorted order so blockedBy and matchedPreferred do not
 * depend on insertion order.
 */

import type { Logger } from '../types/logger.js';
import type {
  ContentItem,
  FilterDecision,
  MatchMode,
  PreferenceSet,
} from '../types/preferences.js';
import { canonicalizeText, sortTopics, type Topic } from '../types/topic.js';
import { createTopicMatcher, matchKey, type TopicMatcher } from './topic-matcher.js';

/** Relevance added per matched preferred topic */
export const DEFAULT_BOOST_UNIT = 1;

/**
 * Filter options.
 */
export interface ContentFilterOptions {
  /** Relevance added per matched preferred topic (default: 1) */
  boostUnit?: number;
  /** Matching rule (default: word-boundary) */
  matchMode?: MatchMode;
  /** Receives a warning when an item falls back to the degraded decision */
  logger?: Logger;
}

/**
 * A preference set compiled into reusable matchers.
 */
export type CompiledFilter = <T extends ContentItem>(item: T) => FilterDecision<T>;

interface CompiledTopic {
  topic: Topic;
  matches: TopicMatcher;
}

/**
 * Searchable text of an item: title, description and tags, canonicalized like topics.
 */
export function buildSearchableText(item: ContentItem): string {
  const parts: string[] = [item.title];
  if (item.description) {
    parts.push(item.description);
  }
  if (item.tags) {
    parts.push(...item.tags);
  }
  return canonicalizeText(parts.join(' '));
}

/**
 * One matcher per distinct match key, named by the first topic in sorted order.
 */
function compileTopics(topics: ReadonlySet<Topic>, mode: MatchMode): CompiledTopic[] {
  const byKey = new Map<string, CompiledTopic>();
  for (const topic of sortTopics(topics)) {
    const key = matchKey(topic, mode);
    if (!byKey.has(key)) {
      byKey.set(key, { topic, matches: createTopicMatcher(topic, mode) });
    }
  }
  return Array.from(byKey.values());
}

/**
 * Compile a preference set once for evaluating many items.
 */
export function compileFilter(
  prefs: PreferenceSet,
  options: ContentFilterOptions = {}
): CompiledFilter {
  const boostUnit = options.boostUnit ?? DEFAULT_BOOST_UNIT;
  const mode = options.matchMode ?? 'word-boundary';
  const logger = options.logger;

  const blocked = compileTopics(prefs.blocked, mode);
  const preferred = compileTopics(prefs.preferred, mode);

  return <T extends ContentItem>(item: T): FilterDecision<T> => {
    try {
      const text = buildSearchableText(item);

      for (const { topic, matches } of blocked) {
        if (matches(text)) {
          return {
            item,
            visible: false,
            relevanceDelta: 0,
            blockedBy: topic,
            matchedPreferred: [],
            degraded: false,
          };
        }
      }

      const matchedPreferred = preferred.filter(({ matches }) => matches(text)).map((c) => c.topic);

      return {
        item,
        visible: true,
        relevanceDelta: matchedPreferred.length * boostUnit,
        blockedBy: null,
        matchedPreferred,
        degraded: false,
      };
    } catch (error) {
      logger?.warn(
        { itemId: item.id, error: error instanceof Error ? error.message : String(error) },
        'Item evaluation failed, keeping it visible'
      );
      return {
        item,
        visible: true,
        relevanceDelta: 0,
        blockedBy: null,
        matchedPreferred: [],
        degraded: true,
      };
    }
  };
}

/**
 * Evaluate a single item.
 */
export function evaluateItem<T extends ContentItem>(
  item: T,
  prefs: PreferenceSet,
  options: ContentFilterOptions = {}
): FilterDecision<T> {
  return compileFilter(prefs, options)(item);
}
