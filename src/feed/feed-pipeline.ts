/**
 * Feed Personalization Pipeline
 *
 * Drops blocked items and orders the rest by relevance. Sorting is stable:
 * items with equal relevance keep their input order, so an unchanged feed
 * does not reshuffle between refreshes.
 */

import type { Logger } from '../types/logger.js';
import type { ContentItem, FilterDecision, PreferenceSet } from '../types/preferences.js';
import { compileFilter, type ContentFilterOptions } from '../filter/content-filter.js';
import type { PreferenceRegistry } from '../registry/preference-registry.js';

/**
 * Counts reported after a feed has been consumed.
 */
export interface FeedSummary {
  total: number;
  visible: number;
  hidden: number;
  boosted: number;
  degraded: number;
}

/**
 * Evaluate every item, in input order.
 */
export function explainFeed<T extends ContentItem>(
  items: Iterable<T>,
  prefs: PreferenceSet,
  options: ContentFilterOptions = {}
): FilterDecision<T>[] {
  const evaluate = compileFilter(prefs, options);
  return Array.from(items, (item) => evaluate(item));
}

/**
 * Summarize decisions.
 */
export function summarizeDecisions(decisions: readonly FilterDecision[]): FeedSummary {
  const visible = decisions.filter((d) => d.visible);
  return {
    total: decisions.length,
    visible: visible.length,
    hidden: decisions.length - visible.length,
    boosted: visible.filter((d) => d.relevanceDelta > 0).length,
    degraded: decisions.filter((d) => d.degraded).length,
  };
}

/**
 * Visible items ordered by relevance (descending), ties in input order.
 */
export function rankDecisions<T extends ContentItem>(decisions: readonly FilterDecision<T>[]): T[] {
  // Array.prototype.sort is stable
  return decisions
    .filter((d) => d.visible)
    .sort((a, b) => b.relevanceDelta - a.relevanceDelta)
    .map((d) => d.item);
}

/**
 * Personalize a batch of items.
 *
 * Returns a single-use iterator: nothing is evaluated until the first next(),
 * and a finished iterator stays finished. Call again to recompute against
 * newer preferences.
 */
export function* applyPreferences<T extends ContentItem>(
  items: Iterable<T>,
  prefs: PreferenceSet,
  options: ContentFilterOptions & { onSummary?: (summary: FeedSummary) => void } = {}
): Generator<T, void, undefined> {
  const decisions = explainFeed(items, prefs, options);
  options.onSummary?.(summarizeDecisions(decisions));
  yield* rankDecisions(decisions);
}

/**
 * Feed personalization bound to the live registry.
 */
export class FeedPersonalizer {
  private readonly registry: PreferenceRegistry;
  private readonly options: ContentFilterOptions;
  private readonly logger: Logger;

  constructor(registry: PreferenceRegistry, logger: Logger, options: ContentFilterOptions = {}) {
    this.registry = registry;
    this.logger = logger.child({ component: 'feed-personalizer' });
    this.options = { ...options, logger: this.logger };
  }

  /**
   * Personalize items against the profile's current snapshot.
   * Loads the profile first if needed.
   */
  async personalize<T extends ContentItem>(
    profileId: string,
    items: Iterable<T>
  ): Promise<Generator<T, void, undefined>> {
    const prefs = await this.registry.open(profileId);
    return applyPreferences(items, prefs, {
      ...this.options,
      onSummary: (summary) => {
        this.logger.debug({ profileId, version: prefs.version, ...summary }, 'Feed personalized');
      },
    });
  }
}
