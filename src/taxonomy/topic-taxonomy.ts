/**
 * Topic Taxonomy - static catalog of browsable topic categories.
 *
 * Loaded once from a JSON catalog and frozen; safe to share between any
 * number of readers.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { TaxonomyError, describeError } from '../core/errors.js';
import { collectTopics, tryCreateTopic, type Topic } from '../types/topic.js';

/** Bundled catalog shipped with the package */
export const DEFAULT_TAXONOMY_PATH = fileURLToPath(
  new URL('../../data/taxonomy/categories.json', import.meta.url)
);

/** Default number of quick-block suggestions offered at once */
export const DEFAULT_SUGGESTION_LIMIT = 12;

const catalogSchema = z.object({
  version: z.number().int().positive(),
  categories: z
    .array(
      z.object({
        name: z.string().min(1),
        icon: z.string().min(1),
        topics: z.array(z.string()).min(1),
      })
    )
    .min(1),
  quickBlockSuggestions: z.array(z.string()).default([]),
});

export type TaxonomyCatalog = z.input<typeof catalogSchema>;

/**
 * A named group of canonical topics.
 */
export interface TopicCategory {
  readonly name: string;
  readonly icon: string;
  readonly topics: readonly Topic[];
}

/**
 * Read-only topic catalog.
 */
export class TopicTaxonomy {
  private readonly categoryList: readonly TopicCategory[];
  private readonly suggestions: readonly Topic[];
  private readonly byTopic: ReadonlyMap<Topic, TopicCategory>;

  constructor(categories: readonly TopicCategory[], suggestions: readonly Topic[]) {
    this.categoryList = Object.freeze(categories.map((c) => Object.freeze(c)));
    this.suggestions = Object.freeze([...suggestions]);

    const byTopic = new Map<Topic, TopicCategory>();
    for (const category of this.categoryList) {
      for (const topic of category.topics) {
        // A topic listed twice belongs to its first category
        if (!byTopic.has(topic)) {
          byTopic.set(topic, category);
        }
      }
    }
    this.byTopic = byTopic;
  }

  /**
   * All categories in catalog order.
   */
  categories(): readonly TopicCategory[] {
    return this.categoryList;
  }

  /**
   * Category a topic belongs to, or null for free-text topics outside the catalog.
   */
  findCategory(topic: string): TopicCategory | null {
    const canonical = tryCreateTopic(topic);
    if (canonical === null) return null;
    return this.byTopic.get(canonical) ?? null;
  }

  /**
   * Every catalog topic in category order, without duplicates.
   */
  allTopics(): readonly Topic[] {
    return Array.from(this.byTopic.keys());
  }

  /**
   * Common topics to block, minus those already blocked.
   */
  quickBlockSuggestions(
    blocked: ReadonlySet<Topic>,
    limit: number = DEFAULT_SUGGESTION_LIMIT
  ): Topic[] {
    return this.suggestions.filter((t) => !blocked.has(t)).slice(0, Math.max(0, limit));
  }
}

/**
 * Build a taxonomy from catalog data.
 * @throws TaxonomyError when the catalog is malformed
 */
export function createTaxonomy(catalog: unknown): TopicTaxonomy {
  const parsed = catalogSchema.safeParse(catalog);
  if (!parsed.success) {
    throw new TaxonomyError(`Invalid taxonomy catalog: ${parsed.error.message}`, {
      cause: parsed.error,
    });
  }

  const categories = parsed.data.categories.map((c): TopicCategory => {
    const topics = collectTopics(c.topics);
    if (topics.length !== c.topics.length) {
      const invalid = c.topics.filter((t) => tryCreateTopic(t) === null);
      if (invalid.length > 0) {
        throw new TaxonomyError(
          `Category "${c.name}" has invalid topics: ${invalid.map((t) => JSON.stringify(t)).join(', ')}`
        );
      }
    }
    return { name: c.name, icon: c.icon, topics: Object.freeze(topics) };
  });

  return new TopicTaxonomy(categories, collectTopics(parsed.data.quickBlockSuggestions));
}

/**
 * Load a taxonomy catalog file.
 * @throws TaxonomyError when the file can't be read or is malformed
 */
export function loadTaxonomy(path: string = DEFAULT_TAXONOMY_PATH): TopicTaxonomy {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new TaxonomyError(`Cannot read taxonomy ${path}: ${describeError(error)}`, {
      cause: error,
    });
  }

  let catalog: unknown;
  try {
    catalog = JSON.parse(content) as unknown;
  } catch (error) {
    throw new TaxonomyError(`Taxonomy ${path} is not valid JSON: ${describeError(error)}`, {
      cause: error,
    });
  }

  return createTaxonomy(catalog);
}
