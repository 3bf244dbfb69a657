/**
 * Topic - canonical free-text label for an interest or a blocked keyword.
 *
 * Raw strings from the UI are never compared directly. Everything goes
 * through canonicalizeText() first, and only createTopic() can mint a Topic.
 */

import { InvalidTopicError } from '../core/errors.js';

declare const topicBrand: unique symbol;

/**
 * A canonicalized topic string.
 * Two topics are equal exactly when their strings are equal.
 */
export type Topic = string & { readonly [topicBrand]: true };

/** Longest accepted topic, in characters after canonicalization */
export const MAX_TOPIC_LENGTH = 64;

const HAS_LETTER_OR_DIGIT = /[\p{L}\p{N}]/u;

/**
 * Canonical text form shared by topics and searchable item text:
 * NFKC, lower-case, trimmed, whitespace runs collapsed to one space.
 */
export function canonicalizeText(text: string): string {
  return text.normalize('NFKC').toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Canonicalize and validate a raw topic.
 * Returns null when the input cannot be a topic.
 */
export function tryCreateTopic(raw: string): Topic | null {
  if (typeof raw !== 'string') return null;

  const canonical = canonicalizeText(raw);
  if (canonical.length === 0 || canonical.length > MAX_TOPIC_LENGTH) {
    return null;
  }
  if (!HAS_LETTER_OR_DIGIT.test(canonical)) {
    return null;
  }

  return canonical as Topic;
}

/**
 * Canonicalize and validate a raw topic.
 * @throws InvalidTopicError when the input is empty, too long or has no letter or digit
 */
export function createTopic(raw: string): Topic {
  const topic = tryCreateTopic(raw);
  if (topic === null) {
    throw new InvalidTopicError(raw);
  }
  return topic;
}

/**
 * Canonicalize a list of raw topics, dropping invalid ones and duplicates.
 * Order of first occurrence is kept.
 */
export function collectTopics(raws: Iterable<string>): Topic[] {
  const seen = new Set<Topic>();
  for (const raw of raws) {
    const topic = tryCreateTopic(raw);
    if (topic !== null) {
      seen.add(topic);
    }
  }
  return Array.from(seen);
}

/**
 * Sort topics by code unit order (locale independent).
 */
export function sortTopics(topics: Iterable<Topic>): Topic[] {
  return Array.from(topics).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}
