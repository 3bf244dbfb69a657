/**
 * Topic matching against canonical item text.
 */

import type { MatchMode } from '../types/preferences.js';
import type { Topic } from '../types/topic.js';

/**
 * Tests whether a topic occurs in canonical text.
 */
export type TopicMatcher = (text: string) => boolean;

/** Characters that join the words of a phrase topic */
const WORD_JOINERS = /[\s-]+/;

/**
 * Escape special regex characters in a string.
 */
function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function topicWords(topic: Topic): string[] {
  return topic.split(WORD_JOINERS).filter((w) => w.length > 0);
}

/**
 * Topics with the same key match exactly the same texts.
 * In word-boundary mode "family vlog" and "family-vlog" share a key.
 */
export function matchKey(topic: Topic, mode: MatchMode = 'word-boundary'): string {
  return mode === 'substring' ? topic : topicWords(topic).join(' ');
}

/**
 * Build the word-boundary pattern for a topic.
 *
 * Words of the topic may be joined by spaces or hyphens in the text, and the
 * match may not touch a letter or digit on either side: "asmr" matches
 * "asmr eating" and "#asmr" but not "asmrookie".
 */
export function topicPattern(topic: Topic): RegExp {
  const body = topicWords(topic).map(escapeRegex).join('[\\s-]+');
  return new RegExp(`(?<![\\p{L}\\p{N}])${body}(?![\\p{L}\\p{N}])`, 'u');
}

/**
 * Create a matcher for one topic.
 */
export function createTopicMatcher(topic: Topic, mode: MatchMode = 'word-boundary'): TopicMatcher {
  if (mode === 'substring') {
    return (text) => text.includes(topic);
  }
  const pattern = topicPattern(topic);
  return (text) => pattern.test(text);
}
