/**
 * Core type definitions.
 */

export type * from './logger.js';
export type * from './preferences.js';
export type { Topic } from './topic.js';

export {
  MAX_TOPIC_LENGTH,
  canonicalizeText,
  createTopic,
  tryCreateTopic,
  collectTopics,
  sortTopics,
} from './topic.js';
export { createEmptyPreferenceSet, preferenceSetsEqual } from './preferences.js';
