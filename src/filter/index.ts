export type { ContentFilterOptions, CompiledFilter } from './content-filter.js';
export {
  compileFilter,
  evaluateItem,
  buildSearchableText,
  DEFAULT_BOOST_UNIT,
} from './content-filter.js';
export type { TopicMatcher } from './topic-matcher.js';
export { createTopicMatcher, topicPattern } from './topic-matcher.js';
