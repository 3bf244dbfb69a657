export type { FeedSummary } from './feed-pipeline.js';
export {
  applyPreferences,
  explainFeed,
  rankDecisions,
  summarizeDecisions,
  FeedPersonalizer,
} from './feed-pipeline.js';
