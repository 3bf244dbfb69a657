export type { TopicCategory, TaxonomyCatalog } from './topic-taxonomy.js';
export {
  TopicTaxonomy,
  createTaxonomy,
  loadTaxonomy,
  DEFAULT_TAXONOMY_PATH,
  DEFAULT_SUGGESTION_LIMIT,
} from './topic-taxonomy.js';
