/**
 * Taxonomy module: static two-level category tables.
 */

export { createTaxonomy, getCategoryHierarchy } from './taxonomy.js';
export { loadDefaultTaxonomy, loadTaxonomyFile, DEFAULT_TAXONOMY_PATH } from './load.js';
export type { Taxonomy, KeywordShortcut } from './types.js';
