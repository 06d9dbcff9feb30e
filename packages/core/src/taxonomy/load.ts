/**
 * Bundled default taxonomy (assets/taxonomy.json).
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createTaxonomy } from './taxonomy.js';
import type { Taxonomy } from './types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

// src/taxonomy/load.ts -> package root is two levels up (same from dist/taxonomy)
export const DEFAULT_TAXONOMY_PATH = join(__dirname, '..', '..', 'assets', 'taxonomy.json');

let defaultTaxonomy: Taxonomy | null = null;

/**
 * Load a taxonomy from a JSON file.
 */
export function loadTaxonomyFile(path: string): Taxonomy {
    const content = readFileSync(path, 'utf-8');
    return createTaxonomy(JSON.parse(content));
}

/**
 * The default taxonomy, built on first use and shared afterwards.
 */
export function loadDefaultTaxonomy(): Taxonomy {
    if (!defaultTaxonomy) {
        defaultTaxonomy = loadTaxonomyFile(DEFAULT_TAXONOMY_PATH);
    }
    return defaultTaxonomy;
}
