import { readFileSync, writeFileSync } from 'node:fs';
import { isRecord } from '../core/string_utils';
import type { TranslationCatalog } from '../types';

/**
 * Parse a catalog stored as a JSON object of source text to target text.
 * @param json - File contents.
 * @throws Error when the JSON is not an object whose values are all strings.
 */
export function parseCatalog(json: string): TranslationCatalog {
	const parsed: unknown = JSON.parse(json);
	if (!isRecord(parsed)) {
		throw new Error('Catalog must be a JSON object mapping source text to target text');
	}

	const catalog: TranslationCatalog = {};
	Object.entries(parsed).forEach(([source, target]) => {
		if (typeof target !== 'string') {
			throw new Error(`Catalog entry ${JSON.stringify(source)} has a non-string translation`);
		}
		catalog[source] = target;
	});
	return catalog;
}

/**
 * Serialize a catalog with stable two-space indentation and a trailing newline.
 */
export function formatCatalog(catalog: TranslationCatalog): string {
	return `${JSON.stringify(catalog, null, 2)}\n`;
}

/**
 * Read and validate a catalog file.
 * @param path - JSON file holding the catalog.
 */
export function readCatalog(path: string): TranslationCatalog {
	return parseCatalog(readFileSync(path, 'utf8'));
}

/**
 * Write a catalog as formatted JSON, replacing the file.
 * @param path - Destination file.
 * @param catalog - Entries to write.
 */
export function writeCatalog(path: string, catalog: TranslationCatalog): void {
	writeFileSync(path, formatCatalog(catalog));
}

/**
 * Merge resolved entries into a catalog, overwriting entries with the same source text.
 */
export function mergeCatalog(catalog: TranslationCatalog, updates: TranslationCatalog): TranslationCatalog {
	return { ...catalog, ...updates };
}
