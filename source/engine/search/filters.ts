/**
 * Post-hoc result filters.
 *
 * Filters look at the document's `path` and `language` fields. Without a
 * `path` field the doc id is taken as the path; without a `language` field
 * the language is inferred from the path's extension.
 */

import path from 'node:path';
import picomatch from 'picomatch';
import {EXTENSION_TO_LANGUAGE, FIELD_KEYS} from '../constants.js';
import type {SearchFilters} from './types.js';

type Fields = Readonly<Record<string, string>>;

/**
 * Predicate over (docId, fields). Fields are undefined for documents the
 * index does not know, which never pass a non-empty filter.
 */
export type DocumentPredicate = (
	docId: string,
	fields: Fields | undefined,
) => boolean;

export function hasFilters(filters: SearchFilters | undefined): boolean {
	return Boolean(filters?.language?.trim() || filters?.pathGlob?.trim());
}

export function documentPath(docId: string, fields: Fields): string {
	return (fields[FIELD_KEYS.PATH] ?? docId).replaceAll('\\', '/');
}

export function documentLanguage(
	docId: string,
	fields: Fields,
): string | undefined {
	const language = fields[FIELD_KEYS.LANGUAGE]?.trim();
	if (language) return language.toLowerCase();
	const ext = path.extname(documentPath(docId, fields)).toLowerCase();
	return EXTENSION_TO_LANGUAGE[ext];
}

/**
 * Compile filters into a predicate. Returns null when nothing is filtered.
 */
export function buildFilterPredicate(
	filters: SearchFilters | undefined,
): DocumentPredicate | null {
	if (!filters || !hasFilters(filters)) return null;

	const language = filters.language?.trim().toLowerCase();
	const glob = filters.pathGlob?.trim();
	const matchesGlob = glob ? picomatch(glob, {dot: true}) : null;

	return (docId, fields) => {
		if (!fields) return false;
		if (language && documentLanguage(docId, fields) !== language) {
			return false;
		}
		if (matchesGlob && !matchesGlob(documentPath(docId, fields))) {
			return false;
		}
		return true;
	};
}
